/**
 * KubeQuery AI - Indexer
 * ======================
 * Offline job: load the documentation corpus, embed it and bulk-load it
 * into Elasticsearch. Not on the query path.
 */

import { readFile } from 'fs/promises';
import type { estypes } from '@elastic/elasticsearch';
import { z } from 'zod';
import { createContextLogger } from '../../utils/logger';
import type { Embedder } from './embedder';
import type { IndexedDocument } from './types';

const indexerLogger = createContextLogger('indexer');

// ============================================
// CONFIGURATION
// ============================================

const BULK_BATCH_SIZE = 500;

/** The part of the Elasticsearch client the indexing job talks to */
export interface IndexEngine {
  bulk(params: estypes.BulkRequest<IndexedDocument>): Promise<estypes.BulkResponse>;
  indices: {
    exists(params: estypes.IndicesExistsRequest): Promise<boolean>;
    create(params: estypes.IndicesCreateRequest): Promise<estypes.IndicesCreateResponse>;
    delete(params: estypes.IndicesDeleteRequest): Promise<estypes.IndicesDeleteResponse>;
  };
}

export const sourceDocumentSchema = z.object({
  id: z.union([z.string(), z.number()]).transform(String),
  title: z.string(),
  text: z.string(),
  source_file: z.string().default(''),
});

export type SourceDocument = z.infer<typeof sourceDocumentSchema>;

// ============================================
// LOADING & ENCODING
// ============================================

export async function loadDocuments(filePath: string): Promise<SourceDocument[]> {
  let raw: string;
  try {
    raw = await readFile(filePath, 'utf-8');
  } catch (err) {
    throw new Error(`Documents file not found or unreadable at ${filePath}`, { cause: err });
  }

  return z.array(sourceDocumentSchema).parse(JSON.parse(raw));
}

/**
 * Adds title, text and title+text vectors to every document
 */
export async function encodeDocuments(documents: SourceDocument[], embedder: Embedder): Promise<IndexedDocument[]> {
  const titles = await embedder.embedMany(documents.map((doc) => doc.title));
  const texts = await embedder.embedMany(documents.map((doc) => doc.text));
  const titleTexts = await embedder.embedMany(documents.map((doc) => `${doc.title} ${doc.text}`));

  return documents.map((doc, i) => ({
    ...doc,
    title_vector: titles[i] ?? [],
    text_vector: texts[i] ?? [],
    title_text_vector: titleTexts[i] ?? [],
  }));
}

// ============================================
// INDEX MANAGEMENT
// ============================================

export function buildIndexMapping(dimensions: number): Omit<estypes.IndicesCreateRequest, 'index'> {
  const denseVector = {
    type: 'dense_vector',
    dims: dimensions,
    index: true,
    similarity: 'cosine',
  } as const;

  return {
    settings: {
      number_of_shards: 1,
      number_of_replicas: 0,
    },
    mappings: {
      properties: {
        text: { type: 'text' },
        title: { type: 'keyword' },
        source_file: { type: 'text' },
        id: { type: 'keyword' },
        title_vector: denseVector,
        text_vector: denseVector,
        title_text_vector: denseVector,
      },
    },
  };
}

/**
 * Drops the index when present, then creates it with the vector mapping
 */
export async function recreateIndex(engine: IndexEngine, indexName: string, dimensions: number): Promise<void> {
  if (await engine.indices.exists({ index: indexName })) {
    indexerLogger.info({ index: indexName }, `Deleting existing index: ${indexName}`);
    await engine.indices.delete({ index: indexName });
  }

  indexerLogger.info({ index: indexName, dimensions }, `Creating index: ${indexName}`);
  await engine.indices.create({ index: indexName, ...buildIndexMapping(dimensions) });
}

export async function bulkIndex(
  engine: IndexEngine,
  indexName: string,
  documents: IndexedDocument[],
  batchSize = BULK_BATCH_SIZE
): Promise<number> {
  let indexed = 0;

  for (let start = 0; start < documents.length; start += batchSize) {
    const batch = documents.slice(start, start + batchSize);
    const operations = batch.flatMap((doc) => [{ index: { _index: indexName, _id: doc.id } }, doc]);

    const response = await engine.bulk({ operations, refresh: true });

    if (response.errors) {
      const failed = response.items.find((item) => item.index?.error);
      const reason = failed?.index?.error?.reason ?? 'unknown reason';
      throw new Error(`Bulk indexing into ${indexName} failed: ${reason}`);
    }

    indexed += batch.length;
    indexerLogger.info({ index: indexName, indexed, total: documents.length }, `Indexed ${indexed}/${documents.length}`);
  }

  return indexed;
}

// ============================================
// JOB
// ============================================

export interface IndexingJobOptions {
  engine: IndexEngine;
  embedder: Embedder;
  indexName: string;
  docsPath: string;
}

export async function runIndexingJob({ engine, embedder, indexName, docsPath }: IndexingJobOptions): Promise<number> {
  const documents = await loadDocuments(docsPath);
  indexerLogger.info({ count: documents.length, docsPath }, `Loaded ${documents.length} documents`);

  const encoded = await encodeDocuments(documents, embedder);
  indexerLogger.info({ model: embedder.model }, 'Encoded all documents');

  await recreateIndex(engine, indexName, embedder.dimensions);
  return bulkIndex(engine, indexName, encoded);
}
