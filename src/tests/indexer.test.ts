/**
 * Indexing job tests
 */

import { afterEach, beforeEach, describe, it, expect } from 'vitest';
import { mkdtemp, rm, writeFile } from 'fs/promises';
import { tmpdir } from 'os';
import { join } from 'path';
import type { estypes } from '@elastic/elasticsearch';
import {
  buildIndexMapping,
  bulkIndex,
  encodeDocuments,
  loadDocuments,
  recreateIndex,
  runIndexingJob,
  type IndexEngine,
} from '@/ai/rag/indexer';
import type { IndexedDocument } from '@/ai/rag/types';
import { FixedEmbedder } from './helpers/fakes';

class FakeIndexEngine implements IndexEngine {
  readonly calls: string[] = [];
  readonly bulkRequests: estypes.BulkRequest<IndexedDocument>[] = [];

  constructor(
    private exists: boolean,
    private readonly bulkError?: string
  ) {}

  async bulk(params: estypes.BulkRequest<IndexedDocument>): Promise<estypes.BulkResponse> {
    this.calls.push('bulk');
    this.bulkRequests.push(params);
    if (this.bulkError) {
      return {
        took: 1,
        errors: true,
        items: [{ index: { _index: 'k8s', status: 400, error: { type: 'mapper_parsing_exception', reason: this.bulkError } } }],
      };
    }
    return { took: 1, errors: false, items: [] };
  }

  indices = {
    exists: async (): Promise<boolean> => {
      this.calls.push('exists');
      return this.exists;
    },
    create: async (params: estypes.IndicesCreateRequest): Promise<estypes.IndicesCreateResponse> => {
      this.calls.push(`create:${params.index}`);
      this.exists = true;
      return { index: params.index, acknowledged: true, shards_acknowledged: true };
    },
    delete: async (params: estypes.IndicesDeleteRequest): Promise<estypes.IndicesDeleteResponse> => {
      this.calls.push(`delete:${String(params.index)}`);
      return { acknowledged: true };
    },
  };
}

const doc = (id: string): IndexedDocument => ({
  id,
  title: `title ${id}`,
  text: `text ${id}`,
  source_file: '',
  title_vector: [0.1],
  text_vector: [0.1],
  title_text_vector: [0.1],
});

describe('Indexer', () => {
  let dir: string;

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), 'kubequery-'));
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  describe('loadDocuments', () => {
    it('parses and normalizes the corpus', async () => {
      const file = join(dir, 'documents.json');
      await writeFile(file, JSON.stringify([{ id: 1, title: 'Pods', text: 'Pod text', source_file: 'pods.md' }, { id: '2', title: 'Jobs', text: 'Job text' }]));

      expect(await loadDocuments(file)).toEqual([
        { id: '1', title: 'Pods', text: 'Pod text', source_file: 'pods.md' },
        { id: '2', title: 'Jobs', text: 'Job text', source_file: '' },
      ]);
    });

    it('names the path when the file is missing', async () => {
      const file = join(dir, 'missing.json');

      await expect(loadDocuments(file)).rejects.toThrow(`Documents file not found or unreadable at ${file}`);
    });
  });

  describe('encodeDocuments', () => {
    it('adds the three vectors', async () => {
      const embedder = new FixedEmbedder(2);

      const [encoded] = await encodeDocuments([{ id: '1', title: 'Pods', text: 'Pod text', source_file: '' }], embedder);

      expect(encoded).toEqual({
        id: '1',
        title: 'Pods',
        text: 'Pod text',
        source_file: '',
        title_vector: [0.1, 0.2],
        text_vector: [0.1, 0.2],
        title_text_vector: [0.1, 0.2],
      });
      expect(embedder.texts).toEqual(['Pods', 'Pod text', 'Pods Pod text']);
    });
  });

  describe('buildIndexMapping', () => {
    it('declares cosine dense vectors of the embedding dimension', () => {
      const mapping = buildIndexMapping(384);

      expect(mapping.mappings?.properties?.['title_vector']).toEqual({
        type: 'dense_vector',
        dims: 384,
        index: true,
        similarity: 'cosine',
      });
      expect(mapping.mappings?.properties?.['title']).toEqual({ type: 'keyword' });
    });
  });

  describe('recreateIndex', () => {
    it('drops an existing index before creating it', async () => {
      const engine = new FakeIndexEngine(true);

      await recreateIndex(engine, 'k8s', 3);

      expect(engine.calls).toEqual(['exists', 'delete:k8s', 'create:k8s']);
    });

    it('creates a missing index directly', async () => {
      const engine = new FakeIndexEngine(false);

      await recreateIndex(engine, 'k8s', 3);

      expect(engine.calls).toEqual(['exists', 'create:k8s']);
    });
  });

  describe('bulkIndex', () => {
    it('sends documents in batches keyed by id', async () => {
      const engine = new FakeIndexEngine(true);

      const count = await bulkIndex(engine, 'k8s', [doc('1'), doc('2'), doc('3')], 2);

      expect(count).toBe(3);
      expect(engine.bulkRequests).toHaveLength(2);
      expect(engine.bulkRequests[0]?.operations?.[0]).toEqual({ index: { _index: 'k8s', _id: '1' } });
      expect(engine.bulkRequests[1]?.operations).toEqual([{ index: { _index: 'k8s', _id: '3' } }, doc('3')]);
    });

    it('fails with the first item error', async () => {
      const engine = new FakeIndexEngine(true, 'failed to parse field [title_vector]');

      await expect(bulkIndex(engine, 'k8s', [doc('1')])).rejects.toThrow(
        'Bulk indexing into k8s failed: failed to parse field [title_vector]'
      );
    });
  });

  describe('runIndexingJob', () => {
    it('loads, encodes and indexes every document', async () => {
      const file = join(dir, 'documents.json');
      await writeFile(file, JSON.stringify([{ id: '1', title: 'Pods', text: 'Pod text' }]));
      const engine = new FakeIndexEngine(false);

      const count = await runIndexingJob({ engine, embedder: new FixedEmbedder(2), indexName: 'k8s', docsPath: file });

      expect(count).toBe(1);
      expect(engine.calls).toEqual(['exists', 'create:k8s', 'bulk']);
    });
  });
});
