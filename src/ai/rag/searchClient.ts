/**
 * KubeQuery AI - Hybrid Search Client
 * ===================================
 * Fused k-NN + BM25 retrieval against Elasticsearch in a single request.
 */

import type { estypes } from '@elastic/elasticsearch';
import { z } from 'zod';
import { createError } from '../../lib/errors';
import { searchLogger } from '../../utils/logger';
import {
  documentSourceSchema,
  SOURCE_FIELDS,
  type RetrievedDocument,
  type SearchResult,
  type VectorField,
} from './types';

// ============================================
// CONFIGURATION
// ============================================

export const DEFAULT_K = 5;
export const DEFAULT_CANDIDATE_POOL = 10_000;

/** Weight of each side of the fused score */
export const KNN_BOOST = 0.5;
export const KEYWORD_BOOST = 0.5;

export interface EngineCallOptions {
  signal?: AbortSignal;
}

/** The part of the Elasticsearch client this module talks to */
export interface SearchEngine {
  search(params: estypes.SearchRequest, options?: EngineCallOptions): Promise<estypes.SearchResponse<unknown>>;
  indices: {
    exists(params: estypes.IndicesExistsRequest, options?: EngineCallOptions): Promise<boolean>;
  };
}

export interface HybridSearchParams {
  indexName: string;
  queryText: string;
  queryVector: number[];
  vectorField: VectorField;
  k?: number;
  candidatePool?: number;
  signal?: AbortSignal;
}

export interface HybridSearchClient {
  indexExists(indexName: string, options?: { signal?: AbortSignal }): Promise<boolean>;
  search(params: HybridSearchParams): Promise<SearchResult>;
}

const indexNotFoundSchema = z.object({
  statusCode: z.literal(404),
  body: z.object({
    error: z.object({ type: z.literal('index_not_found_exception') }),
  }),
});

function isIndexNotFound(err: unknown): boolean {
  return indexNotFoundSchema.safeParse(err).success;
}

/**
 * Request body blending a knn clause and a best_fields multi_match,
 * each with its own boost, into one ranked list.
 */
export function buildHybridQuery(params: HybridSearchParams): estypes.SearchRequest {
  const k = params.k ?? DEFAULT_K;

  return {
    index: params.indexName,
    size: k,
    knn: {
      field: params.vectorField,
      query_vector: params.queryVector,
      k,
      num_candidates: params.candidatePool ?? DEFAULT_CANDIDATE_POOL,
      boost: KNN_BOOST,
    },
    query: {
      bool: {
        must: {
          multi_match: {
            query: params.queryText,
            fields: ['title', 'text'],
            type: 'best_fields',
            boost: KEYWORD_BOOST,
          },
        },
      },
    },
    _source: [...SOURCE_FIELDS],
  };
}

export class ElasticsearchHybridSearchClient implements HybridSearchClient {
  constructor(private readonly engine: SearchEngine) {}

  async indexExists(indexName: string, options: { signal?: AbortSignal } = {}): Promise<boolean> {
    try {
      return await this.engine.indices.exists({ index: indexName }, { signal: options.signal });
    } catch (err) {
      throw createError.search.unavailable(indexName, err);
    }
  }

  async search(params: HybridSearchParams): Promise<SearchResult> {
    const k = params.k ?? DEFAULT_K;

    let response: estypes.SearchResponse<unknown>;
    try {
      response = await this.engine.search(buildHybridQuery(params), { signal: params.signal });
    } catch (err) {
      if (isIndexNotFound(err)) {
        throw createError.search.indexNotFound(params.indexName, err);
      }
      throw createError.search.unavailable(params.indexName, err);
    }

    const documents: RetrievedDocument[] = [];
    for (const hit of response.hits.hits) {
      const parsed = documentSourceSchema.safeParse(hit._source);
      if (!parsed.success) {
        searchLogger.warn(
          { index: params.indexName, hitId: hit._id, issues: parsed.error.issues },
          'Dropping malformed search hit'
        );
        continue;
      }
      documents.push({
        id: parsed.data.id,
        title: parsed.data.title,
        text: parsed.data.text,
        sourceFile: parsed.data.source_file,
      });
    }

    searchLogger.debug(
      { index: params.indexName, vectorField: params.vectorField, hits: documents.length },
      `Found ${documents.length} results for query: "${params.queryText.substring(0, 50)}"`
    );

    return documents.slice(0, k);
  }
}
