/**
 * KubeQuery AI - RAG Types
 * ========================
 * Data contracts between pipeline stages.
 */

import { z } from 'zod';

// ============================================
// DOCUMENTS
// ============================================

export const VECTOR_FIELDS = ['title_vector', 'text_vector', 'title_text_vector'] as const;

export type VectorField = (typeof VECTOR_FIELDS)[number];

/** Fields the search boundary returns for each hit */
export const SOURCE_FIELDS = ['text', 'title', 'source_file', 'id'] as const;

/** Raw `_source` of a hit, validated at the search boundary */
export const documentSourceSchema = z.object({
  id: z.union([z.string(), z.number()]).transform(String),
  title: z.string(),
  text: z.string(),
  source_file: z.string().default(''),
});

export interface RetrievedDocument {
  readonly id: string;
  readonly title: string;
  readonly text: string;
  readonly sourceFile: string;
}

/** Ordered, at most `k` documents */
export type SearchResult = readonly RetrievedDocument[];

/** Document as stored in the index, vectors included */
export interface IndexedDocument {
  id: string;
  title: string;
  text: string;
  source_file: string;
  title_vector: number[];
  text_vector: number[];
  title_text_vector: number[];
}

// ============================================
// RELEVANCE
// ============================================

export const RELEVANCE_LABELS = ['RELEVANT', 'PARTLY_RELEVANT', 'NON_RELEVANT'] as const;

export type RelevanceLabel = (typeof RELEVANCE_LABELS)[number];

export type RelevanceVerdict = RelevanceLabel | 'UNKNOWN';

export interface TokenUsage {
  promptTokens: number;
  completionTokens: number;
  totalTokens: number;
}

export const EMPTY_USAGE: TokenUsage = Object.freeze({ promptTokens: 0, completionTokens: 0, totalTokens: 0 });

export interface RelevanceEvaluation {
  verdict: RelevanceVerdict;
  explanation: string;
  model: string;
  usage: TokenUsage;
}

// ============================================
// PIPELINE
// ============================================

const QUERY_STAGES = [
  'ReceivedQuery',
  'IndexChecked',
  'QueryRewritten',
  'Embedded',
  'Searched',
  'PromptBuilt',
  'AnswerGenerated',
  'RelevanceEvaluated',
  'CostComputed',
  'Complete',
] as const;

export type QueryStage = (typeof QUERY_STAGES)[number];

/**
 * Everything one query() call produces. Carries every field the
 * conversation log persists.
 */
export interface QueryResult {
  question: string;
  /** Query used for embedding and lexical search (rewritten or original) */
  searchQuery: string;
  answer: string;
  searchResults: SearchResult;
  /** Seconds, wall clock for the whole pipeline */
  responseTime: number;
  relevance: RelevanceVerdict;
  relevanceExplanation: string;
  model: string;
  evaluationModel: string;
  promptTokens: number;
  completionTokens: number;
  totalTokens: number;
  evalPromptTokens: number;
  evalCompletionTokens: number;
  evalTotalTokens: number;
  rewritePromptTokens: number;
  rewriteCompletionTokens: number;
  rewriteTotalTokens: number;
  /** USD across generation, evaluation and rewrite */
  cost: number;
}
