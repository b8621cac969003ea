/**
 * KubeQuery AI - RAG Module Index
 * ===============================
 * Centralized exports for the RAG pipeline.
 */

export * from './types';

// Query path
export { LLMEmbedder } from './embedder';
export type { Embedder, LLMEmbedderOptions } from './embedder';
export {
  ElasticsearchHybridSearchClient,
  buildHybridQuery,
  DEFAULT_K,
  DEFAULT_CANDIDATE_POOL,
  KNN_BOOST,
  KEYWORD_BOOST,
} from './searchClient';
export type { HybridSearchClient, HybridSearchParams, SearchEngine } from './searchClient';
export {
  ANSWER_PROMPT_TEMPLATE,
  EVALUATION_PROMPT_TEMPLATE,
  REWRITE_PROMPT_TEMPLATE,
  buildContext,
  buildAnswerPrompt,
  buildEvaluationPrompt,
  buildRewritePrompt,
} from './prompts';
export { RelevanceEvaluator, parseEvaluation, NO_EXPLANATION } from './evaluator';
export type { ParsedEvaluation } from './evaluator';
export { IdentityQueryRewriter, LLMQueryRewriter } from './queryRewriter';
export type { QueryRewriter, RewrittenQuery } from './queryRewriter';
export { QueryOrchestrator } from './orchestrator';
export type { QueryOrchestratorConfig, QueryOrchestratorDeps, QueryOptions } from './orchestrator';

// Indexer
export {
  loadDocuments,
  encodeDocuments,
  buildIndexMapping,
  recreateIndex,
  bulkIndex,
  runIndexingJob,
  sourceDocumentSchema,
} from './indexer';
export type { IndexEngine, IndexingJobOptions, SourceDocument } from './indexer';
