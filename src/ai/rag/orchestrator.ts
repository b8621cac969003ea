/**
 * KubeQuery AI - Query Orchestrator
 * =================================
 * question -> (rewrite) -> embed -> hybrid search -> prompt -> answer
 *          -> relevance evaluation -> cost -> QueryResult
 *
 * Stages run strictly in sequence. Any failure aborts the query with a typed
 * error, except relevance evaluation, which degrades to UNKNOWN so that an
 * answer already generated (and paid for) still reaches the caller.
 */

import type { CompletionGateway } from '../llm/CompletionGateway';
import type { CostAccountant } from '../llm/cost';
import { createError, describeCause, isRagError, RagError } from '../../lib/errors';
import { createContextLogger, createPerformanceLogger, generateCorrelationId, type Logger } from '../../utils/logger';
import type { Embedder } from './embedder';
import type { RelevanceEvaluator } from './evaluator';
import { buildAnswerPrompt } from './prompts';
import { IdentityQueryRewriter, type QueryRewriter } from './queryRewriter';
import { DEFAULT_CANDIDATE_POOL, DEFAULT_K, type HybridSearchClient } from './searchClient';
import type { QueryResult, QueryStage, RelevanceEvaluation, VectorField } from './types';

export interface QueryOrchestratorDeps {
  embedder: Embedder;
  searchClient: HybridSearchClient;
  gateway: CompletionGateway;
  evaluator: RelevanceEvaluator;
  costAccountant: CostAccountant;
  /** Defaults to a pass-through */
  rewriter?: QueryRewriter;
}

export interface QueryOrchestratorConfig {
  indexName: string;
  vectorField: VectorField;
  /** Generation model */
  model: string;
  k?: number;
  candidatePool?: number;
  /** Deadline applied to each external call; none when unset */
  stageTimeoutMs?: number;
}

export interface QueryOptions {
  correlationId?: string;
}

export class QueryOrchestrator {
  private readonly rewriter: QueryRewriter;

  constructor(
    private readonly deps: QueryOrchestratorDeps,
    private readonly config: QueryOrchestratorConfig
  ) {
    this.rewriter = deps.rewriter ?? new IdentityQueryRewriter();
  }

  get indexName(): string {
    return this.config.indexName;
  }

  /**
   * Fresh deadline signal for one external call
   */
  private deadline(): AbortSignal | undefined {
    return this.config.stageTimeoutMs ? AbortSignal.timeout(this.config.stageTimeoutMs) : undefined;
  }

  /**
   * Run one stage; failures abort the query tagged with the stage name
   */
  private async runStage<T>(stage: QueryStage, log: Logger, correlationId: string, operation: () => Promise<T>): Promise<T> {
    try {
      return await operation();
    } catch (err) {
      const error: RagError = isRagError(err)
        ? err.withContext({ stage, correlationId })
        : createError.system.internalServerError({ stage, correlationId }, err);

      log.warn({ stage, code: error.code, err: error }, `Query aborted at ${stage}: ${error.message}`);
      throw error;
    }
  }

  async query(question: string, options: QueryOptions = {}): Promise<QueryResult> {
    const correlationId = options.correlationId ?? generateCorrelationId();
    const log = createContextLogger('orchestrator', correlationId);
    const perf = createPerformanceLogger('rag.query', correlationId);
    const { embedder, searchClient, gateway, evaluator, costAccountant } = this.deps;
    const { indexName, vectorField, model } = this.config;

    let stage: QueryStage = 'ReceivedQuery';
    const advance = (next: QueryStage, metadata: Record<string, unknown> = {}) => {
      log.debug({ from: stage, to: next, elapsedMs: perf.elapsedMs(), ...metadata }, `${stage} -> ${next}`);
      stage = next;
    };

    if (!question.trim()) {
      throw createError.system.validationError('question', 'must not be empty');
    }

    // Re-validated every query: the index may be created or dropped at any time
    const exists = await this.runStage('IndexChecked', log, correlationId, () =>
      searchClient.indexExists(indexName, { signal: this.deadline() })
    );
    if (!exists) {
      const error = createError.search.indexNotFound(indexName).withContext({ stage: 'IndexChecked', correlationId });
      log.warn({ stage: 'IndexChecked', code: error.code }, `Query aborted at IndexChecked: ${error.message}`);
      throw error;
    }
    advance('IndexChecked');

    const rewritten = await this.runStage('QueryRewritten', log, correlationId, () =>
      this.rewriter.rewrite(question, { signal: this.deadline() })
    );
    advance('QueryRewritten', { searchQuery: rewritten.query });

    const queryVector = await this.runStage('Embedded', log, correlationId, () =>
      embedder.embed(rewritten.query, { signal: this.deadline() })
    );
    advance('Embedded');

    const searchResults = await this.runStage('Searched', log, correlationId, () =>
      searchClient.search({
        indexName,
        queryText: rewritten.query,
        queryVector,
        vectorField,
        k: this.config.k ?? DEFAULT_K,
        candidatePool: this.config.candidatePool ?? DEFAULT_CANDIDATE_POOL,
        signal: this.deadline(),
      })
    );
    advance('Searched', { hits: searchResults.length });

    const prompt = buildAnswerPrompt(question, searchResults);
    advance('PromptBuilt', { promptLength: prompt.length });

    const generation = await this.runStage('AnswerGenerated', log, correlationId, () =>
      gateway.complete(prompt, model, { signal: this.deadline() })
    );
    advance('AnswerGenerated', { totalTokens: generation.totalTokens });

    const evaluation = await this.evaluateSoftly(question, generation.text, log);
    advance('RelevanceEvaluated', { relevance: evaluation.verdict });

    const cost =
      costAccountant.cost(model, generation.promptTokens, generation.completionTokens) +
      costAccountant.cost(evaluation.model, evaluation.usage.promptTokens, evaluation.usage.completionTokens) +
      (rewritten.model
        ? costAccountant.cost(rewritten.model, rewritten.usage.promptTokens, rewritten.usage.completionTokens)
        : 0);
    advance('CostComputed', { cost });

    const responseTime = perf.elapsedMs() / 1000;
    advance('Complete');
    perf.finish({ relevance: evaluation.verdict, cost, hits: searchResults.length });

    return {
      question,
      searchQuery: rewritten.query,
      answer: generation.text,
      searchResults,
      responseTime,
      relevance: evaluation.verdict,
      relevanceExplanation: evaluation.explanation,
      model,
      evaluationModel: evaluation.model,
      promptTokens: generation.promptTokens,
      completionTokens: generation.completionTokens,
      totalTokens: generation.totalTokens,
      evalPromptTokens: evaluation.usage.promptTokens,
      evalCompletionTokens: evaluation.usage.completionTokens,
      evalTotalTokens: evaluation.usage.totalTokens,
      rewritePromptTokens: rewritten.usage.promptTokens,
      rewriteCompletionTokens: rewritten.usage.completionTokens,
      rewriteTotalTokens: rewritten.usage.totalTokens,
      cost,
    };
  }

  /**
   * The one soft stage: any failure becomes an UNKNOWN verdict
   */
  private async evaluateSoftly(question: string, answer: string, log: Logger): Promise<RelevanceEvaluation> {
    const { evaluator } = this.deps;
    try {
      return await evaluator.evaluate(question, answer, { signal: this.deadline() });
    } catch (err) {
      log.warn({ stage: 'RelevanceEvaluated', err }, 'Relevance evaluation failed, continuing with UNKNOWN');
      return {
        verdict: 'UNKNOWN',
        explanation: `Evaluation failed: ${describeCause(err)}`,
        model: evaluator.modelId,
        usage: { promptTokens: 0, completionTokens: 0, totalTokens: 0 },
      };
    }
  }
}
