/**
 * KubeQuery - Service wiring
 * Builds every pipeline collaborator from validated configuration.
 */

import { Client } from '@elastic/elasticsearch';
import {
  CostAccountant,
  ElasticsearchHybridSearchClient,
  LLMCompletionGateway,
  LLMEmbedder,
  LLMQueryRewriter,
  loadPricingTable,
  OpenAIClient,
  QueryOrchestrator,
  RelevanceEvaluator,
} from './ai';
import { SupabaseConversationStore, type ConversationStore } from './data';
import type { Env } from './env';
import { createSupabaseAdmin } from './helpers/supabase';
import { appLogger } from './utils/logger';

export interface RagServices {
  elasticsearch: Client;
  searchClient: ElasticsearchHybridSearchClient;
  embedder: LLMEmbedder;
  orchestrator: QueryOrchestrator;
  store: ConversationStore | null;
}

export function createElasticsearchClient(env: Pick<Env, 'ELASTICSEARCH_HOST'>): Client {
  return new Client({ node: env.ELASTICSEARCH_HOST });
}

export function createEmbedder(
  env: Pick<Env, 'OPENAI_API_KEY' | 'OPENAI_BASE_URL' | 'EMBEDDING_BASE_URL' | 'EMBEDDING_MODEL' | 'EMBEDDING_DIMENSIONS'>
): LLMEmbedder {
  const client = new OpenAIClient({
    apiKey: env.OPENAI_API_KEY,
    baseUrl: env.EMBEDDING_BASE_URL ?? env.OPENAI_BASE_URL,
  });
  return new LLMEmbedder(client, { model: env.EMBEDDING_MODEL, dimensions: env.EMBEDDING_DIMENSIONS });
}

export function createRagServices(env: Env): RagServices {
  const elasticsearch = createElasticsearchClient(env);
  const searchClient = new ElasticsearchHybridSearchClient(elasticsearch);
  const embedder = createEmbedder(env);

  const llm = new OpenAIClient({ apiKey: env.OPENAI_API_KEY, baseUrl: env.OPENAI_BASE_URL });
  const gateway = new LLMCompletionGateway(llm);
  const evaluationModel = env.EVALUATION_MODEL ?? env.LLM_MODEL;
  const costAccountant = new CostAccountant(loadPricingTable(env.PRICING_TABLE));

  for (const model of new Set([env.LLM_MODEL, evaluationModel])) {
    if (!costAccountant.hasModel(model)) {
      appLogger.warn({ model }, `No price configured for ${model}, its calls will be reported at zero cost`);
    }
  }

  const orchestrator = new QueryOrchestrator(
    {
      embedder,
      searchClient,
      gateway,
      evaluator: new RelevanceEvaluator(gateway, evaluationModel),
      costAccountant,
      rewriter: env.QUERY_REWRITE_ENABLED ? new LLMQueryRewriter(gateway, env.LLM_MODEL) : undefined,
    },
    {
      indexName: env.ELASTICSEARCH_INDEX,
      vectorField: env.SEARCH_VECTOR_FIELD,
      model: env.LLM_MODEL,
      stageTimeoutMs: env.STAGE_TIMEOUT_MS,
    }
  );

  const supabase = createSupabaseAdmin({ url: env.SUPABASE_URL, serviceRoleKey: env.SUPABASE_SERVICE_ROLE_KEY });
  const store = supabase ? new SupabaseConversationStore(supabase) : null;

  appLogger.info(
    {
      index: env.ELASTICSEARCH_INDEX,
      vectorField: env.SEARCH_VECTOR_FIELD,
      model: env.LLM_MODEL,
      evaluationModel,
      embeddingModel: env.EMBEDDING_MODEL,
      rewrite: env.QUERY_REWRITE_ENABLED,
      storage: store !== null,
    },
    'RAG services initialized'
  );

  return { elasticsearch, searchClient, embedder, orchestrator, store };
}
