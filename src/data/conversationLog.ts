/**
 * KubeQuery Data - Conversation Log
 * =================================
 * Supabase-backed store for answered questions and user feedback.
 * Tables: public.conversations, public.feedback (sql/init_db.sql)
 */

import type { SupabaseClient } from '@supabase/supabase-js';
import { v4 as uuidv4 } from 'uuid';
import { z } from 'zod';
import { createError } from '../lib/errors';
import { storeLogger } from '../utils/logger';
import type {
  ConversationRecord,
  ConversationStats,
  ConversationStore,
  FeedbackEntry,
  FeedbackInput,
  FeedbackStats,
} from './types';

const STATS_WINDOW_MS = 24 * 60 * 60 * 1000;
const DEFAULT_RECENT_LIMIT = 10;

const EMPTY_CONVERSATION_STATS: ConversationStats = {
  totalConversations: 0,
  avgResponseTime: 0,
  avgCost: 0,
  totalCost: 0,
  relevantCount: 0,
  partlyRelevantCount: 0,
  nonRelevantCount: 0,
  unknownCount: 0,
};

const feedbackRowSchema = z.object({
  id: z.string(),
  question: z.string(),
  answer: z.string(),
  feedback: z.union([z.literal(1), z.literal(-1)]),
  timestamp: z.string(),
  session_id: z.string().nullable(),
});

// Row shape of public.conversation_stats(since) in sql/init_db.sql
const conversationStatsRowSchema = z.object({
  total_conversations: z.coerce.number(),
  avg_response_time: z.coerce.number().nullable(),
  avg_cost: z.coerce.number().nullable(),
  total_cost: z.coerce.number().nullable(),
  relevant_count: z.coerce.number(),
  partly_relevant_count: z.coerce.number(),
  non_relevant_count: z.coerce.number(),
  unknown_count: z.coerce.number(),
});

function toFeedbackEntry(row: z.infer<typeof feedbackRowSchema>): FeedbackEntry {
  return {
    id: row.id,
    question: row.question,
    answer: row.answer,
    feedback: row.feedback,
    timestamp: row.timestamp,
    sessionId: row.session_id,
  };
}

export class SupabaseConversationStore implements ConversationStore {
  constructor(private readonly supabase: SupabaseClient) {}

  // ============================================
  // CONVERSATIONS
  // ============================================

  async saveConversation(record: ConversationRecord): Promise<void> {
    const { error } = await this.supabase.from('conversations').insert({
      id: record.conversationId,
      question: record.question,
      answer: record.answer,
      relevance: record.relevance,
      relevance_explanation: record.relevanceExplanation,
      prompt_tokens: record.promptTokens,
      completion_tokens: record.completionTokens,
      total_tokens: record.totalTokens,
      eval_prompt_tokens: record.evalPromptTokens,
      eval_completion_tokens: record.evalCompletionTokens,
      eval_total_tokens: record.evalTotalTokens,
      rewrite_prompt_tokens: record.rewritePromptTokens,
      rewrite_completion_tokens: record.rewriteCompletionTokens,
      rewrite_total_tokens: record.rewriteTotalTokens,
      openai_cost: record.cost,
      response_time: record.responseTime,
      timestamp: record.timestamp.toISOString(),
      session_id: record.sessionId,
    });

    if (error) {
      storeLogger.error({ conversationId: record.conversationId, error: error.message }, 'Save conversation failed');
      throw createError.store.unavailable('saveConversation', new Error(error.message));
    }

    storeLogger.debug({ conversationId: record.conversationId }, 'Conversation saved');
  }

  async getConversationStats(now: Date = new Date()): Promise<ConversationStats> {
    const since = new Date(now.getTime() - STATS_WINDOW_MS).toISOString();

    const { data, error } = await this.supabase.rpc('conversation_stats', { since });

    if (error) {
      storeLogger.error({ error: error.message }, 'Get conversation stats failed');
      throw createError.store.unavailable('getConversationStats', new Error(error.message));
    }

    const [row] = z.array(conversationStatsRowSchema).parse(data ?? []);
    if (!row) {
      return { ...EMPTY_CONVERSATION_STATS };
    }

    return {
      totalConversations: row.total_conversations,
      avgResponseTime: row.avg_response_time ?? 0,
      avgCost: row.avg_cost ?? 0,
      totalCost: row.total_cost ?? 0,
      relevantCount: row.relevant_count,
      partlyRelevantCount: row.partly_relevant_count,
      nonRelevantCount: row.non_relevant_count,
      unknownCount: row.unknown_count,
    };
  }

  // ============================================
  // FEEDBACK
  // ============================================

  async saveFeedback(input: FeedbackInput): Promise<FeedbackEntry> {
    const entry: FeedbackEntry = {
      id: uuidv4(),
      question: input.question,
      answer: input.answer,
      feedback: input.feedback,
      timestamp: new Date().toISOString(),
      sessionId: input.sessionId ?? null,
    };

    const { error } = await this.supabase.from('feedback').insert({
      id: entry.id,
      question: entry.question,
      answer: entry.answer,
      feedback: entry.feedback,
      timestamp: entry.timestamp,
      session_id: entry.sessionId,
    });

    if (error) {
      storeLogger.error({ error: error.message }, 'Save feedback failed');
      throw createError.store.unavailable('saveFeedback', new Error(error.message));
    }

    return entry;
  }

  async getFeedbackStats(sessionId?: string): Promise<FeedbackStats> {
    const [total, positive, negative] = await Promise.all([
      this.countFeedback(sessionId),
      this.countFeedback(sessionId, 1),
      this.countFeedback(sessionId, -1),
    ]);

    return { total, positive, negative };
  }

  /**
   * Row count from the Content-Range header; no rows are transferred
   */
  private async countFeedback(sessionId?: string, value?: 1 | -1): Promise<number> {
    let query = this.supabase.from('feedback').select('*', { count: 'exact', head: true });

    if (sessionId) {
      query = query.eq('session_id', sessionId);
    }
    if (value !== undefined) {
      query = query.eq('feedback', value);
    }

    const { count, error } = await query;

    if (error) {
      storeLogger.error({ error: error.message }, 'Get feedback stats failed');
      throw createError.store.unavailable('getFeedbackStats', new Error(error.message));
    }

    return count ?? 0;
  }

  async getRecentFeedback(limit = DEFAULT_RECENT_LIMIT): Promise<FeedbackEntry[]> {
    const { data, error } = await this.supabase
      .from('feedback')
      .select('id, question, answer, feedback, timestamp, session_id')
      .order('timestamp', { ascending: false })
      .limit(limit);

    if (error) {
      storeLogger.error({ error: error.message }, 'Get recent feedback failed');
      throw createError.store.unavailable('getRecentFeedback', new Error(error.message));
    }

    return z.array(feedbackRowSchema).parse(data ?? []).map(toFeedbackEntry);
  }
}
