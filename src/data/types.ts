/**
 * KubeQuery Data - Types
 * ======================
 * Records written by the conversation log and feedback store.
 */

import type { RelevanceVerdict } from '../ai/rag/types';

// ============================================
// CONVERSATIONS
// ============================================

export interface ConversationRecord {
  conversationId: string;
  sessionId: string | null;
  question: string;
  answer: string;
  relevance: RelevanceVerdict;
  relevanceExplanation: string;
  promptTokens: number;
  completionTokens: number;
  totalTokens: number;
  evalPromptTokens: number;
  evalCompletionTokens: number;
  evalTotalTokens: number;
  rewritePromptTokens: number;
  rewriteCompletionTokens: number;
  rewriteTotalTokens: number;
  /** USD */
  cost: number;
  /** Seconds */
  responseTime: number;
  timestamp: Date;
}

export interface ConversationStats {
  totalConversations: number;
  avgResponseTime: number;
  avgCost: number;
  totalCost: number;
  relevantCount: number;
  partlyRelevantCount: number;
  nonRelevantCount: number;
  unknownCount: number;
}

// ============================================
// FEEDBACK
// ============================================

export type FeedbackValue = 1 | -1;

export interface FeedbackInput {
  question: string;
  answer: string;
  feedback: FeedbackValue;
  sessionId?: string | null;
}

export interface FeedbackEntry {
  id: string;
  question: string;
  answer: string;
  feedback: FeedbackValue;
  timestamp: string;
  sessionId: string | null;
}

export interface FeedbackStats {
  total: number;
  positive: number;
  negative: number;
}

// ============================================
// STORE
// ============================================

/**
 * Persistence collaborator. The query pipeline never depends on it.
 */
export interface ConversationStore {
  saveConversation(record: ConversationRecord): Promise<void>;
  saveFeedback(input: FeedbackInput): Promise<FeedbackEntry>;
  getFeedbackStats(sessionId?: string): Promise<FeedbackStats>;
  getRecentFeedback(limit?: number): Promise<FeedbackEntry[]>;
  /** Conversations of the last 24 hours */
  getConversationStats(now?: Date): Promise<ConversationStats>;
}
