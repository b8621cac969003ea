/**
 * KubeQuery AI - LLM Types
 * ========================
 * Types shared by the completion and embedding clients.
 */

import { z } from 'zod';

// ============================================
// MESSAGE TYPES
// ============================================

export type LLMRole = 'system' | 'user' | 'assistant';

export interface LLMMessage {
  role: LLMRole;
  content: string;
}

// ============================================
// REQUEST/RESPONSE TYPES
// ============================================

export interface LLMCompletionRequest {
  messages: LLMMessage[];
  model: string;
  temperature?: number;
  maxTokens?: number;
}

export interface LLMUsage {
  promptTokens: number;
  completionTokens: number;
  totalTokens: number;
}

export interface LLMCompletionResponse {
  content: string;
  model: string;
  usage: LLMUsage;
  finishReason: string;
  latencyMs: number;
}

export interface LLMEmbeddingRequest {
  input: string | string[];
  model: string;
  dimensions?: number;
}

export interface LLMEmbeddingResponse {
  embeddings: number[][];
  model: string;
  usage: {
    promptTokens: number;
    totalTokens: number;
  };
}

/**
 * Per-call options. The caller owns deadlines; clients only honour the signal.
 */
export interface LLMCallOptions {
  signal?: AbortSignal;
}

// ============================================
// CLIENT CONFIGURATION
// ============================================

export interface LLMClientConfig {
  apiKey: string;
  baseUrl: string;
}

// ============================================
// PRICING
// ============================================

export const modelPriceSchema = z.object({
  prompt: z.number().nonnegative(),
  completion: z.number().nonnegative(),
});

export const pricingTableSchema = z.record(z.string(), modelPriceSchema);

/** USD per 1M tokens */
export type ModelPrice = z.infer<typeof modelPriceSchema>;

export type PricingTable = Readonly<Record<string, ModelPrice>>;

// Model pricing (USD per 1M tokens)
export const DEFAULT_MODEL_PRICING: PricingTable = {
  'gpt-4o': { prompt: 2.5, completion: 10 },
  'gpt-4o-mini': { prompt: 0.15, completion: 0.6 },
  'gpt-4-turbo': { prompt: 10, completion: 30 },
  'gpt-3.5-turbo': { prompt: 0.5, completion: 1.5 },
};

// ============================================
// ERROR TYPES
// ============================================

export class LLMError extends Error {
  constructor(
    message: string,
    public statusCode?: number,
    public retryable: boolean = false
  ) {
    super(message);
    this.name = 'LLMError';
  }
}

export class LLMRateLimitError extends LLMError {
  constructor(public retryAfterMs?: number) {
    super('Rate limit exceeded', 429, true);
    this.name = 'LLMRateLimitError';
  }
}

export class LLMTimeoutError extends LLMError {
  constructor() {
    super('Request timed out or was aborted', 408, true);
    this.name = 'LLMTimeoutError';
  }
}

export class LLMAuthError extends LLMError {
  constructor() {
    super('Authentication failed', 401, false);
    this.name = 'LLMAuthError';
  }
}
