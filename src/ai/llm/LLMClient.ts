/**
 * KubeQuery AI - LLM Client Interface
 * ===================================
 * Abstract base class for completion/embedding providers.
 */

import type {
  LLMCallOptions,
  LLMClientConfig,
  LLMCompletionRequest,
  LLMCompletionResponse,
  LLMEmbeddingRequest,
  LLMEmbeddingResponse,
} from './types';

/**
 * Abstract LLM Client.
 * Implementations make exactly one request per call: no retries, no built-in timeouts.
 */
export abstract class LLMClient {
  protected readonly config: LLMClientConfig;

  constructor(config: LLMClientConfig) {
    this.config = config;
  }

  /**
   * Provider name, used in logs
   */
  abstract get provider(): string;

  /**
   * Generate a chat completion
   */
  abstract complete(request: LLMCompletionRequest, options?: LLMCallOptions): Promise<LLMCompletionResponse>;

  /**
   * Generate embeddings for text
   */
  abstract embed(request: LLMEmbeddingRequest, options?: LLMCallOptions): Promise<LLMEmbeddingResponse>;

  /**
   * Check if the client is properly configured
   */
  isConfigured(): boolean {
    return this.config.apiKey.length > 0;
  }
}
