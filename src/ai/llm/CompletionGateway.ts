/**
 * KubeQuery AI - Completion Gateway
 * =================================
 * Single-turn prompt in, generated text and token usage out.
 */

import { LLMClient } from './LLMClient';
import type { LLMCallOptions } from './types';
import { createError, isRagError } from '../../lib/errors';
import { llmLogger } from '../../utils/logger';

export interface Completion {
  readonly text: string;
  readonly model: string;
  readonly promptTokens: number;
  readonly completionTokens: number;
  /** Always promptTokens + completionTokens */
  readonly totalTokens: number;
}

export interface CompletionGateway {
  complete(prompt: string, modelId: string, options?: LLMCallOptions): Promise<Completion>;
}

/**
 * Gateway over an LLMClient. One request per call; any failure surfaces as
 * COMPLETION_FAILED with the original error attached as `cause`.
 */
export class LLMCompletionGateway implements CompletionGateway {
  constructor(
    private readonly client: LLMClient,
    private readonly temperature?: number
  ) {}

  async complete(prompt: string, modelId: string, options: LLMCallOptions = {}): Promise<Completion> {
    try {
      const response = await this.client.complete(
        {
          model: modelId,
          messages: [{ role: 'user', content: prompt }],
          temperature: this.temperature,
        },
        options
      );

      const { promptTokens, completionTokens } = response.usage;
      const totalTokens = promptTokens + completionTokens;

      if (response.usage.totalTokens !== totalTokens) {
        llmLogger.warn(
          { model: modelId, reported: response.usage.totalTokens, computed: totalTokens },
          'Provider total_tokens disagrees with prompt + completion, using the sum'
        );
      }

      return {
        text: response.content,
        model: modelId,
        promptTokens,
        completionTokens,
        totalTokens,
      };
    } catch (err) {
      if (isRagError(err)) {
        throw err;
      }
      throw createError.llm.completionFailed(modelId, err);
    }
  }
}
