/**
 * Completion gateway tests
 */

import { describe, it, expect } from 'vitest';
import { LLMCompletionGateway } from '@/ai/llm/CompletionGateway';
import { LLMClient } from '@/ai/llm/LLMClient';
import {
  LLMError,
  type LLMCallOptions,
  type LLMCompletionRequest,
  type LLMCompletionResponse,
  type LLMEmbeddingResponse,
  type LLMUsage,
} from '@/ai/llm/types';
import { ErrorCode, isRagError, RagError } from '@/lib/errors';

class StubClient extends LLMClient {
  readonly requests: Array<{ request: LLMCompletionRequest; options?: LLMCallOptions }> = [];

  constructor(private readonly reply: { content: string; usage: LLMUsage } | Error) {
    super({ apiKey: 'test-secret', baseUrl: 'http://llm.test' });
  }

  get provider(): string {
    return 'stub';
  }

  async complete(request: LLMCompletionRequest, options?: LLMCallOptions): Promise<LLMCompletionResponse> {
    this.requests.push({ request, options });
    if (this.reply instanceof Error) {
      throw this.reply;
    }
    return { ...this.reply, model: request.model, finishReason: 'stop', latencyMs: 1 };
  }

  async embed(): Promise<LLMEmbeddingResponse> {
    throw new Error('not used');
  }
}

describe('LLMCompletionGateway', () => {
  it('sends the prompt as a single user message', async () => {
    const client = new StubClient({ content: 'ok', usage: { promptTokens: 3, completionTokens: 1, totalTokens: 4 } });
    const signal = new AbortController().signal;

    await new LLMCompletionGateway(client, 0).complete('Explain Services', 'gpt-4o', { signal });

    expect(client.requests).toHaveLength(1);
    expect(client.requests[0]?.request).toEqual({
      model: 'gpt-4o',
      messages: [{ role: 'user', content: 'Explain Services' }],
      temperature: 0,
    });
    expect(client.requests[0]?.options?.signal).toBe(signal);
  });

  it('returns text and token counts', async () => {
    const client = new StubClient({ content: 'A Service exposes Pods.', usage: { promptTokens: 120, completionTokens: 30, totalTokens: 150 } });

    const result = await new LLMCompletionGateway(client).complete('Explain Services', 'gpt-4o');

    expect(result).toEqual({
      text: 'A Service exposes Pods.',
      model: 'gpt-4o',
      promptTokens: 120,
      completionTokens: 30,
      totalTokens: 150,
    });
  });

  it('keeps totalTokens equal to prompt + completion when the provider disagrees', async () => {
    const client = new StubClient({ content: 'x', usage: { promptTokens: 10, completionTokens: 7, totalTokens: 99 } });

    const result = await new LLMCompletionGateway(client).complete('p', 'gpt-4o');

    expect(result.totalTokens).toBe(17);
  });

  it('wraps provider failures in COMPLETION_FAILED with the cause attached', async () => {
    const providerError = new LLMError('upstream exploded', 500, true);
    const gateway = new LLMCompletionGateway(new StubClient(providerError));

    const error = await gateway.complete('p', 'gpt-4o').catch((err: unknown) => err);

    expect(isRagError(error, ErrorCode.COMPLETION_FAILED)).toBe(true);
    expect(error).toBeInstanceOf(RagError);
    if (error instanceof RagError) {
      expect(error.message).toBe('Completion with gpt-4o failed: upstream exploded');
      expect(error.cause).toBe(providerError);
      expect(error.context).toEqual({ model: 'gpt-4o' });
    }
  });
});
