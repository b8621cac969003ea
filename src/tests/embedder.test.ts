/**
 * Embedder tests
 */

import { describe, it, expect } from 'vitest';
import { LLMClient } from '@/ai/llm/LLMClient';
import type { LLMCompletionResponse, LLMEmbeddingRequest, LLMEmbeddingResponse } from '@/ai/llm/types';
import { LLMEmbedder } from '@/ai/rag/embedder';
import { ErrorCode, isRagError, RagError } from '@/lib/errors';

class StubEmbeddingClient extends LLMClient {
  readonly requests: LLMEmbeddingRequest[] = [];

  constructor(private readonly vectorFor: (text: string) => number[] | Error) {
    super({ apiKey: 'test-secret', baseUrl: 'http://embeddings.test' });
  }

  get provider(): string {
    return 'stub';
  }

  async complete(): Promise<LLMCompletionResponse> {
    throw new Error('not used');
  }

  async embed(request: LLMEmbeddingRequest): Promise<LLMEmbeddingResponse> {
    this.requests.push(request);
    const inputs = Array.isArray(request.input) ? request.input : [request.input];
    const embeddings = inputs.map((text) => {
      const vector = this.vectorFor(text);
      if (vector instanceof Error) throw vector;
      return vector;
    });
    return { embeddings, model: request.model, usage: { promptTokens: 0, totalTokens: 0 } };
  }
}

describe('LLMEmbedder', () => {
  it('returns a vector of the configured dimension', async () => {
    const client = new StubEmbeddingClient(() => [0.1, 0.2, 0.3]);
    const embedder = new LLMEmbedder(client, { model: 'test-embedding', dimensions: 3 });

    expect(await embedder.embed('What is a Pod?')).toEqual([0.1, 0.2, 0.3]);
    expect(client.requests[0]).toEqual({ input: ['What is a Pod?'], model: 'test-embedding', dimensions: 3 });
  });

  it('is deterministic for the same input', async () => {
    const embedder = new LLMEmbedder(new StubEmbeddingClient((text) => [text.length, 1]), {
      model: 'test-embedding',
      dimensions: 2,
    });

    expect(await embedder.embed('kubectl')).toEqual(await embedder.embed('kubectl'));
  });

  it('raises MODEL_UNAVAILABLE on a dimension mismatch', async () => {
    const embedder = new LLMEmbedder(new StubEmbeddingClient(() => [0.1, 0.2]), { model: 'test-embedding', dimensions: 384 });

    const error = await embedder.embed('What is a Pod?').catch((err: unknown) => err);

    expect(isRagError(error, ErrorCode.MODEL_UNAVAILABLE)).toBe(true);
    expect(error instanceof RagError && error.message).toBe(
      'Embedding model test-embedding unavailable: expected 384 dimensions, received 2'
    );
  });

  it('raises MODEL_UNAVAILABLE when the backend fails', async () => {
    const backendError = new Error('connection refused');
    const embedder = new LLMEmbedder(new StubEmbeddingClient(() => backendError), { model: 'test-embedding', dimensions: 3 });

    const error = await embedder.embed('x').catch((err: unknown) => err);

    expect(isRagError(error, ErrorCode.MODEL_UNAVAILABLE)).toBe(true);
    expect(error instanceof RagError && error.cause).toBe(backendError);
  });

  it('batches embedMany and keeps input order', async () => {
    const client = new StubEmbeddingClient((text) => [Number(text)]);
    const embedder = new LLMEmbedder(client, { model: 'test-embedding', dimensions: 1, batchSize: 2 });

    const vectors = await embedder.embedMany(['1', '2', '3', '4', '5']);

    expect(vectors).toEqual([[1], [2], [3], [4], [5]]);
    expect(client.requests.map((r) => r.input)).toEqual([['1', '2'], ['3', '4'], ['5']]);
  });
});
