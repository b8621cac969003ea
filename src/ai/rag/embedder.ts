/**
 * KubeQuery AI - Embedder
 * =======================
 * Text to fixed-dimension vectors through an embeddings endpoint.
 */

import { LLMClient } from '../llm/LLMClient';
import type { LLMCallOptions } from '../llm/types';
import { createError } from '../../lib/errors';

export interface Embedder {
  readonly model: string;
  readonly dimensions: number;
  embed(text: string, options?: LLMCallOptions): Promise<number[]>;
  embedMany(texts: string[], options?: LLMCallOptions): Promise<number[][]>;
}

export interface LLMEmbedderOptions {
  model: string;
  dimensions: number;
  /** Max texts per request in embedMany */
  batchSize?: number;
}

const DEFAULT_BATCH_SIZE = 64;

/**
 * Embedder over LLMClient.embed. Backend failures and vectors of the wrong
 * length both raise MODEL_UNAVAILABLE.
 */
export class LLMEmbedder implements Embedder {
  readonly model: string;
  readonly dimensions: number;
  private readonly batchSize: number;

  constructor(
    private readonly client: LLMClient,
    options: LLMEmbedderOptions
  ) {
    this.model = options.model;
    this.dimensions = options.dimensions;
    this.batchSize = options.batchSize ?? DEFAULT_BATCH_SIZE;
  }

  async embed(text: string, options: LLMCallOptions = {}): Promise<number[]> {
    const [vector] = await this.request([text], options);
    if (!vector) {
      throw createError.embedding.modelUnavailable(this.model, new Error('empty embedding response'));
    }
    return vector;
  }

  async embedMany(texts: string[], options: LLMCallOptions = {}): Promise<number[][]> {
    const vectors: number[][] = [];
    for (let start = 0; start < texts.length; start += this.batchSize) {
      const batch = texts.slice(start, start + this.batchSize);
      vectors.push(...(await this.request(batch, options)));
    }
    return vectors;
  }

  private async request(texts: string[], options: LLMCallOptions): Promise<number[][]> {
    let embeddings: number[][];
    try {
      const response = await this.client.embed(
        { input: texts, model: this.model, dimensions: this.dimensions },
        options
      );
      embeddings = response.embeddings;
    } catch (err) {
      throw createError.embedding.modelUnavailable(this.model, err);
    }

    if (embeddings.length !== texts.length) {
      throw createError.embedding.modelUnavailable(
        this.model,
        new Error(`expected ${texts.length} embeddings, received ${embeddings.length}`)
      );
    }

    for (const vector of embeddings) {
      if (vector.length !== this.dimensions) {
        throw createError.embedding.modelUnavailable(
          this.model,
          new Error(`expected ${this.dimensions} dimensions, received ${vector.length}`)
        );
      }
    }

    return embeddings;
  }
}
