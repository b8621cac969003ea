/**
 * KubeQuery AI - OpenAI Client
 * ============================
 * OpenAI-compatible API implementation of LLMClient.
 * Works against api.openai.com or any server exposing the same
 * /chat/completions and /embeddings endpoints.
 */

import { z } from 'zod';
import { LLMClient } from '../LLMClient';
import type {
  LLMCallOptions,
  LLMClientConfig,
  LLMCompletionRequest,
  LLMCompletionResponse,
  LLMEmbeddingRequest,
  LLMEmbeddingResponse,
} from '../types';
import { LLMError, LLMRateLimitError, LLMTimeoutError, LLMAuthError } from '../types';
import { llmLogger } from '../../../utils/logger';

export const OPENAI_API_URL = 'https://api.openai.com/v1';

const usageSchema = z.object({
  prompt_tokens: z.number().int().nonnegative().default(0),
  completion_tokens: z.number().int().nonnegative().default(0),
  total_tokens: z.number().int().nonnegative().default(0),
});

const chatCompletionSchema = z.object({
  model: z.string().optional(),
  choices: z
    .array(
      z.object({
        message: z.object({ content: z.string().nullable().default('') }),
        finish_reason: z.string().nullable().optional(),
      })
    )
    .min(1, 'response has no choices'),
  usage: usageSchema.optional(),
});

const embeddingsSchema = z.object({
  model: z.string().optional(),
  data: z.array(z.object({ index: z.number().int(), embedding: z.array(z.number()) })),
  usage: z
    .object({
      prompt_tokens: z.number().int().nonnegative().default(0),
      total_tokens: z.number().int().nonnegative().default(0),
    })
    .optional(),
});

const errorBodySchema = z.object({
  error: z.object({ message: z.string() }),
});

function isAbortError(err: unknown): boolean {
  return err instanceof Error && (err.name === 'AbortError' || err.name === 'TimeoutError');
}

export class OpenAIClient extends LLMClient {
  constructor(config: Partial<LLMClientConfig> & { apiKey: string }) {
    super({
      apiKey: config.apiKey,
      baseUrl: (config.baseUrl || OPENAI_API_URL).replace(/\/+$/, ''),
    });
  }

  get provider(): string {
    return 'openai';
  }

  async complete(request: LLMCompletionRequest, options: LLMCallOptions = {}): Promise<LLMCompletionResponse> {
    if (!this.isConfigured()) {
      throw new LLMAuthError();
    }

    const startTime = Date.now();
    const body = {
      model: request.model,
      messages: request.messages.map((m) => ({
        role: m.role,
        content: m.content,
      })),
      temperature: request.temperature,
      max_tokens: request.maxTokens,
      stream: false,
    };

    const data = chatCompletionSchema.parse(await this.post('/chat/completions', body, options.signal));
    const latencyMs = Date.now() - startTime;

    const usage = {
      promptTokens: data.usage?.prompt_tokens ?? 0,
      completionTokens: data.usage?.completion_tokens ?? 0,
      totalTokens: data.usage?.total_tokens ?? 0,
    };

    const [choice] = data.choices;

    llmLogger.debug(
      { model: request.model, totalTokens: usage.totalTokens, latencyMs },
      `Completed ${request.model}: ${usage.totalTokens} tokens, ${latencyMs}ms`
    );

    return {
      content: choice?.message.content ?? '',
      model: data.model || request.model,
      usage,
      finishReason: choice?.finish_reason || 'stop',
      latencyMs,
    };
  }

  async embed(request: LLMEmbeddingRequest, options: LLMCallOptions = {}): Promise<LLMEmbeddingResponse> {
    if (!this.isConfigured()) {
      throw new LLMAuthError();
    }

    const inputs = Array.isArray(request.input) ? request.input : [request.input];
    const body = {
      model: request.model,
      input: inputs,
      ...(request.dimensions !== undefined && { dimensions: request.dimensions }),
    };

    const data = embeddingsSchema.parse(await this.post('/embeddings', body, options.signal));

    const embeddings = [...data.data].sort((a, b) => a.index - b.index).map((item) => item.embedding);

    llmLogger.debug({ model: request.model, count: inputs.length }, `Embedded ${inputs.length} text(s) with ${request.model}`);

    return {
      embeddings,
      model: data.model || request.model,
      usage: {
        promptTokens: data.usage?.prompt_tokens ?? 0,
        totalTokens: data.usage?.total_tokens ?? 0,
      },
    };
  }

  private async post(path: string, body: unknown, signal?: AbortSignal): Promise<unknown> {
    let response: Response;
    try {
      response = await fetch(`${this.config.baseUrl}${path}`, {
        method: 'POST',
        headers: {
          'Content-Type': 'application/json',
          Authorization: `Bearer ${this.config.apiKey}`,
        },
        body: JSON.stringify(body),
        signal,
      });
    } catch (err) {
      if (isAbortError(err)) {
        throw new LLMTimeoutError();
      }
      throw err;
    }

    if (!response.ok) {
      await this.handleErrorResponse(response);
    }

    return response.json();
  }

  private async handleErrorResponse(response: Response): Promise<never> {
    const status = response.status;
    let errorMessage = `OpenAI API error: ${status}`;

    const parsed = errorBodySchema.safeParse(await response.json().catch(() => null));
    if (parsed.success) {
      errorMessage = parsed.data.error.message;
    }

    if (status === 401) {
      throw new LLMAuthError();
    }

    if (status === 429) {
      const retryAfter = response.headers.get('retry-after');
      throw new LLMRateLimitError(retryAfter ? parseInt(retryAfter, 10) * 1000 : undefined);
    }

    throw new LLMError(errorMessage, status, status >= 500);
  }
}
