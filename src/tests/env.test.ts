/**
 * Environment validation tests
 */

import { describe, it, expect } from 'vitest';
import { ZodError } from 'zod';
import { parseEnv } from '@/env';

describe('parseEnv', () => {
  it('applies defaults', () => {
    const env = parseEnv({ OPENAI_API_KEY: 'test-secret' });

    expect(env).toMatchObject({
      NODE_ENV: 'development',
      PORT: 3000,
      LLM_MODEL: 'gpt-4o',
      EMBEDDING_MODEL: 'text-embedding-3-small',
      EMBEDDING_DIMENSIONS: 384,
      ELASTICSEARCH_HOST: 'http://localhost:9200',
      ELASTICSEARCH_INDEX: 'k8s-questions',
      SEARCH_VECTOR_FIELD: 'title_vector',
      QUERY_REWRITE_ENABLED: false,
      QUERY_RATE_LIMIT_PER_MINUTE: 30,
    });
    expect(env.EVALUATION_MODEL).toBeUndefined();
    expect(env.STAGE_TIMEOUT_MS).toBeUndefined();
  });

  it('parses typed values', () => {
    const env = parseEnv({
      OPENAI_API_KEY: 'test-secret',
      QUERY_REWRITE_ENABLED: '1',
      STAGE_TIMEOUT_MS: '15000',
      SEARCH_VECTOR_FIELD: 'title_text_vector',
      EVALUATION_MODEL: 'gpt-4o-mini',
    });

    expect(env.QUERY_REWRITE_ENABLED).toBe(true);
    expect(env.STAGE_TIMEOUT_MS).toBe(15000);
    expect(env.SEARCH_VECTOR_FIELD).toBe('title_text_vector');
    expect(env.EVALUATION_MODEL).toBe('gpt-4o-mini');
  });

  it('requires an API key', () => {
    expect(() => parseEnv({})).toThrow(ZodError);
  });

  it('rejects an unknown vector field', () => {
    expect(() => parseEnv({ OPENAI_API_KEY: 'test-secret', SEARCH_VECTOR_FIELD: 'body_vector' })).toThrow(ZodError);
  });

  it('rejects a non-numeric stage timeout', () => {
    expect(() => parseEnv({ OPENAI_API_KEY: 'test-secret', STAGE_TIMEOUT_MS: 'soon' })).toThrow(ZodError);
  });
});
