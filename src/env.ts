import { z } from 'zod';
import { VECTOR_FIELDS } from './ai/rag/types';

/**
 * Centralized environment variable validation using Zod
 * This ensures type safety and runtime validation of all env vars
 */

// Load environment variables
import dotenv from 'dotenv';
dotenv.config();

const booleanFlag = z
  .enum(['true', 'false', '1', '0'])
  .transform((val) => val === 'true' || val === '1');

const optionalPositiveInt = z
  .string()
  .regex(/^\d+$/, 'must be a positive integer')
  .transform((val) => parseInt(val, 10))
  .pipe(z.number().positive())
  .optional();

/**
 * Define the schema for environment variables
 * Pipeline collaborators read their configuration from here, never from process.env
 */
const envSchema = z.object({
  // Node environment
  NODE_ENV: z
    .enum(['development', 'test', 'production'], {
      errorMap: () => ({
        message: 'NODE_ENV must be either development, test, or production',
      }),
    })
    .default('development'),

  PORT: z
    .string()
    .transform((val) => parseInt(val, 10))
    .pipe(z.number().positive().max(65535))
    .default('3000'),

  LOG_LEVEL: z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace']).default('info'),

  // Completion API
  OPENAI_API_KEY: z
    .string({
      required_error: 'OPENAI_API_KEY is required',
      invalid_type_error: 'OPENAI_API_KEY must be a string',
    })
    .min(1, 'OPENAI_API_KEY cannot be empty'),

  OPENAI_BASE_URL: z
    .string()
    .url({ message: 'OPENAI_BASE_URL must be a valid URL' })
    .default('https://api.openai.com/v1'),

  LLM_MODEL: z.string().min(1).default('gpt-4o'),

  // Falls back to LLM_MODEL when unset
  EVALUATION_MODEL: z.string().min(1).optional(),

  // Embedding model
  EMBEDDING_MODEL: z.string().min(1).default('text-embedding-3-small'),

  EMBEDDING_BASE_URL: z
    .string()
    .url({ message: 'EMBEDDING_BASE_URL must be a valid URL' })
    .optional(),

  EMBEDDING_DIMENSIONS: z
    .string()
    .transform((val) => parseInt(val, 10))
    .pipe(z.number().int().positive())
    .default('384'),

  // Search index
  ELASTICSEARCH_HOST: z
    .string()
    .url({ message: 'ELASTICSEARCH_HOST must be a valid URL (e.g., http://localhost:9200)' })
    .default('http://localhost:9200'),

  ELASTICSEARCH_INDEX: z.string().min(1, 'ELASTICSEARCH_INDEX cannot be empty').default('k8s-questions'),

  SEARCH_VECTOR_FIELD: z.enum(VECTOR_FIELDS).default('title_vector'),

  // Pipeline behaviour
  QUERY_REWRITE_ENABLED: booleanFlag.default('false'),

  STAGE_TIMEOUT_MS: optionalPositiveInt,

  // JSON object: { "<model>": { "prompt": <usd per 1M>, "completion": <usd per 1M> } }
  PRICING_TABLE: z.string().optional(),

  // Optional - Persistence (feedback and conversation logs)
  SUPABASE_URL: z.string().url({ message: 'SUPABASE_URL must be a valid URL if provided' }).optional(),

  SUPABASE_SERVICE_ROLE_KEY: z.string().min(1).optional(),

  // Indexing job input
  DOCS_PATH: z.string().min(1).default('data/documents.json'),

  QUERY_RATE_LIMIT_PER_MINUTE: z
    .string()
    .transform((val) => parseInt(val, 10))
    .pipe(z.number().int().positive())
    .default('30'),
});

/**
 * Type inference for the validated environment
 */
export type Env = z.infer<typeof envSchema>;

/**
 * Parse an environment source without side effects.
 * Throws a ZodError on invalid configuration.
 */
export function parseEnv(source: NodeJS.ProcessEnv): Env {
  return envSchema.parse(source);
}

/**
 * Validate and parse environment variables
 * This will exit the process if validation fails
 */
function validateEnv(): Env {
  try {
    return parseEnv(process.env);
  } catch (error) {
    if (error instanceof z.ZodError) {
      const invalidVars = error.errors
        .map((err) => `  - ${err.path.join('.')}: ${err.message}`)
        .join('\n');

      console.error('❌ Environment validation failed:\n');
      console.error(invalidVars);
      console.error('\n📝 Please check your .env file and ensure all required variables are set.');
      console.error('   See .env.example for reference.\n');

      process.exit(1);
    }
    throw error;
  }
}

/**
 * Validated environment variables
 * Use this throughout the application instead of process.env
 * @example
 * import { env } from '@/env';
 *
 * const index = env.ELASTICSEARCH_INDEX; // string
 * const deadline = env.STAGE_TIMEOUT_MS; // number | undefined
 */
export const env = validateEnv();
