/**
 * Centralized error handling - KubeQuery Backend
 * Typed errors with standardized codes; only the query orchestrator decides
 * whether a pipeline error aborts the query or degrades it.
 */

import type { NextFunction, Request, Response } from 'express';
import { createContextLogger } from '../utils/logger';

const errorLogger = createContextLogger('errors');

export enum ErrorCode {
  // Pipeline
  MODEL_UNAVAILABLE = 'MODEL_UNAVAILABLE',
  INDEX_NOT_FOUND = 'INDEX_NOT_FOUND',
  SEARCH_UNAVAILABLE = 'SEARCH_UNAVAILABLE',
  COMPLETION_FAILED = 'COMPLETION_FAILED',
  MALFORMED_EVALUATION = 'MALFORMED_EVALUATION',

  // Persistence
  STORAGE_UNAVAILABLE = 'STORAGE_UNAVAILABLE',

  // System
  VALIDATION_ERROR = 'VALIDATION_ERROR',
  RATE_LIMIT_EXCEEDED = 'RATE_LIMIT_EXCEEDED',
  INTERNAL_SERVER_ERROR = 'INTERNAL_SERVER_ERROR',
}

export interface ErrorDetails {
  code: ErrorCode;
  message: string;
  userMessage: string; // Shown to the end user, names the remedy
  statusCode: number;
  retryable: boolean;
  context?: Record<string, unknown>;
  cause?: unknown;
}

export class RagError extends Error {
  public readonly code: ErrorCode;
  public readonly statusCode: number;
  public readonly userMessage: string;
  public readonly retryable: boolean;
  public readonly context: Record<string, unknown>;

  constructor(details: ErrorDetails) {
    super(details.message, details.cause === undefined ? undefined : { cause: details.cause });
    this.name = 'RagError';
    this.code = details.code;
    this.statusCode = details.statusCode;
    this.userMessage = details.userMessage;
    this.retryable = details.retryable;
    this.context = details.context ?? {};
  }

  /**
   * Copy of this error with extra context merged in
   */
  withContext(extra: Record<string, unknown>): RagError {
    return new RagError({
      code: this.code,
      message: this.message,
      userMessage: this.userMessage,
      statusCode: this.statusCode,
      retryable: this.retryable,
      context: { ...this.context, ...extra },
      cause: this.cause,
    });
  }

  toJSON() {
    return {
      code: this.code,
      message: this.message,
      userMessage: this.userMessage,
      statusCode: this.statusCode,
      retryable: this.retryable,
      context: this.context,
    };
  }
}

export function isRagError(error: unknown, code?: ErrorCode): error is RagError {
  return error instanceof RagError && (code === undefined || error.code === code);
}

export function describeCause(cause: unknown): string {
  if (cause instanceof Error) return cause.message;
  return String(cause);
}

// Factory for typed errors
export const createError = {
  embedding: {
    modelUnavailable: (model: string, cause?: unknown) =>
      new RagError({
        code: ErrorCode.MODEL_UNAVAILABLE,
        message: `Embedding model ${model} unavailable${cause === undefined ? '' : `: ${describeCause(cause)}`}`,
        userMessage:
          'The embedding model is unavailable. Check EMBEDDING_MODEL and the embedding service, then try again.',
        statusCode: 503,
        retryable: true,
        context: { model },
        cause,
      }),
  },

  search: {
    indexNotFound: (indexName: string, cause?: unknown) =>
      new RagError({
        code: ErrorCode.INDEX_NOT_FOUND,
        message: `Elasticsearch index '${indexName}' not found`,
        userMessage: `Search index '${indexName}' not found. Run the indexing job (npm run index-documents) to create and populate it.`,
        statusCode: 503,
        retryable: false,
        context: { indexName },
        cause,
      }),

    unavailable: (indexName: string, cause?: unknown) =>
      new RagError({
        code: ErrorCode.SEARCH_UNAVAILABLE,
        message: `Search on '${indexName}' failed${cause === undefined ? '' : `: ${describeCause(cause)}`}`,
        userMessage: 'The search engine is unreachable. Check ELASTICSEARCH_HOST and try again.',
        statusCode: 503,
        retryable: true,
        context: { indexName },
        cause,
      }),
  },

  llm: {
    completionFailed: (model: string, cause?: unknown) =>
      new RagError({
        code: ErrorCode.COMPLETION_FAILED,
        message: `Completion with ${model} failed${cause === undefined ? '' : `: ${describeCause(cause)}`}`,
        userMessage: 'The language model did not answer. Check OPENAI_API_KEY and the API status, then try again.',
        statusCode: 502,
        retryable: true,
        context: { model },
        cause,
      }),

    malformedEvaluation: (detail: string, raw: string) =>
      new RagError({
        code: ErrorCode.MALFORMED_EVALUATION,
        message: `Failed to parse evaluation: ${detail}`,
        userMessage: 'The relevance evaluation could not be read.',
        statusCode: 502,
        retryable: false,
        context: { raw },
      }),
  },

  store: {
    unavailable: (operation: string, cause?: unknown) =>
      new RagError({
        code: ErrorCode.STORAGE_UNAVAILABLE,
        message: `Storage unavailable during ${operation}${cause === undefined ? '' : `: ${describeCause(cause)}`}`,
        userMessage:
          'Feedback storage is unavailable. Configure SUPABASE_URL and SUPABASE_SERVICE_ROLE_KEY to enable it.',
        statusCode: 503,
        retryable: true,
        context: { operation },
        cause,
      }),
  },

  system: {
    validationError: (field: string, rule: string) =>
      new RagError({
        code: ErrorCode.VALIDATION_ERROR,
        message: `Validation error: ${field} failed rule ${rule}`,
        userMessage: `The field ${field} is not valid: ${rule}`,
        statusCode: 400,
        retryable: false,
        context: { field, rule },
      }),

    rateLimitExceeded: (operation: string, limit: number) =>
      new RagError({
        code: ErrorCode.RATE_LIMIT_EXCEEDED,
        message: `Rate limit exceeded for ${operation}: ${limit} requests per minute`,
        userMessage: 'Too many questions. Please wait a moment before asking again.',
        statusCode: 429,
        retryable: true,
        context: { operation, limit },
      }),

    internalServerError: (context?: Record<string, unknown>, cause?: unknown) =>
      new RagError({
        code: ErrorCode.INTERNAL_SERVER_ERROR,
        message: `Internal server error${cause === undefined ? '' : `: ${describeCause(cause)}`}`,
        userMessage: 'An unexpected error occurred.',
        statusCode: 500,
        retryable: true,
        context,
        cause,
      }),
  },
};

// Express middleware for centralized error responses
export const errorHandler = (error: unknown, req: Request, res: Response, _next: NextFunction) => {
  const context = {
    path: req.path,
    method: req.method,
  };

  if (error instanceof RagError) {
    errorLogger.warn({ ...context, err: error, code: error.code }, `Request failed: ${error.message}`);

    return res.status(error.statusCode).json({
      error: {
        code: error.code,
        message: error.userMessage,
        retryable: error.retryable,
      },
    });
  }

  // Untyped error: detailed log, generic response
  errorLogger.error({ ...context, err: error }, 'Unhandled error');

  const genericError = createError.system.internalServerError(context);
  return res.status(500).json({
    error: {
      code: genericError.code,
      message: genericError.userMessage,
      retryable: true,
    },
  });
};
