/**
 * Logger - KubeQuery Backend
 * Pino configuration with secret redaction
 */

import pino from 'pino';
import { v4 as uuidv4 } from 'uuid';
import { env } from '../env';

/**
 * Keys masked in every log line
 */
const SENSITIVE_KEYS = [
  'password',
  'token',
  'secret',
  'apiKey',
  'api_key',
  'authorization',
  'OPENAI_API_KEY',
  'SUPABASE_SERVICE_ROLE_KEY',
];

const loggerConfig: pino.LoggerOptions = {
  level: env.NODE_ENV === 'test' ? 'silent' : env.LOG_LEVEL,

  // Development: pretty output
  ...(env.NODE_ENV === 'development' && {
    transport: {
      target: 'pino-pretty',
      options: {
        colorize: true,
        translateTime: 'yyyy-mm-dd HH:MM:ss.l',
        ignore: 'pid,hostname',
        messageFormat: '{context} - {msg}',
        singleLine: false,
        levelFirst: true,
      },
    },
  }),

  // Production: structured JSON
  ...(env.NODE_ENV === 'production' && {
    formatters: {
      level: (label: string) => ({ level: label.toUpperCase() }),
      bindings: (bindings: pino.Bindings) => ({
        pid: bindings.pid,
        hostname: bindings.hostname,
        environment: env.NODE_ENV,
        service: 'kubequery-backend',
      }),
    },
    timestamp: pino.stdTimeFunctions.isoTime,
    messageKey: 'message',
  }),

  redact: {
    paths: SENSITIVE_KEYS.flatMap((key) => [key, `*.${key}`, `headers.${key}`]),
    remove: false,
    censor: '***REDACTED***',
  },

  serializers: {
    err: pino.stdSerializers.err,
  },
};

/**
 * Root logger
 */
export const logger = pino(loggerConfig);

export type Logger = pino.Logger;

/**
 * Child logger bound to a context and an optional correlationId
 */
export const createContextLogger = (context: string, correlationId?: string): Logger => {
  return logger.child({
    context,
    ...(correlationId && { correlationId }),
  });
};

export const appLogger = createContextLogger('app');
export const httpLogger = createContextLogger('http');
export const llmLogger = createContextLogger('llm');
export const searchLogger = createContextLogger('search');
export const storeLogger = createContextLogger('store');
export const rateLimitLogger = createContextLogger('rate-limit');

interface LogErrorOptions {
  error: Error;
  correlationId?: string;
  context?: string;
  metadata?: Record<string, unknown>;
}

/**
 * Log an error with its correlation id and metadata
 */
export const logError = ({
  error,
  correlationId = uuidv4(),
  context = 'app',
  metadata = {},
}: LogErrorOptions): void => {
  const contextLogger = createContextLogger(context, correlationId);

  contextLogger.error(
    {
      err: error,
      correlationId,
      metadata,
    },
    `Error occurred: ${error.message}`
  );
};

export const generateCorrelationId = (): string => {
  return uuidv4();
};

/**
 * Measures the duration of an operation and logs it on finish
 */
export const createPerformanceLogger = (operation: string, correlationId?: string) => {
  const startTime = process.hrtime.bigint();
  const perfLogger = createContextLogger('performance', correlationId);

  return {
    /** Elapsed milliseconds since creation */
    elapsedMs: (): number => Number(process.hrtime.bigint() - startTime) / 1_000_000,
    finish: (metadata?: Record<string, unknown>): number => {
      const duration = Number(process.hrtime.bigint() - startTime) / 1_000_000;

      perfLogger.info(
        {
          operation,
          duration: `${duration.toFixed(2)}ms`,
          ...metadata,
        },
        `Operation ${operation} completed in ${duration.toFixed(2)}ms`
      );
      return duration;
    },
  };
};

export default logger;
