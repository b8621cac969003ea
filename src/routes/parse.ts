import type { z } from 'zod';
import { createError } from '../lib/errors';

/**
 * Parse a request payload, turning the first zod issue into a VALIDATION_ERROR
 */
export function parseBody<T extends z.ZodTypeAny>(schema: T, payload: unknown): z.output<T> {
  const result = schema.safeParse(payload ?? {});
  if (!result.success) {
    const [issue] = result.error.issues;
    throw createError.system.validationError(issue?.path.join('.') || 'body', issue?.message ?? 'invalid payload');
  }
  return result.data;
}
