import { z } from 'zod';

/**
 * Request payload validation for the HTTP API
 */

export const questionSchema = z
  .string({ required_error: 'question is required' })
  .trim()
  .min(1, 'question must not be empty')
  .max(2000, 'question must be at most 2000 characters');

export const sessionIdSchema = z.string().trim().min(1).max(100).optional();

export const queryRequestSchema = z.object({
  question: questionSchema,
  sessionId: sessionIdSchema,
});

export const feedbackRequestSchema = z.object({
  question: questionSchema,
  answer: z.string({ required_error: 'answer is required' }).min(1, 'answer must not be empty'),
  feedback: z.union([z.literal(1), z.literal(-1)], {
    errorMap: () => ({ message: 'feedback must be 1 or -1' }),
  }),
  sessionId: sessionIdSchema,
});

export const feedbackStatsQuerySchema = z.object({
  sessionId: sessionIdSchema,
});

export const recentFeedbackQuerySchema = z.object({
  limit: z.coerce.number().int().min(1).max(100).default(10),
});

export type QueryRequest = z.infer<typeof queryRequestSchema>;
export type FeedbackRequest = z.infer<typeof feedbackRequestSchema>;
