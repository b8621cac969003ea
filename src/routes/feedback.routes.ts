/**
 * KubeQuery API - Feedback & Stats Routes
 * =======================================
 * Thumbs up/down on answers plus the aggregates shown on the dashboard.
 */

import { Router, type NextFunction, type Request, type Response } from 'express';
import type { ConversationStore } from '../data/types';
import { createError } from '../lib/errors';
import { feedbackRequestSchema, feedbackStatsQuerySchema, recentFeedbackQuerySchema } from '../lib/validations';
import { parseBody } from './parse';

function requireStore(store: ConversationStore | null, operation: string): ConversationStore {
  if (!store) {
    throw createError.store.unavailable(operation);
  }
  return store;
}

export function createFeedbackRouter(store: ConversationStore | null): Router {
  const router = Router();

  router.post('/feedback', async (req: Request, res: Response, next: NextFunction) => {
    try {
      const input = parseBody(feedbackRequestSchema, req.body);
      const entry = await requireStore(store, 'saveFeedback').saveFeedback({
        question: input.question,
        answer: input.answer,
        feedback: input.feedback,
        sessionId: input.sessionId ?? null,
      });
      res.status(201).json(entry);
    } catch (err) {
      next(err);
    }
  });

  router.get('/feedback/stats', async (req: Request, res: Response, next: NextFunction) => {
    try {
      const { sessionId } = parseBody(feedbackStatsQuerySchema, req.query);
      res.json(await requireStore(store, 'getFeedbackStats').getFeedbackStats(sessionId));
    } catch (err) {
      next(err);
    }
  });

  router.get('/feedback/recent', async (req: Request, res: Response, next: NextFunction) => {
    try {
      const { limit } = parseBody(recentFeedbackQuerySchema, req.query);
      res.json(await requireStore(store, 'getRecentFeedback').getRecentFeedback(limit));
    } catch (err) {
      next(err);
    }
  });

  router.get('/conversations/stats', async (_req: Request, res: Response, next: NextFunction) => {
    try {
      res.json(await requireStore(store, 'getConversationStats').getConversationStats());
    } catch (err) {
      next(err);
    }
  });

  return router;
}
