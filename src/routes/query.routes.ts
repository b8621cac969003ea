/**
 * KubeQuery API - Query Routes
 * ============================
 * POST /api/query runs the RAG pipeline and logs the conversation.
 */

import { Router, type NextFunction, type Request, type Response } from 'express';
import { v4 as uuidv4 } from 'uuid';
import type { QueryOrchestrator } from '../ai/rag/orchestrator';
import type { ConversationStore } from '../data/types';
import { queryRequestSchema } from '../lib/validations';
import { createContextLogger } from '../utils/logger';
import { parseBody } from './parse';

export interface QueryRouterDeps {
  orchestrator: QueryOrchestrator;
  store: ConversationStore | null;
  rateLimit?: (req: Request, res: Response, next: NextFunction) => Promise<void>;
}

export function createQueryRouter({ orchestrator, store, rateLimit }: QueryRouterDeps): Router {
  const router = Router();
  if (rateLimit) {
    router.use('/query', rateLimit);
  }

  router.post('/query', async (req: Request, res: Response, next: NextFunction) => {
    try {
      const { question, sessionId: requestedSessionId } = parseBody(queryRequestSchema, req.body);
      const sessionId = requestedSessionId ?? uuidv4();
      const conversationId = uuidv4();
      const log = createContextLogger('query', conversationId);

      const result = await orchestrator.query(question, { correlationId: conversationId });

      let persisted = false;
      if (store) {
        try {
          await store.saveConversation({
            conversationId,
            sessionId,
            question,
            answer: result.answer,
            relevance: result.relevance,
            relevanceExplanation: result.relevanceExplanation,
            promptTokens: result.promptTokens,
            completionTokens: result.completionTokens,
            totalTokens: result.totalTokens,
            evalPromptTokens: result.evalPromptTokens,
            evalCompletionTokens: result.evalCompletionTokens,
            evalTotalTokens: result.evalTotalTokens,
            rewritePromptTokens: result.rewritePromptTokens,
            rewriteCompletionTokens: result.rewriteCompletionTokens,
            rewriteTotalTokens: result.rewriteTotalTokens,
            cost: result.cost,
            responseTime: result.responseTime,
            timestamp: new Date(),
          });
          persisted = true;
        } catch (err) {
          log.warn({ err }, 'Conversation not persisted');
        }
      }

      res.json({ conversationId, sessionId, persisted, result });
    } catch (err) {
      next(err);
    }
  });

  return router;
}
