/**
 * HTTP Server - KubeQuery Backend
 * Express app exposing the question-answering API
 */

import cors from 'cors';
import express from 'express';
import type { Express, Request, Response } from 'express';

import type { QueryOrchestrator } from '../ai/rag/orchestrator';
import type { HybridSearchClient } from '../ai/rag/searchClient';
import type { ConversationStore } from '../data/types';
import { errorHandler } from '../lib/errors';
import type { RateLimit } from '../middleware/rateLimiter';
import { createFeedbackRouter } from '../routes/feedback.routes';
import { createQueryRouter } from '../routes/query.routes';
import { httpLogger } from '../utils/logger';

export interface AppDeps {
  orchestrator: QueryOrchestrator;
  searchClient: HybridSearchClient;
  store: ConversationStore | null;
  queryRateLimit?: RateLimit;
  version?: string;
}

export function createApp(deps: AppDeps): Express {
  const app = express();

  // Base middleware
  app.use(cors());
  app.use(express.json({ limit: '100kb' }));

  /**
   * Health check: reports whether the search index is ready
   */
  app.get('/health', async (_req: Request, res: Response) => {
    const indexName = deps.orchestrator.indexName;
    let indexExists = false;
    let searchAvailable = true;

    try {
      indexExists = await deps.searchClient.indexExists(indexName);
    } catch (err) {
      searchAvailable = false;
      httpLogger.warn({ err, indexName }, 'Health check could not reach the search engine');
    }

    res.status(searchAvailable ? 200 : 503).json({
      status: searchAvailable && indexExists ? 'healthy' : 'degraded',
      timestamp: new Date().toISOString(),
      version: deps.version ?? '1.0.0',
      index: { name: indexName, exists: indexExists },
      storage: deps.store ? 'configured' : 'disabled',
    });
  });

  app.use(
    '/api',
    createQueryRouter({
      orchestrator: deps.orchestrator,
      store: deps.store,
      rateLimit: deps.queryRateLimit?.middleware,
    })
  );
  app.use('/api', createFeedbackRouter(deps.store));

  app.use(errorHandler);

  return app;
}
