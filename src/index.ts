/**
 * KubeQuery Backend - entrypoint
 */

import { createRagServices } from './container';
import { env } from './env';
import { createRateLimit } from './middleware/rateLimiter';
import { createApp } from './server';
import { appLogger } from './utils/logger';

const services = createRagServices(env);

const app = createApp({
  orchestrator: services.orchestrator,
  searchClient: services.searchClient,
  store: services.store,
  queryRateLimit: createRateLimit({ name: 'query', points: env.QUERY_RATE_LIMIT_PER_MINUTE }),
});

const server = app.listen(env.PORT, () => {
  appLogger.info({ port: env.PORT }, `Server running on http://localhost:${env.PORT}`);
});

const shutdown = (signal: string) => {
  appLogger.info({ signal }, 'Shutting down');
  server.close(() => {
    services.elasticsearch
      .close()
      .then(() => process.exit(0))
      .catch((err: unknown) => {
        appLogger.error({ err }, 'Failed to close Elasticsearch client');
        process.exit(1);
      });
  });
};

process.on('SIGTERM', () => shutdown('SIGTERM'));
process.on('SIGINT', () => shutdown('SIGINT'));
