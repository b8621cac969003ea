/**
 * Indexing job: (re)creates the search index from DOCS_PATH.
 * Usage: npm run index-documents
 */

import { runIndexingJob } from '../src/ai/rag/indexer';
import { createElasticsearchClient, createEmbedder } from '../src/container';
import { env } from '../src/env';
import { appLogger, logError } from '../src/utils/logger';

async function main(): Promise<void> {
  const engine = createElasticsearchClient(env);

  try {
    const count = await runIndexingJob({
      engine,
      embedder: createEmbedder(env),
      indexName: env.ELASTICSEARCH_INDEX,
      docsPath: env.DOCS_PATH,
    });
    appLogger.info({ count, index: env.ELASTICSEARCH_INDEX }, `Indexed ${count} documents`);
  } finally {
    await engine.close();
  }
}

main().catch((err: unknown) => {
  logError({ error: err instanceof Error ? err : new Error(String(err)), context: 'indexer' });
  process.exit(1);
});
