/**
 * Retriever Service
 * Entry point: loads configuration, wires the orchestrator and serves HTTP
 */

import { config } from 'dotenv';
import { fileURLToPath } from 'url';
import { dirname, resolve } from 'path';

// Load environment variables from project root
const __filename = fileURLToPath(import.meta.url);
const __dirname = dirname(__filename);
config({ path: resolve(__dirname, '../../../.env') });

import { parseIntEnv } from '@ctxrag/shared-types';
import { loadRetrievalConfig } from './config/retrieval-config.js';
import { createRetriever } from './orchestrator/factory.js';
import { createApp } from './http/app.js';
import { createLogger, logError } from './utils/logger.js';

const PORT = parseIntEnv('RETRIEVER_PORT', 3010);
const NODE_ENV = process.env['NODE_ENV'] || 'development';

const logger = createLogger('Service');

async function startRetrieverService(): Promise<void> {
  logger.info('Starting Retriever Service...', { environment: NODE_ENV });

  const retrievalConfig = loadRetrievalConfig();
  const retriever = createRetriever(retrievalConfig);
  await retriever.connect();

  const app = createApp({
    orchestrator: retriever.orchestrator,
    logger: createLogger('HTTP'),
    sessionBackend: retrievalConfig.sessionBackend,
  });

  const server = app.listen(PORT, () => {
    logger.info(`Retriever listening on port ${PORT}`, {
      maxDocs: retrievalConfig.maxDocs,
      sessionBackend: retrievalConfig.sessionBackend,
    });
  });

  const shutdown = (signal: string): void => {
    logger.info(`Received ${signal}, shutting down...`);
    server.close(() => {
      retriever
        .close()
        .then(() => process.exit(0))
        .catch((error: unknown) => {
          logError(logger, 'Error during shutdown', error);
          process.exit(1);
        });
    });
  };

  process.on('SIGINT', () => shutdown('SIGINT'));
  process.on('SIGTERM', () => shutdown('SIGTERM'));
}

startRetrieverService().catch((error: unknown) => {
  logError(logger, 'Failed to start Retriever Service', error);
  process.exit(1);
});
