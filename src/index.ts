import { config } from './config/index.js';
import { logger } from './utils/logger.js';
import { createContainer } from './container.js';
import { buildServer } from './api/server.js';

const container = await createContainer(config);

const fastify = buildServer(
  {
    queryService: container.queryService,
    paperIndexer: container.paperIndexer,
    graphRepo: container.graphRepo,
    vectorStore: container.vectorStore,
    llmService: container.llmService,
    environment: config.server.nodeEnv,
  },
  logger
);

const shutdown = async () => {
  logger.info('Shutting down gracefully...');
  await fastify.close();
  await container.close();
  logger.info('Shutdown complete');
  process.exit(0);
};

process.on('SIGINT', shutdown);
process.on('SIGTERM', shutdown);

try {
  await fastify.listen({
    port: config.server.port,
    host: config.server.host,
  });
  logger.info(`Server listening on port ${config.server.port}`);
} catch (err) {
  logger.error(err);
  await container.close();
  process.exit(1);
}
