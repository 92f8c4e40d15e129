import type { FastifyRequest, FastifyReply } from 'fastify';
import { logger } from '../../utils/logger.js';
import type { GraphRepository } from '../../services/graph/GraphRepository.interface.js';
import type { VectorStore } from '../../services/vector/VectorStore.interface.js';
import type { LLMService } from '../../services/llm/LLMService.interface.js';
import { sendError } from './errors.js';

export function createStatsHandler(
  graphRepo: Pick<GraphRepository, 'getGraphStats'>,
  vectorStore: Pick<VectorStore, 'countChunks'>
) {
  return async (_request: FastifyRequest, reply: FastifyReply) => {
    try {
      const [graph, chunks] = await Promise.all([graphRepo.getGraphStats(), vectorStore.countChunks()]);
      return reply.code(200).send({ ...graph, chunks });
    } catch (error) {
      logger.error({ error }, 'Stats handler error');
      return sendError(reply, error);
    }
  };
}

export function createHealthHandler(
  graphRepo: Pick<GraphRepository, 'testConnection'>,
  vectorStore: Pick<VectorStore, 'testConnection'>,
  llm: Pick<LLMService, 'testConnection'>,
  environment: string
) {
  return async () => {
    const [neo4j, qdrant, llmOk] = await Promise.all([
      graphRepo.testConnection(),
      vectorStore.testConnection(),
      llm.testConnection(),
    ]);

    return {
      status: neo4j && qdrant && llmOk ? 'ok' : 'degraded',
      timestamp: new Date().toISOString(),
      environment,
      services: { neo4j, qdrant, llm: llmOk },
    };
  };
}
