import type { FastifyRequest, FastifyReply } from 'fastify';
import { logger } from '../../utils/logger.js';
import type { QueryService } from '../../services/query/QueryService.js';
import type { QueryRequestBody } from '../schemas/query.schema.js';
import { sendError } from './errors.js';

export function createQueryHandler(queryService: Pick<QueryService, 'ask'>) {
  return async (request: FastifyRequest<{ Body: QueryRequestBody }>, reply: FastifyReply) => {
    try {
      const { question, include_citations, top_k } = request.body;
      logger.debug({ questionLength: question.length, top_k }, 'Query request');

      const result = await queryService.ask({
        question,
        includeCitations: include_citations,
        topK: top_k,
      });

      return reply.code(200).send(result);
    } catch (error) {
      logger.error({ error }, 'Query handler error');
      return sendError(reply, error);
    }
  };
}
