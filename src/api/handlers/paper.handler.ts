import type { FastifyRequest, FastifyReply } from 'fastify';
import { logger } from '../../utils/logger.js';
import { NotFoundError } from '../../utils/errors.js';
import type { GraphRepository } from '../../services/graph/GraphRepository.interface.js';
import type { PaperIndexer } from '../../services/ingestion/PaperIndexer.js';
import type { PaperInput } from '../../services/ingestion/types.js';
import { sendError } from './errors.js';

export function createPaperMetadataHandler(graphRepo: Pick<GraphRepository, 'getPaperMetadata'>) {
  return async (request: FastifyRequest<{ Params: { id: string } }>, reply: FastifyReply) => {
    try {
      const { id } = request.params;
      const paper = await graphRepo.getPaperMetadata(id);
      if (!paper) {
        throw new NotFoundError(`Paper ${id} not found`);
      }
      return reply.code(200).send(paper);
    } catch (error) {
      logger.error({ error }, 'Paper metadata handler error');
      return sendError(reply, error);
    }
  };
}

export function createIndexPaperHandler(indexer: Pick<PaperIndexer, 'indexPaper'>) {
  return async (request: FastifyRequest<{ Body: PaperInput }>, reply: FastifyReply) => {
    try {
      logger.info({ filename: request.body.filename }, 'Received paper for indexing');
      const result = await indexer.indexPaper(request.body);
      return reply.code(201).send(result);
    } catch (error) {
      logger.error({ error }, 'Index paper handler error');
      return sendError(reply, error);
    }
  };
}
