import type { FastifyInstance } from 'fastify';
import { createQueryHandler } from './handlers/query.handler.js';
import { createIndexPaperHandler, createPaperMetadataHandler } from './handlers/paper.handler.js';
import { createHealthHandler, createStatsHandler } from './handlers/system.handler.js';
import { errorResponseSchema } from './schemas/common.schema.js';
import { queryRequestSchema, type QueryRequestBody } from './schemas/query.schema.js';
import { indexPaperRequestSchema, indexPaperResponseSchema, paperParamsSchema } from './schemas/paper.schema.js';
import { healthResponseSchema, statsResponseSchema } from './schemas/system.schema.js';
import type { QueryService } from '../services/query/QueryService.js';
import type { PaperIndexer } from '../services/ingestion/PaperIndexer.js';
import type { PaperInput } from '../services/ingestion/types.js';
import type { GraphRepository } from '../services/graph/GraphRepository.interface.js';
import type { VectorStore } from '../services/vector/VectorStore.interface.js';
import type { LLMService } from '../services/llm/LLMService.interface.js';

export interface RouteDependencies {
  queryService: Pick<QueryService, 'ask'>;
  paperIndexer: Pick<PaperIndexer, 'indexPaper'>;
  graphRepo: Pick<GraphRepository, 'getPaperMetadata' | 'getGraphStats' | 'testConnection'>;
  vectorStore: Pick<VectorStore, 'countChunks' | 'testConnection'>;
  llmService: Pick<LLMService, 'testConnection'>;
  environment: string;
}

export function registerRoutes(fastify: FastifyInstance, deps: RouteDependencies): void {
  fastify.post<{ Body: QueryRequestBody }>('/query', {
    schema: {
      body: queryRequestSchema,
      response: {
        400: errorResponseSchema,
        500: errorResponseSchema,
        503: errorResponseSchema,
      },
    },
    handler: createQueryHandler(deps.queryService),
  });

  fastify.get<{ Params: { id: string } }>('/papers/:id', {
    schema: {
      params: paperParamsSchema,
      response: {
        404: errorResponseSchema,
        500: errorResponseSchema,
        503: errorResponseSchema,
      },
    },
    handler: createPaperMetadataHandler(deps.graphRepo),
  });

  fastify.post<{ Body: PaperInput }>('/papers', {
    schema: {
      body: indexPaperRequestSchema,
      response: {
        201: indexPaperResponseSchema,
        400: errorResponseSchema,
        500: errorResponseSchema,
        503: errorResponseSchema,
      },
    },
    handler: createIndexPaperHandler(deps.paperIndexer),
  });

  fastify.get('/stats', {
    schema: {
      response: {
        200: statsResponseSchema,
        500: errorResponseSchema,
        503: errorResponseSchema,
      },
    },
    handler: createStatsHandler(deps.graphRepo, deps.vectorStore),
  });

  fastify.get('/health', {
    schema: {
      response: {
        200: healthResponseSchema,
      },
    },
    handler: createHealthHandler(deps.graphRepo, deps.vectorStore, deps.llmService, deps.environment),
  });
}
