import Fastify, { type FastifyBaseLogger, type FastifyError, type FastifyInstance } from 'fastify';
import { logger as appLogger } from '../utils/logger.js';
import { registerRoutes, type RouteDependencies } from './routes.js';

export function buildServer(deps: RouteDependencies, logger: FastifyBaseLogger | boolean = false): FastifyInstance {
  const fastify = Fastify({ logger });

  fastify.setErrorHandler((error: FastifyError, request, reply) => {
    if (error.validation) {
      return reply.code(400).send({
        error: 'VALIDATION_ERROR',
        message: error.message,
      });
    }

    appLogger.error({ error, url: request.url }, 'Request error');
    return reply.code(500).send({
      error: 'INTERNAL_ERROR',
      message: error.message,
    });
  });

  registerRoutes(fastify, deps);

  return fastify;
}
