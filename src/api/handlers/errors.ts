import type { FastifyReply } from 'fastify';
import { NotFoundError, ValidationError, isDependencyError } from '../../utils/errors.js';
import { SYSTEM_UNAVAILABLE } from '../schemas/common.schema.js';

/** Maps service error families onto HTTP responses. */
export function sendError(reply: FastifyReply, error: unknown) {
  if (error instanceof ValidationError) {
    return reply.code(400).send({
      error: error.code,
      message: error.message,
      details: error.details,
    });
  }

  if (error instanceof NotFoundError) {
    return reply.code(404).send({
      error: error.code,
      message: error.message,
    });
  }

  if (isDependencyError(error)) {
    return reply.code(503).send(SYSTEM_UNAVAILABLE);
  }

  return reply.code(500).send({
    error: 'INTERNAL_ERROR',
    message: error instanceof Error ? error.message : 'Unknown error',
  });
}
