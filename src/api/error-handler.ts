import { FastifyError, FastifyReply, FastifyRequest } from 'fastify';
import { isEngineError } from '../errors/errors';
import { logger } from '../observability/logger';

/**
 * Map engine errors to their status codes; anything else is a 500 with a
 * generic body.
 */
export function errorHandler(error: FastifyError, req: FastifyRequest, reply: FastifyReply): void {
  if (isEngineError(error)) {
    if (error.statusCode >= 500) {
      logger.error({ err: error, url: req.url, method: req.method }, 'Request failed');
    } else {
      logger.info({ code: error.code, url: req.url, method: req.method }, error.message);
    }
    reply.status(error.statusCode).send({ error: error.code, message: error.message });
    return;
  }

  if (error.validation) {
    reply.status(400).send({ error: 'ValidationError', message: error.message });
    return;
  }

  logger.error({ err: error, url: req.url, method: req.method }, 'Unhandled request error');
  reply.status(500).send({ error: 'InternalError', message: 'Internal server error' });
}
