import type { FastifyInstance } from 'fastify';
import { HttpError, NotFoundError, getLogger } from '@sentinel/shared';
import type { ErrorResponse } from '@sentinel/shared';

const logger = getLogger();

/** Map errors and unknown routes to `{ code, message }` bodies. */
export function registerErrorHandlers(app: FastifyInstance): void {
  app.setErrorHandler((error, request, reply) => {
    if (error instanceof HttpError) {
      const body: ErrorResponse = { code: error.code, message: error.message };
      return reply.status(error.statusCode).send(body);
    }

    // Malformed requests rejected by fastify itself (bad JSON body and the like)
    if (error.statusCode !== undefined && error.statusCode >= 400 && error.statusCode < 500) {
      const body: ErrorResponse = { code: error.code ?? 'BAD_REQUEST', message: error.message };
      return reply.status(error.statusCode).send(body);
    }

    logger.error({ err: error, method: request.method, url: request.url }, 'Unhandled request error');
    const body: ErrorResponse = {
      code: 'INTERNAL_SERVER_ERROR',
      message: 'An unexpected error occurred',
    };
    return reply.status(500).send(body);
  });

  app.setNotFoundHandler((request, reply) => {
    const error = new NotFoundError(request.url);
    const body: ErrorResponse = { code: error.code, message: error.message };
    return reply.status(error.statusCode).send(body);
  });
}
