import type { FastifyReply, FastifyRequest, preHandlerAsyncHookHandler } from 'fastify';
import type { OperationName, ServiceFacade } from '../service/ServiceFacade.js';

/**
 * preHandler that rejects the request with UnauthorizedError unless its
 * Authorization header grants access to `operation`.
 */
export function requireAuth(
  facade: ServiceFacade,
  operation: OperationName,
): preHandlerAsyncHookHandler {
  return async (request: FastifyRequest, _reply: FastifyReply): Promise<void> => {
    await facade.requireAccess(operation, request.headers.authorization);
  };
}
