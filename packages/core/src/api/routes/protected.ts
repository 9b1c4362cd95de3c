import type { FastifyInstance } from 'fastify';
import type { CommandResult } from '@sentinel/shared';
import type { ServiceFacade } from '../../service/ServiceFacade.js';
import { requireAuth } from '../guard.js';

function statusFor(result: CommandResult): number {
  if (result.success) return 200;
  return result.outcome === 'rejected' ? 409 : 500;
}

export function registerProtectedRoutes(app: FastifyInstance, facade: ServiceFacade): void {
  app.get('/metrics', { preHandler: requireAuth(facade, 'metrics') }, async () => {
    return facade.metrics();
  });

  app.post('/update', { preHandler: requireAuth(facade, 'update') }, async (_request, reply) => {
    const result = await facade.update();
    reply.status(statusFor(result));
    return result;
  });

  app.post('/reboot', { preHandler: requireAuth(facade, 'reboot') }, async (_request, reply) => {
    const result = await facade.reboot();
    reply.status(statusFor(result));
    return result;
  });
}
