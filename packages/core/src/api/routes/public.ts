import type { FastifyInstance } from 'fastify';
import type { ServiceFacade } from '../../service/ServiceFacade.js';

export function registerPublicRoutes(app: FastifyInstance, facade: ServiceFacade): void {
  app.get('/health', async () => facade.health());

  app.get('/info', async () => facade.info());
}
