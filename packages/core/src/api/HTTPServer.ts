import Fastify, { type FastifyInstance } from 'fastify';
import { DEFAULT_BIND_HOST, getLogger } from '@sentinel/shared';
import type { ServiceFacade } from '../service/ServiceFacade.js';
import { registerErrorHandlers } from './errors.js';
import { registerPublicRoutes } from './routes/public.js';
import { registerProtectedRoutes } from './routes/protected.js';

const logger = getLogger();

/** Build the Fastify app without binding a socket. */
export function buildApp(facade: ServiceFacade): FastifyInstance {
  const app = Fastify({ logger: false });

  registerErrorHandlers(app);
  registerPublicRoutes(app, facade);
  registerProtectedRoutes(app, facade);

  return app;
}

export class HTTPServer {
  private app: FastifyInstance;
  private port: number;
  private host: string;

  constructor(facade: ServiceFacade, port: number, host: string = DEFAULT_BIND_HOST) {
    this.port = port;
    this.host = host;
    this.app = buildApp(facade);
  }

  async start(): Promise<void> {
    await this.app.listen({ port: this.port, host: this.host });
    logger.info({ port: this.port, host: this.host }, 'HTTP server listening');
  }

  async stop(): Promise<void> {
    await this.app.close();
  }
}
