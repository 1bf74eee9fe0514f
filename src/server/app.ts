import Fastify from 'fastify';
import type { FastifyError } from 'fastify';
import cookie from '@fastify/cookie';
import replyFrom from '@fastify/reply-from';
import { proxyRoutes } from '../api/proxy.js';
import type { ProxyRouteOptions } from '../api/proxy.js';
import { createAuthMiddleware } from '../middleware/auth.js';
import type { AuthService } from '../services/AuthService.js';
import type { BrokerService } from '../services/BrokerService.js';

export interface AppDependencies {
  broker: BrokerService;
  authService: AuthService;
  proxy: ProxyRouteOptions;
  /** Fastify request logging; on unless turned off */
  logger?: boolean;
}

export async function createApp(deps: AppDependencies) {
  const app = Fastify({ logger: deps.logger ?? true });

  await app.register(cookie);
  await app.register(replyFrom);

  app.addHook('onRequest', createAuthMiddleware(deps.authService));

  await proxyRoutes(app, deps.broker, deps.proxy);

  app.setErrorHandler((error: FastifyError, _request, reply) => {
    app.log.error(error);
    reply.status(error.statusCode || 500).send({
      error: error.message || 'Internal Server Error',
      code: error.code || 'INTERNAL_ERROR',
    });
  });

  return app;
}

export interface ServerOptions {
  port: number;
  host: string;
}

/** Starts the broker: background loops first, then the HTTP listener. */
export async function startServer(deps: AppDependencies, options: ServerOptions) {
  const app = await createApp(deps);

  deps.broker.start();
  app.addHook('onClose', async () => deps.broker.stop());

  await app.listen({ port: options.port, host: options.host });
  return app;
}
