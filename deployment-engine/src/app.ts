/**
 * Fastify server for the model hosting service
 */

import Fastify, { FastifyInstance, FastifyServerOptions } from 'fastify';
import cors from '@fastify/cors';
import helmet from '@fastify/helmet';
import rateLimit from '@fastify/rate-limit';
import jwt from '@fastify/jwt';
import { PlatformConfig } from '@creditops/config';
import { Logger } from '@creditops/utils';
import { createDefaultCatalog } from './adapters';
import { registerApiRoutes } from './routes/api.routes';
import { sendError } from './routes/errors';
import { AdapterCatalog } from './services/adapter-catalog';
import { AuthService } from './services/auth.service';
import { HostingService } from './services/hosting.service';
import { MetricsService } from './services/metrics.service';
import { InMemoryServiceRegistry, ServiceRegistry } from './services/service-registry';

export interface ServerOptions {
  config: PlatformConfig;
  registry?: ServiceRegistry;
  catalog?: AdapterCatalog;
  /** Fastify request logger; off unless given */
  logger?: FastifyServerOptions['logger'];
  /** Logger for service lifecycle events */
  serviceLogger?: Logger;
}

export async function buildServer(options: ServerOptions): Promise<FastifyInstance> {
  const { config } = options;

  const fastify = Fastify({ logger: options.logger ?? false });

  // Register plugins
  await fastify.register(cors, {
    origin: true,
  });

  await fastify.register(helmet, {
    contentSecurityPolicy: false, // Disable for API
  });

  await fastify.register(rateLimit, {
    max: config.server.rateLimitMax,
    timeWindow: config.server.rateLimitWindow,
  });

  await fastify.register(jwt, {
    secret: config.auth.jwtSecret,
  });

  const auth = await AuthService.create(fastify, config.auth);
  const hosting = new HostingService(
    options.registry ?? new InMemoryServiceRegistry(),
    options.catalog ?? createDefaultCatalog(),
    options.serviceLogger ?? new Logger('hosting', { level: config.core.logLevel }),
    { immutableVersions: config.registry.immutableVersions }
  );

  const metrics = new MetricsService();
  fastify.addHook('onResponse', async (request, reply) => {
    metrics.recordRequest({
      method: request.method,
      route: request.routeOptions.url ?? 'unmatched',
      statusCode: reply.statusCode,
      durationMs: reply.elapsedTime,
    });
  });

  fastify.setErrorHandler((error, _request, reply) => sendError(reply, error));

  await registerApiRoutes(fastify, {
    hosting,
    auth,
    metrics,
    about: { name: config.core.name, version: config.core.version },
  });

  return fastify;
}
