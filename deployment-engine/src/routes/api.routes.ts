/**
 * API Routes for the model hosting service
 */

import { FastifyInstance, FastifyReply, FastifyRequest } from 'fastify';
import { z } from 'zod';
import { SCHEMA_TYPE_TAGS } from '@creditops/types';
import { HostingService } from '../services/hosting.service';
import { AuthService } from '../services/auth.service';
import { MetricsService } from '../services/metrics.service';
import { requireBearerToken } from '../middleware/auth.middleware';
import { sendError } from './errors';

// Request schemas
const SchemaDeclarationSchema = z.record(z.enum(SCHEMA_TYPE_TAGS));

const ModelArtifactSchema = z.record(z.unknown());

const LoginRequestSchema = z.object({
  username: z.string().min(1),
  password: z.string().min(1),
});

const PublishRequestSchema = z.object({
  name: z.string().min(1),
  version: z.string().min(1),
  adapter: z.string().min(1),
  model: ModelArtifactSchema,
  inputs: SchemaDeclarationSchema,
  outputs: SchemaDeclarationSchema,
  description: z.string().max(500).optional(),
});

const UpdateRequestSchema = z.object({
  model: ModelArtifactSchema,
  expectedRevision: z.number().int().positive().optional(),
  description: z.string().max(500).optional(),
});

const ServiceParamsSchema = z.object({
  name: z.string().min(1),
  version: z.string().min(1),
});

const ListQuerySchema = z.object({
  name: z.string().min(1).optional(),
});

export interface RouteDependencies {
  hosting: HostingService;
  auth: AuthService;
  metrics: MetricsService;
  about: { name: string; version: string };
}

export async function registerApiRoutes(fastify: FastifyInstance, deps: RouteDependencies) {
  const { hosting, auth, metrics, about } = deps;

  /**
   * POST /api/v1/login
   * Exchange operator credentials for a bearer token
   */
  fastify.post('/api/v1/login', async (request: FastifyRequest, reply: FastifyReply) => {
    try {
      const credentials = LoginRequestSchema.parse(request.body);
      const token = await auth.login(credentials);
      return reply.code(200).send(token);
    } catch (error) {
      return sendError(reply, error);
    }
  });

  /**
   * GET /api/v1/health-check
   */
  fastify.get('/api/v1/health-check', async (_request: FastifyRequest, reply: FastifyReply) => {
    const services = await hosting.list();
    return reply.code(200).send({
      status: 'ok',
      name: about.name,
      version: about.version,
      services: services.length,
      adapters: hosting.adapters(),
    });
  });

  /**
   * GET /api/v1/metrics
   * Prometheus scrape endpoint
   */
  fastify.get('/api/v1/metrics', async (_request: FastifyRequest, reply: FastifyReply) => {
    metrics.setServicesHosted((await hosting.list()).length);
    return reply.code(200).header('Content-Type', metrics.contentType).send(await metrics.render());
  });

  // Everything below requires a bearer token
  await fastify.register(async (secured) => {
    secured.addHook('preHandler', requireBearerToken);

    /**
     * POST /api/v1/services
     * Publish a trained model as a callable service
     */
    secured.post('/api/v1/services', async (request: FastifyRequest, reply: FastifyReply) => {
      try {
        const publishRequest = PublishRequestSchema.parse(request.body);
        const descriptor = await hosting.publish(publishRequest);
        return reply.code(201).send(descriptor);
      } catch (error) {
        return sendError(reply, error);
      }
    });

    /**
     * GET /api/v1/services?name=
     */
    secured.get('/api/v1/services', async (request: FastifyRequest, reply: FastifyReply) => {
      try {
        const { name } = ListQuerySchema.parse(request.query);
        const services = await hosting.list(name);
        return reply.code(200).send({ services });
      } catch (error) {
        return sendError(reply, error);
      }
    });

    /**
     * GET /api/v1/services/:name/:version
     */
    secured.get('/api/v1/services/:name/:version', async (request: FastifyRequest, reply: FastifyReply) => {
      try {
        const { name, version } = ServiceParamsSchema.parse(request.params);
        return reply.code(200).send(await hosting.fetch(name, version));
      } catch (error) {
        return sendError(reply, error);
      }
    });

    /**
     * PATCH /api/v1/services/:name/:version
     * Swap the bound model in place
     */
    secured.patch('/api/v1/services/:name/:version', async (request: FastifyRequest, reply: FastifyReply) => {
      try {
        const { name, version } = ServiceParamsSchema.parse(request.params);
        const updateRequest = UpdateRequestSchema.parse(request.body);
        return reply.code(200).send(await hosting.update(name, version, updateRequest));
      } catch (error) {
        return sendError(reply, error);
      }
    });

    /**
     * DELETE /api/v1/services/:name/:version
     */
    secured.delete('/api/v1/services/:name/:version', async (request: FastifyRequest, reply: FastifyReply) => {
      try {
        const { name, version } = ServiceParamsSchema.parse(request.params);
        await hosting.remove(name, version);
        return reply.code(204).send();
      } catch (error) {
        return sendError(reply, error);
      }
    });

    /**
     * POST /api/v1/services/:name/:version/consume
     * Run the service on one input record
     */
    secured.post(
      '/api/v1/services/:name/:version/consume',
      async (request: FastifyRequest, reply: FastifyReply) => {
        try {
          const { name, version } = ServiceParamsSchema.parse(request.params);
          return reply.code(200).send(await hosting.consume(name, version, request.body));
        } catch (error) {
          return sendError(reply, error);
        }
      }
    );

    /**
     * GET /api/v1/services/:name/:version/swagger.json
     */
    secured.get(
      '/api/v1/services/:name/:version/swagger.json',
      async (request: FastifyRequest, reply: FastifyReply) => {
        try {
          const { name, version } = ServiceParamsSchema.parse(request.params);
          const document = await hosting.swagger(name, version, {
            host: request.hostname,
            schemes: [request.protocol],
          });
          return reply.code(200).send(document);
        } catch (error) {
          return sendError(reply, error);
        }
      }
    );
  });
}
