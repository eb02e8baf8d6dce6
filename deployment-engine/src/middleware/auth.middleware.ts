/**
 * Bearer token guard for Fastify routes
 */

import { FastifyReply, FastifyRequest } from 'fastify';
import '@fastify/jwt'; // request.jwtVerify
import { ServiceError, ServiceErrorCode } from '@creditops/types';
import { sendError } from '../routes/errors';

export async function requireBearerToken(request: FastifyRequest, reply: FastifyReply) {
  try {
    await request.jwtVerify();
  } catch (error) {
    request.log.debug({ err: error }, 'Bearer token rejected');
    return sendError(
      reply,
      new ServiceError(ServiceErrorCode.AUTH_REJECTED, 'Missing or invalid bearer token')
    );
  }
}
