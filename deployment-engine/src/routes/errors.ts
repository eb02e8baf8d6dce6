/**
 * Maps thrown errors onto HTTP error responses
 */

import { STATUS_CODES } from 'http';
import { FastifyReply } from 'fastify';
import { ZodError } from 'zod';
import {
  ErrorResponse,
  MLError,
  ServiceError,
  ServiceErrorCode,
  serviceErrorCodeForStatus,
} from '@creditops/types';
import { formatIssues } from '../services/schema-validation';

export interface MappedError {
  status: number;
  body: ErrorResponse;
}

function body(status: number, code: string, message: string): MappedError {
  return { status, body: { error: STATUS_CODES[status] ?? 'Error', code, message } };
}

export function toErrorResponse(error: unknown): MappedError {
  if (error instanceof ServiceError) {
    return body(error.status, error.code, error.message);
  }
  if (error instanceof ZodError) {
    return body(400, ServiceErrorCode.INVALID_REQUEST, `Invalid request: ${formatIssues(error)}`);
  }
  if (error instanceof MLError) {
    return body(500, error.code, error.message);
  }
  // Fastify and its plugins raise errors carrying a status; rate-limit throws a plain object
  if (typeof error === 'object' && error !== null && 'statusCode' in error && typeof error.statusCode === 'number') {
    const status = error.statusCode;
    const message =
      'message' in error && typeof error.message === 'string' ? error.message : STATUS_CODES[status] ?? 'Error';
    return body(status, serviceErrorCodeForStatus(status), message);
  }
  return body(
    500,
    ServiceErrorCode.INTERNAL,
    error instanceof Error ? error.message : 'Unknown error'
  );
}

export function sendError(reply: FastifyReply, error: unknown): FastifyReply {
  const { status, body: payload } = toErrorResponse(error);
  if (status >= 500) {
    reply.log.error({ err: error }, payload.message);
  } else {
    reply.log.info({ code: payload.code }, payload.message);
  }
  return reply.code(status).send(payload);
}
