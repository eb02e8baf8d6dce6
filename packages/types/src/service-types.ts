/**
 * Hosting Service Types
 * Wire contracts between the hosting service and its clients
 */

import { ServiceErrorCode } from './errors';
import { ServiceSchema } from './schema-types';

/**
 * Serialized trained model as sent over the wire.
 * The adapter a service is published with decides how to read it.
 */
export type ModelArtifact = object;

export interface ServiceDescriptor {
  name: string;
  version: string;
  /** Bumped on every in-place update of the bound model */
  revision: number;
  adapter: string;
  description?: string;
  inputs: ServiceSchema;
  outputs: ServiceSchema;
  modelId: string;
  createdAt: string;
  updatedAt: string;
}

export interface PublishServiceRequest {
  name: string;
  version: string;
  adapter: string;
  model: ModelArtifact;
  inputs: ServiceSchema;
  outputs: ServiceSchema;
  description?: string;
}

export interface UpdateServiceRequest {
  model: ModelArtifact;
  /** Compare-and-swap guard: rejected unless it matches the stored revision */
  expectedRevision?: number;
  description?: string;
}

export interface ConsumeResponse<Row = Record<string, unknown>> {
  answer: Row[];
}

export interface LoginRequest {
  username: string;
  password: string;
}

export interface LoginResponse {
  accessToken: string;
  tokenType: 'Bearer';
  expiresIn: number;
}

export interface ErrorResponse {
  error: string;
  code: ServiceErrorCode | string;
  message: string;
}

// ============================================================================
// Swagger 2.0 interface descriptor
// ============================================================================

export interface SwaggerSchemaObject {
  type?: 'string' | 'number' | 'integer' | 'boolean' | 'array' | 'object';
  format?: string;
  description?: string;
  items?: SwaggerSchemaObject;
  properties?: Record<string, SwaggerSchemaObject>;
  required?: string[];
  $ref?: string;
}

export interface SwaggerParameter {
  name: string;
  in: 'body' | 'header' | 'path' | 'query';
  required: boolean;
  description?: string;
  type?: 'string';
  schema?: SwaggerSchemaObject;
}

export interface SwaggerResponse {
  description: string;
  schema?: SwaggerSchemaObject;
}

export interface SwaggerOperation {
  operationId: string;
  summary?: string;
  tags?: string[];
  parameters: SwaggerParameter[];
  responses: Record<string, SwaggerResponse>;
  security?: Array<Record<string, string[]>>;
}

export interface SwaggerSecurityScheme {
  type: 'apiKey';
  name: string;
  in: 'header';
  description?: string;
}

export interface SwaggerDocument {
  swagger: '2.0';
  info: {
    title: string;
    description?: string;
    version: string;
  };
  host?: string;
  basePath: string;
  schemes: string[];
  consumes: string[];
  produces: string[];
  securityDefinitions: Record<string, SwaggerSecurityScheme>;
  paths: Record<string, Record<string, SwaggerOperation>>;
  definitions: Record<string, SwaggerSchemaObject>;
}
