/**
 * Swagger Service
 * Builds the Swagger 2.0 interface document of a published service
 */

import {
  SchemaTypeTag,
  ServiceDescriptor,
  ServiceSchema,
  SwaggerDocument,
  SwaggerResponse,
  SwaggerSchemaObject,
} from '@creditops/types';

export const API_BASE_PATH = '/api/v1';
export const BEARER_SCHEME = 'Bearer';

export interface SwaggerOptions {
  /** host[:port] clients should call */
  host?: string;
  schemes?: string[];
}

const TAG_SCHEMAS: Record<SchemaTypeTag, SwaggerSchemaObject> = {
  character: { type: 'string' },
  numeric: { type: 'number', format: 'double' },
  integer: { type: 'integer', format: 'int32' },
  logical: { type: 'boolean' },
  'data.frame': { type: 'array', items: { type: 'object' } },
};

function ref(definition: string): SwaggerSchemaObject {
  return { $ref: `#/definitions/${definition}` };
}

export function schemaToDefinition(schema: ServiceSchema): SwaggerSchemaObject {
  const properties: Record<string, SwaggerSchemaObject> = {};
  for (const [field, tag] of Object.entries(schema)) {
    properties[field] = { ...TAG_SCHEMAS[tag] };
  }
  return { type: 'object', properties, required: Object.keys(schema) };
}

function errorResponse(description: string): SwaggerResponse {
  return { description, schema: ref('ErrorResponse') };
}

export function consumePath(descriptor: Pick<ServiceDescriptor, 'name' | 'version'>): string {
  return `/services/${descriptor.name}/${descriptor.version}/consume`;
}

export function buildSwaggerDocument(descriptor: ServiceDescriptor, options: SwaggerOptions = {}): SwaggerDocument {
  const document: SwaggerDocument = {
    swagger: '2.0',
    info: {
      title: descriptor.name,
      description: descriptor.description ?? `Service ${descriptor.name} (adapter ${descriptor.adapter})`,
      version: descriptor.version,
    },
    basePath: API_BASE_PATH,
    schemes: options.schemes ?? ['http'],
    consumes: ['application/json'],
    produces: ['application/json'],
    securityDefinitions: {
      [BEARER_SCHEME]: {
        type: 'apiKey',
        name: 'Authorization',
        in: 'header',
        description: 'Bearer access token returned by the login operation',
      },
    },
    paths: {
      '/login': {
        post: {
          operationId: 'login',
          summary: 'Exchange operator credentials for an access token',
          tags: ['authentication'],
          parameters: [{ name: 'LoginRequest', in: 'body', required: true, schema: ref('LoginRequest') }],
          responses: {
            '200': { description: 'Access token', schema: ref('AccessTokenResponse') },
            '401': errorResponse('Invalid credentials'),
          },
        },
      },
      [consumePath(descriptor)]: {
        post: {
          operationId: 'consume',
          summary: `Invoke ${descriptor.name} version ${descriptor.version}`,
          tags: [descriptor.name],
          parameters: [{ name: 'InputParameters', in: 'body', required: true, schema: ref('InputParameters') }],
          responses: {
            '200': { description: 'Adapter output', schema: ref('OutputParameters') },
            '400': errorResponse('Input does not match the declared schema'),
            '401': errorResponse('Missing or invalid access token'),
            '404': errorResponse('Service not found'),
          },
          security: [{ [BEARER_SCHEME]: [] }],
        },
      },
    },
    definitions: {
      LoginRequest: {
        type: 'object',
        properties: { username: { type: 'string' }, password: { type: 'string' } },
        required: ['username', 'password'],
      },
      AccessTokenResponse: {
        type: 'object',
        properties: {
          accessToken: { type: 'string' },
          tokenType: { type: 'string' },
          expiresIn: { type: 'integer', format: 'int32' },
        },
        required: ['accessToken', 'tokenType', 'expiresIn'],
      },
      InputParameters: schemaToDefinition(descriptor.inputs),
      OutputParameters: schemaToDefinition(descriptor.outputs),
      ErrorResponse: {
        type: 'object',
        properties: { error: { type: 'string' }, code: { type: 'string' }, message: { type: 'string' } },
        required: ['error', 'code', 'message'],
      },
    },
  };

  if (options.host) {
    document.host = options.host;
  }
  return document;
}
