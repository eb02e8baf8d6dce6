/**
 * Swagger Service Tests
 */

import { CREDIT_INPUT_SCHEMA, CREDIT_OUTPUT_SCHEMA, ServiceDescriptor } from '@creditops/types';
import { buildSwaggerDocument, consumePath, schemaToDefinition } from '../src/services/swagger.service';

const descriptor: ServiceDescriptor = {
  name: 'credit',
  version: '1.0',
  revision: 3,
  adapter: 'credit-default',
  description: 'Probability that a credit account defaults',
  inputs: CREDIT_INPUT_SCHEMA,
  outputs: CREDIT_OUTPUT_SCHEMA,
  modelId: 'model_1',
  createdAt: '2024-01-01T00:00:00.000Z',
  updatedAt: '2024-01-02T00:00:00.000Z',
};

describe('buildSwaggerDocument', () => {
  const document = buildSwaggerDocument(descriptor);

  it('should produce a Swagger 2.0 document for the service', () => {
    expect(document.swagger).toBe('2.0');
    expect(document.info).toEqual({
      title: 'credit',
      description: 'Probability that a credit account defaults',
      version: '1.0',
    });
    expect(document.basePath).toBe('/api/v1');
    expect(document.schemes).toEqual(['http']);
    expect(document.host).toBeUndefined();
  });

  it('should expose exactly a login and a consume operation', () => {
    expect(Object.keys(document.paths)).toEqual(['/login', '/services/credit/1.0/consume']);
    expect(document.paths['/login'].post.operationId).toBe('login');
    expect(document.paths['/services/credit/1.0/consume'].post.operationId).toBe('consume');
  });

  it('should require a bearer token for consume only', () => {
    expect(document.securityDefinitions.Bearer).toEqual({
      type: 'apiKey',
      name: 'Authorization',
      in: 'header',
      description: 'Bearer access token returned by the login operation',
    });
    expect(document.paths['/services/credit/1.0/consume'].post.security).toEqual([{ Bearer: [] }]);
    expect(document.paths['/login'].post.security).toBeUndefined();
  });

  it('should derive input parameters from the input schema', () => {
    const inputs = document.definitions.InputParameters;

    expect(inputs.required).toEqual(Object.keys(CREDIT_INPUT_SCHEMA));
    expect(inputs.properties?.account_id).toEqual({ type: 'string' });
    expect(inputs.properties?.amount_6).toEqual({ type: 'number', format: 'double' });
    expect(inputs.properties?.marital_status).toEqual({ type: 'string' });
  });

  it('should describe the answer as an array of rows', () => {
    expect(document.definitions.OutputParameters).toEqual({
      type: 'object',
      properties: { answer: { type: 'array', items: { type: 'object' } } },
      required: ['answer'],
    });
  });

  it('should point operation bodies at the generated definitions', () => {
    const consume = document.paths['/services/credit/1.0/consume'].post;

    expect(consume.parameters).toEqual([
      { name: 'InputParameters', in: 'body', required: true, schema: { $ref: '#/definitions/InputParameters' } },
    ]);
    expect(consume.responses['200'].schema).toEqual({ $ref: '#/definitions/OutputParameters' });
    expect(Object.keys(consume.responses)).toEqual(['200', '400', '401', '404']);
  });

  it('should set host and schemes when given', () => {
    const withHost = buildSwaggerDocument(descriptor, { host: 'localhost:3001', schemes: ['https'] });

    expect(withHost.host).toBe('localhost:3001');
    expect(withHost.schemes).toEqual(['https']);
  });
});

describe('schemaToDefinition', () => {
  it('should map every type tag', () => {
    expect(
      schemaToDefinition({ id: 'character', score: 'numeric', count: 'integer', flag: 'logical', rows: 'data.frame' })
    ).toEqual({
      type: 'object',
      properties: {
        id: { type: 'string' },
        score: { type: 'number', format: 'double' },
        count: { type: 'integer', format: 'int32' },
        flag: { type: 'boolean' },
        rows: { type: 'array', items: { type: 'object' } },
      },
      required: ['id', 'score', 'count', 'flag', 'rows'],
    });
  });
});

describe('consumePath', () => {
  it('should build the path relative to the base path', () => {
    expect(consumePath({ name: 'credit', version: '2.0.1' })).toBe('/services/credit/2.0.1/consume');
  });
});
