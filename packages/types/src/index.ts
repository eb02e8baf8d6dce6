/**
 * @creditops/types - Shared TypeScript type definitions
 */

export * from './schema-types';
export * from './credit-types';
export * from './service-types';
export * from './errors';
