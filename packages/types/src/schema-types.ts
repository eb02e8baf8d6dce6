/**
 * Service Interface Schema Types
 * Statically declared field → type-tag maps used to describe service inputs and outputs
 */

export type ScalarTypeTag = 'character' | 'numeric' | 'integer' | 'logical';

export type SchemaTypeTag = ScalarTypeTag | 'data.frame';

export const SCHEMA_TYPE_TAGS = [
  'character',
  'numeric',
  'integer',
  'logical',
  'data.frame',
] as const satisfies readonly SchemaTypeTag[];

export type ServiceSchema = Readonly<Record<string, SchemaTypeTag>>;

/**
 * Runtime value carried by each type tag
 */
export interface TagValueMap {
  character: string;
  numeric: number;
  integer: number;
  logical: boolean;
  'data.frame': Array<Record<string, unknown>>;
}

/**
 * Record type described by a schema declaration
 */
export type RecordOf<S extends ServiceSchema> = {
  -readonly [K in keyof S]: TagValueMap[S[K]];
};
