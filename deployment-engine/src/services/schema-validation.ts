/**
 * Runtime validators generated from statically declared service schemas
 */

import { z } from 'zod';
import _ from 'lodash';
import {
  RecordOf,
  SchemaTypeTag,
  ServiceError,
  ServiceErrorCode,
  ServiceSchema,
} from '@creditops/types';

const TAG_VALIDATORS: Record<SchemaTypeTag, z.ZodTypeAny> = {
  character: z.string(),
  numeric: z.number().finite(),
  integer: z.number().int(),
  logical: z.boolean(),
  'data.frame': z.array(z.record(z.unknown())),
};

export function buildRecordValidator(schema: ServiceSchema): z.ZodTypeAny {
  const shape: Record<string, z.ZodTypeAny> = {};
  for (const [field, tag] of Object.entries(schema)) {
    shape[field] = TAG_VALIDATORS[tag];
  }
  return z.object(shape).strict();
}

export function formatIssues(error: z.ZodError): string {
  return error.issues
    .map((issue) => `${issue.path.length > 0 ? issue.path.join('.') : '(root)'}: ${issue.message}`)
    .join('; ');
}

/**
 * Throws SCHEMA_MISMATCH unless input has exactly the declared fields and types
 */
export function assertRecordOf<S extends ServiceSchema>(
  schema: S,
  input: unknown,
  validator: z.ZodTypeAny = buildRecordValidator(schema)
): asserts input is RecordOf<S> {
  const result = validator.safeParse(input);
  if (!result.success) {
    throw new ServiceError(ServiceErrorCode.SCHEMA_MISMATCH, `Input does not match schema: ${formatIssues(result.error)}`);
  }
}

/** Same fields with the same type tags, in any order */
export function schemasEqual(a: ServiceSchema, b: ServiceSchema): boolean {
  return _.isEqual({ ...a }, { ...b });
}
