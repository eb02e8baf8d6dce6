/**
 * Adapter Catalog
 * Prediction adapters the host can bind published models to
 */

import { RecordOf, ServiceError, ServiceErrorCode, ServiceSchema } from '@creditops/types';
import { AdapterDefinition, ServiceBinding } from '../models/types';
import { assertRecordOf, buildRecordValidator } from './schema-validation';

export interface AdapterDeclaration<I extends ServiceSchema, M extends { readonly id: string }, Output> {
  name: string;
  description: string;
  inputs: I;
  outputs: ServiceSchema;
  loadModel(artifact: unknown): M;
  adapt(record: RecordOf<I>, model: M): Output;
}

/**
 * Type-erase an adapter so adapters over different records share one catalog
 */
export function defineAdapter<I extends ServiceSchema, M extends { readonly id: string }, Output>(
  declaration: AdapterDeclaration<I, M, Output>
): AdapterDefinition {
  const validator = buildRecordValidator(declaration.inputs);

  return {
    name: declaration.name,
    description: declaration.description,
    inputs: declaration.inputs,
    outputs: declaration.outputs,
    bind(artifact: unknown): ServiceBinding {
      const model = declaration.loadModel(artifact);
      return {
        modelId: model.id,
        invoke(input: unknown) {
          assertRecordOf(declaration.inputs, input, validator);
          return { answer: [declaration.adapt(input, model)] };
        },
      };
    },
  };
}

export class AdapterCatalog {
  private adapters = new Map<string, AdapterDefinition>();

  constructor(adapters: AdapterDefinition[] = []) {
    adapters.forEach((adapter) => this.register(adapter));
  }

  register(adapter: AdapterDefinition): void {
    if (this.adapters.has(adapter.name)) {
      throw new Error(`Adapter ${adapter.name} is already registered`);
    }
    this.adapters.set(adapter.name, adapter);
  }

  get(name: string): AdapterDefinition {
    const adapter = this.adapters.get(name);
    if (!adapter) {
      throw new ServiceError(
        ServiceErrorCode.INVALID_REQUEST,
        `Unknown adapter "${name}". Available: ${this.names().join(', ') || 'none'}`
      );
    }
    return adapter;
  }

  names(): string[] {
    return Array.from(this.adapters.keys()).sort();
  }
}
