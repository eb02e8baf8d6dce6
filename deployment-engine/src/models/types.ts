/**
 * Type definitions for the model hosting service
 */

import { ConsumeResponse, ServiceDescriptor, ServiceSchema } from '@creditops/types';

/**
 * An adapter bound to one loaded model. Validates raw input against the
 * adapter's input schema before running it.
 */
export interface ServiceBinding {
  readonly modelId: string;
  invoke(input: unknown): ConsumeResponse<unknown>;
}

/**
 * A prediction adapter the host knows how to serve
 */
export interface AdapterDefinition {
  readonly name: string;
  readonly description: string;
  readonly inputs: ServiceSchema;
  readonly outputs: ServiceSchema;
  /** Load a serialized model and bind it; throws when the artifact is unusable */
  bind(artifact: unknown): ServiceBinding;
}

export interface ServiceEntry {
  descriptor: ServiceDescriptor;
  binding: ServiceBinding;
}

export interface ServiceChange {
  binding: ServiceBinding;
  description?: string;
}

export interface ServiceKey {
  name: string;
  version: string;
}
