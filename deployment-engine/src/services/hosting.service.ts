/**
 * Hosting Service
 * Publishes, serves, updates and retires prediction services
 */

import {
  ConsumeResponse,
  MLError,
  PublishServiceRequest,
  ServiceDescriptor,
  ServiceError,
  ServiceErrorCode,
  SwaggerDocument,
  UpdateServiceRequest,
} from '@creditops/types';
import { Logger } from '@creditops/utils';
import { AdapterDefinition, ServiceBinding } from '../models/types';
import { AdapterCatalog } from './adapter-catalog';
import { parseServiceKey, ServiceRegistry } from './service-registry';
import { schemasEqual } from './schema-validation';
import { buildSwaggerDocument, SwaggerOptions } from './swagger.service';

export interface HostingOptions {
  /** Reject in-place model updates; a new version must be published instead */
  immutableVersions?: boolean;
}

export class HostingService {
  private readonly immutableVersions: boolean;

  constructor(
    private readonly registry: ServiceRegistry,
    private readonly catalog: AdapterCatalog,
    private readonly logger: Logger,
    options: HostingOptions = {}
  ) {
    this.immutableVersions = options.immutableVersions ?? false;
  }

  async publish(request: PublishServiceRequest): Promise<ServiceDescriptor> {
    const { name, version } = parseServiceKey(request.name, request.version);
    const adapter = this.catalog.get(request.adapter);

    if (!schemasEqual(request.inputs, adapter.inputs)) {
      throw new ServiceError(
        ServiceErrorCode.SCHEMA_MISMATCH,
        `Declared inputs do not match adapter ${adapter.name}: expected ${JSON.stringify(adapter.inputs)}`
      );
    }
    if (!schemasEqual(request.outputs, adapter.outputs)) {
      throw new ServiceError(
        ServiceErrorCode.SCHEMA_MISMATCH,
        `Declared outputs do not match adapter ${adapter.name}: expected ${JSON.stringify(adapter.outputs)}`
      );
    }

    const entry = await this.registry.create({
      name,
      version,
      adapter: adapter.name,
      description: request.description,
      inputs: adapter.inputs,
      outputs: adapter.outputs,
      binding: this.bind(adapter, request.model),
    });

    this.logger.info('Service published', {
      name,
      version,
      adapter: adapter.name,
      modelId: entry.descriptor.modelId,
    });
    return entry.descriptor;
  }

  async fetch(name: string, version: string): Promise<ServiceDescriptor> {
    const key = parseServiceKey(name, version);
    const entry = await this.registry.get(key.name, key.version);
    return entry.descriptor;
  }

  async list(name?: string): Promise<ServiceDescriptor[]> {
    return this.registry.list(name);
  }

  /**
   * Rebind the service to a new model; the name and version stay callable
   * throughout and later invocations use the new model.
   */
  async update(name: string, version: string, request: UpdateServiceRequest): Promise<ServiceDescriptor> {
    const key = parseServiceKey(name, version);
    const current = await this.registry.get(key.name, key.version);

    if (this.immutableVersions) {
      throw new ServiceError(
        ServiceErrorCode.VERSION_IMMUTABLE,
        `Service ${key.name} version ${key.version} is immutable; publish a new version instead`
      );
    }

    const adapter = this.catalog.get(current.descriptor.adapter);
    const entry = await this.registry.replace(
      key.name,
      key.version,
      { binding: this.bind(adapter, request.model), description: request.description },
      request.expectedRevision
    );

    this.logger.info('Service updated', {
      name: key.name,
      version: key.version,
      revision: entry.descriptor.revision,
      previousModelId: current.descriptor.modelId,
      modelId: entry.descriptor.modelId,
    });
    return entry.descriptor;
  }

  async remove(name: string, version: string): Promise<void> {
    const key = parseServiceKey(name, version);
    await this.registry.delete(key.name, key.version);
    this.logger.info('Service deleted', { ...key });
  }

  async consume(name: string, version: string, input: unknown): Promise<ConsumeResponse<unknown>> {
    const key = parseServiceKey(name, version);
    const entry = await this.registry.get(key.name, key.version);
    const response = entry.binding.invoke(input);

    this.logger.debug('Service invoked', {
      ...key,
      revision: entry.descriptor.revision,
      modelId: entry.binding.modelId,
    });
    return response;
  }

  async swagger(name: string, version: string, options: SwaggerOptions = {}): Promise<SwaggerDocument> {
    return buildSwaggerDocument(await this.fetch(name, version), options);
  }

  adapters(): string[] {
    return this.catalog.names();
  }

  private bind(adapter: AdapterDefinition, artifact: unknown): ServiceBinding {
    try {
      return adapter.bind(artifact);
    } catch (error) {
      if (error instanceof MLError) {
        throw new ServiceError(
          ServiceErrorCode.INVALID_REQUEST,
          `Model rejected by adapter ${adapter.name}: ${error.message}`
        );
      }
      throw error;
    }
  }
}
