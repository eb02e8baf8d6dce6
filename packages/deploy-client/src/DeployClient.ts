/**
 * HTTP client for the model hosting service
 *
 * Publishes trained models, fetches service handles and invokes them.
 * Requests are sent once; failures surface as ServiceError with the
 * server's error code.
 */

import { EventEmitter } from 'events';
import axios, { AxiosInstance, AxiosRequestConfig } from 'axios';
import {
  ConsumeResponse,
  ErrorResponse,
  isServiceErrorCode,
  LoginResponse,
  PublishServiceRequest,
  ServiceDescriptor,
  ServiceError,
  ServiceErrorCode,
  serviceErrorCodeForStatus,
  SwaggerDocument,
  UpdateServiceRequest,
} from '@creditops/types';
import { Logger } from '@creditops/utils';

export interface DeployClientConfig {
  baseUrl: string;
  timeoutMs?: number;
  logger?: Logger;
}

export interface DeployClientStats {
  requestCount: number;
  failedRequests: number;
  authenticated: boolean;
}

function isErrorResponse(data: unknown): data is ErrorResponse {
  return (
    typeof data === 'object' &&
    data !== null &&
    'code' in data &&
    typeof data.code === 'string' &&
    'message' in data &&
    typeof data.message === 'string'
  );
}

/**
 * Translate a failed request into a ServiceError
 */
export function toServiceError(error: unknown): ServiceError {
  if (error instanceof ServiceError) {
    return error;
  }

  if (axios.isAxiosError(error)) {
    if (!error.response) {
      return new ServiceError(ServiceErrorCode.UNREACHABLE, `Hosting service unreachable: ${error.message}`);
    }

    const { status, data } = error.response;
    if (isErrorResponse(data)) {
      const code = isServiceErrorCode(data.code) ? data.code : serviceErrorCodeForStatus(status);
      return new ServiceError(code, data.message);
    }
    return new ServiceError(serviceErrorCodeForStatus(status), `Request failed with status ${status}`);
  }

  return new ServiceError(ServiceErrorCode.INTERNAL, error instanceof Error ? error.message : String(error));
}

function servicePath(name: string, version: string): string {
  return `/api/v1/services/${encodeURIComponent(name)}/${encodeURIComponent(version)}`;
}

export class DeployClient extends EventEmitter {
  private http: AxiosInstance;
  private logger?: Logger;
  private accessToken: string | null = null;
  private requestCount = 0;
  private failedRequests = 0;

  constructor(config: DeployClientConfig) {
    super();
    this.logger = config.logger;
    this.http = axios.create({
      baseURL: config.baseUrl,
      timeout: config.timeoutMs ?? 30000,
    });
  }

  get isAuthenticated(): boolean {
    return this.accessToken !== null;
  }

  async login(username: string, password: string): Promise<LoginResponse> {
    const response = await this.send<LoginResponse>({
      method: 'POST',
      url: '/api/v1/login',
      data: { username, password },
    });

    this.accessToken = response.accessToken;
    this.logger?.info('Authenticated with hosting service', { expiresIn: response.expiresIn });
    this.emit('authenticated', { expiresIn: response.expiresIn });
    return response;
  }

  async publishService<Input extends object = Record<string, unknown>, Row = Record<string, unknown>>(
    request: PublishServiceRequest
  ): Promise<ServiceHandle<Input, Row>> {
    const descriptor = await this.send<ServiceDescriptor>({
      method: 'POST',
      url: '/api/v1/services',
      data: request,
    });
    this.logger?.info('Service published', { name: descriptor.name, version: descriptor.version });
    return new ServiceHandle(this, descriptor);
  }

  async getService<Input extends object = Record<string, unknown>, Row = Record<string, unknown>>(
    name: string,
    version: string
  ): Promise<ServiceHandle<Input, Row>> {
    const descriptor = await this.send<ServiceDescriptor>({ method: 'GET', url: servicePath(name, version) });
    return new ServiceHandle(this, descriptor);
  }

  async listServices(name?: string): Promise<ServiceDescriptor[]> {
    const response = await this.send<{ services: ServiceDescriptor[] }>({
      method: 'GET',
      url: '/api/v1/services',
      params: name === undefined ? undefined : { name },
    });
    return response.services;
  }

  async updateService<Input extends object = Record<string, unknown>, Row = Record<string, unknown>>(
    name: string,
    version: string,
    request: UpdateServiceRequest
  ): Promise<ServiceHandle<Input, Row>> {
    const descriptor = await this.send<ServiceDescriptor>({
      method: 'PATCH',
      url: servicePath(name, version),
      data: request,
    });
    this.logger?.info('Service updated', {
      name: descriptor.name,
      version: descriptor.version,
      revision: descriptor.revision,
    });
    return new ServiceHandle(this, descriptor);
  }

  async deleteService(name: string, version: string): Promise<void> {
    await this.send<unknown>({ method: 'DELETE', url: servicePath(name, version) });
    this.logger?.info('Service deleted', { name, version });
  }

  async consume<Input extends object, Row>(
    name: string,
    version: string,
    record: Input
  ): Promise<ConsumeResponse<Row>> {
    return this.send<ConsumeResponse<Row>>({
      method: 'POST',
      url: `${servicePath(name, version)}/consume`,
      data: record,
    });
  }

  async swagger(name: string, version: string): Promise<SwaggerDocument> {
    return this.send<SwaggerDocument>({ method: 'GET', url: `${servicePath(name, version)}/swagger.json` });
  }

  getStats(): DeployClientStats {
    return {
      requestCount: this.requestCount,
      failedRequests: this.failedRequests,
      authenticated: this.isAuthenticated,
    };
  }

  private async send<T>(config: AxiosRequestConfig): Promise<T> {
    this.requestCount++;
    const headers = this.accessToken ? { Authorization: `Bearer ${this.accessToken}` } : undefined;

    try {
      const response = await this.http.request<T>({ ...config, headers });
      return response.data;
    } catch (error) {
      this.failedRequests++;
      const serviceError = toServiceError(error);
      this.logger?.warn('Hosting service request failed', {
        method: config.method,
        url: config.url,
        code: serviceError.code,
        message: serviceError.message,
      });
      throw serviceError;
    }
  }
}

/**
 * A published service bound to the client that fetched it
 */
export class ServiceHandle<Input extends object = Record<string, unknown>, Row = Record<string, unknown>> {
  constructor(private readonly client: DeployClient, readonly descriptor: ServiceDescriptor) {}

  get name(): string {
    return this.descriptor.name;
  }

  get version(): string {
    return this.descriptor.version;
  }

  consume(record: Input): Promise<ConsumeResponse<Row>> {
    return this.client.consume<Input, Row>(this.descriptor.name, this.descriptor.version, record);
  }

  swagger(): Promise<SwaggerDocument> {
    return this.client.swagger(this.descriptor.name, this.descriptor.version);
  }
}
