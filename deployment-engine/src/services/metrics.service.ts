/**
 * Metrics Service
 * Prometheus counters and latency histograms for the hosting API
 */

import { Counter, Gauge, Histogram, Registry } from 'prom-client';

export interface RequestSample {
  method: string;
  route: string;
  statusCode: number;
  durationMs: number;
}

export class MetricsService {
  private readonly registry: Registry;
  private readonly requestsTotal: Counter<'method' | 'route' | 'status'>;
  private readonly requestDuration: Histogram<'method' | 'route'>;
  private readonly servicesHosted: Gauge;

  constructor(prefix = 'creditops') {
    // Per-server registry, never the prom-client global one
    this.registry = new Registry();

    this.requestsTotal = new Counter({
      name: `${prefix}_http_requests_total`,
      help: 'HTTP requests handled, by route and status code',
      labelNames: ['method', 'route', 'status'],
      registers: [this.registry],
    });

    this.requestDuration = new Histogram({
      name: `${prefix}_http_request_duration_seconds`,
      help: 'HTTP request latency in seconds',
      labelNames: ['method', 'route'],
      buckets: [0.005, 0.01, 0.025, 0.05, 0.1, 0.25, 0.5, 1, 2.5],
      registers: [this.registry],
    });

    this.servicesHosted = new Gauge({
      name: `${prefix}_services_hosted`,
      help: 'Service versions currently published',
      registers: [this.registry],
    });
  }

  get contentType(): string {
    return this.registry.contentType;
  }

  recordRequest(sample: RequestSample): void {
    this.requestsTotal.inc({ method: sample.method, route: sample.route, status: String(sample.statusCode) });
    this.requestDuration.observe({ method: sample.method, route: sample.route }, sample.durationMs / 1000);
  }

  setServicesHosted(count: number): void {
    this.servicesHosted.set(count);
  }

  async requestCount(method: string, route: string, statusCode: number): Promise<number> {
    const metric = await this.requestsTotal.get();
    const match = metric.values.find(
      (value) =>
        value.labels.method === method && value.labels.route === route && value.labels.status === String(statusCode)
    );
    return match?.value ?? 0;
  }

  render(): Promise<string> {
    return this.registry.metrics();
  }
}
