import promClient from 'prom-client';
import { HealthState } from '../types';

const HEALTH_GAUGE_VALUE: Record<HealthState, number> = {
  healthy: 1,
  unhealthy: 0,
  unknown: -1
};

export class MetricsCollector {
  private register: promClient.Registry = new promClient.Registry();

  // HTTP Metrics (balancer front end)
  public readonly httpRequestsTotal = new promClient.Counter({
    name: 'ringlb_http_requests_total',
    help: 'Total HTTP requests received by the balancer',
    labelNames: ['method', 'route', 'status_code'],
    registers: [this.register]
  });

  public readonly httpRequestDuration = new promClient.Histogram({
    name: 'ringlb_http_request_duration_seconds',
    help: 'HTTP request duration in seconds',
    labelNames: ['method', 'route', 'status_code'],
    buckets: [0.001, 0.005, 0.015, 0.05, 0.1, 0.5, 1, 2, 5],
    registers: [this.register]
  });

  // Backend Metrics
  public readonly backendRequests = new promClient.Counter({
    name: 'ringlb_backend_requests_total',
    help: 'Requests routed to each backend server',
    labelNames: ['server_id'],
    registers: [this.register]
  });

  public readonly backendErrors = new promClient.Counter({
    name: 'ringlb_backend_errors_total',
    help: 'Errors reported for each backend server',
    labelNames: ['server_id'],
    registers: [this.register]
  });

  public readonly backendResponseTime = new promClient.Histogram({
    name: 'ringlb_backend_response_time_seconds',
    help: 'Backend response time in seconds',
    labelNames: ['server_id'],
    buckets: [0.005, 0.01, 0.025, 0.05, 0.1, 0.25, 0.5, 1, 2.5, 5, 10],
    registers: [this.register]
  });

  public readonly selectionFailures = new promClient.Counter({
    name: 'ringlb_selection_failures_total',
    help: 'Keys for which no server could be selected',
    labelNames: ['reason'],
    registers: [this.register]
  });

  // Pool Metrics
  public readonly serverHealth = new promClient.Gauge({
    name: 'ringlb_server_health',
    help: 'Server health (1=healthy, 0=unhealthy, -1=unknown)',
    labelNames: ['server_id'],
    registers: [this.register]
  });

  public readonly servers = new promClient.Gauge({
    name: 'ringlb_servers',
    help: 'Number of registered backend servers',
    registers: [this.register]
  });

  public readonly ringVirtualNodes = new promClient.Gauge({
    name: 'ringlb_ring_virtual_nodes',
    help: 'Number of virtual nodes on the hash ring',
    registers: [this.register]
  });

  constructor() {
    // Add default metrics (memory, CPU, etc.)
    promClient.collectDefaultMetrics({ register: this.register });
  }

  async getMetrics(): Promise<string> {
    return this.register.metrics();
  }

  getContentType(): string {
    return this.register.contentType;
  }

  recordRequest(method: string, route: string, statusCode: number, duration: number): void {
    const labels = { method, route, status_code: statusCode.toString() };
    this.httpRequestsTotal.inc(labels);
    this.httpRequestDuration.observe(labels, duration);
  }

  recordBackendRequest(serverId: string): void {
    this.backendRequests.inc({ server_id: serverId });
  }

  recordBackendError(serverId: string): void {
    this.backendErrors.inc({ server_id: serverId });
  }

  recordBackendResponseTime(serverId: string, seconds: number): void {
    this.backendResponseTime.observe({ server_id: serverId }, seconds);
  }

  recordSelectionFailure(reason: string): void {
    this.selectionFailures.inc({ reason });
  }

  updateServerHealth(serverId: string, state: HealthState): void {
    this.serverHealth.set({ server_id: serverId }, HEALTH_GAUGE_VALUE[state]);
  }

  updatePoolSize(servers: number, virtualNodes: number): void {
    this.servers.set(servers);
    this.ringVirtualNodes.set(virtualNodes);
  }

  /** Drops every per-server series for a removed server. */
  removeServer(serverId: string): void {
    const labels = { server_id: serverId };
    this.backendRequests.remove(labels);
    this.backendErrors.remove(labels);
    this.backendResponseTime.remove(labels);
    this.serverHealth.remove(labels);
  }
}
