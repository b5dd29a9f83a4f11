import {
  AggregateStats,
  HashAlgorithm,
  HealthRecord,
  HealthState,
  KeyLookup,
  RingDescription,
  Server,
  ServerDescriptor,
  ServerSnapshot,
  ServerStats
} from '../types';
import { BalancerError } from '../utils/errorHandler';
import { Logger } from '../utils/Logger';
import { ConsistentHashRing, assertValidWeight } from './ConsistentHashRing';
import { HashFunction } from './HashFunction';
import { HealthMonitor } from './HealthMonitor';
import { MetricsCollector } from './MetricsCollector';
import { StatisticsCollector } from './StatisticsCollector';

export interface LoadBalancerOptions {
  virtualNodes?: number;
  hashFunction?: HashFunction | HashAlgorithm;
  /** Candidates tried per selection; defaults to the number of servers. */
  maxCandidates?: number;
  healthMonitor?: HealthMonitor;
  metrics?: MetricsCollector;
}

export function serverId(host: string, port: number): string {
  return `${host}:${port}`;
}

/**
 * Routes keys to backend servers: consistent-hash candidates filtered by
 * health, first healthy candidate wins.
 */
export class LoadBalancer {
  private servers: Map<string, Server> = new Map();
  private ring: ConsistentHashRing;
  private healthMonitor: HealthMonitor;
  private statistics: StatisticsCollector = new StatisticsCollector();
  private metrics?: MetricsCollector;
  private maxCandidates?: number;
  private startTime: number = Date.now();
  private logger: Logger;

  constructor(options: LoadBalancerOptions = {}) {
    if (options.maxCandidates !== undefined && (!Number.isInteger(options.maxCandidates) || options.maxCandidates < 1)) {
      throw new BalancerError(`maxCandidates must be a positive integer, got ${options.maxCandidates}`, 'INVALID_CONFIG');
    }
    this.ring = new ConsistentHashRing({
      virtualNodes: options.virtualNodes,
      hashFunction: options.hashFunction
    });
    this.healthMonitor = options.healthMonitor ?? new HealthMonitor();
    this.metrics = options.metrics;
    this.maxCandidates = options.maxCandidates;
    this.logger = new Logger('LoadBalancer');
  }

  start(): void {
    this.healthMonitor.start();
  }

  stop(): void {
    this.healthMonitor.stop();
  }

  addServer(descriptor: ServerDescriptor): Server {
    const weight = descriptor.weight ?? 1;
    assertValidWeight(weight);

    const host = typeof descriptor.host === 'string' ? descriptor.host.trim() : '';
    if (host.length === 0) {
      throw new BalancerError('Server host must be a non-empty string', 'INVALID_SERVER');
    }
    if (!Number.isInteger(descriptor.port) || descriptor.port < 1 || descriptor.port > 65535) {
      throw new BalancerError(`Port must be an integer between 1 and 65535, got ${descriptor.port}`, 'INVALID_SERVER');
    }

    const id = serverId(host, descriptor.port);
    if (this.servers.has(id)) {
      throw new BalancerError(`Server ${id} already exists`, 'DUPLICATE_SERVER');
    }

    const server: Server = { id, host, port: descriptor.port, weight, addedAt: new Date() };

    // Ring first: if placement throws, nothing else has been registered
    this.ring.addServer(id, weight);
    this.healthMonitor.register({ id, host, port: server.port });
    this.statistics.register(id);
    this.servers.set(id, server);
    this.metrics?.updateServerHealth(id, 'unknown');
    this.updatePoolMetrics();

    this.logger.info('Server added', { serverId: id, weight, virtualNodes: this.ring.getVirtualNodes(id).length });
    return { ...server };
  }

  removeServer(id: string): Server {
    const server = this.servers.get(id);
    if (!server) {
      throw new BalancerError(`Server ${id} not found`, 'SERVER_NOT_FOUND');
    }

    this.ring.removeServer(id);
    this.servers.delete(id);
    this.healthMonitor.deregister(id);
    this.statistics.unregister(id);
    this.metrics?.removeServer(id);
    this.updatePoolMetrics();

    this.logger.info('Server removed', { serverId: id });
    return { ...server };
  }

  updateWeight(id: string, weight: number): Server {
    assertValidWeight(weight);
    const server = this.servers.get(id);
    if (!server) {
      throw new BalancerError(`Server ${id} not found`, 'SERVER_NOT_FOUND');
    }

    this.ring.setWeight(id, weight);
    const updated: Server = { ...server, weight };
    this.servers.set(id, updated);
    this.updatePoolMetrics();

    this.logger.info('Server weight updated', { serverId: id, from: server.weight, to: weight });
    return { ...updated };
  }

  /**
   * Drain (false) or enable (true) a server. A drained server is skipped by
   * selection whatever its probes report, until it is enabled again.
   */
  setServerHealth(id: string, healthy: boolean): HealthState {
    if (!this.servers.has(id)) {
      throw new BalancerError(`Server ${id} not found`, 'SERVER_NOT_FOUND');
    }
    const state = healthy ? 'healthy' : 'unhealthy';
    this.healthMonitor.setState(id, state);
    this.metrics?.updateServerHealth(id, state);
    return state;
  }

  selectServer(key: string): string {
    if (this.ring.size === 0) {
      this.recordSelectionFailure('no_servers');
      throw new BalancerError('No servers available', 'NO_SERVERS_AVAILABLE');
    }

    const candidates = this.ring.lookupCandidates(key, this.maxCandidates ?? this.ring.size);
    const selected = candidates.find(id => this.healthMonitor.isHealthy(id));

    if (selected === undefined) {
      this.recordSelectionFailure('no_healthy_server');
      throw new BalancerError(
        `No healthy server among ${candidates.length} candidate(s) for key`,
        'NO_HEALTHY_SERVER'
      );
    }

    this.statistics.recordRequest(selected);
    this.metrics?.recordBackendRequest(selected);
    return selected;
  }

  /** Like selectServer, but returns the server record. */
  route(key: string): Server {
    const id = this.selectServer(key);
    const server = this.servers.get(id);
    if (!server) {
      throw new BalancerError(`Server ${id} not found`, 'SERVER_NOT_FOUND');
    }
    return { ...server };
  }

  recordSuccess(id: string, latencyMs: number): void {
    this.statistics.recordLatency(id, latencyMs);
    if (this.servers.has(id)) {
      this.metrics?.recordBackendResponseTime(id, latencyMs / 1000);
    }
  }

  recordError(id: string, latencyMs?: number): void {
    this.statistics.recordError(id);
    if (latencyMs !== undefined) {
      this.statistics.recordLatency(id, latencyMs);
    }
    if (this.servers.has(id)) {
      this.metrics?.recordBackendError(id);
    }
  }

  hasServer(id: string): boolean {
    return this.servers.has(id);
  }

  getServer(id: string): ServerSnapshot {
    const server = this.servers.get(id);
    if (!server) {
      throw new BalancerError(`Server ${id} not found`, 'SERVER_NOT_FOUND');
    }
    return this.describeServer(server);
  }

  getServerList(): ServerSnapshot[] {
    return Array.from(this.servers.values(), server => this.describeServer(server));
  }

  getAggregateStats(): AggregateStats {
    const totals = this.statistics.aggregate();
    let healthyServers = 0;
    let unhealthyServers = 0;
    let unknownServers = 0;

    for (const id of this.servers.keys()) {
      const record = this.healthMonitor.getRecord(id);
      if (this.healthMonitor.isHealthy(id)) healthyServers++;
      else if (record?.state === 'unhealthy' || record?.drained) unhealthyServers++;
      else unknownServers++;
    }

    return {
      totalServers: this.servers.size,
      healthyServers,
      unhealthyServers,
      unknownServers,
      ...totals,
      virtualNodes: this.ring.virtualNodeCount,
      uptime: Date.now() - this.startTime
    };
  }

  /** Where a key lands and why, without counting it as a request. */
  describeKey(key: string): KeyLookup {
    const hash = this.ring.hashKey(key);
    const candidates = this.ring
      .lookupCandidates(key, this.ring.size)
      .map(id => {
        const record = this.healthMonitor.getRecord(id);
        return { serverId: id, state: record?.state ?? 'unknown', drained: record?.drained ?? false };
      });
    const selected = candidates
      .slice(0, this.maxCandidates ?? candidates.length)
      .find(c => this.healthMonitor.isHealthy(c.serverId));

    if (selected) {
      return { key, hash, selected: selected.serverId, candidates };
    }
    return {
      key,
      hash,
      selected: null,
      candidates,
      reason: candidates.length === 0 ? 'No servers available' : 'No healthy servers available'
    };
  }

  describeRing(limit: number = 100): RingDescription {
    const stats = this.ring.getStats();
    return {
      hashFunction: this.ring.hashFunctionName,
      totalVirtualNodes: stats.totalVirtualNodes,
      servers: stats.virtualNodesPerServer,
      sample: this.ring.sample(limit)
    };
  }

  /** Pushes the current health of every server into the metrics gauges. */
  refreshHealthMetrics(): void {
    if (!this.metrics) {
      return;
    }
    for (const record of this.healthMonitor.snapshot()) {
      this.metrics.updateServerHealth(record.serverId, record.drained ? 'unhealthy' : record.state);
    }
  }

  getHealthMonitor(): HealthMonitor {
    return this.healthMonitor;
  }

  private describeServer(server: Server): ServerSnapshot {
    const stats: ServerStats = this.statistics.get(server.id) ?? {
      requestCount: 0,
      errorCount: 0,
      latencySamples: 0,
      averageResponseTimeMs: 0,
      lastResponseTimeMs: null
    };
    const health: HealthRecord = this.healthMonitor.getRecord(server.id) ?? {
      serverId: server.id,
      state: 'unknown',
      consecutiveSuccesses: 0,
      consecutiveFailures: 0,
      lastCheckedAt: null,
      lastResponseTimeMs: null,
      lastError: null,
      drained: false
    };

    return {
      ...server,
      url: `http://${server.host}:${server.port}`,
      health,
      stats,
      errorRate: stats.requestCount > 0 ? stats.errorCount / stats.requestCount : 0,
      virtualNodes: this.ring.getVirtualNodes(server.id).length
    };
  }

  private recordSelectionFailure(reason: string): void {
    this.statistics.recordSelectionFailure();
    this.metrics?.recordSelectionFailure(reason);
  }

  private updatePoolMetrics(): void {
    this.metrics?.updatePoolSize(this.servers.size, this.ring.virtualNodeCount);
  }
}
