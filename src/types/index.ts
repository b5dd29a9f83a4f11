export type HashAlgorithm = 'murmur3' | 'fnv1a' | 'djb2' | 'md5' | 'sha1' | 'crc32';

export type HealthState = 'unknown' | 'healthy' | 'unhealthy';

export type ProbeType = 'http' | 'tcp';

export interface ServerDescriptor {
  host: string;
  port: number;
  weight?: number; // Virtual-node multiplier (default: 1)
}

export interface Server {
  id: string;
  host: string;
  port: number;
  weight: number;
  addedAt: Date;
}

export interface HealthCheckConfig {
  enabled: boolean;
  type?: ProbeType;
  path?: string; // Probe path for HTTP checks (default: /health)
  expectedStatus?: number;
  interval?: number; // Seconds between probes
  timeout?: number; // Seconds before a probe counts as failed
  retries?: number; // Consecutive failures before a healthy server is condemned
}

export interface ProxyConfig {
  enabled: boolean;
  timeout?: number; // Milliseconds
  routeKeyHeader?: string;
}

export interface BalancerConfig {
  port: number;
  host: string;
  apiKey: string;
  virtualNodes: number;
  hashFunction: HashAlgorithm;
  maxCandidates?: number;
  healthCheck: HealthCheckConfig;
  proxy: ProxyConfig;
  servers: ServerDescriptor[];
}

export interface ProbeTarget {
  id: string;
  host: string;
  port: number;
}

export interface ProbeResult {
  healthy: boolean;
  responseTimeMs: number;
  statusCode?: number;
  error?: string;
}

export interface HealthRecord {
  serverId: string;
  state: HealthState;
  consecutiveSuccesses: number;
  consecutiveFailures: number;
  lastCheckedAt: Date | null;
  lastResponseTimeMs: number | null;
  lastError: string | null;
  /** Set by drain, cleared only by enable; a drained server is never selected. */
  drained: boolean;
}

export interface ServerStats {
  requestCount: number;
  errorCount: number;
  latencySamples: number;
  averageResponseTimeMs: number;
  lastResponseTimeMs: number | null;
}

export interface AggregateStats {
  totalServers: number;
  healthyServers: number;
  unhealthyServers: number;
  unknownServers: number;
  totalRequests: number;
  totalErrors: number;
  errorRate: number;
  selectionFailures: number;
  virtualNodes: number;
  uptime: number;
}

export interface ServerSnapshot extends Server {
  url: string;
  health: HealthRecord;
  stats: ServerStats;
  errorRate: number;
  virtualNodes: number;
}

export interface KeyLookup {
  key: string;
  hash: number;
  selected: string | null;
  candidates: Array<{ serverId: string; state: HealthState; drained: boolean }>;
  reason?: string;
}

export interface RingEntry {
  hash: number;
  serverId: string;
  replicaIndex: number;
}

export interface RingDescription {
  hashFunction: string;
  totalVirtualNodes: number;
  servers: Record<string, number>;
  sample: RingEntry[];
}
