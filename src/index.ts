export * from './types';
export { BalancerServer } from './core/BalancerServer';
export { ConsistentHashRing, DEFAULT_VIRTUAL_NODES } from './core/ConsistentHashRing';
export { createHashFunction, DEFAULT_HASH_ALGORITHM, HASH_ALGORITHMS, HashFunction } from './core/HashFunction';
export { HealthMonitor, nextHealthState } from './core/HealthMonitor';
export { createHealthProbe, HealthProbe, HttpHealthProbe, TcpHealthProbe } from './core/HealthProbe';
export { LoadBalancer, serverId } from './core/LoadBalancer';
export { MetricsCollector } from './core/MetricsCollector';
export { StatisticsCollector } from './core/StatisticsCollector';
export { VirtualNode } from './core/VirtualNode';
export { BalancerError, ErrorCode } from './utils/errorHandler';
export { defaultConfig } from './config/defaults';
export { loadConfig, validateConfig } from './config/loader';
