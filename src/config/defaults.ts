import { BalancerConfig } from '../types';

export const defaultConfig: BalancerConfig = {
  port: 8080,
  host: '0.0.0.0',
  apiKey: process.env.RINGLB_API_KEY || 'default-api-key-change-in-production',
  virtualNodes: 150,
  hashFunction: 'murmur3',
  healthCheck: {
    enabled: true,
    type: 'http',
    path: '/health',
    expectedStatus: 200,
    interval: 10, // seconds
    timeout: 2, // seconds
    retries: 3
  },
  proxy: {
    enabled: true,
    timeout: 30000, // 30 seconds
    routeKeyHeader: 'x-route-key'
  },
  servers: []
};
