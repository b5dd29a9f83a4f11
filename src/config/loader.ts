import * as fs from 'fs-extra';
import { BalancerConfig, HealthCheckConfig, ProxyConfig, ServerDescriptor } from '../types';
import { HASH_ALGORITHMS, isHashAlgorithm } from '../core/HashFunction';
import { BalancerError } from '../utils/errorHandler';
import { defaultConfig } from './defaults';

export const DEFAULT_CONFIG_PATH = './config/ringlb.json';

type Json = Record<string, unknown>;

function isObject(value: unknown): value is Json {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function invalid(path: string, expected: string, value: unknown): BalancerError {
  return new BalancerError(`Invalid config: ${path} must be ${expected}, got ${JSON.stringify(value)}`, 'INVALID_CONFIG');
}

function positiveInteger(source: Json, key: string, path: string): number {
  const value = source[key];
  if (typeof value !== 'number' || !Number.isInteger(value) || value < 1) {
    throw invalid(path, 'a positive integer', value);
  }
  return value;
}

function positiveNumber(source: Json, key: string, path: string): number {
  const value = source[key];
  if (typeof value !== 'number' || !(value > 0)) {
    throw invalid(path, 'a positive number', value);
  }
  return value;
}

function text(source: Json, key: string, path: string): string {
  const value = source[key];
  if (typeof value !== 'string' || value.length === 0) {
    throw invalid(path, 'a non-empty string', value);
  }
  return value;
}

function flag(source: Json, key: string, path: string): boolean {
  const value = source[key];
  if (typeof value !== 'boolean') {
    throw invalid(path, 'a boolean', value);
  }
  return value;
}

function section(source: Json, key: string): Json {
  const value = source[key];
  if (!isObject(value)) {
    throw invalid(key, 'an object', value);
  }
  return value;
}

function validateHealthCheck(source: Json): HealthCheckConfig {
  const type = source.type;
  if (type !== 'http' && type !== 'tcp') {
    throw invalid('healthCheck.type', "'http' or 'tcp'", type);
  }
  return {
    enabled: flag(source, 'enabled', 'healthCheck.enabled'),
    type,
    path: text(source, 'path', 'healthCheck.path'),
    expectedStatus: positiveInteger(source, 'expectedStatus', 'healthCheck.expectedStatus'),
    interval: positiveNumber(source, 'interval', 'healthCheck.interval'),
    timeout: positiveNumber(source, 'timeout', 'healthCheck.timeout'),
    retries: positiveInteger(source, 'retries', 'healthCheck.retries')
  };
}

function validateProxy(source: Json): ProxyConfig {
  return {
    enabled: flag(source, 'enabled', 'proxy.enabled'),
    timeout: positiveInteger(source, 'timeout', 'proxy.timeout'),
    routeKeyHeader: text(source, 'routeKeyHeader', 'proxy.routeKeyHeader').toLowerCase()
  };
}

function validateServers(value: unknown): ServerDescriptor[] {
  if (!Array.isArray(value)) {
    throw invalid('servers', 'an array', value);
  }
  return value.map((entry: unknown, index) => {
    const path = `servers[${index}]`;
    if (!isObject(entry)) {
      throw invalid(path, 'an object', entry);
    }
    const port = positiveInteger(entry, 'port', `${path}.port`);
    if (port > 65535) {
      throw invalid(`${path}.port`, 'at most 65535', port);
    }
    return {
      host: text(entry, 'host', `${path}.host`),
      port,
      weight: entry.weight === undefined ? 1 : positiveInteger(entry, 'weight', `${path}.weight`)
    };
  });
}

/**
 * Checks a merged config object field by field and returns it typed.
 * Throws INVALID_CONFIG naming the first offending path.
 */
export function validateConfig(raw: unknown): BalancerConfig {
  if (!isObject(raw)) {
    throw invalid('config', 'an object', raw);
  }

  const hashFunction = text(raw, 'hashFunction', 'hashFunction');
  if (!isHashAlgorithm(hashFunction)) {
    throw invalid('hashFunction', `one of ${HASH_ALGORITHMS.map(name => `'${name}'`).join(', ')}`, hashFunction);
  }

  const port = positiveInteger(raw, 'port', 'port');
  if (port > 65535) {
    throw invalid('port', 'at most 65535', port);
  }

  return {
    port,
    host: text(raw, 'host', 'host'),
    apiKey: text(raw, 'apiKey', 'apiKey'),
    virtualNodes: positiveInteger(raw, 'virtualNodes', 'virtualNodes'),
    hashFunction,
    ...(raw.maxCandidates !== undefined && { maxCandidates: positiveInteger(raw, 'maxCandidates', 'maxCandidates') }),
    healthCheck: validateHealthCheck(section(raw, 'healthCheck')),
    proxy: validateProxy(section(raw, 'proxy')),
    servers: validateServers(raw.servers)
  };
}

/** Overlays user config on the defaults; nested sections merge one level deep. */
export function mergeConfig(userConfig: unknown): Json {
  const base: Json = { ...defaultConfig };
  if (!isObject(userConfig)) {
    return base;
  }
  const merged: Json = { ...base, ...userConfig };
  for (const key of ['healthCheck', 'proxy'] as const) {
    const override = userConfig[key];
    if (isObject(override)) {
      merged[key] = { ...defaultConfig[key], ...override };
    }
  }
  return merged;
}

export async function loadConfig(configPath: string = process.env.RINGLB_CONFIG || DEFAULT_CONFIG_PATH): Promise<BalancerConfig> {
  let userConfig: unknown = {};

  if (await fs.pathExists(configPath)) {
    try {
      userConfig = await fs.readJson(configPath);
    } catch (error) {
      throw new BalancerError(
        `Invalid config: ${configPath} is not valid JSON (${error instanceof Error ? error.message : String(error)})`,
        'INVALID_CONFIG'
      );
    }
  }

  const merged = mergeConfig(userConfig);
  if (process.env.RINGLB_PORT) {
    merged.port = parseInt(process.env.RINGLB_PORT, 10);
  }
  if (process.env.RINGLB_API_KEY) {
    merged.apiKey = process.env.RINGLB_API_KEY;
  }

  return validateConfig(merged);
}
