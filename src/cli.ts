#!/usr/bin/env node
import { Command } from 'commander';
import chalk from 'chalk';
import ora from 'ora';
import axios from 'axios';
import { AggregateStats, HealthState, KeyLookup, ServerSnapshot } from './types';

const program = new Command();
const API_URL = process.env.RINGLB_API_URL || 'http://localhost:8080';
const API_KEY = process.env.RINGLB_API_KEY || 'default-api-key-change-in-production';

const api = axios.create({
  baseURL: `${API_URL}/api`,
  headers: { 'X-API-Key': API_KEY }
});

interface ServerListResponse {
  servers: ServerSnapshot[];
  totalCount: number;
  healthyCount: number;
}

interface StatsResponse extends AggregateStats {
  servers: Array<{
    id: string;
    state: HealthState;
    drained: boolean;
    requestCount: number;
    errorCount: number;
    averageResponseTimeMs: number;
  }>;
}

interface MutationResponse {
  success: boolean;
  message: string;
}

function stateLabel(state: HealthState, drained: boolean = false): string {
  if (drained) {
    return `${chalk.gray('DRAINED')} ${chalk.gray(`(probe: ${state})`)}`;
  }
  switch (state) {
    case 'healthy':
      return chalk.green('HEALTHY');
    case 'unhealthy':
      return chalk.red('UNHEALTHY');
    default:
      return chalk.yellow('UNKNOWN');
  }
}

function failureMessage(error: unknown): string {
  if (axios.isAxiosError(error)) {
    const data: unknown = error.response?.data;
    if (typeof data === 'object' && data !== null && 'error' in data && typeof data.error === 'string') {
      return data.error;
    }
    return error.message;
  }
  return error instanceof Error ? error.message : String(error);
}

function parsePositiveInteger(value: string, name: string): number {
  const parsed = Number(value);
  if (!Number.isInteger(parsed) || parsed < 1) {
    console.error(chalk.red(`❌ ${name} must be a positive integer, got ${value}`));
    process.exit(1);
  }
  return parsed;
}

/** Runs a mutating request behind a spinner and prints the server's message. */
async function mutate(label: string, request: () => Promise<{ data: MutationResponse }>): Promise<void> {
  const spinner = ora(label).start();
  try {
    const response = await request();
    spinner.succeed(chalk.green(response.data.message));
  } catch (error) {
    spinner.fail(chalk.red(failureMessage(error)));
    process.exit(1);
  }
}

program
  .name('ringlb')
  .description('Consistent-hashing load balancer CLI')
  .version('1.0.0');

program
  .command('servers')
  .description('List backend servers')
  .option('-j, --json', 'Output as JSON')
  .action(async (options: { json?: boolean }) => {
    try {
      const { data } = await api.get<ServerListResponse>('/servers');

      if (options.json) {
        console.log(JSON.stringify(data, null, 2));
        return;
      }

      console.log(chalk.bold.blue('\n🌐 Backend Servers\n'));

      data.servers.forEach(server => {
        console.log(`${chalk.bold(server.id)}`);
        console.log(`  URL: ${chalk.cyan(server.url)}`);
        console.log(`  Weight: ${chalk.cyan(server.weight)} (${server.virtualNodes} virtual nodes)`);
        console.log(`  Status: ${stateLabel(server.health.state, server.health.drained)}`);
        console.log(`  Requests: ${chalk.cyan(server.stats.requestCount.toLocaleString())} | Errors: ${chalk.yellow(server.stats.errorCount.toLocaleString())}`);
        if (server.health.lastError) {
          console.log(`  Last error: ${chalk.red(server.health.lastError)}`);
        }
        console.log();
      });

      console.log(`Total: ${data.totalCount} | Healthy: ${chalk.green(data.healthyCount)}\n`);
    } catch (error) {
      console.error(chalk.red(`❌ Failed to fetch servers: ${failureMessage(error)}`));
      process.exit(1);
    }
  });

program
  .command('add')
  .description('Add a backend server')
  .argument('<host>', 'Server host')
  .argument('<port>', 'Server port')
  .option('-w, --weight <weight>', 'Server weight', '1')
  .action(async (host: string, port: string, options: { weight: string }) => {
    const body = {
      host,
      port: parsePositiveInteger(port, 'port'),
      weight: parsePositiveInteger(options.weight, 'weight')
    };
    await mutate(`Adding ${host}:${port}...`, () => api.post<MutationResponse>('/servers', body));
  });

program
  .command('remove')
  .description('Remove a backend server')
  .argument('<id>', 'Server id (host:port)')
  .action(async (id: string) => {
    await mutate(`Removing ${id}...`, () => api.delete<MutationResponse>(`/servers/${encodeURIComponent(id)}`));
  });

program
  .command('weight')
  .description('Change the weight of a backend server')
  .argument('<id>', 'Server id (host:port)')
  .argument('<weight>', 'New weight')
  .action(async (id: string, weight: string) => {
    const body = { weight: parsePositiveInteger(weight, 'weight') };
    await mutate(`Updating ${id}...`, () => api.put<MutationResponse>(`/servers/${encodeURIComponent(id)}`, body));
  });

program
  .command('drain')
  .description('Mark a server unhealthy so no new keys route to it')
  .argument('<id>', 'Server id (host:port)')
  .action(async (id: string) => {
    await mutate(`Draining ${id}...`, () => api.post<MutationResponse>(`/servers/${encodeURIComponent(id)}/drain`));
  });

program
  .command('enable')
  .description('Mark a server healthy')
  .argument('<id>', 'Server id (host:port)')
  .action(async (id: string) => {
    await mutate(`Enabling ${id}...`, () => api.post<MutationResponse>(`/servers/${encodeURIComponent(id)}/enable`));
  });

program
  .command('stats')
  .description('Show balancer statistics')
  .option('-j, --json', 'Output as JSON')
  .action(async (options: { json?: boolean }) => {
    try {
      const { data: stats } = await api.get<StatsResponse>('/stats');

      if (options.json) {
        console.log(JSON.stringify(stats, null, 2));
        return;
      }

      console.log(chalk.bold.blue('\n📊 Load Balancer Statistics\n'));

      console.log(chalk.bold('Traffic:'));
      console.log(`  Total Requests: ${chalk.cyan(stats.totalRequests.toLocaleString())}`);
      console.log(`  Total Errors: ${chalk.yellow(stats.totalErrors.toLocaleString())}`);
      console.log(`  Error Rate: ${chalk.magenta((stats.errorRate * 100).toFixed(2) + '%')}`);
      console.log(`  Selection Failures: ${chalk.red(stats.selectionFailures.toLocaleString())}`);

      console.log(chalk.bold('\nPool:'));
      console.log(`  Servers: ${chalk.cyan(stats.totalServers)} (${chalk.green(stats.healthyServers)} healthy, ${chalk.red(stats.unhealthyServers)} unhealthy, ${chalk.yellow(stats.unknownServers)} unknown)`);
      console.log(`  Virtual Nodes: ${chalk.cyan(stats.virtualNodes)}`);

      console.log(chalk.bold('\nServers:'));
      stats.servers.forEach(server => {
        const status = server.drained ? chalk.gray('●') : server.state === 'healthy' ? chalk.green('●') : server.state === 'unhealthy' ? chalk.red('●') : chalk.yellow('●');
        console.log(`  ${status} ${server.id} - ${server.requestCount} requests, ${server.errorCount} errors, ${server.averageResponseTimeMs.toFixed(1)}ms avg`);
      });

      console.log(chalk.bold('\nUptime:'));
      console.log(`  ${chalk.cyan(formatDuration(stats.uptime))}\n`);
    } catch (error) {
      console.error(chalk.red(`❌ Failed to fetch stats: ${failureMessage(error)}`));
      process.exit(1);
    }
  });

program
  .command('lookup')
  .description('Show which server a key routes to')
  .argument('<key>', 'Routing key')
  .action(async (key: string) => {
    try {
      const { data } = await api.get<KeyLookup>(`/select/${encodeURIComponent(key)}`);

      console.log(`${chalk.bold('Key:')} ${data.key} ${chalk.gray(`(hash ${data.hash})`)}`);
      if (data.selected) {
        console.log(`${chalk.bold('Server:')} ${chalk.green(data.selected)}`);
      } else {
        console.log(`${chalk.bold('Server:')} ${chalk.red(data.reason ?? 'none')}`);
      }
      console.log(chalk.bold('Candidates:'));
      data.candidates.forEach((candidate, index) => {
        console.log(`  ${index + 1}. ${candidate.serverId} ${stateLabel(candidate.state, candidate.drained)}`);
      });
    } catch (error) {
      console.error(chalk.red(`❌ Lookup failed: ${failureMessage(error)}`));
      process.exit(1);
    }
  });

program
  .command('serve')
  .description('Start the load balancer')
  .option('-p, --port <port>', 'Port to listen on')
  .option('-c, --config <config>', 'Config file path')
  .action(async (options: { port?: string; config?: string }) => {
    console.log(chalk.blue('🚀 Starting ringlb...'));

    if (options.port) {
      process.env.RINGLB_PORT = options.port;
    }
    if (options.config) {
      process.env.RINGLB_CONFIG = options.config;
    }

    await import('./server');
  });

function formatDuration(ms: number): string {
  const seconds = Math.floor(ms / 1000);
  const minutes = Math.floor(seconds / 60);
  const hours = Math.floor(minutes / 60);
  const days = Math.floor(hours / 24);

  if (days > 0) return `${days}d ${hours % 24}h ${minutes % 60}m`;
  if (hours > 0) return `${hours}h ${minutes % 60}m ${seconds % 60}s`;
  if (minutes > 0) return `${minutes}m ${seconds % 60}s`;
  return `${seconds}s`;
}

program.parseAsync(process.argv).catch((error: unknown) => {
  console.error(chalk.red(failureMessage(error)));
  process.exit(1);
});
