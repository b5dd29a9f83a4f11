import { BalancerServer } from './core/BalancerServer';
import { HealthMonitor } from './core/HealthMonitor';
import { createHealthProbe } from './core/HealthProbe';
import { LoadBalancer } from './core/LoadBalancer';
import { MetricsCollector } from './core/MetricsCollector';
import { loadConfig } from './config/loader';
import { describeError, setupUnhandledErrorHandlers } from './utils/errorHandler';
import { Logger } from './utils/Logger';

// Setup unhandled error handlers
setupUnhandledErrorHandlers();

const logger = new Logger('Server');

async function main() {
  try {
    const config = await loadConfig();
    logger.info('Configuration loaded', {
      port: config.port,
      hashFunction: config.hashFunction,
      virtualNodes: config.virtualNodes,
      servers: config.servers.length
    });

    const healthMonitor = new HealthMonitor({
      interval: config.healthCheck.interval,
      timeout: config.healthCheck.timeout,
      retries: config.healthCheck.retries,
      probe: createHealthProbe(config.healthCheck)
    });
    const metrics = new MetricsCollector();
    const loadBalancer = new LoadBalancer({
      virtualNodes: config.virtualNodes,
      hashFunction: config.hashFunction,
      maxCandidates: config.maxCandidates,
      healthMonitor,
      metrics
    });

    const server = new BalancerServer(config, loadBalancer, metrics);
    server.setupGracefulShutdown();
    await server.start();
  } catch (error) {
    logger.error('Failed to start server', describeError(error));
    process.exit(1);
  }
}

void main();
