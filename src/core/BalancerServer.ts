import express, { Request, Response, NextFunction } from 'express';
import cors from 'cors';
import helmet from 'helmet';
import responseTime from 'response-time';
import axios, { AxiosError } from 'axios';
import http from 'http';
import { BalancerConfig, Server, ServerDescriptor } from '../types';
import { Logger } from '../utils/Logger';
import {
  requestIdMiddleware,
  requestLoggerMiddleware,
  errorHandlerMiddleware,
  asyncHandler,
  describeError,
  isBalancerError,
  BalancerError
} from '../utils/errorHandler';
import { LoadBalancer } from './LoadBalancer';
import { MetricsCollector } from './MetricsCollector';

// Hop-by-hop headers are never forwarded in either direction
const HOP_BY_HOP_HEADERS = new Set([
  'connection',
  'keep-alive',
  'proxy-authenticate',
  'proxy-authorization',
  'te',
  'trailer',
  'transfer-encoding',
  'upgrade',
  'host',
  'content-length'
]);

function requireInteger(value: unknown, field: string): number {
  const parsed = typeof value === 'string' && value.trim() !== '' ? Number(value) : value;
  if (typeof parsed !== 'number' || !Number.isInteger(parsed)) {
    throw new BalancerError(`${field} must be an integer`, 'INVALID_REQUEST');
  }
  return parsed;
}

function field(body: unknown, name: string): unknown {
  if (typeof body !== 'object' || body === null) {
    return undefined;
  }
  return Reflect.get(body, name);
}

// Collapses a request path to its first two segments to keep label cardinality low
function metricsRoute(url: string | undefined): string {
  const path = (url ?? '/').split('?')[0];
  return path.startsWith('/api') ? path.split('/').slice(0, 3).join('/') : 'proxy';
}

function parseDescriptor(body: unknown): ServerDescriptor {
  if (typeof body !== 'object' || body === null) {
    throw new BalancerError('No JSON body provided', 'INVALID_REQUEST');
  }
  const host = field(body, 'host');
  const port = field(body, 'port');
  const weight = field(body, 'weight');
  if (typeof host !== 'string' || host.length === 0) {
    throw new BalancerError('Missing required field: host', 'INVALID_REQUEST');
  }
  if (port === undefined) {
    throw new BalancerError('Missing required field: port', 'INVALID_REQUEST');
  }
  return {
    host,
    port: requireInteger(port, 'port'),
    ...(weight !== undefined && { weight: requireInteger(weight, 'weight') })
  };
}

export class BalancerServer {
  private app: express.Application;
  private config: BalancerConfig;
  private loadBalancer: LoadBalancer;
  private metrics: MetricsCollector;
  private logger: Logger;
  private server: http.Server | null = null;
  private metricsTimer: NodeJS.Timeout | null = null;
  private isShuttingDown: boolean = false;

  constructor(config: BalancerConfig, loadBalancer: LoadBalancer, metrics: MetricsCollector) {
    this.config = config;
    this.loadBalancer = loadBalancer;
    this.metrics = metrics;
    this.app = express();
    this.logger = new Logger('BalancerServer');

    this.setupMiddleware();
    this.setupRoutes();
    // Error handling middleware (last)
    this.app.use(errorHandlerMiddleware);
  }

  getApp(): express.Application {
    return this.app;
  }

  private setupMiddleware(): void {
    this.app.disable('x-powered-by');
    this.app.use(requestIdMiddleware);
    this.app.use(requestLoggerMiddleware);

    this.app.use(responseTime((req: http.IncomingMessage, res: http.ServerResponse, time: number) => {
      this.metrics.recordRequest(req.method ?? 'GET', metricsRoute(req.url), res.statusCode, time / 1000);
    }));
  }

  private setupRoutes(): void {
    this.app.use('/api', this.createAPIRouter());
    if (this.config.proxy.enabled) {
      this.app.use(this.createProxyRouter());
    }
  }

  private createAPIRouter(): express.Router {
    const router = express.Router();

    router.use(helmet({
      contentSecurityPolicy: false,
      crossOriginEmbedderPolicy: false
    }));

    router.use(cors({
      origin: '*',
      methods: ['GET', 'POST', 'PUT', 'DELETE', 'OPTIONS'],
      allowedHeaders: ['Content-Type', 'Authorization', 'X-API-Key']
    }));

    router.use(express.json({ limit: '1mb' }));

    // Balancer self-health is public so upstream checks need no key
    router.get('/health', (req: Request, res: Response) => {
      const stats = this.loadBalancer.getAggregateStats();
      const healthy = stats.healthyServers > 0 && !this.isShuttingDown;

      res.status(healthy ? 200 : 503).json({
        status: this.isShuttingDown ? 'shutting_down' : healthy ? 'healthy' : 'unhealthy',
        healthyServers: stats.healthyServers,
        totalServers: stats.totalServers,
        uptime: stats.uptime,
        ...(!healthy && !this.isShuttingDown && { message: 'No healthy backend servers available' })
      });
    });

    router.use((req: Request, res: Response, next: NextFunction) => {
      const apiKey = req.headers['x-api-key'];
      if (apiKey !== this.config.apiKey) {
        throw new BalancerError('Unauthorized', 'UNAUTHORIZED');
      }
      next();
    });

    router.get('/metrics', asyncHandler(async (req: Request, res: Response) => {
      this.loadBalancer.refreshHealthMetrics();
      res.set('Content-Type', this.metrics.getContentType());
      res.send(await this.metrics.getMetrics());
    }));

    router.get('/servers', (req: Request, res: Response) => {
      const servers = this.loadBalancer.getServerList();
      res.json({
        servers,
        totalCount: servers.length,
        healthyCount: servers.filter(s => s.health.state === 'healthy' && !s.health.drained).length,
        timestamp: Date.now()
      });
    });

    router.post('/servers', (req: Request, res: Response) => {
      const server = this.loadBalancer.addServer(parseDescriptor(req.body));
      res.status(201).json({
        success: true,
        message: `Server ${server.id} added`,
        server: this.loadBalancer.getServer(server.id)
      });
    });

    router.get('/servers/:id', (req: Request, res: Response) => {
      res.json(this.loadBalancer.getServer(req.params.id));
    });

    router.put('/servers/:id', (req: Request, res: Response) => {
      const weight = field(req.body, 'weight');
      if (weight === undefined) {
        throw new BalancerError('Missing required field: weight', 'INVALID_REQUEST');
      }
      const server = this.loadBalancer.updateWeight(req.params.id, requireInteger(weight, 'weight'));
      res.json({ success: true, message: `Server ${server.id} updated`, updatedFields: ['weight'], server });
    });

    router.delete('/servers/:id', (req: Request, res: Response) => {
      const server = this.loadBalancer.removeServer(req.params.id);
      res.json({ success: true, message: `Server ${server.id} removed` });
    });

    router.put('/servers/:id/health', (req: Request, res: Response) => {
      const healthy = field(req.body, 'healthy');
      if (typeof healthy !== 'boolean') {
        throw new BalancerError("Missing boolean field 'healthy'", 'INVALID_REQUEST');
      }
      const state = this.loadBalancer.setServerHealth(req.params.id, healthy);
      res.json({ success: true, message: `Server ${req.params.id} marked as ${state}`, state });
    });

    router.post('/servers/:id/drain', (req: Request, res: Response) => {
      this.loadBalancer.setServerHealth(req.params.id, false);
      res.json({ success: true, message: `Server ${req.params.id} is now draining (marked unhealthy)` });
    });

    router.post('/servers/:id/enable', (req: Request, res: Response) => {
      this.loadBalancer.setServerHealth(req.params.id, true);
      res.json({ success: true, message: `Server ${req.params.id} is now enabled (marked healthy)` });
    });

    router.get('/stats', (req: Request, res: Response) => {
      res.json({
        ...this.loadBalancer.getAggregateStats(),
        servers: this.loadBalancer.getServerList().map(s => ({
          id: s.id,
          state: s.health.state,
          drained: s.health.drained,
          requestCount: s.stats.requestCount,
          errorCount: s.stats.errorCount,
          averageResponseTimeMs: s.stats.averageResponseTimeMs
        })),
        timestamp: Date.now()
      });
    });

    router.get('/select/:key', (req: Request, res: Response) => {
      res.json(this.loadBalancer.describeKey(req.params.key));
    });

    router.get('/ring', (req: Request, res: Response) => {
      const limit = req.query.limit === undefined ? 100 : requireInteger(req.query.limit, 'limit');
      res.json(this.loadBalancer.describeRing(limit));
    });

    router.use((req: Request) => {
      throw new BalancerError(`Route ${req.method} /api${req.path} not found`, 'NOT_FOUND');
    });

    return router;
  }

  private createProxyRouter(): express.Router {
    const router = express.Router();
    const routeKeyHeader = this.config.proxy.routeKeyHeader ?? 'x-route-key';

    router.use(express.raw({ type: () => true, limit: '100mb' }));

    router.use(asyncHandler(async (req: Request, res: Response) => {
      const headerKey = req.headers[routeKeyHeader];
      const key = typeof headerKey === 'string' && headerKey.length > 0 ? headerKey : `${req.ip}:${req.path}`;

      const server = this.routeOrReject(key, res);
      if (!server) {
        return;
      }

      const headers: Record<string, string> = {};
      for (const [name, value] of Object.entries(req.headers)) {
        if (value === undefined || HOP_BY_HOP_HEADERS.has(name)) continue;
        headers[name] = Array.isArray(value) ? value.join(', ') : value;
      }
      if (req.ip) {
        headers['x-forwarded-for'] = headers['x-forwarded-for'] ? `${headers['x-forwarded-for']}, ${req.ip}` : req.ip;
      }

      const startTime = Date.now();
      try {
        const response = await axios.request<Buffer>({
          method: req.method,
          url: `http://${server.host}:${server.port}${req.originalUrl}`,
          headers,
          data: Buffer.isBuffer(req.body) && req.body.length > 0 ? req.body : undefined,
          responseType: 'arraybuffer',
          timeout: this.config.proxy.timeout,
          maxRedirects: 0,
          validateStatus: () => true
        });
        const elapsed = Date.now() - startTime;

        if (response.status >= 500) {
          this.loadBalancer.recordError(server.id, elapsed);
        } else {
          this.loadBalancer.recordSuccess(server.id, elapsed);
        }
        this.logger.http('Request forwarded', {
          serverId: server.id,
          method: req.method,
          url: req.originalUrl,
          statusCode: response.status,
          durationMs: elapsed
        });

        for (const [name, value] of Object.entries(response.headers)) {
          if (HOP_BY_HOP_HEADERS.has(name.toLowerCase()) || value === undefined || value === null) continue;
          res.setHeader(name, Array.isArray(value) ? value.map(String) : String(value));
        }
        res.setHeader('X-Load-Balancer-Server', server.id);
        res.setHeader('X-Load-Balancer-Response-Time', (elapsed / 1000).toFixed(3));
        res.status(response.status).send(Buffer.from(response.data));
      } catch (error) {
        const elapsed = Date.now() - startTime;
        this.loadBalancer.recordError(server.id, elapsed);
        this.logger.error('Error forwarding request', {
          serverId: server.id,
          url: req.originalUrl,
          code: error instanceof AxiosError ? error.code : undefined,
          ...describeError(error)
        });
        throw new BalancerError(`Backend server ${server.id} failed to respond`, 'BAD_GATEWAY');
      }
    }));

    return router;
  }

  private routeOrReject(key: string, res: Response): Server | null {
    try {
      return this.loadBalancer.route(key);
    } catch (error) {
      if (isBalancerError(error, 'NO_SERVERS_AVAILABLE') || isBalancerError(error, 'NO_HEALTHY_SERVER')) {
        res.status(503).json({ success: false, error: 'No healthy servers available', code: error.code });
        return null;
      }
      throw error;
    }
  }

  private startMetricsUpdater(): void {
    // Health gauges follow the monitor by polling its snapshot
    this.metricsTimer = setInterval(() => {
      this.loadBalancer.refreshHealthMetrics();
    }, 5000);
  }

  async start(): Promise<void> {
    for (const descriptor of this.config.servers) {
      this.loadBalancer.addServer(descriptor);
    }

    if (this.config.healthCheck.enabled) {
      this.loadBalancer.start();
    } else {
      // Without probing nothing would ever leave 'unknown'
      for (const server of this.loadBalancer.getServerList()) {
        this.loadBalancer.setServerHealth(server.id, true);
      }
      this.logger.warn('Health checks disabled; all servers marked healthy');
    }
    this.startMetricsUpdater();

    await new Promise<void>((resolve, reject) => {
      const server = http.createServer(this.app);
      server.once('error', reject);
      server.listen(this.config.port, this.config.host, () => {
        server.off('error', reject);
        resolve();
      });
      this.server = server;
    });

    this.printStartupInfo();
  }

  async stop(): Promise<void> {
    this.isShuttingDown = true;
    this.loadBalancer.stop();

    if (this.metricsTimer) {
      clearInterval(this.metricsTimer);
      this.metricsTimer = null;
    }

    const server = this.server;
    this.server = null;
    if (server) {
      await new Promise<void>((resolve, reject) => {
        server.close(error => (error ? reject(error) : resolve()));
      });
      this.logger.info('HTTP server closed');
    }
  }

  setupGracefulShutdown(): void {
    const shutdown = async (signal: string) => {
      this.logger.info(`Received ${signal}, starting graceful shutdown...`);
      try {
        await this.stop();
        this.logger.info('Graceful shutdown complete');
        process.exit(0);
      } catch (error) {
        this.logger.error('Error during shutdown', describeError(error));
        process.exit(1);
      }
    };

    process.on('SIGTERM', () => void shutdown('SIGTERM'));
    process.on('SIGINT', () => void shutdown('SIGINT'));
  }

  private printStartupInfo(): void {
    const stats = this.loadBalancer.getAggregateStats();
    const ring = this.loadBalancer.describeRing(0);
    this.logger.info('Load balancer started', {
      address: `http://${this.config.host}:${this.config.port}`,
      servers: stats.totalServers,
      virtualNodes: ring.totalVirtualNodes,
      hashFunction: ring.hashFunction,
      healthChecks: this.config.healthCheck.enabled,
      proxy: this.config.proxy.enabled
    });
  }
}
