import axios from 'axios';
import net from 'net';
import { HealthCheckConfig, ProbeResult, ProbeTarget } from '../types';

/**
 * A single health check attempt. Implementations may reject; the monitor
 * treats a rejection the same as an unhealthy result.
 */
export interface HealthProbe {
  check(target: ProbeTarget, timeoutMs: number): Promise<ProbeResult>;
}

export class HttpHealthProbe implements HealthProbe {
  private path: string;
  private expectedStatus: number;

  constructor(path: string = '/health', expectedStatus: number = 200) {
    this.path = path.startsWith('/') ? path : `/${path}`;
    this.expectedStatus = expectedStatus;
  }

  async check(target: ProbeTarget, timeoutMs: number): Promise<ProbeResult> {
    const url = `http://${target.host}:${target.port}${this.path}`;
    const startTime = Date.now();

    try {
      const response = await axios.get(url, {
        timeout: timeoutMs,
        maxRedirects: 0,
        headers: { 'User-Agent': 'ringlb-health/1.0' },
        validateStatus: () => true
      });
      const healthy = response.status === this.expectedStatus;

      return {
        healthy,
        responseTimeMs: Date.now() - startTime,
        statusCode: response.status,
        ...(!healthy && { error: `Unexpected status code: got ${response.status}, expected ${this.expectedStatus}` })
      };
    } catch (error) {
      return {
        healthy: false,
        responseTimeMs: Date.now() - startTime,
        error: error instanceof Error ? error.message : String(error)
      };
    }
  }
}

export class TcpHealthProbe implements HealthProbe {
  check(target: ProbeTarget, timeoutMs: number): Promise<ProbeResult> {
    const startTime = Date.now();

    return new Promise(resolve => {
      const socket = net.createConnection({ host: target.host, port: target.port });

      const finish = (healthy: boolean, error?: string) => {
        socket.destroy();
        resolve({
          healthy,
          responseTimeMs: Date.now() - startTime,
          ...(error !== undefined && { error })
        });
      };

      socket.setTimeout(timeoutMs);
      socket.once('connect', () => finish(true));
      socket.once('timeout', () => finish(false, `Connection timed out after ${timeoutMs}ms`));
      socket.once('error', (err: Error) => finish(false, err.message));
    });
  }
}

export function createHealthProbe(config: HealthCheckConfig): HealthProbe {
  if (config.type === 'tcp') {
    return new TcpHealthProbe();
  }
  return new HttpHealthProbe(config.path, config.expectedStatus);
}
