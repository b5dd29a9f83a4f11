import http from 'http';
import net from 'net';
import { createHealthProbe, HttpHealthProbe, TcpHealthProbe } from '../../core/HealthProbe';
import { ProbeTarget } from '../../types';
import { close, listen } from '../helpers';

function targetFor(port: number): ProbeTarget {
  return { id: `127.0.0.1:${port}`, host: '127.0.0.1', port };
}

/** A port that was just bound and released, so nothing listens on it. */
async function closedPort(): Promise<number> {
  const server = net.createServer();
  const port = await listen(server);
  await close(server);
  return port;
}

describe('HttpHealthProbe', () => {
  let server: http.Server;
  let port: number;
  let status: number;
  let requestedPaths: string[];

  beforeEach(async () => {
    status = 200;
    requestedPaths = [];
    server = http.createServer((req, res) => {
      requestedPaths.push(req.url ?? '');
      if (req.url === '/slow') {
        return; // never answers
      }
      res.statusCode = status;
      res.end('ok');
    });
    port = await listen(server);
  });

  afterEach(async () => {
    server.closeAllConnections();
    await close(server);
  });

  it('should report healthy on the expected status', async () => {
    const result = await new HttpHealthProbe('/health', 200).check(targetFor(port), 1000);

    expect(result.healthy).toBe(true);
    expect(result.statusCode).toBe(200);
    expect(result.error).toBeUndefined();
    expect(result.responseTimeMs).toBeGreaterThanOrEqual(0);
    expect(requestedPaths).toEqual(['/health']);
  });

  it('should report unhealthy on any other status', async () => {
    status = 503;

    const result = await new HttpHealthProbe('/health', 200).check(targetFor(port), 1000);

    expect(result.healthy).toBe(false);
    expect(result.statusCode).toBe(503);
    expect(result.error).toBe('Unexpected status code: got 503, expected 200');
  });

  it('should accept a custom expected status and a path without a leading slash', async () => {
    status = 204;

    const result = await new HttpHealthProbe('status', 204).check(targetFor(port), 1000);

    expect(result.healthy).toBe(true);
    expect(requestedPaths).toEqual(['/status']);
  });

  it('should report unhealthy when the server does not answer in time', async () => {
    const result = await new HttpHealthProbe('/slow').check(targetFor(port), 100);

    expect(result.healthy).toBe(false);
    expect(result.statusCode).toBeUndefined();
    expect(result.error).toBe('timeout of 100ms exceeded');
  });

  it('should report unhealthy when the connection is refused', async () => {
    const result = await new HttpHealthProbe().check(targetFor(await closedPort()), 1000);

    expect(result.healthy).toBe(false);
    expect(result.error).toContain('ECONNREFUSED');
  });
});

describe('TcpHealthProbe', () => {
  it('should report healthy when the port accepts connections', async () => {
    const server = net.createServer(socket => socket.end());
    const port = await listen(server);

    try {
      const result = await new TcpHealthProbe().check(targetFor(port), 1000);
      expect(result.healthy).toBe(true);
      expect(result.error).toBeUndefined();
    } finally {
      await close(server);
    }
  });

  it('should report unhealthy when the connection is refused', async () => {
    const result = await new TcpHealthProbe().check(targetFor(await closedPort()), 1000);

    expect(result.healthy).toBe(false);
    expect(result.error).toContain('ECONNREFUSED');
  });
});

describe('createHealthProbe', () => {
  it('should build the probe named by the config', () => {
    expect(createHealthProbe({ enabled: true, type: 'tcp' })).toBeInstanceOf(TcpHealthProbe);
    expect(createHealthProbe({ enabled: true, type: 'http' })).toBeInstanceOf(HttpHealthProbe);
    expect(createHealthProbe({ enabled: true })).toBeInstanceOf(HttpHealthProbe);
  });
});
