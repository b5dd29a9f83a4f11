import { HealthRecord, HealthState, ProbeResult, ProbeTarget } from '../types';
import { BalancerError, describeError } from '../utils/errorHandler';
import { Logger } from '../utils/Logger';
import { HealthProbe, HttpHealthProbe } from './HealthProbe';

export interface HealthMonitorOptions {
  interval?: number; // seconds
  timeout?: number; // seconds
  retries?: number;
  probe?: HealthProbe;
}

interface MonitoredServer {
  readonly target: ProbeTarget;
  readonly record: HealthRecord;
  timer: NodeJS.Timeout | null;
}

/**
 * Health state transition for one probe outcome. `consecutiveFailures` is the
 * count including this outcome.
 *
 * unknown takes the first outcome as-is; healthy needs `retries` failures in a
 * row to flip; unhealthy recovers on a single success.
 */
export function nextHealthState(
  current: HealthState,
  healthy: boolean,
  consecutiveFailures: number,
  retries: number
): HealthState {
  if (healthy) {
    return 'healthy';
  }
  if (current === 'healthy') {
    return consecutiveFailures >= retries ? 'unhealthy' : 'healthy';
  }
  return 'unhealthy';
}

export class HealthMonitor {
  private servers: Map<string, MonitoredServer> = new Map();
  private probe: HealthProbe;
  private intervalMs: number;
  private timeoutMs: number;
  private retries: number;
  private running: boolean = false;
  private logger: Logger;

  constructor(options: HealthMonitorOptions = {}) {
    const interval = options.interval ?? 10;
    const timeout = options.timeout ?? 2;
    const retries = options.retries ?? 3;

    if (!(interval > 0) || !(timeout > 0)) {
      throw new BalancerError('Health check interval and timeout must be positive', 'INVALID_CONFIG');
    }
    if (!Number.isInteger(retries) || retries < 1) {
      throw new BalancerError(`Health check retries must be a positive integer, got ${retries}`, 'INVALID_CONFIG');
    }

    this.intervalMs = interval * 1000;
    this.timeoutMs = timeout * 1000;
    this.retries = retries;
    this.probe = options.probe ?? new HttpHealthProbe();
    this.logger = new Logger('HealthMonitor');
  }

  isRunning(): boolean {
    return this.running;
  }

  register(target: ProbeTarget): void {
    if (this.servers.has(target.id)) {
      throw new BalancerError(`Server ${target.id} is already monitored`, 'DUPLICATE_SERVER');
    }

    const entry: MonitoredServer = {
      target: { ...target },
      record: {
        serverId: target.id,
        state: 'unknown',
        consecutiveSuccesses: 0,
        consecutiveFailures: 0,
        lastCheckedAt: null,
        lastResponseTimeMs: null,
        lastError: null,
        drained: false
      },
      timer: null
    };
    this.servers.set(target.id, entry);

    if (this.running) {
      this.schedule(entry, 0);
    }
  }

  /**
   * Stops future probes for the server. A probe already in flight finishes,
   * but its result is discarded.
   */
  deregister(serverId: string): boolean {
    const entry = this.servers.get(serverId);
    if (!entry) {
      return false;
    }
    this.cancel(entry);
    this.servers.delete(serverId);
    return true;
  }

  start(): void {
    if (this.running) {
      return;
    }
    this.running = true;
    for (const entry of this.servers.values()) {
      this.schedule(entry, 0);
    }
    this.logger.info('Health monitor started', {
      servers: this.servers.size,
      intervalMs: this.intervalMs,
      timeoutMs: this.timeoutMs,
      retries: this.retries
    });
  }

  stop(): void {
    if (!this.running) {
      return;
    }
    this.running = false;
    for (const entry of this.servers.values()) {
      this.cancel(entry);
    }
    this.logger.info('Health monitor stopped');
  }

  /** Selectable: probed healthy and not drained. */
  isHealthy(serverId: string): boolean {
    const record = this.servers.get(serverId)?.record;
    return record !== undefined && record.state === 'healthy' && !record.drained;
  }

  getState(serverId: string): HealthState | undefined {
    return this.servers.get(serverId)?.record.state;
  }

  getRecord(serverId: string): HealthRecord | undefined {
    const entry = this.servers.get(serverId);
    return entry ? { ...entry.record } : undefined;
  }

  snapshot(): HealthRecord[] {
    return Array.from(this.servers.values(), entry => ({ ...entry.record }));
  }

  /**
   * Manual override. 'unhealthy' drains the server: probes keep updating its
   * state, but it stays out of selection until it is set 'healthy' again.
   * Resets the consecutive counters.
   */
  setState(serverId: string, state: 'healthy' | 'unhealthy'): void {
    const entry = this.servers.get(serverId);
    if (!entry) {
      throw new BalancerError(`Server ${serverId} is not monitored`, 'SERVER_NOT_FOUND');
    }
    const { record } = entry;
    const previous = record.state;
    const wasDrained = record.drained;
    record.state = state;
    record.drained = state === 'unhealthy';
    record.consecutiveSuccesses = 0;
    record.consecutiveFailures = 0;

    if (previous !== state || wasDrained !== record.drained) {
      this.logger.info('Server health set manually', { serverId, from: previous, to: state, drained: record.drained });
    }
  }

  /**
   * Feeds one probe outcome into the server's state machine. Returns the new
   * state, or undefined when the server is not monitored.
   */
  recordProbeResult(serverId: string, result: ProbeResult): HealthState | undefined {
    const entry = this.servers.get(serverId);
    if (!entry) {
      return undefined;
    }
    return this.apply(entry, result);
  }

  /** Runs one probe for the server right away, outside the schedule. */
  async probeNow(serverId: string): Promise<HealthState | undefined> {
    const entry = this.servers.get(serverId);
    if (!entry) {
      return undefined;
    }
    return this.runProbe(entry);
  }

  private apply(entry: MonitoredServer, result: ProbeResult): HealthState {
    const { record } = entry;
    const previous = record.state;

    if (result.healthy) {
      record.consecutiveSuccesses++;
      record.consecutiveFailures = 0;
      record.lastError = null;
    } else {
      record.consecutiveFailures++;
      record.consecutiveSuccesses = 0;
      record.lastError = result.error ?? 'Probe failed';
    }
    record.lastCheckedAt = new Date();
    record.lastResponseTimeMs = result.responseTimeMs;
    record.state = nextHealthState(previous, result.healthy, record.consecutiveFailures, this.retries);

    if (record.state !== previous) {
      const meta = {
        serverId: record.serverId,
        from: previous,
        to: record.state,
        consecutiveFailures: record.consecutiveFailures,
        responseTimeMs: result.responseTimeMs,
        ...(record.lastError !== null && { reason: record.lastError }),
        ...(record.drained && { drained: true })
      };
      if (record.state === 'healthy') {
        this.logger.info('Server is now healthy', meta);
      } else {
        this.logger.warn('Server is now unhealthy', meta);
      }
    } else if (!result.healthy) {
      this.logger.debug('Health probe failed', {
        serverId: record.serverId,
        consecutiveFailures: record.consecutiveFailures,
        retries: this.retries,
        reason: record.lastError
      });
    }

    return record.state;
  }

  private async runProbe(entry: MonitoredServer): Promise<HealthState | undefined> {
    const result = await this.probeWithTimeout(entry.target);

    // Removed, or removed and re-added, while the probe was in flight
    if (this.servers.get(entry.target.id) !== entry) {
      return undefined;
    }
    return this.apply(entry, result);
  }

  private async probeWithTimeout(target: ProbeTarget): Promise<ProbeResult> {
    const startTime = Date.now();
    let timer: NodeJS.Timeout | undefined;

    const timeout = new Promise<ProbeResult>(resolve => {
      timer = setTimeout(() => resolve({
        healthy: false,
        responseTimeMs: Date.now() - startTime,
        error: `Probe timed out after ${this.timeoutMs}ms`
      }), this.timeoutMs);
    });

    try {
      return await Promise.race([this.probe.check(target, this.timeoutMs), timeout]);
    } catch (error) {
      return {
        healthy: false,
        responseTimeMs: Date.now() - startTime,
        error: error instanceof Error ? error.message : String(error)
      };
    } finally {
      clearTimeout(timer);
    }
  }

  private schedule(entry: MonitoredServer, delayMs: number): void {
    this.cancel(entry);
    entry.timer = setTimeout(() => {
      entry.timer = null;
      void this.cycle(entry);
    }, delayMs);
  }

  private async cycle(entry: MonitoredServer): Promise<void> {
    try {
      await this.runProbe(entry);
    } catch (error) {
      this.logger.error('Health probe cycle failed', { serverId: entry.target.id, ...describeError(error) });
    }
    if (this.running && this.servers.get(entry.target.id) === entry && entry.timer === null) {
      this.schedule(entry, this.intervalMs);
    }
  }

  private cancel(entry: MonitoredServer): void {
    if (entry.timer) {
      clearTimeout(entry.timer);
      entry.timer = null;
    }
  }
}
