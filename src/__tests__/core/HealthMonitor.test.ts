import { HealthMonitor, nextHealthState } from '../../core/HealthMonitor';
import { HealthProbe } from '../../core/HealthProbe';
import { ProbeResult, ProbeTarget } from '../../types';
import { thrownBy } from '../helpers';

const target: ProbeTarget = { id: '10.0.0.1:8080', host: '10.0.0.1', port: 8080 };

const up: ProbeResult = { healthy: true, responseTimeMs: 3, statusCode: 200 };
const down: ProbeResult = { healthy: false, responseTimeMs: 5, error: 'Connection refused' };

function fakeProbe() {
  const check = jest.fn<Promise<ProbeResult>, [ProbeTarget, number]>();
  const probe: HealthProbe = { check };
  return { probe, check };
}

function deferred<T>() {
  let resolve: (value: T) => void = () => undefined;
  const promise = new Promise<T>(r => {
    resolve = r;
  });
  return { promise, resolve };
}

describe('nextHealthState', () => {
  it('should take the first outcome from unknown', () => {
    expect(nextHealthState('unknown', true, 0, 3)).toBe('healthy');
    expect(nextHealthState('unknown', false, 1, 3)).toBe('unhealthy');
  });

  it('should need `retries` consecutive failures to condemn a healthy server', () => {
    expect(nextHealthState('healthy', false, 1, 3)).toBe('healthy');
    expect(nextHealthState('healthy', false, 2, 3)).toBe('healthy');
    expect(nextHealthState('healthy', false, 3, 3)).toBe('unhealthy');
  });

  it('should recover an unhealthy server on one success', () => {
    expect(nextHealthState('unhealthy', true, 0, 3)).toBe('healthy');
    expect(nextHealthState('unhealthy', false, 7, 3)).toBe('unhealthy');
  });
});

describe('HealthMonitor', () => {
  describe('construction', () => {
    it('should reject invalid options', () => {
      expect(thrownBy(() => new HealthMonitor({ interval: 0 }))).toHaveProperty('code', 'INVALID_CONFIG');
      expect(thrownBy(() => new HealthMonitor({ timeout: -1 }))).toHaveProperty('code', 'INVALID_CONFIG');
      expect(thrownBy(() => new HealthMonitor({ retries: 0 }))).toHaveProperty('code', 'INVALID_CONFIG');
    });
  });

  describe('registration', () => {
    it('should start servers in the unknown state', () => {
      const monitor = new HealthMonitor({ probe: fakeProbe().probe });
      monitor.register(target);

      expect(monitor.getState(target.id)).toBe('unknown');
      expect(monitor.isHealthy(target.id)).toBe(false);
      expect(monitor.getRecord(target.id)).toEqual({
        serverId: target.id,
        state: 'unknown',
        consecutiveSuccesses: 0,
        consecutiveFailures: 0,
        lastCheckedAt: null,
        lastResponseTimeMs: null,
        lastError: null,
        drained: false
      });
    });

    it('should reject a duplicate registration', () => {
      const monitor = new HealthMonitor({ probe: fakeProbe().probe });
      monitor.register(target);

      expect(thrownBy(() => monitor.register(target))).toHaveProperty('code', 'DUPLICATE_SERVER');
    });

    it('should forget deregistered servers', () => {
      const monitor = new HealthMonitor({ probe: fakeProbe().probe });
      monitor.register(target);

      expect(monitor.deregister(target.id)).toBe(true);
      expect(monitor.deregister(target.id)).toBe(false);
      expect(monitor.getState(target.id)).toBeUndefined();
      expect(monitor.snapshot()).toEqual([]);
    });
  });

  describe('recordProbeResult', () => {
    it('should drive the state machine and the record', () => {
      const monitor = new HealthMonitor({ retries: 3, probe: fakeProbe().probe });
      monitor.register(target);

      expect(monitor.recordProbeResult(target.id, up)).toBe('healthy');
      expect(monitor.recordProbeResult(target.id, down)).toBe('healthy');
      expect(monitor.recordProbeResult(target.id, down)).toBe('healthy');

      const record = monitor.getRecord(target.id);
      expect(record?.consecutiveFailures).toBe(2);
      expect(record?.consecutiveSuccesses).toBe(0);
      expect(record?.lastError).toBe('Connection refused');
      expect(record?.lastResponseTimeMs).toBe(5);
      expect(record?.lastCheckedAt).toBeInstanceOf(Date);

      expect(monitor.recordProbeResult(target.id, down)).toBe('unhealthy');
      expect(monitor.recordProbeResult(target.id, up)).toBe('healthy');
      expect(monitor.getRecord(target.id)?.lastError).toBeNull();
    });

    it('should not condemn a server whose failures are interrupted by a success', () => {
      const monitor = new HealthMonitor({ retries: 3, probe: fakeProbe().probe });
      monitor.register(target);
      monitor.recordProbeResult(target.id, up);

      for (const result of [down, down, up, down, down, up, down, down]) {
        expect(monitor.recordProbeResult(target.id, result)).toBe('healthy');
      }
    });

    it('should condemn a server on its very first failed probe', () => {
      const monitor = new HealthMonitor({ retries: 3, probe: fakeProbe().probe });
      monitor.register(target);

      expect(monitor.recordProbeResult(target.id, down)).toBe('unhealthy');
    });

    it('should ignore results for unknown servers', () => {
      const monitor = new HealthMonitor({ probe: fakeProbe().probe });

      expect(monitor.recordProbeResult('ghost:1', up)).toBeUndefined();
    });

    it('should hand out copies of the record', () => {
      const monitor = new HealthMonitor({ probe: fakeProbe().probe });
      monitor.register(target);

      const record = monitor.getRecord(target.id);
      if (record) {
        record.state = 'healthy';
      }

      expect(monitor.getState(target.id)).toBe('unknown');
    });
  });

  describe('setState', () => {
    it('should override the state and reset the counters', () => {
      const monitor = new HealthMonitor({ retries: 3, probe: fakeProbe().probe });
      monitor.register(target);
      monitor.recordProbeResult(target.id, up);
      monitor.recordProbeResult(target.id, down);

      monitor.setState(target.id, 'unhealthy');

      expect(monitor.getState(target.id)).toBe('unhealthy');
      expect(monitor.getRecord(target.id)?.consecutiveFailures).toBe(0);

      monitor.setState(target.id, 'healthy');
      expect(monitor.isHealthy(target.id)).toBe(true);
    });

    it('should keep a drained server unselectable after a healthy probe', async () => {
      const { probe, check } = fakeProbe();
      check.mockResolvedValue(up);
      const monitor = new HealthMonitor({ probe });
      monitor.register(target);
      monitor.recordProbeResult(target.id, up);

      monitor.setState(target.id, 'unhealthy');
      await expect(monitor.probeNow(target.id)).resolves.toBe('healthy');

      expect(monitor.getRecord(target.id)).toMatchObject({ state: 'healthy', drained: true });
      expect(monitor.isHealthy(target.id)).toBe(false);
    });

    it('should clear the drain only when set healthy again', () => {
      const monitor = new HealthMonitor({ probe: fakeProbe().probe });
      monitor.register(target);
      monitor.setState(target.id, 'unhealthy');
      monitor.recordProbeResult(target.id, up);
      monitor.recordProbeResult(target.id, up);
      expect(monitor.isHealthy(target.id)).toBe(false);

      monitor.setState(target.id, 'healthy');

      expect(monitor.getRecord(target.id)?.drained).toBe(false);
      expect(monitor.isHealthy(target.id)).toBe(true);
    });

    it('should throw for unknown servers', () => {
      const monitor = new HealthMonitor({ probe: fakeProbe().probe });

      expect(thrownBy(() => monitor.setState('ghost:1', 'healthy'))).toHaveProperty('code', 'SERVER_NOT_FOUND');
    });
  });

  describe('probeNow', () => {
    it('should treat a rejected probe as a failure', async () => {
      const { probe, check } = fakeProbe();
      check.mockRejectedValue(new Error('socket hang up'));
      const monitor = new HealthMonitor({ probe });
      monitor.register(target);

      await expect(monitor.probeNow(target.id)).resolves.toBe('unhealthy');
      expect(monitor.getRecord(target.id)?.lastError).toBe('socket hang up');
    });

    it('should pass the target and the timeout in milliseconds to the probe', async () => {
      const { probe, check } = fakeProbe();
      check.mockResolvedValue(up);
      const monitor = new HealthMonitor({ timeout: 1.5, probe });
      monitor.register(target);

      await monitor.probeNow(target.id);

      expect(check).toHaveBeenCalledWith(target, 1500);
    });

    it('should discard a result that arrives after the server was removed and re-added', async () => {
      const { probe, check } = fakeProbe();
      const pending = deferred<ProbeResult>();
      check.mockReturnValueOnce(pending.promise);
      const monitor = new HealthMonitor({ probe });
      monitor.register(target);

      const outcome = monitor.probeNow(target.id);
      monitor.deregister(target.id);
      monitor.register(target);
      pending.resolve(down);

      await expect(outcome).resolves.toBeUndefined();
      expect(monitor.getState(target.id)).toBe('unknown');
    });

    it('should return undefined for unknown servers', async () => {
      const monitor = new HealthMonitor({ probe: fakeProbe().probe });

      await expect(monitor.probeNow('ghost:1')).resolves.toBeUndefined();
    });
  });

  describe('scheduling', () => {
    beforeEach(() => {
      jest.useFakeTimers();
    });

    afterEach(() => {
      jest.useRealTimers();
    });

    it('should probe on start and then every interval', async () => {
      const { probe, check } = fakeProbe();
      check.mockResolvedValue(up);
      const monitor = new HealthMonitor({ interval: 10, probe });
      monitor.register(target);

      monitor.start();
      expect(monitor.isRunning()).toBe(true);
      await jest.advanceTimersByTimeAsync(1);

      expect(check).toHaveBeenCalledTimes(1);
      expect(monitor.getState(target.id)).toBe('healthy');

      await jest.advanceTimersByTimeAsync(10000);
      expect(check).toHaveBeenCalledTimes(2);

      await jest.advanceTimersByTimeAsync(20000);
      expect(check).toHaveBeenCalledTimes(4);

      monitor.stop();
    });

    it('should stop probing after stop', async () => {
      const { probe, check } = fakeProbe();
      check.mockResolvedValue(up);
      const monitor = new HealthMonitor({ interval: 10, probe });
      monitor.register(target);

      monitor.start();
      await jest.advanceTimersByTimeAsync(1);
      monitor.stop();
      await jest.advanceTimersByTimeAsync(60000);

      expect(check).toHaveBeenCalledTimes(1);
      expect(monitor.isRunning()).toBe(false);
    });

    it('should count a probe that outlives the timeout as a failure', async () => {
      const { probe, check } = fakeProbe();
      check.mockReturnValue(new Promise<ProbeResult>(() => undefined));
      const monitor = new HealthMonitor({ interval: 10, timeout: 2, probe });
      monitor.register(target);

      monitor.start();
      await jest.advanceTimersByTimeAsync(1);
      expect(monitor.getState(target.id)).toBe('unknown');

      await jest.advanceTimersByTimeAsync(2000);
      expect(monitor.getState(target.id)).toBe('unhealthy');
      expect(monitor.getRecord(target.id)?.lastError).toBe('Probe timed out after 2000ms');

      monitor.stop();
    });

    it('should probe servers registered while running right away', async () => {
      const { probe, check } = fakeProbe();
      check.mockResolvedValue(down);
      const monitor = new HealthMonitor({ interval: 10, probe });
      monitor.start();

      monitor.register(target);
      await jest.advanceTimersByTimeAsync(1);

      expect(check).toHaveBeenCalledTimes(1);
      expect(monitor.getState(target.id)).toBe('unhealthy');

      monitor.stop();
    });

    it('should stop probing a deregistered server', async () => {
      const { probe, check } = fakeProbe();
      check.mockResolvedValue(up);
      const monitor = new HealthMonitor({ interval: 10, probe });
      monitor.register(target);
      monitor.start();
      await jest.advanceTimersByTimeAsync(1);

      monitor.deregister(target.id);
      await jest.advanceTimersByTimeAsync(30000);

      expect(check).toHaveBeenCalledTimes(1);
      monitor.stop();
    });
  });
});
