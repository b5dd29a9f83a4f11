import { ServerStats } from '../types';

export interface StatisticsTotals {
  totalRequests: number;
  totalErrors: number;
  errorRate: number;
  selectionFailures: number;
}

function emptyStats(): ServerStats {
  return {
    requestCount: 0,
    errorCount: 0,
    latencySamples: 0,
    averageResponseTimeMs: 0,
    lastResponseTimeMs: null
  };
}

/**
 * Per-server request, error and latency counters. Counters only grow; a
 * server's record disappears with the server. Every read hands out copies.
 */
export class StatisticsCollector {
  private stats: Map<string, ServerStats> = new Map();
  private selectionFailures: number = 0;

  register(serverId: string): void {
    if (!this.stats.has(serverId)) {
      this.stats.set(serverId, emptyStats());
    }
  }

  unregister(serverId: string): void {
    this.stats.delete(serverId);
  }

  recordRequest(serverId: string): void {
    const entry = this.stats.get(serverId);
    if (entry) {
      entry.requestCount++;
    }
  }

  recordError(serverId: string): void {
    const entry = this.stats.get(serverId);
    if (entry) {
      entry.errorCount++;
    }
  }

  recordLatency(serverId: string, durationMs: number): void {
    const entry = this.stats.get(serverId);
    if (!entry || !Number.isFinite(durationMs) || durationMs < 0) {
      return;
    }
    entry.latencySamples++;
    // Incremental mean
    entry.averageResponseTimeMs += (durationMs - entry.averageResponseTimeMs) / entry.latencySamples;
    entry.lastResponseTimeMs = durationMs;
  }

  recordSelectionFailure(): void {
    this.selectionFailures++;
  }

  get(serverId: string): ServerStats | undefined {
    const entry = this.stats.get(serverId);
    return entry ? { ...entry } : undefined;
  }

  snapshot(): Record<string, ServerStats> {
    const result: Record<string, ServerStats> = {};
    for (const [serverId, entry] of this.stats) {
      result[serverId] = { ...entry };
    }
    return result;
  }

  aggregate(): StatisticsTotals {
    let totalRequests = 0;
    let totalErrors = 0;
    for (const entry of this.stats.values()) {
      totalRequests += entry.requestCount;
      totalErrors += entry.errorCount;
    }
    return {
      totalRequests,
      totalErrors,
      errorRate: totalRequests > 0 ? totalErrors / totalRequests : 0,
      selectionFailures: this.selectionFailures
    };
  }
}
