/**
 * Sync health telemetry.
 *
 * Folds the diagnostics of all sync components into counters a host can
 * show on a status screen or ship to its own monitoring.
 *
 * @module health-monitor
 */

import { BehaviorSubject, Subject, takeUntil, type Observable } from 'rxjs';
import type { SyncDiagnostic } from './diagnostics.js';

/** Aggregate health counters */
export interface SyncHealth {
  readonly transportErrors: number;
  readonly reconnectsScheduled: number;
  readonly connections: number;
  readonly framesDropped: number;
  readonly framesIgnored: number;
  readonly fetches: number;
  readonly fetchFailures: number;
  readonly pollsSkipped: number;
  readonly writes: number;
  readonly writeFailures: number;
  readonly avgWriteLatencyMs: number;
  readonly lastSnapshotAt: number | null;
  readonly lastErrorAt: number | null;
  /** True once more than `unhealthyAfterFailures` consecutive transport failures occurred */
  readonly degraded: boolean;
}

export interface SyncHealthConfig {
  /** Consecutive transport failures before `degraded` is set (default: 5) */
  readonly unhealthyAfterFailures?: number;
}

const INITIAL_HEALTH: SyncHealth = {
  transportErrors: 0,
  reconnectsScheduled: 0,
  connections: 0,
  framesDropped: 0,
  framesIgnored: 0,
  fetches: 0,
  fetchFailures: 0,
  pollsSkipped: 0,
  writes: 0,
  writeFailures: 0,
  avgWriteLatencyMs: 0,
  lastSnapshotAt: null,
  lastErrorAt: null,
  degraded: false,
};

/**
 * @example
 * ```typescript
 * const monitor = new SyncHealthMonitor();
 * session.diagnostics$.subscribe((d) => monitor.record(d));
 *
 * monitor.health$.subscribe((h) => {
 *   if (h.degraded) console.log('Live updates unavailable, polling only');
 * });
 * ```
 */
export class SyncHealthMonitor {
  private readonly config: Required<SyncHealthConfig>;
  private readonly health$$ = new BehaviorSubject<SyncHealth>(INITIAL_HEALTH);
  private readonly destroy$ = new Subject<void>();
  private totalWriteLatency = 0;
  private destroyed = false;

  constructor(config: SyncHealthConfig = {}) {
    this.config = {
      unhealthyAfterFailures: config.unhealthyAfterFailures ?? 5,
    };
  }

  get health$(): Observable<SyncHealth> {
    return this.health$$.asObservable().pipe(takeUntil(this.destroy$));
  }

  getHealth(): SyncHealth {
    return this.health$$.value;
  }

  record(diagnostic: SyncDiagnostic): void {
    const h = this.health$$.value;

    switch (diagnostic.type) {
      case 'transport-error':
        this.update({
          transportErrors: h.transportErrors + 1,
          lastErrorAt: diagnostic.timestamp,
          degraded: diagnostic.failures > this.config.unhealthyAfterFailures,
        });
        break;
      case 'reconnect-scheduled':
        this.update({ reconnectsScheduled: h.reconnectsScheduled + 1 });
        break;
      case 'connected':
        this.update({ connections: h.connections + 1, degraded: false });
        break;
      case 'frame-dropped':
        this.update({ framesDropped: h.framesDropped + 1, lastErrorAt: diagnostic.timestamp });
        break;
      case 'frame-ignored':
        this.update({ framesIgnored: h.framesIgnored + 1 });
        break;
      case 'fetch-succeeded':
        this.update({ fetches: h.fetches + 1, lastSnapshotAt: diagnostic.timestamp });
        break;
      case 'fetch-failed':
        this.update({ fetchFailures: h.fetchFailures + 1, lastErrorAt: diagnostic.timestamp });
        break;
      case 'poll-skipped':
        this.update({ pollsSkipped: h.pollsSkipped + 1 });
        break;
      case 'write-succeeded': {
        this.totalWriteLatency += diagnostic.durationMs;
        const writes = h.writes + 1;
        this.update({ writes, avgWriteLatencyMs: Math.round(this.totalWriteLatency / writes) });
        break;
      }
      case 'write-failed':
        this.update({ writeFailures: h.writeFailures + 1, lastErrorAt: diagnostic.timestamp });
        break;
    }
  }

  reset(): void {
    if (this.destroyed) return;
    this.totalWriteLatency = 0;
    this.health$$.next(INITIAL_HEALTH);
  }

  destroy(): void {
    if (this.destroyed) return;
    this.destroyed = true;
    this.destroy$.next();
    this.destroy$.complete();
    this.health$$.complete();
  }

  private update(partial: Partial<SyncHealth>): void {
    if (this.destroyed) return;
    this.health$$.next({ ...this.health$$.value, ...partial });
  }
}

export function createSyncHealthMonitor(config?: SyncHealthConfig): SyncHealthMonitor {
  return new SyncHealthMonitor(config);
}
