/**
 * Poll fetcher: periodic full snapshots as the safety net under the push
 * channel.
 *
 * Polls every `disconnectedIntervalMs` while the push channel is down and
 * every `connectedIntervalMs` while it is up. A tick is skipped while any
 * device has a write in flight or waiting on its debounce, so a snapshot
 * taken before the gateway applied the write cannot revert the optimistic
 * value.
 */

import { FetchError, type DeviceStore, type PropertyDiff } from '@homesync/core';
import { BehaviorSubject, Subject, takeUntil, type Observable } from 'rxjs';
import type { SyncDiagnostic } from './diagnostics.js';
import { resolveLogger, type Logger, type LoggerSetting } from './logger.js';
import { runWithTimeout } from './timeout.js';
import type { DeviceGateway } from './transport/types.js';

/**
 * What the fetcher needs to know about outstanding writes.
 */
export interface PendingWriteSource {
  hasPendingWrites(): boolean;
  pendingDeviceIds(): readonly string[];
  /** Properties applied locally but not confirmed by the gateway yet */
  pendingOverlay(): ReadonlyMap<string, PropertyDiff>;
}

export interface PollFetcherConfig {
  /** Interval while the push channel is connected. @default 30000 */
  connectedIntervalMs?: number;
  /** Interval while the push channel is down. @default 10000 */
  disconnectedIntervalMs?: number;
  /** Upper bound for one snapshot request. @default 8000 */
  requestTimeoutMs?: number;
  logger?: LoggerSetting;
}

/** `fast` while the push channel is down, `slow` while it is up */
export type PollMode = 'fast' | 'slow';

export interface PollFetcherStats {
  fetches: number;
  failures: number;
  skippedTicks: number;
  lastSuccessAt: number | null;
  mode: PollMode;
  intervalMs: number;
}

const NO_PENDING_WRITES: PendingWriteSource = {
  hasPendingWrites: () => false,
  pendingDeviceIds: () => [],
  pendingOverlay: () => new Map(),
};

export class PollFetcher {
  private readonly config: Required<Omit<PollFetcherConfig, 'logger'>>;
  private readonly logger: Logger;
  private readonly store: DeviceStore;
  private readonly gateway: DeviceGateway;
  private pendingWrites: PendingWriteSource = NO_PENDING_WRITES;

  private readonly stats$$: BehaviorSubject<PollFetcherStats>;
  private readonly diagnostics$$ = new Subject<SyncDiagnostic>();
  private readonly destroy$ = new Subject<void>();
  private readonly lifetime = new AbortController();

  private timer: ReturnType<typeof setTimeout> | null = null;
  /** Start of the current interval: the last tick, or start() */
  private lastTickAt = 0;
  private inFlight: Promise<boolean> | null = null;
  /** Forced fetch queued behind the one in flight */
  private followUp: Promise<boolean> | null = null;
  private pushConnected = false;
  private running = false;
  private destroyed = false;

  constructor(store: DeviceStore, gateway: DeviceGateway, config: PollFetcherConfig = {}) {
    this.store = store;
    this.gateway = gateway;
    this.config = {
      connectedIntervalMs: config.connectedIntervalMs ?? 30000,
      disconnectedIntervalMs: config.disconnectedIntervalMs ?? 10000,
      requestTimeoutMs: config.requestTimeoutMs ?? 8000,
    };
    this.logger = resolveLogger(config.logger, 'PollFetcher');

    this.stats$$ = new BehaviorSubject<PollFetcherStats>({
      fetches: 0,
      failures: 0,
      skippedTicks: 0,
      lastSuccessAt: null,
      mode: 'fast',
      intervalMs: this.config.disconnectedIntervalMs,
    });
  }

  get stats$(): Observable<PollFetcherStats> {
    return this.stats$$.asObservable().pipe(takeUntil(this.destroy$));
  }

  get diagnostics$(): Observable<SyncDiagnostic> {
    return this.diagnostics$$.asObservable().pipe(takeUntil(this.destroy$));
  }

  getStats(): PollFetcherStats {
    return this.stats$$.value;
  }

  get mode(): PollMode {
    return this.pushConnected ? 'slow' : 'fast';
  }

  get intervalMs(): number {
    return this.pushConnected ? this.config.connectedIntervalMs : this.config.disconnectedIntervalMs;
  }

  get isFetching(): boolean {
    return this.inFlight !== null;
  }

  /**
   * Wire in the write coordinator so ticks can be held while writes are
   * outstanding.
   */
  setPendingWriteSource(source: PendingWriteSource): void {
    this.pendingWrites = source;
  }

  /**
   * Start ticking. Does not fetch immediately; call {@link fetchNow} for that.
   */
  start(): void {
    if (this.destroyed || this.running) return;
    this.running = true;
    this.lastTickAt = Date.now();
    this.arm();
    this.logger.debug('Polling started', { intervalMs: this.intervalMs });
  }

  stop(): void {
    if (!this.running) return;
    this.running = false;
    this.disarm();
    this.logger.debug('Polling stopped');
  }

  /**
   * Switch interval when the push channel goes up or down. The next tick is
   * due one new interval after the last tick, so a channel that keeps
   * flapping cannot postpone polling.
   */
  setPushConnected(connected: boolean): void {
    if (this.pushConnected === connected) return;
    this.pushConnected = connected;
    this.updateStats({ mode: this.mode, intervalMs: this.intervalMs });
    this.logger.debug('Poll interval changed', { mode: this.mode, intervalMs: this.intervalMs });
    if (this.running) {
      this.arm();
    }
  }

  /**
   * Fetch a snapshot now, regardless of pending writes. Writes that were
   * applied locally but are still unconfirmed are laid over the snapshot.
   *
   * A fetch already in flight was requested before this call and may carry
   * state this caller needs corrected, so one more fetch runs after it.
   * Every call made meanwhile shares that follow-up. Resolves to whether the
   * snapshot was applied; never rejects.
   */
  fetchNow(): Promise<boolean> {
    if (this.destroyed) return Promise.resolve(false);
    if (!this.inFlight) return this.runFetch('forced');

    if (!this.followUp) {
      this.followUp = this.inFlight.then(() => {
        this.followUp = null;
        if (this.destroyed) return false;
        return this.runFetch('forced');
      });
    }
    return this.followUp;
  }

  destroy(): void {
    if (this.destroyed) return;
    this.destroyed = true;
    this.stop();
    this.lifetime.abort();
    this.destroy$.next();
    this.destroy$.complete();
    this.stats$$.complete();
    this.diagnostics$$.complete();
  }

  // ── Private ────────────────────────────────────────────

  private arm(): void {
    this.disarm();
    const delay = Math.max(0, this.lastTickAt + this.intervalMs - Date.now());
    this.timer = setTimeout(() => {
      this.timer = null;
      this.lastTickAt = Date.now();
      this.tick();
      if (this.running) this.arm();
    }, delay);
  }

  private disarm(): void {
    if (this.timer) {
      clearTimeout(this.timer);
      this.timer = null;
    }
  }

  private tick(): void {
    if (this.destroyed) return;

    if (this.pendingWrites.hasPendingWrites()) {
      const pendingDevices = this.pendingWrites.pendingDeviceIds();
      this.updateStats({ skippedTicks: this.getStats().skippedTicks + 1 });
      this.logger.debug('Poll skipped while writes are pending', { pendingDevices });
      this.diagnostics$$.next({ type: 'poll-skipped', pendingDevices, timestamp: Date.now() });
      return;
    }

    if (this.inFlight) {
      this.logger.debug('Poll skipped, previous fetch still running');
      return;
    }

    void this.runFetch('tick');
  }

  private runFetch(reason: 'tick' | 'forced'): Promise<boolean> {
    if (this.inFlight) return this.inFlight;

    const token = this.store.beginSnapshot();
    const startedAt = Date.now();

    const run = async (): Promise<boolean> => {
      try {
        const devices = await runWithTimeout(
          (signal) => this.gateway.fetchDevices(signal),
          this.config.requestTimeoutMs,
          () => new FetchError('HOMESYNC_F301', undefined, { timeoutMs: this.config.requestTimeoutMs }),
          this.lifetime.signal
        );
        if (this.destroyed) return false;

        this.store.applyFullSnapshot(devices, { token, overlay: this.pendingWrites.pendingOverlay() });

        const now = Date.now();
        const stats = this.getStats();
        this.updateStats({ fetches: stats.fetches + 1, lastSuccessAt: now });
        this.logger.debug('Snapshot applied', { reason, deviceCount: devices.length });
        this.diagnostics$$.next({
          type: 'fetch-succeeded',
          deviceCount: devices.length,
          durationMs: now - startedAt,
          timestamp: now,
        });
        return true;
      } catch (error) {
        this.store.cancelSnapshot(token);
        if (this.destroyed) return false;

        const fetchError =
          error instanceof FetchError
            ? error
            : new FetchError(
                'HOMESYNC_F300',
                error instanceof Error ? error.message : String(error),
                { reason },
                error instanceof Error ? error : undefined
              );
        this.updateStats({ failures: this.getStats().failures + 1 });
        this.logger.warn('Snapshot fetch failed, keeping previous state', {
          code: fetchError.code,
          reason: fetchError.message,
        });
        this.diagnostics$$.next({ type: 'fetch-failed', error: fetchError, timestamp: Date.now() });
        return false;
      } finally {
        this.inFlight = null;
      }
    };

    const promise = run();
    this.inFlight = promise;
    return promise;
  }

  private updateStats(partial: Partial<PollFetcherStats>): void {
    if (this.destroyed) return;
    this.stats$$.next({ ...this.stats$$.value, ...partial });
  }
}

export function createPollFetcher(
  store: DeviceStore,
  gateway: DeviceGateway,
  config?: PollFetcherConfig
): PollFetcher {
  return new PollFetcher(store, gateway, config);
}
