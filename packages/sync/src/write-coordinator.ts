/**
 * WriteCoordinator - optimistic device writes with debounce and coalescing.
 *
 * Discrete properties (`state`, `effect`, ...) are applied to the store and
 * sent at once. Continuous properties (brightness, color temperature, color)
 * arrive in bursts while a slider moves, so they wait for a quiet period per
 * device; every change made to that device during the window goes out as a
 * single request. A discrete change sent during the window carries the
 * waiting continuous changes with it.
 *
 * A device counts as pending from its first queued change until its last
 * request settles. On failure the coordinator drops that request's changes
 * from the pending overlay and asks for a resync, so the optimistic value is
 * corrected from the gateway while later requests to the device stay laid
 * over the snapshot.
 *
 * @example
 * ```typescript
 * const writes = new WriteCoordinator(store, gateway, {
 *   resync: () => fetcher.fetchNow(),
 * });
 *
 * writes.requestPropertyChange('desk_lamp', 'brightness', 120);
 * writes.requestPropertyChange('desk_lamp', 'brightness', 140);
 * // one request with { brightness: 140 } after 100ms of quiet
 * ```
 */

import {
  combinePropertyDiffs,
  WriteError,
  type DeviceStore,
  type PropertyDiff,
  type PropertyValue,
} from '@homesync/core';
import { BehaviorSubject, Subject, takeUntil, type Observable } from 'rxjs';
import type { SyncDiagnostic } from './diagnostics.js';
import { resolveLogger, type Logger, type LoggerSetting } from './logger.js';
import type { PendingWriteSource } from './poll-fetcher.js';
import { runWithTimeout } from './timeout.js';
import type { DeviceGateway } from './transport/types.js';

// ── Types ──────────────────────────────────────────────────

export const DEFAULT_CONTINUOUS_PROPERTIES: readonly string[] = ['brightness', 'color_temp', 'color'];

export interface WriteCoordinatorConfig {
  /** Quiet period for continuous properties. @default 100 */
  debounceMs?: number;
  /** Properties that are debounced. @default ['brightness', 'color_temp', 'color'] */
  continuousProperties?: readonly string[];
  /** Upper bound for one write request. @default 8000 */
  requestTimeoutMs?: number;
  /** Called after a failed write to re-read state from the gateway */
  resync?: () => Promise<unknown>;
  logger?: LoggerSetting;
}

/**
 * Outstanding write state of one device.
 */
export interface PendingWrite {
  deviceId: string;
  /** Changes waiting for the debounce window to close */
  queued: PropertyDiff;
  /** Epoch ms when the debounce window closes, or null when none is open */
  deadline: number | null;
  /** Changes sent and not yet settled */
  inFlight: PropertyDiff;
  /** Number of requests not yet settled */
  requests: number;
}

export interface WriteCoordinatorStats {
  sent: number;
  succeeded: number;
  failed: number;
  coalesced: number;
}

interface DeviceWriteState {
  queued: PropertyDiff;
  deadline: number | null;
  timer: ReturnType<typeof setTimeout> | null;
  /** Unsettled requests by request number, each with the changes it sent */
  requests: Map<number, PropertyDiff>;
}

// ── Implementation ────────────────────────────────────────

export class WriteCoordinator implements PendingWriteSource {
  private readonly debounceMs: number;
  private readonly continuous: ReadonlySet<string>;
  private readonly requestTimeoutMs: number;
  private readonly resync: (() => Promise<unknown>) | null;
  private readonly logger: Logger;
  private readonly store: DeviceStore;
  private readonly gateway: DeviceGateway;

  private readonly devices = new Map<string, DeviceWriteState>();
  private readonly destroy$ = new Subject<void>();
  private readonly lifetime = new AbortController();
  private readonly pendingSubject = new BehaviorSubject<readonly PendingWrite[]>([]);
  private readonly diagnosticsSubject = new Subject<SyncDiagnostic>();
  private stats: WriteCoordinatorStats = { sent: 0, succeeded: 0, failed: 0, coalesced: 0 };
  private requestCounter = 0;
  private destroyed = false;

  /** Outstanding writes per device; emits on every change. */
  readonly pending$: Observable<readonly PendingWrite[]>;
  readonly diagnostics$: Observable<SyncDiagnostic>;

  constructor(store: DeviceStore, gateway: DeviceGateway, config: WriteCoordinatorConfig = {}) {
    this.store = store;
    this.gateway = gateway;
    this.debounceMs = config.debounceMs ?? 100;
    this.continuous = new Set(config.continuousProperties ?? DEFAULT_CONTINUOUS_PROPERTIES);
    this.requestTimeoutMs = config.requestTimeoutMs ?? 8000;
    this.resync = config.resync ?? null;
    this.logger = resolveLogger(config.logger, 'WriteCoordinator');

    this.pending$ = this.pendingSubject.asObservable().pipe(takeUntil(this.destroy$));
    this.diagnostics$ = this.diagnosticsSubject.asObservable().pipe(takeUntil(this.destroy$));
  }

  /**
   * Change one property of a device.
   */
  requestPropertyChange(deviceId: string, property: string, value: PropertyValue | null): void {
    this.requestStateChange(deviceId, { [property]: value });
  }

  /**
   * Change several properties of a device at once.
   */
  requestStateChange(deviceId: string, properties: PropertyDiff): void {
    if (this.destroyed) return;
    const keys = Object.keys(properties);
    if (keys.length === 0) return;

    const state = this.getOrCreate(deviceId);
    if (Object.keys(state.queued).length > 0) {
      this.stats = { ...this.stats, coalesced: this.stats.coalesced + 1 };
    }
    state.queued = combinePropertyDiffs(state.queued, properties);

    if (keys.every((key) => this.continuous.has(key))) {
      this.armDebounce(deviceId, state);
    } else {
      this.dispatch(deviceId);
    }
    this.publishPending();
  }

  /**
   * Send queued changes now instead of waiting for the debounce window.
   * Without an id every device is flushed.
   */
  flush(deviceId?: string): void {
    if (this.destroyed) return;
    const ids = deviceId === undefined ? [...this.devices.keys()] : [deviceId];
    for (const id of ids) {
      this.dispatch(id);
    }
    this.publishPending();
  }

  hasPendingWrites(): boolean {
    return this.devices.size > 0;
  }

  isPending(deviceId: string): boolean {
    return this.devices.has(deviceId);
  }

  pendingDeviceIds(): readonly string[] {
    return [...this.devices.keys()];
  }

  getPendingWrites(): readonly PendingWrite[] {
    return this.pendingSubject.value;
  }

  /**
   * Changes of unsettled requests per device. A failed request's changes
   * are gone from here before its resync is requested.
   */
  pendingOverlay(): ReadonlyMap<string, PropertyDiff> {
    const overlay = new Map<string, PropertyDiff>();
    for (const [deviceId, state] of this.devices) {
      if (state.requests.size > 0) overlay.set(deviceId, inFlightOf(state));
    }
    return overlay;
  }

  getStats(): WriteCoordinatorStats {
    return { ...this.stats };
  }

  /**
   * Cancel debounce timers and abandon in-flight requests. Queued changes
   * are dropped.
   */
  destroy(): void {
    if (this.destroyed) return;
    this.destroyed = true;
    for (const state of this.devices.values()) {
      if (state.timer) clearTimeout(state.timer);
    }
    this.devices.clear();
    this.lifetime.abort();
    this.destroy$.next();
    this.destroy$.complete();
    this.pendingSubject.complete();
    this.diagnosticsSubject.complete();
  }

  // ── Private ────────────────────────────────────────────

  private getOrCreate(deviceId: string): DeviceWriteState {
    let state = this.devices.get(deviceId);
    if (!state) {
      state = { queued: {}, deadline: null, timer: null, requests: new Map() };
      this.devices.set(deviceId, state);
    }
    return state;
  }

  private armDebounce(deviceId: string, state: DeviceWriteState): void {
    if (state.timer) clearTimeout(state.timer);
    state.deadline = Date.now() + this.debounceMs;
    state.timer = setTimeout(() => {
      state.timer = null;
      this.dispatch(deviceId);
      this.publishPending();
    }, this.debounceMs);
  }

  private dispatch(deviceId: string): void {
    const state = this.devices.get(deviceId);
    if (!state) return;

    if (state.timer) {
      clearTimeout(state.timer);
      state.timer = null;
    }
    state.deadline = null;

    const properties = state.queued;
    state.queued = {};
    if (Object.keys(properties).length === 0) {
      this.releaseIfIdle(deviceId, state);
      return;
    }

    const outcome = this.store.applyOptimistic(deviceId, properties);
    if (outcome !== 'applied') {
      this.logger.debug('Device not in store, sending write without local update', { deviceId });
    }

    const request = ++this.requestCounter;
    state.requests.set(request, properties);
    this.stats = { ...this.stats, sent: this.stats.sent + 1 };

    void this.send(deviceId, state, request, properties);
  }

  private async send(
    deviceId: string,
    state: DeviceWriteState,
    request: number,
    properties: PropertyDiff
  ): Promise<void> {
    const startedAt = Date.now();
    let failure: WriteError | null = null;

    try {
      await runWithTimeout(
        (signal) => this.gateway.writeDeviceState(deviceId, properties, signal),
        this.requestTimeoutMs,
        () => new WriteError('HOMESYNC_W401', deviceId, undefined, { timeoutMs: this.requestTimeoutMs }),
        this.lifetime.signal
      );
    } catch (error) {
      failure =
        error instanceof WriteError
          ? error
          : new WriteError(
              'HOMESYNC_W400',
              deviceId,
              error instanceof Error ? error.message : String(error),
              {},
              error instanceof Error ? error : undefined
            );
    }

    if (this.destroyed) return;

    state.requests.delete(request);
    this.releaseIfIdle(deviceId, state);
    this.publishPending();

    if (failure) {
      this.stats = { ...this.stats, failed: this.stats.failed + 1 };
      this.logger.warn('Device write failed, resyncing', {
        deviceId,
        code: failure.code,
        reason: failure.message,
      });
      this.diagnosticsSubject.next({ type: 'write-failed', error: failure, timestamp: Date.now() });
      this.requestResync();
      return;
    }

    const now = Date.now();
    this.stats = { ...this.stats, succeeded: this.stats.succeeded + 1 };
    this.logger.debug('Device write confirmed', { deviceId, keys: Object.keys(properties) });
    this.diagnosticsSubject.next({
      type: 'write-succeeded',
      deviceId,
      durationMs: now - startedAt,
      timestamp: now,
    });
  }

  private requestResync(): void {
    if (!this.resync) return;
    this.resync().catch((error: unknown) => {
      this.logger.error('Resync after failed write did not run', error instanceof Error ? error : undefined);
    });
  }

  private releaseIfIdle(deviceId: string, state: DeviceWriteState): void {
    if (state.requests.size === 0 && state.timer === null && Object.keys(state.queued).length === 0) {
      this.devices.delete(deviceId);
    }
  }

  private publishPending(): void {
    if (this.destroyed) return;
    const pending: PendingWrite[] = [];
    for (const [deviceId, state] of this.devices) {
      pending.push({
        deviceId,
        queued: state.queued,
        deadline: state.deadline,
        inFlight: inFlightOf(state),
        requests: state.requests.size,
      });
    }
    this.pendingSubject.next(pending);
  }
}

function inFlightOf(state: DeviceWriteState): PropertyDiff {
  let combined: PropertyDiff = {};
  for (const properties of state.requests.values()) {
    combined = combinePropertyDiffs(combined, properties);
  }
  return combined;
}

export function createWriteCoordinator(
  store: DeviceStore,
  gateway: DeviceGateway,
  config?: WriteCoordinatorConfig
): WriteCoordinator {
  return new WriteCoordinator(store, gateway, config);
}
