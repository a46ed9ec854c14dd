/**
 * Push channel manager: one persistent socket to the gateway, kept alive
 * with backoff reconnects.
 *
 * ## Connection Lifecycle
 *
 * ```
 * connect() ──→ [connecting] ──first valid frame──→ [connected]
 *                   │                                   │
 *                   └──── error / close / timeout ──────┤
 *                                                       ▼
 *                                              [disconnected]
 *                                                 │         │
 *                                      ≤ maxAttempts       > maxAttempts
 *                                                 ▼         ▼
 *                                       [reconnecting]   [failed]
 *                                                 │         │
 *                                                 └─ timer ─┴──→ [connecting]
 * ```
 *
 * `disconnect()` and `destroy()` move to `disconnected` from any state and
 * suppress automatic reconnection. Nothing here throws at the caller;
 * failures are reported on {@link PushChannelManager.diagnostics$}.
 */

import { TransportError } from '@homesync/core';
import { BehaviorSubject, Subject, takeUntil, type Observable } from 'rxjs';
import { planReconnect, type ReconnectPolicy } from './backoff.js';
import type { SyncDiagnostic } from './diagnostics.js';
import { resolveLogger, type Logger, type LoggerSetting } from './logger.js';
import { decodeFrame, encodeFrame, type DeviceUpdateFrame, type FrameData } from './protocol/codec.js';
import type { DuplexConnection, DuplexTransport } from './transport/types.js';

export type ConnectionStatus = 'disconnected' | 'connecting' | 'connected' | 'reconnecting' | 'failed';

export interface ConnectionState {
  status: ConnectionStatus;
  /** Consecutive failures since the last successful connection */
  failures: number;
  /** When the status was entered (epoch ms) */
  since: number;
  lastError: TransportError | null;
}

export interface PushChannelConfig {
  /** Socket URL, e.g. `ws://hub.local:8080/ws` */
  url: string;
  /**
   * Time allowed from opening the socket to the first valid frame.
   * @default 10000
   */
  connectTimeoutMs?: number;
  /** Backoff settings */
  reconnect?: ReconnectPolicy;
  /** Logger options, a logger, or `false` */
  logger?: LoggerSetting;
}

const ALLOWED_TRANSITIONS: Record<ConnectionStatus, readonly ConnectionStatus[]> = {
  disconnected: ['connecting', 'reconnecting', 'failed'],
  connecting: ['connected', 'disconnected'],
  connected: ['disconnected'],
  reconnecting: ['connecting', 'disconnected'],
  failed: ['connecting', 'disconnected'],
};

export function canTransition(from: ConnectionStatus, to: ConnectionStatus): boolean {
  return ALLOWED_TRANSITIONS[from].includes(to);
}

/**
 * @example
 * ```typescript
 * const channel = new PushChannelManager(createWebSocketDuplexTransport(), {
 *   url: 'ws://hub.local:8080/ws',
 * });
 *
 * channel.updates$.subscribe((update) => store.applyPatch(update.deviceId, update.diff ?? {}));
 * channel.state$.subscribe((state) => console.log(state.status));
 * channel.connect();
 * ```
 */
export class PushChannelManager {
  private readonly url: string;
  private readonly connectTimeoutMs: number;
  private readonly reconnectPolicy: ReconnectPolicy;
  private readonly transport: DuplexTransport;
  private readonly logger: Logger;

  private readonly state$$: BehaviorSubject<ConnectionState>;
  private readonly updates$$ = new Subject<DeviceUpdateFrame>();
  private readonly diagnostics$$ = new Subject<SyncDiagnostic>();
  private readonly destroy$ = new Subject<void>();

  private connection: DuplexConnection | null = null;
  /** Bumped whenever a socket is abandoned; stale callbacks compare against it */
  private generation = 0;
  private connectTimer: ReturnType<typeof setTimeout> | null = null;
  private reconnectTimer: ReturnType<typeof setTimeout> | null = null;
  private failures = 0;
  private suppressed = true;
  private destroyed = false;

  constructor(transport: DuplexTransport, config: PushChannelConfig) {
    this.transport = transport;
    this.url = config.url;
    this.connectTimeoutMs = config.connectTimeoutMs ?? 10000;
    this.reconnectPolicy = config.reconnect ?? {};
    this.logger = resolveLogger(config.logger, 'PushChannel');

    this.state$$ = new BehaviorSubject<ConnectionState>({
      status: 'disconnected',
      failures: 0,
      since: Date.now(),
      lastError: null,
    });
  }

  /** Connection state; replays the current state to new subscribers. */
  get state$(): Observable<ConnectionState> {
    return this.state$$.asObservable().pipe(takeUntil(this.destroy$));
  }

  /** Decoded device updates. */
  get updates$(): Observable<DeviceUpdateFrame> {
    return this.updates$$.asObservable().pipe(takeUntil(this.destroy$));
  }

  get diagnostics$(): Observable<SyncDiagnostic> {
    return this.diagnostics$$.asObservable().pipe(takeUntil(this.destroy$));
  }

  get status(): ConnectionStatus {
    return this.state$$.value.status;
  }

  get state(): ConnectionState {
    return this.state$$.value;
  }

  isConnected(): boolean {
    return this.status === 'connected';
  }

  /**
   * Open the channel unless it is already connecting or connected.
   */
  connect(): void {
    if (this.destroyed) return;
    this.suppressed = false;
    if (this.status === 'connecting' || this.status === 'connected') return;
    this.clearReconnectTimer();
    this.open();
  }

  /**
   * Host-triggered reconnect (e.g. the app came back to the foreground):
   * resets the failure counter and connects now unless already connecting
   * or connected.
   */
  restart(): void {
    if (this.destroyed) return;
    this.failures = 0;
    this.connect();
  }

  /**
   * Close the socket and stay disconnected until {@link connect} is called.
   */
  disconnect(): void {
    if (this.destroyed) return;
    this.suppressed = true;
    this.clearReconnectTimer();
    this.abandonConnection();
    this.failures = 0;
    if (this.status !== 'disconnected') {
      this.transition('disconnected', null);
    }
    this.logger.info('Push channel disconnected by host');
  }

  destroy(): void {
    if (this.destroyed) return;
    this.disconnect();
    this.destroyed = true;
    this.destroy$.next();
    this.destroy$.complete();
    this.state$$.complete();
    this.updates$$.complete();
    this.diagnostics$$.complete();
  }

  // ── Private ────────────────────────────────────────────

  private open(): void {
    const generation = ++this.generation;
    this.transition('connecting', this.state.lastError);
    this.logger.debug('Opening push channel', { url: this.url, failures: this.failures });

    this.connectTimer = setTimeout(() => {
      this.connectTimer = null;
      this.handleFailure(
        generation,
        new TransportError('HOMESYNC_T101', undefined, { timeoutMs: this.connectTimeoutMs })
      );
    }, this.connectTimeoutMs);

    let connection: DuplexConnection;
    try {
      connection = this.transport.open(this.url, {
        onOpen: () => {
          if (generation === this.generation) this.logger.debug('Socket open, waiting for first frame');
        },
        onFrame: (data) => this.handleFrame(generation, data),
        onError: (error) =>
          this.handleFailure(
            generation,
            new TransportError('HOMESYNC_T102', error.message, { url: this.url }, error)
          ),
        onClose: (code, reason) =>
          this.handleFailure(
            generation,
            new TransportError('HOMESYNC_T103', `Push channel closed (${code})`, { code, reason })
          ),
      });
    } catch (error) {
      this.handleFailure(
        generation,
        new TransportError(
          'HOMESYNC_T100',
          error instanceof Error ? error.message : String(error),
          { url: this.url },
          error instanceof Error ? error : undefined
        )
      );
      return;
    }

    // A transport may fail synchronously inside open()
    if (generation !== this.generation) {
      connection.close();
      return;
    }
    this.connection = connection;
  }

  private handleFrame(generation: number, data: FrameData): void {
    if (generation !== this.generation) return;

    const result = decodeFrame(data);
    switch (result.kind) {
      case 'invalid':
        this.logger.warn('Dropped invalid frame', { code: result.error.code, reason: result.error.message });
        this.emit({ type: 'frame-dropped', error: result.error, timestamp: Date.now() });
        return;
      case 'ignored':
        this.markConnected();
        this.logger.debug('Ignored frame of unknown type', { frameType: result.frameType });
        this.emit({ type: 'frame-ignored', frameType: result.frameType, timestamp: Date.now() });
        return;
      case 'frame':
        break;
    }

    this.markConnected();
    const frame = result.frame;
    switch (frame.type) {
      case 'ping':
        this.sendPong(generation);
        break;
      case 'pong':
        this.logger.debug('Pong received', { timestamp: frame.timestamp });
        break;
      case 'device_update':
        this.updates$$.next(frame);
        break;
    }
  }

  private sendPong(generation: number): void {
    try {
      this.connection?.send(encodeFrame({ type: 'pong', timestamp: Date.now() }));
    } catch (error) {
      this.handleFailure(
        generation,
        new TransportError(
          'HOMESYNC_T102',
          'Failed to answer ping',
          { url: this.url },
          error instanceof Error ? error : undefined
        )
      );
    }
  }

  private markConnected(): void {
    if (this.status !== 'connecting') return;
    this.clearConnectTimer();
    this.failures = 0;
    this.transition('connected', null);
    this.logger.info('Push channel connected', { url: this.url });
    this.emit({ type: 'connected', timestamp: Date.now() });
  }

  private handleFailure(generation: number, error: TransportError): void {
    if (generation !== this.generation) return;
    if (this.status !== 'connecting' && this.status !== 'connected') return;

    this.abandonConnection();
    this.failures++;
    this.logger.warn('Push channel failed', {
      code: error.code,
      reason: error.message,
      failures: this.failures,
    });
    this.emit({ type: 'transport-error', error, failures: this.failures, timestamp: Date.now() });
    this.transition('disconnected', error);

    if (!this.suppressed && !this.destroyed) {
      this.scheduleReconnect();
    }
  }

  private scheduleReconnect(): void {
    const plan = planReconnect(this.failures, this.reconnectPolicy);
    this.transition(plan.mode === 'long-interval' ? 'failed' : 'reconnecting', this.state.lastError);
    this.logger.info('Reconnect scheduled', { delayMs: plan.delayMs, mode: plan.mode });
    this.emit({
      type: 'reconnect-scheduled',
      attempt: this.failures,
      delayMs: plan.delayMs,
      mode: plan.mode,
      timestamp: Date.now(),
    });

    this.reconnectTimer = setTimeout(() => {
      this.reconnectTimer = null;
      this.open();
    }, plan.delayMs);
  }

  /**
   * Detach and close the current socket without reporting its close.
   */
  private abandonConnection(): void {
    this.generation++;
    this.clearConnectTimer();
    const connection = this.connection;
    this.connection = null;
    if (!connection) return;
    try {
      connection.close(1000, 'client closing');
    } catch (error) {
      this.logger.debug('Error while closing socket', {
        reason: error instanceof Error ? error.message : String(error),
      });
    }
  }

  private transition(to: ConnectionStatus, lastError: TransportError | null): void {
    const from = this.status;
    if (!canTransition(from, to)) {
      this.logger.error('Rejected push channel transition', undefined, { from, to });
      return;
    }
    this.state$$.next({ status: to, failures: this.failures, since: Date.now(), lastError });
  }

  private clearConnectTimer(): void {
    if (this.connectTimer) {
      clearTimeout(this.connectTimer);
      this.connectTimer = null;
    }
  }

  private clearReconnectTimer(): void {
    if (this.reconnectTimer) {
      clearTimeout(this.reconnectTimer);
      this.reconnectTimer = null;
    }
  }

  private emit(diagnostic: SyncDiagnostic): void {
    this.diagnostics$$.next(diagnostic);
  }
}

export function createPushChannelManager(
  transport: DuplexTransport,
  config: PushChannelConfig
): PushChannelManager {
  return new PushChannelManager(transport, config);
}
