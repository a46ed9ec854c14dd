/**
 * ReplicaSession - one connection to one gateway.
 *
 * Owns the device store and wires the push channel, the poll fetcher and
 * the write coordinator around it:
 *
 * - push updates are patched into the store (or upserted, for devices the
 *   gateway just paired)
 * - the push channel's state switches the poll interval
 * - the write coordinator holds poll ticks while writes are outstanding and
 *   asks the fetcher for a resync when a write fails
 *
 * ## Session phases
 *
 * ```
 * [stopped] ──start()──→ [degraded] ⇄ [live] ──destroy()──→ [stopped]
 * ```
 *
 * `live` while the push channel is connected, `degraded` while the session
 * runs on polling alone. Independently, the poll gate is `held` while any
 * device has a pending write and `open` otherwise.
 *
 * @example
 * ```typescript
 * const session = createGatewaySession({ baseUrl: 'http://hub.local:8080' });
 * await session.start();
 *
 * session.store.devices$.subscribe((devices) => render(devices));
 * session.requestPropertyChange('desk_lamp', 'state', 'ON');
 *
 * // later
 * session.destroy();
 * ```
 */

import {
  DeviceStore,
  type DeviceEntity,
  type DeviceStoreConfig,
  type PropertyDiff,
  type PropertyValue,
} from '@homesync/core';
import {
  BehaviorSubject,
  combineLatest,
  distinctUntilChanged,
  map,
  merge,
  Subject,
  takeUntil,
  type Observable,
} from 'rxjs';
import type { SyncDiagnostic } from './diagnostics.js';
import { SyncHealthMonitor, type SyncHealthConfig } from './health-monitor.js';
import { isLogger, resolveLogger, type Logger, type LoggerSetting } from './logger.js';
import { PollFetcher, type PollFetcherConfig } from './poll-fetcher.js';
import type { DeviceUpdateFrame } from './protocol/codec.js';
import {
  PushChannelManager,
  type ConnectionState,
  type ConnectionStatus,
  type PushChannelConfig,
} from './push-channel.js';
import { resolveGatewayEndpoints } from './transport/endpoints.js';
import { HttpDeviceGateway, type HttpDeviceGatewayConfig } from './transport/http.js';
import type { DeviceGateway, DuplexTransport } from './transport/types.js';
import { WebSocketDuplexTransport, type WebSocketDuplexTransportConfig } from './transport/websocket.js';
import { WriteCoordinator, type PendingWrite, type WriteCoordinatorConfig } from './write-coordinator.js';

export type SessionPhase = 'stopped' | 'degraded' | 'live';

export type PollGate = 'open' | 'held';

export interface SessionState {
  phase: SessionPhase;
  pollGate: PollGate;
  connection: ConnectionStatus;
  pendingDevices: readonly string[];
}

export interface ReplicaSessionConfig {
  /** Push channel socket URL */
  socketUrl: string;
  pushChannel?: Omit<PushChannelConfig, 'url' | 'logger'>;
  polling?: Omit<PollFetcherConfig, 'logger'>;
  writes?: Omit<WriteCoordinatorConfig, 'logger' | 'resync'>;
  store?: DeviceStoreConfig;
  health?: SyncHealthConfig;
  /** Applied to every component, each with its own context name */
  logger?: LoggerSetting;
}

export interface ReplicaSessionDeps {
  transport: DuplexTransport;
  gateway: DeviceGateway;
}

/**
 * Derive the session phase from whether it runs and the push channel state.
 */
export function deriveSessionPhase(running: boolean, connection: ConnectionStatus): SessionPhase {
  if (!running) return 'stopped';
  return connection === 'connected' ? 'live' : 'degraded';
}

export class ReplicaSession {
  readonly store: DeviceStore;
  readonly push: PushChannelManager;
  readonly poller: PollFetcher;
  readonly writes: WriteCoordinator;
  readonly health: SyncHealthMonitor;

  private readonly logger: Logger;
  private readonly running$ = new BehaviorSubject<boolean>(false);
  private readonly destroy$ = new Subject<void>();
  private readonly state$$ = new BehaviorSubject<SessionState>({
    phase: 'stopped',
    pollGate: 'open',
    connection: 'disconnected',
    pendingDevices: [],
  });
  private startPromise: Promise<boolean> | null = null;
  private destroyed = false;

  constructor(deps: ReplicaSessionDeps, config: ReplicaSessionConfig) {
    const loggerSetting = config.logger;
    const componentLogger = (context: string): LoggerSetting =>
      loggerSetting === false ? false : loggerSetting ? componentSetting(loggerSetting, context) : { context };

    this.logger = resolveLogger(loggerSetting, 'ReplicaSession');
    this.store = new DeviceStore(config.store);
    this.push = new PushChannelManager(deps.transport, {
      ...config.pushChannel,
      url: config.socketUrl,
      logger: componentLogger('PushChannel'),
    });
    this.poller = new PollFetcher(this.store, deps.gateway, {
      ...config.polling,
      logger: componentLogger('PollFetcher'),
    });
    this.writes = new WriteCoordinator(this.store, deps.gateway, {
      ...config.writes,
      resync: () => this.poller.fetchNow(),
      logger: componentLogger('WriteCoordinator'),
    });
    this.poller.setPendingWriteSource(this.writes);
    this.health = new SyncHealthMonitor(config.health);

    this.push.updates$.pipe(takeUntil(this.destroy$)).subscribe((update) => this.applyUpdate(update));

    this.push.state$.pipe(takeUntil(this.destroy$)).subscribe((state: ConnectionState) => {
      this.poller.setPushConnected(state.status === 'connected');
    });

    this.diagnostics$.pipe(takeUntil(this.destroy$)).subscribe((diagnostic) => this.health.record(diagnostic));

    combineLatest([this.running$, this.push.state$, this.writes.pending$])
      .pipe(
        map(([running, connection, pending]) => buildState(running, connection.status, pending)),
        takeUntil(this.destroy$)
      )
      .subscribe((state) => this.state$$.next(state));
  }

  /** Merged diagnostics of all components. */
  get diagnostics$(): Observable<SyncDiagnostic> {
    return merge(this.push.diagnostics$, this.poller.diagnostics$, this.writes.diagnostics$).pipe(
      takeUntil(this.destroy$)
    );
  }

  get state$(): Observable<SessionState> {
    return this.state$$.asObservable().pipe(takeUntil(this.destroy$));
  }

  /** Phase changes only. */
  get phase$(): Observable<SessionPhase> {
    return this.state$.pipe(
      map((state) => state.phase),
      distinctUntilChanged()
    );
  }

  getState(): SessionState {
    return this.state$$.value;
  }

  get devices$(): Observable<readonly DeviceEntity[]> {
    return this.store.devices$;
  }

  get connection$(): Observable<ConnectionState> {
    return this.push.state$;
  }

  getDevice(deviceId: string): DeviceEntity | undefined {
    return this.store.get(deviceId);
  }

  getDevices(zones: readonly string[] = []): readonly DeviceEntity[] {
    return this.store.getByZones(zones);
  }

  requestPropertyChange(deviceId: string, property: string, value: PropertyValue | null): void {
    this.writes.requestPropertyChange(deviceId, property, value);
  }

  requestStateChange(deviceId: string, properties: PropertyDiff): void {
    this.writes.requestStateChange(deviceId, properties);
  }

  /**
   * Open the push channel, start polling and load the first snapshot.
   * Resolves to whether the first snapshot loaded; never rejects. Polling
   * keeps retrying either way.
   */
  start(): Promise<boolean> {
    if (this.destroyed) return Promise.resolve(false);
    if (this.startPromise) return this.startPromise;

    this.logger.info('Starting replica session');
    this.running$.next(true);
    this.push.connect();
    this.poller.start();
    this.startPromise = this.poller.fetchNow();
    return this.startPromise;
  }

  /**
   * Host-triggered resync, e.g. after the app returns to the foreground:
   * reconnect the push channel right away and fetch a fresh snapshot.
   */
  restart(): Promise<boolean> {
    if (this.destroyed || !this.running$.value) return Promise.resolve(false);
    this.logger.info('Restarting replica session');
    this.push.restart();
    return this.poller.fetchNow();
  }

  destroy(): void {
    if (this.destroyed) return;
    this.destroyed = true;
    this.logger.info('Destroying replica session');

    this.writes.destroy();
    this.poller.destroy();
    this.push.destroy();
    this.running$.next(false);
    this.state$$.next(buildState(false, 'disconnected', []));

    this.destroy$.next();
    this.destroy$.complete();
    this.running$.complete();
    this.state$$.complete();
    this.health.destroy();
    this.store.destroy();
  }

  private applyUpdate(update: DeviceUpdateFrame): void {
    if (update.device) {
      this.store.upsertDevice(update.device);
      this.logger.debug('Device announced on push channel', { deviceId: update.deviceId });
    }
    if (update.diff) {
      const outcome = this.store.applyPatch(update.deviceId, update.diff);
      if (outcome !== 'applied') {
        this.logger.debug('Update for unknown device', { deviceId: update.deviceId, outcome });
      }
    }
  }
}

function buildState(running: boolean, connection: ConnectionStatus, pending: readonly PendingWrite[]): SessionState {
  return {
    phase: deriveSessionPhase(running, connection),
    pollGate: pending.length > 0 ? 'held' : 'open',
    connection,
    pendingDevices: pending.map((write) => write.deviceId),
  };
}

function componentSetting(setting: Exclude<LoggerSetting, false>, context: string): LoggerSetting {
  return isLogger(setting) ? setting : { ...setting, context };
}

export interface GatewaySessionOptions
  extends Omit<ReplicaSessionConfig, 'socketUrl'>,
    Pick<HttpDeviceGatewayConfig, 'writeMethod' | 'fetch'>,
    WebSocketDuplexTransportConfig {
  /** Gateway base URL, e.g. `http://192.168.1.10:8080` */
  baseUrl: string;
}

/**
 * Build a session against a gateway's HTTP and WebSocket API.
 */
export function createGatewaySession(options: GatewaySessionOptions): ReplicaSession {
  const { baseUrl, authToken, writeMethod, fetch: fetchImpl, handshakeTimeoutMs, ...sessionConfig } = options;
  const endpoints = resolveGatewayEndpoints(baseUrl);

  return new ReplicaSession(
    {
      transport: new WebSocketDuplexTransport({ authToken, handshakeTimeoutMs }),
      gateway: new HttpDeviceGateway({ baseUrl, authToken, writeMethod, fetch: fetchImpl }),
    },
    { ...sessionConfig, socketUrl: endpoints.socketUrl }
  );
}
