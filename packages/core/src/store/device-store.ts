/**
 * DeviceStore - canonical in-memory replica of device state.
 *
 * Every mutation runs through a single synchronous writer that builds a new
 * map of frozen entities and publishes it in one assignment, so readers only
 * ever observe a complete state. Change notifications are delivered after the
 * new state is published, in mutation order, even when a subscriber mutates
 * the store from inside its handler.
 *
 * ## Snapshot ordering
 *
 * A poll fetch takes time. Patches that arrive while it is in flight are
 * newer than the snapshot it will return, so the fetcher opens a
 * {@link SnapshotToken} before issuing the request and passes it back to
 * {@link DeviceStore.applyFullSnapshot}. Mutations recorded after the token
 * was opened are replayed on top of the snapshot.
 *
 * @example
 * ```typescript
 * const store = new DeviceStore();
 * const token = store.beginSnapshot();
 * const devices = await gateway.fetchDevices();
 * store.applyFullSnapshot(devices, { token });
 *
 * store.applyPatch('kitchen_light', { brightness: 180 });
 * store.get('kitchen_light')?.properties.brightness; // 180
 * ```
 */

import { BehaviorSubject, Subject, takeUntil, type Observable } from 'rxjs';
import {
  createDeviceEntity,
  type DeviceEntity,
  type DeviceInput,
  type PropertyDiff,
} from '../types/device.js';
import { applyPropertyDiff, propertyValuesEqual } from './property-diff.js';

// ── Types ──────────────────────────────────────────────────

export interface DeviceStoreConfig {
  /**
   * Keep patches for unknown device ids and replay them when a later
   * snapshot introduces the device. @default true
   */
  bufferUnknownPatches?: boolean;
  /** Buffered patches kept per unknown device (oldest dropped). @default 50 */
  maxBufferedPatchesPerDevice?: number;
}

/** Where a property mutation came from */
export type PatchSource = 'push' | 'optimistic';

/** Result of {@link DeviceStore.applyPatch} */
export type PatchOutcome = 'applied' | 'buffered' | 'ignored';

export type DeviceStoreChange =
  | {
      type: 'snapshot';
      deviceIds: readonly string[];
      added: readonly string[];
      removed: readonly string[];
      replayed: number;
    }
  | { type: 'patch'; deviceId: string; keys: readonly string[]; source: PatchSource }
  | { type: 'upsert'; deviceId: string; created: boolean };

/**
 * Marker returned by {@link DeviceStore.beginSnapshot}.
 */
export interface SnapshotToken {
  readonly id: number;
  /** Mutation sequence number when the token was opened */
  readonly sequence: number;
}

type JournalEntry =
  | { sequence: number; kind: 'patch'; deviceId: string; diff: PropertyDiff; source: PatchSource }
  | { sequence: number; kind: 'upsert'; device: DeviceEntity };

/**
 * Options for {@link DeviceStore.applyFullSnapshot}.
 */
export interface SnapshotOptions {
  /** Token opened before the fetch; newer mutations are replayed on top. */
  token?: SnapshotToken;
  /**
   * Properties of writes that were applied locally but not yet confirmed.
   * They are laid over the snapshot so it cannot revert them.
   */
  overlay?: ReadonlyMap<string, PropertyDiff>;
}

interface BufferedPatch {
  sequence: number;
  diff: PropertyDiff;
}

// ── Implementation ────────────────────────────────────────

export class DeviceStore {
  private readonly config: Required<DeviceStoreConfig>;
  private readonly destroy$ = new Subject<void>();
  private readonly changesSubject = new Subject<DeviceStoreChange>();
  private readonly devicesSubject: BehaviorSubject<readonly DeviceEntity[]>;

  private published: ReadonlyMap<string, DeviceEntity> = new Map();
  private publishedList: readonly DeviceEntity[] = Object.freeze([]);
  private sequence = 0;
  private tokenCounter = 0;
  private readonly openTokens = new Map<number, SnapshotToken>();
  private journal: JournalEntry[] = [];
  private readonly unknownPatches = new Map<string, BufferedPatch[]>();

  private readonly pendingNotifications: DeviceStoreChange[] = [];
  private notifying = false;
  private destroyed = false;

  /** Change notification after every successful mutation. */
  readonly changes$: Observable<DeviceStoreChange>;
  /** Current device list; replays the latest list to new subscribers. */
  readonly devices$: Observable<readonly DeviceEntity[]>;

  constructor(config: DeviceStoreConfig = {}) {
    this.config = {
      bufferUnknownPatches: config.bufferUnknownPatches ?? true,
      maxBufferedPatchesPerDevice: config.maxBufferedPatchesPerDevice ?? 50,
    };

    this.devicesSubject = new BehaviorSubject<readonly DeviceEntity[]>(Object.freeze([]));
    this.changes$ = this.changesSubject.asObservable().pipe(takeUntil(this.destroy$));
    this.devices$ = this.devicesSubject.asObservable().pipe(takeUntil(this.destroy$));
  }

  // ── Reads ──────────────────────────────────────────────

  get(deviceId: string): DeviceEntity | undefined {
    return this.published.get(deviceId);
  }

  has(deviceId: string): boolean {
    return this.published.has(deviceId);
  }

  get size(): number {
    return this.published.size;
  }

  /**
   * All devices in snapshot order.
   */
  getAll(): readonly DeviceEntity[] {
    return this.publishedList;
  }

  /**
   * Devices belonging to any of the given zones. An empty list returns all.
   */
  getByZones(zones: readonly string[]): readonly DeviceEntity[] {
    const all = this.getAll();
    if (zones.length === 0) return all;
    return all.filter((device) => device.zones.some((zone) => zones.includes(zone)));
  }

  /**
   * The currently published state. The returned map is never mutated.
   */
  snapshot(): ReadonlyMap<string, DeviceEntity> {
    return this.published;
  }

  /** Number of unknown devices with buffered patches. */
  get bufferedDeviceCount(): number {
    return this.unknownPatches.size;
  }

  // ── Writes ─────────────────────────────────────────────

  /**
   * Open a snapshot token before fetching a full snapshot.
   */
  beginSnapshot(): SnapshotToken {
    const token: SnapshotToken = { id: ++this.tokenCounter, sequence: this.sequence };
    this.openTokens.set(token.id, token);
    return token;
  }

  /**
   * Discard a token whose fetch failed.
   */
  cancelSnapshot(token: SnapshotToken): void {
    this.openTokens.delete(token.id);
    this.trimJournal();
  }

  /**
   * Replace the whole store with `devices`. Ids absent from the list are
   * pruned. With a token, mutations recorded since the token was opened are
   * replayed on top.
   */
  applyFullSnapshot(devices: readonly DeviceInput[], options: SnapshotOptions = {}): void {
    if (this.destroyed) return;
    const { token, overlay } = options;

    const next = new Map<string, DeviceEntity>();
    for (const input of devices) {
      next.set(input.id, createDeviceEntity(input));
    }

    let replayed = 0;
    if (token && this.openTokens.has(token.id)) {
      for (const entry of this.journal) {
        if (entry.sequence <= token.sequence) continue;
        if (this.replayEntry(next, entry)) replayed++;
      }
      this.openTokens.delete(token.id);
    } else {
      for (const [deviceId, patches] of this.unknownPatches) {
        const device = next.get(deviceId);
        if (!device) continue;
        let properties = device.properties;
        for (const patch of patches) {
          properties = applyPropertyDiff(properties, patch.diff);
          replayed++;
        }
        next.set(deviceId, Object.freeze({ ...device, properties }));
      }
    }

    if (overlay) {
      for (const [deviceId, diff] of overlay) {
        const device = next.get(deviceId);
        if (!device) continue;
        next.set(deviceId, Object.freeze({ ...device, properties: applyPropertyDiff(device.properties, diff) }));
      }
    }

    this.unknownPatches.clear();
    this.trimJournal();

    const previous = this.published;
    const added = [...next.keys()].filter((id) => !previous.has(id));
    const removed = [...previous.keys()].filter((id) => !next.has(id));

    this.publish(next, {
      type: 'snapshot',
      deviceIds: [...next.keys()],
      added,
      removed,
      replayed,
    });
  }

  /**
   * Merge a push-channel diff into a known device. Unknown ids leave the
   * store unchanged; with buffering enabled the diff is kept for the next
   * snapshot. A diff that changes nothing publishes nothing.
   */
  applyPatch(deviceId: string, diff: PropertyDiff): PatchOutcome {
    return this.mergeProperties(deviceId, diff, 'push');
  }

  /**
   * Merge a local, not-yet-confirmed write into a known device.
   */
  applyOptimistic(deviceId: string, diff: PropertyDiff): PatchOutcome {
    return this.mergeProperties(deviceId, diff, 'optimistic');
  }

  /**
   * Insert or replace a single device, e.g. one the gateway announced on the
   * push channel after pairing.
   */
  upsertDevice(input: DeviceInput): void {
    if (this.destroyed) return;

    const sequence = ++this.sequence;
    let device = createDeviceEntity(input);
    const buffered = this.unknownPatches.get(device.id);
    if (buffered) {
      for (const patch of buffered) {
        device = Object.freeze({ ...device, properties: applyPropertyDiff(device.properties, patch.diff) });
      }
      this.unknownPatches.delete(device.id);
    }

    this.record({ sequence, kind: 'upsert', device });

    const created = !this.published.has(device.id);
    const next = new Map(this.published);
    next.set(device.id, device);
    this.publish(next, { type: 'upsert', deviceId: device.id, created });
  }

  /**
   * Drop all devices, buffers and open tokens. Subscribers stay attached.
   */
  clear(): void {
    if (this.destroyed) return;
    const removed = [...this.published.keys()];
    this.openTokens.clear();
    this.journal = [];
    this.unknownPatches.clear();
    this.publish(new Map(), { type: 'snapshot', deviceIds: [], added: [], removed, replayed: 0 });
  }

  /**
   * Complete all streams. Later mutations are ignored.
   */
  destroy(): void {
    if (this.destroyed) return;
    this.destroyed = true;
    this.destroy$.next();
    this.destroy$.complete();
    this.changesSubject.complete();
    this.devicesSubject.complete();
    this.openTokens.clear();
    this.journal = [];
    this.unknownPatches.clear();
  }

  // ── Private ────────────────────────────────────────────

  private mergeProperties(deviceId: string, diff: PropertyDiff, source: PatchSource): PatchOutcome {
    if (this.destroyed) return 'ignored';

    const sequence = ++this.sequence;
    this.record({ sequence, kind: 'patch', deviceId, diff, source });

    const current = this.published.get(deviceId);
    if (!current) {
      if (source === 'push' && this.config.bufferUnknownPatches) {
        this.bufferUnknown(deviceId, { sequence, diff });
        return 'buffered';
      }
      return 'ignored';
    }

    // Already in effect: nothing to publish
    const keys = Object.keys(diff);
    if (keys.every((key) => propertyValuesEqual(current.properties[key] ?? null, diff[key] ?? null))) {
      return 'applied';
    }

    const next = new Map(this.published);
    next.set(
      deviceId,
      Object.freeze({ ...current, properties: applyPropertyDiff(current.properties, diff) })
    );
    this.publish(next, { type: 'patch', deviceId, keys, source });
    return 'applied';
  }

  private bufferUnknown(deviceId: string, patch: BufferedPatch): void {
    const list = this.unknownPatches.get(deviceId) ?? [];
    list.push(patch);
    while (list.length > this.config.maxBufferedPatchesPerDevice) {
      list.shift();
    }
    this.unknownPatches.set(deviceId, list);
  }

  private record(entry: JournalEntry): void {
    if (this.openTokens.size > 0) {
      this.journal.push(entry);
    }
  }

  private replayEntry(target: Map<string, DeviceEntity>, entry: JournalEntry): boolean {
    if (entry.kind === 'upsert') {
      target.set(entry.device.id, entry.device);
      return true;
    }
    const device = target.get(entry.deviceId);
    if (!device) return false;
    target.set(
      entry.deviceId,
      Object.freeze({ ...device, properties: applyPropertyDiff(device.properties, entry.diff) })
    );
    return true;
  }

  private trimJournal(): void {
    if (this.openTokens.size === 0) {
      this.journal = [];
      return;
    }
    const oldest = Math.min(...[...this.openTokens.values()].map((t) => t.sequence));
    this.journal = this.journal.filter((entry) => entry.sequence > oldest);
  }

  private publish(next: Map<string, DeviceEntity>, change: DeviceStoreChange): void {
    this.published = next;
    this.publishedList = Object.freeze([...next.values()]);
    this.pendingNotifications.push(change);
    this.drainNotifications();
  }

  private drainNotifications(): void {
    if (this.notifying) return;
    this.notifying = true;
    try {
      let change = this.pendingNotifications.shift();
      while (change) {
        this.devicesSubject.next(this.publishedList);
        this.changesSubject.next(change);
        change = this.pendingNotifications.shift();
      }
    } finally {
      this.notifying = false;
    }
  }
}

export function createDeviceStore(config?: DeviceStoreConfig): DeviceStore {
  return new DeviceStore(config);
}
