import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import type { DeviceInput } from '../types/device.js';
import { DeviceStore, type DeviceStoreChange } from './device-store.js';

function lamp(id: string, properties: DeviceInput['properties'] = {}, zones: string[] = []): DeviceInput {
  return { id, properties, zones };
}

describe('DeviceStore', () => {
  let store: DeviceStore;
  let changes: DeviceStoreChange[];

  beforeEach(() => {
    store = new DeviceStore();
    changes = [];
    store.changes$.subscribe((change) => changes.push(change));
  });

  afterEach(() => {
    store.destroy();
  });

  describe('applyFullSnapshot()', () => {
    it('should replace the store with exactly the snapshot devices', () => {
      store.applyFullSnapshot([lamp('a'), lamp('b'), lamp('c')]);
      store.applyFullSnapshot([lamp('b'), lamp('d')]);

      expect(store.getAll().map((d) => d.id)).toEqual(['b', 'd']);
      expect(store.has('a')).toBe(false);
      expect(store.has('c')).toBe(false);
      expect(store.size).toBe(2);
    });

    it('should report added and removed ids', () => {
      store.applyFullSnapshot([lamp('a'), lamp('b')]);
      store.applyFullSnapshot([lamp('b'), lamp('c')]);

      expect(changes[1]).toEqual({
        type: 'snapshot',
        deviceIds: ['b', 'c'],
        added: ['c'],
        removed: ['a'],
        replayed: 0,
      });
    });

    it('should take zone membership from the snapshot', () => {
      store.applyFullSnapshot([lamp('a', {}, ['kitchen'])]);
      store.applyFullSnapshot([lamp('a', {}, ['hall', 'hall'])]);

      expect(store.get('a')?.zones).toEqual(['hall']);
    });

    it('should replay patches applied after the token was opened', () => {
      store.applyFullSnapshot([lamp('a', { state: 'OFF', brightness: 10 })]);

      const token = store.beginSnapshot();
      store.applyPatch('a', { brightness: 99 });

      // The fetched snapshot predates the patch
      store.applyFullSnapshot([lamp('a', { state: 'ON', brightness: 10 })], { token });

      expect(store.get('a')?.properties).toEqual({ state: 'ON', brightness: 99 });
      expect(changes[changes.length - 1]).toMatchObject({ type: 'snapshot', replayed: 1 });
    });

    it('should not replay patches applied before the token was opened', () => {
      store.applyFullSnapshot([lamp('a', { brightness: 10 })]);
      store.applyPatch('a', { brightness: 20 });

      const token = store.beginSnapshot();
      store.applyFullSnapshot([lamp('a', { brightness: 30 })], { token });

      expect(store.get('a')?.properties.brightness).toBe(30);
    });

    it('should replay optimistic writes made while a fetch was in flight', () => {
      store.applyFullSnapshot([lamp('a', { state: 'OFF' })]);
      const token = store.beginSnapshot();
      store.applyOptimistic('a', { state: 'ON' });
      store.applyFullSnapshot([lamp('a', { state: 'OFF' })], { token });

      expect(store.get('a')?.properties.state).toBe('ON');
    });

    it('should lay unconfirmed writes over the snapshot', () => {
      store.applyFullSnapshot([lamp('a', { state: 'OFF' }), lamp('b', { state: 'OFF' })]);
      store.applyFullSnapshot([lamp('a', { state: 'OFF' }), lamp('b', { state: 'OFF' })], {
        overlay: new Map([['a', { state: 'ON' }], ['missing', { state: 'ON' }]]),
      });

      expect(store.get('a')?.properties.state).toBe('ON');
      expect(store.get('b')?.properties.state).toBe('OFF');
      expect(store.has('missing')).toBe(false);
    });

    it('should treat a cancelled token like no token', () => {
      store.applyFullSnapshot([lamp('a', { brightness: 10 })]);
      const token = store.beginSnapshot();
      store.applyPatch('a', { brightness: 20 });
      store.cancelSnapshot(token);

      store.applyFullSnapshot([lamp('a', { brightness: 30 })], { token });

      expect(store.get('a')?.properties.brightness).toBe(30);
    });
  });

  describe('applyPatch()', () => {
    beforeEach(() => {
      store.applyFullSnapshot([lamp('bulb', { state: 'OFF' })]);
    });

    it('should merge a diff into the device', () => {
      expect(store.applyPatch('bulb', { brightness: 120 })).toBe('applied');
      expect(store.get('bulb')?.properties).toEqual({ state: 'OFF', brightness: 120 });
    });

    it('should end with no brightness key after set, delete, then unrelated patch', () => {
      store.applyPatch('bulb', { brightness: 200 });
      store.applyPatch('bulb', { brightness: null });
      store.applyPatch('bulb', { state: 'ON' });

      const properties = store.get('bulb')?.properties ?? {};
      expect('brightness' in properties).toBe(false);
      expect(properties.state).toBe('ON');
    });

    it('should leave the store unchanged for an unknown id', () => {
      const before = store.snapshot();
      const outcome = store.applyPatch('ghost', { state: 'ON' });

      expect(outcome).toBe('buffered');
      expect(store.snapshot()).toBe(before);
      expect(store.has('ghost')).toBe(false);
    });

    it('should ignore unknown ids when buffering is disabled', () => {
      const unbuffered = new DeviceStore({ bufferUnknownPatches: false });
      expect(unbuffered.applyPatch('ghost', { state: 'ON' })).toBe('ignored');
      expect(unbuffered.bufferedDeviceCount).toBe(0);
      unbuffered.destroy();
    });

    it('should replace the entity instead of mutating it', () => {
      const before = store.get('bulb');
      store.applyPatch('bulb', { state: 'ON' });
      const after = store.get('bulb');

      expect(after).not.toBe(before);
      expect(before?.properties.state).toBe('OFF');
      expect(Object.isFrozen(after)).toBe(true);
      expect(Object.isFrozen(after?.properties)).toBe(true);
    });

    it('should emit a patch notification', () => {
      store.applyPatch('bulb', { state: 'ON', brightness: 5 });
      expect(changes[changes.length - 1]).toEqual({
        type: 'patch',
        deviceId: 'bulb',
        keys: ['state', 'brightness'],
        source: 'push',
      });
    });
  });

  describe('no-op patches', () => {
    it('should not publish a diff that is already in effect', () => {
      store.applyFullSnapshot([lamp('strip', { state: 'ON', color: { x: 0.3, y: 0.2 } })]);
      const before = store.get('strip');
      const count = changes.length;

      expect(store.applyPatch('strip', { state: 'ON', color: { x: 0.3, y: 0.2 }, effect: null })).toBe('applied');

      expect(store.get('strip')).toBe(before);
      expect(changes).toHaveLength(count);
    });

    it('should still replay a no-op patch recorded after a token', () => {
      store.applyFullSnapshot([lamp('strip', { state: 'ON' })]);
      const token = store.beginSnapshot();
      store.applyPatch('strip', { state: 'ON' });

      store.applyFullSnapshot([lamp('strip', { state: 'OFF' })], { token });

      expect(store.get('strip')?.properties.state).toBe('ON');
    });
  });

  describe('unknown-device buffering', () => {
    it('should replay buffered patches when a snapshot introduces the device', () => {
      store.applyPatch('new_plug', { state: 'ON' });
      store.applyPatch('new_plug', { power: 12 });

      store.applyFullSnapshot([lamp('new_plug', { state: 'OFF' })]);

      expect(store.get('new_plug')?.properties).toEqual({ state: 'ON', power: 12 });
      expect(store.bufferedDeviceCount).toBe(0);
    });

    it('should drop buffered patches for devices the snapshot does not contain', () => {
      store.applyPatch('gone', { state: 'ON' });
      store.applyFullSnapshot([lamp('other')]);
      store.applyFullSnapshot([lamp('gone', { state: 'OFF' })]);

      expect(store.get('gone')?.properties.state).toBe('OFF');
    });

    it('should keep only the newest buffered patches per device', () => {
      const small = new DeviceStore({ maxBufferedPatchesPerDevice: 2 });
      small.applyPatch('x', { a: 1 });
      small.applyPatch('x', { b: 2 });
      small.applyPatch('x', { c: 3 });
      small.applyFullSnapshot([lamp('x')]);

      expect(small.get('x')?.properties).toEqual({ b: 2, c: 3 });
      small.destroy();
    });

    it('should apply buffered patches to an upserted device', () => {
      store.applyPatch('paired', { linkquality: 80 });
      store.upsertDevice(lamp('paired', { state: 'OFF' }));

      expect(store.get('paired')?.properties).toEqual({ state: 'OFF', linkquality: 80 });
    });
  });

  describe('applyOptimistic()', () => {
    it('should merge into a known device and tag the source', () => {
      store.applyFullSnapshot([lamp('bulb', { state: 'OFF' })]);
      expect(store.applyOptimistic('bulb', { state: 'ON' })).toBe('applied');
      expect(store.get('bulb')?.properties.state).toBe('ON');
      expect(changes[changes.length - 1]).toMatchObject({ type: 'patch', source: 'optimistic' });
    });

    it('should never buffer optimistic writes for unknown devices', () => {
      expect(store.applyOptimistic('ghost', { state: 'ON' })).toBe('ignored');
      expect(store.bufferedDeviceCount).toBe(0);
    });
  });

  describe('upsertDevice()', () => {
    it('should report whether the device was created', () => {
      store.upsertDevice(lamp('a'));
      store.upsertDevice(lamp('a', { state: 'ON' }));

      expect(changes).toEqual([
        { type: 'upsert', deviceId: 'a', created: true },
        { type: 'upsert', deviceId: 'a', created: false },
      ]);
      expect(store.get('a')?.properties.state).toBe('ON');
    });
  });

  describe('reads', () => {
    it('should filter by zones', () => {
      store.applyFullSnapshot([
        lamp('a', {}, ['kitchen']),
        lamp('b', {}, ['hall']),
        lamp('c', {}, ['kitchen', 'hall']),
      ]);

      expect(store.getByZones(['kitchen']).map((d) => d.id)).toEqual(['a', 'c']);
      expect(store.getByZones([]).map((d) => d.id)).toEqual(['a', 'b', 'c']);
    });

    it('should publish the device list on devices$', () => {
      const lists: string[][] = [];
      store.devices$.subscribe((devices) => lists.push(devices.map((d) => d.id)));

      store.applyFullSnapshot([lamp('a')]);
      store.upsertDevice(lamp('b'));

      expect(lists).toEqual([[], ['a'], ['a', 'b']]);
    });

    it('should let a subscriber read a consistent state during notification', () => {
      store.applyFullSnapshot([lamp('a', { level: 0 })]);
      const seen: unknown[] = [];
      store.changes$.subscribe((change) => {
        if (change.type === 'patch') {
          seen.push(store.get(change.deviceId)?.properties.level);
          if (change.keys.includes('level') && store.get('a')?.properties.level === 1) {
            store.applyPatch('a', { level: 2 });
          }
        }
      });

      store.applyPatch('a', { level: 1 });

      expect(seen).toEqual([1, 2]);
      expect(changes.filter((c) => c.type === 'patch')).toHaveLength(2);
    });
  });

  describe('destroy()', () => {
    it('should be idempotent and ignore later mutations', () => {
      store.applyFullSnapshot([lamp('a')]);
      store.destroy();
      store.destroy();

      store.applyFullSnapshot([lamp('b')]);
      expect(store.applyPatch('a', { state: 'ON' })).toBe('ignored');
      expect(store.has('b')).toBe(false);
    });
  });
});
