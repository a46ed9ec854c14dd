import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { FakeTransport } from './__tests__/fakes.js';
import type { SyncDiagnostic } from './diagnostics.js';
import type { DeviceUpdateFrame } from './protocol/codec.js';
import { canTransition, PushChannelManager, type ConnectionStatus } from './push-channel.js';

const SOCKET_URL = 'ws://hub.local:8080/ws';

describe('PushChannelManager', () => {
  let transport: FakeTransport;
  let channel: PushChannelManager;
  let diagnostics: SyncDiagnostic[];

  beforeEach(() => {
    vi.useFakeTimers();
    transport = new FakeTransport();
    channel = new PushChannelManager(transport, { url: SOCKET_URL, logger: false });
    diagnostics = [];
    channel.diagnostics$.subscribe((d) => diagnostics.push(d));
  });

  afterEach(() => {
    channel.destroy();
    vi.useRealTimers();
  });

  function reconnectDelays(): number[] {
    return diagnostics.flatMap((d) => (d.type === 'reconnect-scheduled' ? [d.delayMs] : []));
  }

  describe('connect()', () => {
    it('should move to connected on the first valid frame', () => {
      const statuses: ConnectionStatus[] = [];
      channel.state$.subscribe((s) => statuses.push(s.status));

      channel.connect();
      expect(transport.latest.url).toBe(SOCKET_URL);
      transport.latest.open();
      expect(channel.status).toBe('connecting');

      transport.latest.receive({ type: 'ping' });

      expect(statuses).toEqual(['disconnected', 'connecting', 'connected']);
      expect(channel.state.failures).toBe(0);
    });

    it('should not open a second socket while connecting or connected', () => {
      channel.connect();
      channel.connect();
      transport.latest.receive({ type: 'ping' });
      channel.connect();

      expect(transport.connections).toHaveLength(1);
    });

    it('should fail the attempt when no frame arrives within the timeout', () => {
      channel.connect();
      transport.latest.open();

      vi.advanceTimersByTime(10000);

      expect(diagnostics[0]).toMatchObject({ type: 'transport-error', failures: 1 });
      const first = diagnostics[0];
      expect(first?.type === 'transport-error' && first.error.code).toBe('HOMESYNC_T101');
      expect(transport.latest.closed).toBe(true);
      expect(channel.status).toBe('reconnecting');
    });

    it('should report a transport that cannot open the socket', () => {
      transport.failNextOpen = new Error('Invalid URL');
      channel.connect();

      const first = diagnostics[0];
      expect(first?.type === 'transport-error' && first.error.code).toBe('HOMESYNC_T100');
      expect(channel.status).toBe('reconnecting');
    });
  });

  describe('frames', () => {
    beforeEach(() => {
      channel.connect();
      transport.latest.open();
    });

    it('should answer ping with pong', () => {
      transport.latest.receive({ type: 'ping' });

      expect(transport.latest.sent).toHaveLength(1);
      expect(JSON.parse(transport.latest.sent[0] ?? '')).toEqual({ type: 'pong', timestamp: Date.now() });
    });

    it('should publish device updates', () => {
      const updates: DeviceUpdateFrame[] = [];
      channel.updates$.subscribe((u) => updates.push(u));

      transport.latest.receive({
        type: 'device_update',
        device_name: 'desk_lamp',
        state: { brightness: 10, color: null },
        timestamp: '2024-05-01T10:00:00Z',
      });

      expect(updates).toEqual([
        {
          type: 'device_update',
          deviceId: 'desk_lamp',
          diff: { brightness: 10, color: null },
          device: null,
          timestamp: '2024-05-01T10:00:00Z',
        },
      ]);
      expect(channel.status).toBe('connected');
    });

    it('should drop malformed frames without closing the socket', () => {
      transport.latest.receive('{not json');

      expect(diagnostics).toHaveLength(1);
      const dropped = diagnostics[0];
      expect(dropped?.type === 'frame-dropped' && dropped.error.code).toBe('HOMESYNC_P200');
      expect(transport.latest.closed).toBe(false);
      expect(channel.status).toBe('connecting');
    });

    it('should ignore unknown frame types but count them as traffic', () => {
      transport.latest.receive({ type: 'bridge_event', data: {} });

      expect(diagnostics).toContainEqual({
        type: 'frame-ignored',
        frameType: 'bridge_event',
        timestamp: Date.now(),
      });
      expect(channel.status).toBe('connected');
    });
  });

  describe('reconnect', () => {
    it('should schedule exactly one reconnect after the socket closes', () => {
      channel.connect();
      const first = transport.latest;
      first.receive({ type: 'ping' });

      first.remoteClose();
      first.fail();

      expect(channel.status).toBe('reconnecting');
      expect(reconnectDelays()).toEqual([2000]);

      vi.advanceTimersByTime(1999);
      expect(transport.connections).toHaveLength(1);
      vi.advanceTimersByTime(1);
      expect(transport.connections).toHaveLength(2);
      expect(channel.status).toBe('connecting');
    });

    it('should back off 2s, 4s, 8s, 16s, 30s then switch to the long interval', () => {
      channel.connect();

      for (let i = 0; i < 6; i++) {
        transport.latest.fail();
        const delays = reconnectDelays();
        if (i < 5) vi.advanceTimersByTime(delays[delays.length - 1] ?? 0);
      }

      expect(reconnectDelays()).toEqual([2000, 4000, 8000, 16000, 30000, 120000]);
      expect(channel.status).toBe('failed');
      expect(channel.state.failures).toBe(6);

      vi.advanceTimersByTime(119999);
      expect(transport.connections).toHaveLength(6);
      vi.advanceTimersByTime(1);
      expect(transport.connections).toHaveLength(7);
    });

    it('should reset the failure count after a successful connection', () => {
      channel.connect();
      transport.latest.fail();
      vi.advanceTimersByTime(2000);
      transport.latest.fail();
      vi.advanceTimersByTime(4000);

      transport.latest.receive({ type: 'ping' });
      transport.latest.remoteClose();

      expect(reconnectDelays()).toEqual([2000, 4000, 2000]);
    });
  });

  describe('restart()', () => {
    it('should reset the counter and connect immediately', () => {
      channel.connect();
      transport.latest.fail();
      vi.advanceTimersByTime(2000);
      transport.latest.fail();
      expect(channel.status).toBe('reconnecting');

      channel.restart();

      expect(transport.connections).toHaveLength(3);
      expect(channel.state.failures).toBe(0);

      transport.latest.fail();
      expect(reconnectDelays()).toEqual([2000, 4000, 2000]);
    });

    it('should leave a connected channel alone', () => {
      channel.connect();
      transport.latest.receive({ type: 'ping' });

      channel.restart();

      expect(transport.connections).toHaveLength(1);
      expect(channel.status).toBe('connected');
    });
  });

  describe('disconnect()', () => {
    it('should close the socket and suppress reconnects until connect()', () => {
      channel.connect();
      transport.latest.receive({ type: 'ping' });

      channel.disconnect();
      expect(channel.status).toBe('disconnected');
      expect(transport.latest.closed).toBe(true);

      vi.advanceTimersByTime(300000);
      expect(transport.connections).toHaveLength(1);

      channel.connect();
      expect(transport.connections).toHaveLength(2);
    });
  });

  describe('destroy()', () => {
    it('should be idempotent and ignore late socket events', () => {
      let completed = false;
      channel.state$.subscribe({ complete: () => (completed = true) });
      channel.connect();
      const socket = transport.latest;

      channel.destroy();
      channel.destroy();
      socket.remoteClose();
      vi.advanceTimersByTime(300000);

      expect(completed).toBe(true);
      expect(transport.connections).toHaveLength(1);
      expect(diagnostics).toEqual([]);
    });
  });
});

describe('canTransition', () => {
  it('should allow only the documented transitions', () => {
    expect(canTransition('disconnected', 'connecting')).toBe(true);
    expect(canTransition('connecting', 'connected')).toBe(true);
    expect(canTransition('failed', 'connecting')).toBe(true);
    expect(canTransition('connected', 'connecting')).toBe(false);
    expect(canTransition('reconnecting', 'connected')).toBe(false);
  });
});
