import { HomeSyncError } from '@homesync/core';
import { describe, expect, it } from 'vitest';
import { resolveGatewayEndpoints } from './endpoints.js';

function thrown(fn: () => unknown): unknown {
  try {
    fn();
  } catch (error) {
    return error;
  }
  return undefined;
}

describe('resolveGatewayEndpoints', () => {
  it('should derive the socket and API URLs from host and port', () => {
    const endpoints = resolveGatewayEndpoints('http://192.168.1.10:8080');

    expect(endpoints.socketUrl).toBe('ws://192.168.1.10:8080/ws');
    expect(endpoints.snapshotUrl).toBe('http://192.168.1.10:8080/api/zigbee2mqtt/list_devices');
    expect(endpoints.writeUrl('kitchen_light')).toBe('http://192.168.1.10:8080/api/zigbee2mqtt/set/kitchen_light');
  });

  it('should use wss for https and keep a path prefix for the API only', () => {
    const endpoints = resolveGatewayEndpoints('https://home.example.com/hub/');

    expect(endpoints.socketUrl).toBe('wss://home.example.com/ws');
    expect(endpoints.snapshotUrl).toBe('https://home.example.com/hub/api/zigbee2mqtt/list_devices');
  });

  it('should encode device ids', () => {
    const endpoints = resolveGatewayEndpoints('http://hub.local');
    expect(endpoints.writeUrl('garden/pump')).toBe('http://hub.local/api/zigbee2mqtt/set/garden%2Fpump');
  });

  it('should reject URLs that are not http(s)', () => {
    for (const url of ['ftp://hub.local', 'not a url']) {
      const error = thrown(() => resolveGatewayEndpoints(url));
      expect(error).toBeInstanceOf(HomeSyncError);
      expect(error).toMatchObject({ code: 'HOMESYNC_C500' });
    }
  });
});
