import { HomeSyncError } from '@homesync/core';

/**
 * URLs of the gateway API derived from its base URL.
 */
export interface GatewayEndpoints {
  /** `GET` returning the full device list */
  snapshotUrl: string;
  /** Push channel socket (`ws://` or `wss://`, path `/ws` at the host root) */
  socketUrl: string;
  /** Write endpoint for one device */
  writeUrl(deviceId: string): string;
}

/**
 * Derive every endpoint from the gateway base URL.
 *
 * @example
 * ```typescript
 * const endpoints = resolveGatewayEndpoints('http://192.168.1.10:8080');
 * endpoints.socketUrl; // 'ws://192.168.1.10:8080/ws'
 * endpoints.snapshotUrl; // 'http://192.168.1.10:8080/api/zigbee2mqtt/list_devices'
 * ```
 *
 * @throws HomeSyncError (HOMESYNC_C500) when the URL is not http(s)
 */
export function resolveGatewayEndpoints(baseUrl: string): GatewayEndpoints {
  let base: URL;
  try {
    base = new URL(baseUrl);
  } catch (error) {
    throw new HomeSyncError({
      code: 'HOMESYNC_C500',
      message: `Invalid gateway base URL: ${baseUrl}`,
      context: { baseUrl },
      cause: error instanceof Error ? error : undefined,
    });
  }

  if (base.protocol !== 'http:' && base.protocol !== 'https:') {
    throw new HomeSyncError({
      code: 'HOMESYNC_C500',
      message: `Gateway base URL must use http or https, got ${base.protocol}`,
      context: { baseUrl },
    });
  }

  const prefix = `${base.origin}${base.pathname.replace(/\/+$/, '')}`;
  const socketProtocol = base.protocol === 'https:' ? 'wss:' : 'ws:';

  return {
    snapshotUrl: `${prefix}/api/zigbee2mqtt/list_devices`,
    socketUrl: `${socketProtocol}//${base.host}/ws`,
    writeUrl: (deviceId) => `${prefix}/api/zigbee2mqtt/set/${encodeURIComponent(deviceId)}`,
  };
}
