import { FetchError, WriteError, type DeviceInput, type PropertyDiff } from '@homesync/core';
import { deviceListSchema, toDeviceInput } from '../protocol/schemas.js';
import { resolveGatewayEndpoints, type GatewayEndpoints } from './endpoints.js';
import type { DeviceGateway, GatewayAuthConfig } from './types.js';

/**
 * HTTP gateway configuration
 */
export interface HttpDeviceGatewayConfig extends GatewayAuthConfig {
  /** Gateway base URL, e.g. `http://192.168.1.10:8080` */
  baseUrl: string;
  /**
   * How writes are sent. `GET` puts the JSON state in the `state` query
   * parameter; `POST` sends it as the body.
   * @default 'GET'
   */
  writeMethod?: 'GET' | 'POST';
  /** Fetch implementation @default globalThis.fetch */
  fetch?: typeof fetch;
}

/**
 * {@link DeviceGateway} over the gateway's HTTP API.
 *
 * ## API Endpoints
 *
 * - `GET /api/zigbee2mqtt/list_devices` - full device list (`null` means none)
 * - `GET /api/zigbee2mqtt/set/{device}?state={json}` - change device state
 *
 * @example
 * ```typescript
 * const gateway = createHttpDeviceGateway({ baseUrl: 'http://hub.local:8080' });
 * const devices = await gateway.fetchDevices();
 * await gateway.writeDeviceState('kitchen_light', { state: 'ON' });
 * ```
 */
export class HttpDeviceGateway implements DeviceGateway {
  private readonly endpoints: GatewayEndpoints;
  private readonly authToken: string;
  private readonly writeMethod: 'GET' | 'POST';
  private readonly fetchImpl: typeof fetch;

  constructor(config: HttpDeviceGatewayConfig) {
    this.endpoints = resolveGatewayEndpoints(config.baseUrl);
    this.authToken = config.authToken ?? '';
    this.writeMethod = config.writeMethod ?? 'GET';
    this.fetchImpl = config.fetch ?? globalThis.fetch;
  }

  async fetchDevices(signal?: AbortSignal): Promise<DeviceInput[]> {
    const url = this.endpoints.snapshotUrl;

    let response: Response;
    try {
      response = await this.fetchImpl(url, { method: 'GET', headers: this.getHeaders(), signal });
    } catch (error) {
      throw new FetchError('HOMESYNC_F300', describe(error), { url }, asError(error));
    }

    if (!response.ok) {
      throw new FetchError('HOMESYNC_F300', `HTTP error: ${response.status}`, {
        url,
        statusCode: response.status,
      });
    }

    const text = await response.text();
    let body: unknown = null;
    if (text.trim() !== '') {
      try {
        body = JSON.parse(text);
      } catch (error) {
        throw new FetchError('HOMESYNC_F302', 'Device list is not valid JSON', { url }, asError(error));
      }
    }

    const parsed = deviceListSchema.safeParse(body);
    if (!parsed.success) {
      throw new FetchError('HOMESYNC_F302', `Device list is invalid: ${parsed.error.issues[0]?.message ?? 'unknown issue'}`, {
        url,
        path: parsed.error.issues[0]?.path.join('.'),
      });
    }

    return (parsed.data ?? []).map(toDeviceInput);
  }

  async writeDeviceState(deviceId: string, properties: PropertyDiff, signal?: AbortSignal): Promise<void> {
    const url = new URL(this.endpoints.writeUrl(deviceId));
    const payload = JSON.stringify(properties);

    const init: RequestInit = { method: this.writeMethod, headers: this.getHeaders(), signal };
    if (this.writeMethod === 'GET') {
      url.searchParams.set('state', payload);
    } else {
      init.body = payload;
    }

    let response: Response;
    try {
      response = await this.fetchImpl(url.toString(), init);
    } catch (error) {
      throw new WriteError('HOMESYNC_W400', deviceId, describe(error), { url: url.toString() }, asError(error));
    }

    if (!response.ok) {
      throw new WriteError('HOMESYNC_W400', deviceId, `HTTP error: ${response.status}`, {
        statusCode: response.status,
      });
    }
  }

  /**
   * Get request headers
   */
  private getHeaders(): Record<string, string> {
    const headers: Record<string, string> = {
      'Content-Type': 'application/json',
    };

    if (this.authToken) {
      headers.Authorization = `Bearer ${this.authToken}`;
    }

    return headers;
  }
}

function asError(error: unknown): Error | undefined {
  return error instanceof Error ? error : undefined;
}

function describe(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

export function createHttpDeviceGateway(config: HttpDeviceGatewayConfig): HttpDeviceGateway {
  return new HttpDeviceGateway(config);
}
