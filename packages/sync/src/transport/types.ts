import type { DeviceInput, PropertyDiff } from '@homesync/core';
import type { FrameData } from '../protocol/codec.js';

/**
 * Callbacks a duplex transport reports socket events through.
 *
 * After `onError` or `onClose` the connection is dead; a transport may
 * report both for the same failure.
 */
export interface DuplexHandlers {
  onOpen(): void;
  onFrame(data: FrameData): void;
  onError(error: Error): void;
  onClose(code: number, reason: string): void;
}

/**
 * One open (or opening) socket.
 */
export interface DuplexConnection {
  /** Send a text frame. Throws when the socket is not open. */
  send(frame: string): void;
  /** Close the socket. Closing twice is a no-op. */
  close(code?: number, reason?: string): void;
}

/**
 * Opens push-channel sockets.
 *
 * Implementations carry no retry logic; reconnection belongs to the
 * push channel manager.
 *
 * @see {@link WebSocketDuplexTransport}
 */
export interface DuplexTransport {
  /**
   * Start opening a socket to `url`. May throw synchronously when the
   * socket cannot even be created (malformed URL).
   */
  open(url: string, handlers: DuplexHandlers): DuplexConnection;
}

/**
 * Request/response access to the gateway's device API.
 *
 * Both calls receive an abort signal; the caller bounds them with its own
 * timeout and aborts on teardown.
 *
 * @see {@link HttpDeviceGateway}
 */
export interface DeviceGateway {
  /**
   * Fetch the full device list.
   * @throws FetchError on non-success status or an invalid body
   */
  fetchDevices(signal?: AbortSignal): Promise<DeviceInput[]>;

  /**
   * Ask the gateway to change device state.
   * @throws WriteError when the gateway rejects the request
   */
  writeDeviceState(deviceId: string, properties: PropertyDiff, signal?: AbortSignal): Promise<void>;
}

/**
 * Shared transport configuration.
 */
export interface GatewayAuthConfig {
  /** Bearer token sent with every request (and as `token` on the socket URL) */
  authToken?: string;
}
