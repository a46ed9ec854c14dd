import { TransportError } from '@homesync/core';
import { WebSocket, type RawData } from 'ws';
import type { DuplexConnection, DuplexHandlers, DuplexTransport, GatewayAuthConfig } from './types.js';

export interface WebSocketDuplexTransportConfig extends GatewayAuthConfig {
  /**
   * Upper bound for the HTTP upgrade handshake, in milliseconds.
   * @default 10000
   */
  handshakeTimeoutMs?: number;
}

/**
 * Push-channel transport on the `ws` package.
 *
 * Protocol-level ping frames are answered by `ws` itself; application-level
 * `{"type":"ping"}` frames are passed up like any other frame.
 *
 * @example
 * ```typescript
 * const transport = createWebSocketDuplexTransport({ authToken: 'token' });
 * const channel = new PushChannelManager(transport, { url: 'ws://hub.local:8080/ws' });
 * ```
 */
export class WebSocketDuplexTransport implements DuplexTransport {
  private readonly config: Required<WebSocketDuplexTransportConfig>;

  constructor(config: WebSocketDuplexTransportConfig = {}) {
    this.config = {
      authToken: config.authToken ?? '',
      handshakeTimeoutMs: config.handshakeTimeoutMs ?? 10000,
    };
  }

  open(url: string, handlers: DuplexHandlers): DuplexConnection {
    const target = new URL(url);

    // Add auth token as query param if provided
    if (this.config.authToken) {
      target.searchParams.set('token', this.config.authToken);
    }

    const socket = new WebSocket(target.toString(), {
      handshakeTimeout: this.config.handshakeTimeoutMs,
    });

    socket.on('open', () => handlers.onOpen());
    socket.on('message', (data: RawData) => handlers.onFrame(data));
    socket.on('error', (error: Error) => handlers.onError(error));
    socket.on('close', (code: number, reason: Buffer) => handlers.onClose(code, reason.toString('utf8')));

    return {
      send(frame: string): void {
        if (socket.readyState !== WebSocket.OPEN) {
          throw new TransportError('HOMESYNC_T102', 'Cannot send on a socket that is not open', {
            readyState: socket.readyState,
          });
        }
        socket.send(frame);
      },
      close(code = 1000, reason = 'client closing'): void {
        if (socket.readyState === WebSocket.CLOSED || socket.readyState === WebSocket.CLOSING) {
          return;
        }
        if (socket.readyState === WebSocket.CONNECTING) {
          socket.terminate();
          return;
        }
        socket.close(code, reason);
      },
    };
  }
}

export function createWebSocketDuplexTransport(
  config?: WebSocketDuplexTransportConfig
): WebSocketDuplexTransport {
  return new WebSocketDuplexTransport(config);
}
