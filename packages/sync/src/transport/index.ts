/**
 * Transport layer between the replica and the gateway.
 *
 * - {@link WebSocketDuplexTransport}: push channel sockets on `ws`
 * - {@link HttpDeviceGateway}: snapshot fetches and device writes over HTTP
 *
 * Both sit behind interfaces ({@link DuplexTransport}, {@link DeviceGateway})
 * so tests and other hosts can supply their own.
 *
 * @module sync/transport
 */
export * from './endpoints.js';
export * from './http.js';
export * from './types.js';
export * from './websocket.js';
