/**
 * @homesync/sync - keeps a local device replica in step with the gateway
 *
 * ## Architecture
 *
 * ```
 * ┌─────────────────────────────────────────────────────────────────────┐
 * │                         Host Application                            │
 * └───────────────────────────────┬─────────────────────────────────────┘
 *                                 │ reads / requestPropertyChange
 *                                 ▼
 * ┌─────────────────────────────────────────────────────────────────────┐
 * │                         ReplicaSession                              │
 * │                                                                     │
 * │  ┌──────────────┐  ┌─────────────────┐  ┌───────────────────────┐   │
 * │  │ PushChannel  │  │ PollFetcher     │  │ WriteCoordinator      │   │
 * │  │ Manager      │  │ (snapshots,     │  │ (optimistic writes,   │   │
 * │  │ (live diffs) │  │  safety net)    │  │  debounce)            │   │
 * │  └──────┬───────┘  └────────┬────────┘  └───────────┬───────────┘   │
 * │         └───────────────────┼───────────────────────┘               │
 * │                             ▼                                       │
 * │                   DeviceStore (@homesync/core)                      │
 * └───────────────────────────────┬─────────────────────────────────────┘
 *                                 │ WebSocket + HTTP
 *                                 ▼
 * ┌─────────────────────────────────────────────────────────────────────┐
 * │                             Gateway                                 │
 * └─────────────────────────────────────────────────────────────────────┘
 * ```
 *
 * ## Quick Start
 *
 * ```typescript
 * import { createGatewaySession } from '@homesync/sync';
 *
 * const session = createGatewaySession({ baseUrl: 'http://192.168.1.10:8080' });
 * await session.start();
 *
 * session.devices$.subscribe((devices) => render(devices));
 * session.requestPropertyChange('desk_lamp', 'brightness', 180);
 * ```
 *
 * ## Push Protocol Frames
 *
 * | Frame | Direction | Purpose |
 * |-------|-----------|---------|
 * | `device_update` | Gateway → Client | Partial state (`state`) or a new device (`device`) |
 * | `ping` | Gateway → Client | Heartbeat, answered with `pong` |
 * | `pong` | Client → Gateway | Heartbeat reply |
 *
 * @packageDocumentation
 * @module @homesync/sync
 */

export * from './backoff.js';
export * from './config.js';
export * from './diagnostics.js';
export * from './health-monitor.js';
export * from './logger.js';
export * from './poll-fetcher.js';
export * from './protocol/index.js';
export * from './push-channel.js';
export * from './replica-session.js';
export * from './timeout.js';
export * from './transport/index.js';
export * from './write-coordinator.js';
