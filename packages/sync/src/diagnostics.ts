import type { FetchError, ProtocolError, TransportError, WriteError } from '@homesync/core';
import type { ReconnectMode } from './backoff.js';

/**
 * Non-fatal events reported by the sync components.
 *
 * Nothing in a background loop throws at the host; failures surface here
 * and in the log instead.
 */
export type SyncDiagnostic =
  | { type: 'transport-error'; error: TransportError; failures: number; timestamp: number }
  | {
      type: 'reconnect-scheduled';
      attempt: number;
      delayMs: number;
      mode: ReconnectMode;
      timestamp: number;
    }
  | { type: 'connected'; timestamp: number }
  | { type: 'frame-dropped'; error: ProtocolError; timestamp: number }
  | { type: 'frame-ignored'; frameType: string; timestamp: number }
  | { type: 'fetch-succeeded'; deviceCount: number; durationMs: number; timestamp: number }
  | { type: 'fetch-failed'; error: FetchError; timestamp: number }
  | { type: 'poll-skipped'; pendingDevices: readonly string[]; timestamp: number }
  | { type: 'write-succeeded'; deviceId: string; durationMs: number; timestamp: number }
  | { type: 'write-failed'; error: WriteError; timestamp: number };

export type SyncDiagnosticType = SyncDiagnostic['type'];
