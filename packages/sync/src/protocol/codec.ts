/**
 * Message codec for the push channel.
 *
 * Inbound frames are JSON objects discriminated by `type`. Decoding never
 * throws: invalid frames come back as a {@link ProtocolError} for the caller
 * to report, and frames of a type this client does not know are returned as
 * ignored so newer gateways can add frame types.
 */

import { ProtocolError, type DeviceInput, type PropertyDiff } from '@homesync/core';
import {
  deviceUpdateFrameSchema,
  envelopeSchema,
  pingFrameSchema,
  pongFrameSchema,
  toDeviceInput,
} from './schemas.js';

/** Raw frame payload as handed over by a duplex transport */
export type FrameData = string | Uint8Array | ArrayBuffer | readonly Uint8Array[];

/**
 * Partial state change of one device. A newly paired device may arrive
 * with its full row in `device`.
 */
export interface DeviceUpdateFrame {
  type: 'device_update';
  deviceId: string;
  diff: PropertyDiff | null;
  device: DeviceInput | null;
  timestamp?: string;
}

export interface PingFrame {
  type: 'ping';
  timestamp?: number;
}

export interface PongFrame {
  type: 'pong';
  timestamp?: number;
}

export type InboundFrame = DeviceUpdateFrame | PingFrame | PongFrame;

export type OutboundFrame = PingFrame | PongFrame;

export type DecodeResult =
  | { kind: 'frame'; frame: InboundFrame }
  | { kind: 'ignored'; frameType: string }
  | { kind: 'invalid'; error: ProtocolError };

const EXCERPT_LENGTH = 200;

/**
 * Normalize transport payloads to text.
 */
export function frameToText(data: FrameData): string {
  if (typeof data === 'string') return data;
  if (data instanceof ArrayBuffer) return Buffer.from(data).toString('utf8');
  if (data instanceof Uint8Array) return Buffer.from(data).toString('utf8');
  return Buffer.concat(data.map((chunk) => Buffer.from(chunk))).toString('utf8');
}

export function decodeFrame(data: FrameData): DecodeResult {
  const text = frameToText(data);
  const excerpt = text.slice(0, EXCERPT_LENGTH);

  let parsed: unknown;
  try {
    parsed = JSON.parse(text);
  } catch (error) {
    return invalid('HOMESYNC_P200', 'Frame is not valid JSON', excerpt, error);
  }

  const envelope = envelopeSchema.safeParse(parsed);
  if (!envelope.success) {
    return invalid('HOMESYNC_P201', 'Frame must be an object with a string "type"', excerpt);
  }

  switch (envelope.data.type) {
    case 'device_update': {
      const result = deviceUpdateFrameSchema.safeParse(parsed);
      if (!result.success) {
        return invalid('HOMESYNC_P202', describeIssues('device_update', result.error.issues), excerpt);
      }
      const { device_name, state, device, timestamp } = result.data;
      return {
        kind: 'frame',
        frame: {
          type: 'device_update',
          deviceId: device_name,
          diff: state ?? null,
          device: device ? { ...toDeviceInput(device), id: device_name } : null,
          timestamp,
        },
      };
    }
    case 'ping': {
      const result = pingFrameSchema.safeParse(parsed);
      if (!result.success) {
        return invalid('HOMESYNC_P202', describeIssues('ping', result.error.issues), excerpt);
      }
      return { kind: 'frame', frame: result.data };
    }
    case 'pong': {
      const result = pongFrameSchema.safeParse(parsed);
      if (!result.success) {
        return invalid('HOMESYNC_P202', describeIssues('pong', result.error.issues), excerpt);
      }
      return { kind: 'frame', frame: result.data };
    }
    default:
      return { kind: 'ignored', frameType: envelope.data.type };
  }
}

export function encodeFrame(frame: OutboundFrame): string {
  return JSON.stringify(frame);
}

function invalid(
  code: 'HOMESYNC_P200' | 'HOMESYNC_P201' | 'HOMESYNC_P202',
  message: string,
  excerpt: string,
  cause?: unknown
): DecodeResult {
  return {
    kind: 'invalid',
    error: new ProtocolError(code, message, excerpt, cause instanceof Error ? cause : undefined),
  };
}

function describeIssues(frameType: string, issues: readonly { path: (string | number)[]; message: string }[]): string {
  const detail = issues
    .map((issue) => (issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message))
    .join('; ');
  return `Invalid ${frameType} frame: ${detail}`;
}
