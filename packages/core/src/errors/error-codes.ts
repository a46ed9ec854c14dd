/**
 * homesync Error Codes
 *
 * Error codes are structured as HOMESYNC_[CATEGORY][NUMBER]:
 * - T: Transport errors on the push channel (T100-T199)
 * - P: Protocol errors on inbound frames (P200-P299)
 * - F: Snapshot fetch errors (F300-F399)
 * - W: Remote write errors (W400-W499)
 * - C: Configuration errors (C500-C599)
 * - X: Internal errors (X900-X999)
 */

/**
 * Error code definitions with messages and suggestions
 */
export const ERROR_CODES = {
  // Transport errors (T100-T199)
  HOMESYNC_T100: {
    code: 'HOMESYNC_T100',
    message: 'Failed to open push channel',
    suggestion: 'Check that the gateway is reachable and the WebSocket URL is correct.',
  },
  HOMESYNC_T101: {
    code: 'HOMESYNC_T101',
    message: 'Push channel connection timed out',
    suggestion: 'The gateway accepted the socket but sent nothing. Raise connectTimeoutMs on slow links.',
  },
  HOMESYNC_T102: {
    code: 'HOMESYNC_T102',
    message: 'Push channel socket error',
    suggestion: 'The channel will reconnect with backoff. Polling covers the gap.',
  },
  HOMESYNC_T103: {
    code: 'HOMESYNC_T103',
    message: 'Push channel closed',
    suggestion: 'The channel will reconnect with backoff. Polling covers the gap.',
  },

  // Protocol errors (P200-P299)
  HOMESYNC_P200: {
    code: 'HOMESYNC_P200',
    message: 'Frame is not valid JSON',
    suggestion: 'The frame was dropped. Check the gateway serializer.',
  },
  HOMESYNC_P201: {
    code: 'HOMESYNC_P201',
    message: 'Frame envelope is invalid',
    suggestion: 'Every frame must be a JSON object with a string "type" field.',
  },
  HOMESYNC_P202: {
    code: 'HOMESYNC_P202',
    message: 'Frame payload is invalid',
    suggestion: 'The frame type is known but its payload does not match the expected shape.',
  },

  // Fetch errors (F300-F399)
  HOMESYNC_F300: {
    code: 'HOMESYNC_F300',
    message: 'Device snapshot request failed',
    suggestion: 'The previous device state is kept and the fetch is retried on the next tick.',
  },
  HOMESYNC_F301: {
    code: 'HOMESYNC_F301',
    message: 'Device snapshot request timed out',
    suggestion: 'Raise requestTimeoutMs or check gateway load.',
  },
  HOMESYNC_F302: {
    code: 'HOMESYNC_F302',
    message: 'Device snapshot body is invalid',
    suggestion: 'The gateway returned a body that is not a device list.',
  },

  // Write errors (W400-W499)
  HOMESYNC_W400: {
    code: 'HOMESYNC_W400',
    message: 'Device write was rejected',
    suggestion: 'The optimistic value is corrected by a forced resync.',
  },
  HOMESYNC_W401: {
    code: 'HOMESYNC_W401',
    message: 'Device write timed out',
    suggestion: 'The optimistic value is corrected by a forced resync.',
  },

  // Configuration errors (C500-C599)
  HOMESYNC_C500: {
    code: 'HOMESYNC_C500',
    message: 'Invalid configuration',
    suggestion: 'Check the configuration values against the documented defaults.',
  },

  // Internal errors (X900-X999)
  HOMESYNC_X900: {
    code: 'HOMESYNC_X900',
    message: 'Internal error',
    suggestion: 'An unexpected error occurred. Please report this issue.',
  },
} as const;

/**
 * Error code type
 */
export type ErrorCode = keyof typeof ERROR_CODES;

/**
 * Error category type
 */
export type ErrorCategory = 'transport' | 'protocol' | 'fetch' | 'write' | 'config' | 'internal';

/**
 * Get the category of an error code
 */
export function getErrorCategory(code: ErrorCode): ErrorCategory {
  const letter = code.charAt('HOMESYNC_'.length);
  switch (letter) {
    case 'T':
      return 'transport';
    case 'P':
      return 'protocol';
    case 'F':
      return 'fetch';
    case 'W':
      return 'write';
    case 'C':
      return 'config';
    default:
      return 'internal';
  }
}

/**
 * Get error info by code
 */
export function getErrorInfo(code: ErrorCode): (typeof ERROR_CODES)[ErrorCode] {
  return ERROR_CODES[code];
}
