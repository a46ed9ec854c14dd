/**
 * homesync Error System
 *
 * Structured errors with codes (HOMESYNC_T100, HOMESYNC_F300, ...), a
 * category per failure class of the sync core, suggestions and chaining.
 *
 * @example
 * ```typescript
 * import { HomeSyncError } from '@homesync/core';
 *
 * if (HomeSyncError.isCategory(diagnostic.error, 'write')) {
 *   showToast('Could not update device');
 * }
 * ```
 *
 * @module errors
 */

export {
  ERROR_CODES,
  getErrorCategory,
  getErrorInfo,
  type ErrorCategory,
  type ErrorCode,
} from './error-codes.js';

export {
  FetchError,
  HomeSyncError,
  ProtocolError,
  TransportError,
  WriteError,
  ensureHomeSyncError,
  type HomeSyncErrorOptions,
  type SerializedHomeSyncError,
} from './homesync-error.js';
