/**
 * HomeSyncError - structured error class for the replica sync core
 */

import {
  type ErrorCategory,
  type ErrorCode,
  getErrorCategory,
  getErrorInfo,
} from './error-codes.js';

/**
 * Options for creating a HomeSyncError
 */
export interface HomeSyncErrorOptions {
  /** The error code */
  code: ErrorCode;
  /** Custom message (overrides default) */
  message?: string;
  /** Custom suggestion (overrides default) */
  suggestion?: string;
  /** Additional context information */
  context?: Record<string, unknown>;
  /** The original error that caused this error */
  cause?: Error;
}

/**
 * Serialized format of a HomeSyncError
 */
export interface SerializedHomeSyncError {
  name: string;
  code: string;
  message: string;
  suggestion?: string;
  category: ErrorCategory;
  context: Record<string, unknown>;
  stack?: string;
  cause?: SerializedHomeSyncError | { name: string; message: string; stack?: string };
}

/**
 * Error class for the sync core with structured error information.
 *
 * Nothing in the sync core throws these at the host from a background loop;
 * they travel as diagnostics. They are thrown from the gateway and transport
 * adapters, where the calling component catches and classifies them.
 *
 * @example
 * ```typescript
 * throw new HomeSyncError({
 *   code: 'HOMESYNC_F300',
 *   context: { status: 502 }
 * });
 * ```
 */
export class HomeSyncError extends Error {
  /** Unique error code */
  readonly code: ErrorCode;

  /** Helpful suggestion for resolving the error */
  readonly suggestion?: string;

  /** Error category for grouping */
  readonly category: ErrorCategory;

  /** Additional context information */
  readonly context: Record<string, unknown>;

  /** Original error that caused this error */
  override readonly cause?: Error;

  constructor(options: HomeSyncErrorOptions) {
    const errorInfo = getErrorInfo(options.code);
    const message = options.message ?? errorInfo.message;

    super(message, { cause: options.cause });

    this.name = 'HomeSyncError';
    this.code = options.code;
    this.suggestion = options.suggestion ?? errorInfo.suggestion;
    this.category = getErrorCategory(options.code);
    this.context = options.context ?? {};
    this.cause = options.cause;

    // Maintain proper stack trace for V8
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, HomeSyncError);
    }
  }

  /**
   * Create a HomeSyncError from an error code with minimal options
   */
  static fromCode(code: ErrorCode, context?: Record<string, unknown>): HomeSyncError {
    return new HomeSyncError({ code, context });
  }

  /**
   * Wrap an existing error with a HomeSyncError
   */
  static wrap(error: Error, code: ErrorCode, context?: Record<string, unknown>): HomeSyncError {
    return new HomeSyncError({
      code,
      message: error.message,
      context,
      cause: error,
    });
  }

  static isHomeSyncError(error: unknown): error is HomeSyncError {
    return error instanceof HomeSyncError;
  }

  static isCode(error: unknown, code: ErrorCode): boolean {
    return HomeSyncError.isHomeSyncError(error) && error.code === code;
  }

  static isCategory(error: unknown, category: ErrorCategory): boolean {
    return HomeSyncError.isHomeSyncError(error) && error.category === category;
  }

  /**
   * Format the error for display
   */
  format(): string {
    const lines = [`[${this.code}] ${this.message}`];

    if (Object.keys(this.context).length > 0) {
      lines.push(`Context: ${JSON.stringify(this.context)}`);
    }

    if (this.suggestion) {
      lines.push(`Suggestion: ${this.suggestion}`);
    }

    return lines.join('\n');
  }

  /**
   * Convert to a plain object for serialization
   */
  toJSON(): SerializedHomeSyncError {
    const result: SerializedHomeSyncError = {
      name: this.name,
      code: this.code,
      message: this.message,
      category: this.category,
      context: this.context,
    };

    if (this.suggestion) {
      result.suggestion = this.suggestion;
    }

    if (this.stack) {
      result.stack = this.stack;
    }

    if (this.cause) {
      if (HomeSyncError.isHomeSyncError(this.cause)) {
        result.cause = this.cause.toJSON();
      } else {
        result.cause = {
          name: this.cause.name,
          message: this.cause.message,
          stack: this.cause.stack,
        };
      }
    }

    return result;
  }

  override toString(): string {
    return this.format();
  }
}

/**
 * Connection-level failure on the push channel. Triggers a reconnect.
 */
export class TransportError extends HomeSyncError {
  constructor(code: ErrorCode, message?: string, context?: Record<string, unknown>, cause?: Error) {
    super({ code, message, context, cause });
    this.name = 'TransportError';
  }
}

/**
 * Malformed inbound frame. The frame is dropped; the channel stays up.
 */
export class ProtocolError extends HomeSyncError {
  /** First part of the offending frame, for diagnostics */
  readonly frame: string;

  constructor(code: ErrorCode, message: string, frame: string, cause?: Error) {
    super({ code, message, context: { frame }, cause });
    this.name = 'ProtocolError';
    this.frame = frame;
  }
}

/**
 * Snapshot fetch failure. Prior state is kept; retried on the next tick.
 */
export class FetchError extends HomeSyncError {
  constructor(code: ErrorCode, message?: string, context?: Record<string, unknown>, cause?: Error) {
    super({ code, message, context, cause });
    this.name = 'FetchError';
  }
}

/**
 * Remote write rejected or timed out. Triggers a resync.
 */
export class WriteError extends HomeSyncError {
  /** Device whose write failed */
  readonly deviceId: string;

  constructor(
    code: ErrorCode,
    deviceId: string,
    message?: string,
    context?: Record<string, unknown>,
    cause?: Error
  ) {
    super({ code, message, context: { ...context, deviceId }, cause });
    this.name = 'WriteError';
    this.deviceId = deviceId;
  }
}

/**
 * Helper function to ensure errors are HomeSyncErrors
 */
export function ensureHomeSyncError(
  error: unknown,
  defaultCode: ErrorCode = 'HOMESYNC_X900'
): HomeSyncError {
  if (HomeSyncError.isHomeSyncError(error)) {
    return error;
  }

  if (error instanceof Error) {
    return HomeSyncError.wrap(error, defaultCode);
  }

  return new HomeSyncError({
    code: defaultCode,
    message: String(error),
  });
}
