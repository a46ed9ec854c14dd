import { describe, expect, it } from 'vitest';
import { getErrorCategory } from './error-codes.js';
import {
  ensureHomeSyncError,
  FetchError,
  HomeSyncError,
  ProtocolError,
  TransportError,
  WriteError,
} from './homesync-error.js';

describe('HomeSyncError', () => {
  it('should fill message, suggestion and category from the code', () => {
    const error = new HomeSyncError({ code: 'HOMESYNC_T103' });

    expect(error.message).toBe('Push channel closed');
    expect(error.suggestion).toBe('The channel will reconnect with backoff. Polling covers the gap.');
    expect(error.category).toBe('transport');
    expect(error.context).toEqual({});
  });

  it('should format code, context and suggestion', () => {
    const error = new HomeSyncError({
      code: 'HOMESYNC_C500',
      message: 'Invalid base URL',
      context: { baseUrl: 'ftp://hub' },
    });

    expect(error.format()).toBe(
      '[HOMESYNC_C500] Invalid base URL\n' +
        'Context: {"baseUrl":"ftp://hub"}\n' +
        'Suggestion: Check the configuration values against the documented defaults.'
    );
  });

  it('should serialize a wrapped cause', () => {
    const cause = new TypeError('fetch failed');
    const json = HomeSyncError.wrap(cause, 'HOMESYNC_F300').toJSON();

    expect(json).toMatchObject({
      name: 'HomeSyncError',
      code: 'HOMESYNC_F300',
      message: 'fetch failed',
      category: 'fetch',
      cause: { name: 'TypeError', message: 'fetch failed' },
    });
  });

  it('should check codes and categories', () => {
    const error = new FetchError('HOMESYNC_F301');

    expect(HomeSyncError.isCode(error, 'HOMESYNC_F301')).toBe(true);
    expect(HomeSyncError.isCategory(error, 'fetch')).toBe(true);
    expect(HomeSyncError.isCategory(new Error('plain'), 'fetch')).toBe(false);
  });
});

describe('error subclasses', () => {
  it('should keep their names and extra fields', () => {
    expect(new TransportError('HOMESYNC_T100').name).toBe('TransportError');

    const protocol = new ProtocolError('HOMESYNC_P200', 'Frame is not valid JSON', '{oops');
    expect(protocol.frame).toBe('{oops');
    expect(protocol.context).toEqual({ frame: '{oops' });

    const write = new WriteError('HOMESYNC_W401', 'desk_lamp', undefined, { timeoutMs: 8000 });
    expect(write).toBeInstanceOf(HomeSyncError);
    expect(write.message).toBe('Device write timed out');
    expect(write.context).toEqual({ timeoutMs: 8000, deviceId: 'desk_lamp' });
  });
});

describe('ensureHomeSyncError', () => {
  it('should pass HomeSyncErrors through', () => {
    const error = new FetchError('HOMESYNC_F300');
    expect(ensureHomeSyncError(error)).toBe(error);
  });

  it('should wrap errors and other values as internal errors', () => {
    expect(ensureHomeSyncError(new Error('boom'))).toMatchObject({ code: 'HOMESYNC_X900', message: 'boom' });
    expect(ensureHomeSyncError('boom', 'HOMESYNC_W400')).toMatchObject({
      code: 'HOMESYNC_W400',
      message: 'boom',
      category: 'write',
    });
  });
});

describe('getErrorCategory', () => {
  it('should map code letters to categories', () => {
    expect(getErrorCategory('HOMESYNC_P202')).toBe('protocol');
    expect(getErrorCategory('HOMESYNC_C500')).toBe('config');
    expect(getErrorCategory('HOMESYNC_X900')).toBe('internal');
  });
});
