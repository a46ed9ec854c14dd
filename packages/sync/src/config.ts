import { HomeSyncError } from '@homesync/core';
import { z } from 'zod';
import type { GatewaySessionOptions } from './replica-session.js';

const positiveMs = z.coerce.number().int().positive();

const envSchema = z.object({
  HOMESYNC_BASE_URL: z.string().url(),
  HOMESYNC_AUTH_TOKEN: z.string().min(1).optional(),
  HOMESYNC_LOG_LEVEL: z.enum(['debug', 'info', 'warn', 'error']).optional(),
  HOMESYNC_POLL_CONNECTED_MS: positiveMs.optional(),
  HOMESYNC_POLL_DISCONNECTED_MS: positiveMs.optional(),
  HOMESYNC_REQUEST_TIMEOUT_MS: positiveMs.optional(),
  HOMESYNC_CONNECT_TIMEOUT_MS: positiveMs.optional(),
  HOMESYNC_DEBOUNCE_MS: positiveMs.optional(),
});

export type SessionEnv = z.infer<typeof envSchema>;

/**
 * Build session options from environment variables.
 *
 * | Variable | Option |
 * |---|---|
 * | `HOMESYNC_BASE_URL` (required) | `baseUrl` |
 * | `HOMESYNC_AUTH_TOKEN` | `authToken` |
 * | `HOMESYNC_LOG_LEVEL` | `logger.level` |
 * | `HOMESYNC_POLL_CONNECTED_MS` | `polling.connectedIntervalMs` |
 * | `HOMESYNC_POLL_DISCONNECTED_MS` | `polling.disconnectedIntervalMs` |
 * | `HOMESYNC_REQUEST_TIMEOUT_MS` | `polling.requestTimeoutMs`, `writes.requestTimeoutMs` |
 * | `HOMESYNC_CONNECT_TIMEOUT_MS` | `pushChannel.connectTimeoutMs` |
 * | `HOMESYNC_DEBOUNCE_MS` | `writes.debounceMs` |
 *
 * @throws HomeSyncError (HOMESYNC_C500) listing every invalid variable
 */
export function loadSessionConfigFromEnv(env: NodeJS.ProcessEnv = process.env): GatewaySessionOptions {
  const parsed = envSchema.safeParse(env);
  if (!parsed.success) {
    const problems = parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`);
    throw new HomeSyncError({
      code: 'HOMESYNC_C500',
      message: `Invalid environment: ${problems.join('; ')}`,
      context: { variables: parsed.error.issues.map((issue) => issue.path.join('.')) },
    });
  }

  const vars = parsed.data;
  return {
    baseUrl: vars.HOMESYNC_BASE_URL,
    authToken: vars.HOMESYNC_AUTH_TOKEN,
    logger: vars.HOMESYNC_LOG_LEVEL ? { level: vars.HOMESYNC_LOG_LEVEL } : undefined,
    pushChannel: { connectTimeoutMs: vars.HOMESYNC_CONNECT_TIMEOUT_MS },
    polling: {
      connectedIntervalMs: vars.HOMESYNC_POLL_CONNECTED_MS,
      disconnectedIntervalMs: vars.HOMESYNC_POLL_DISCONNECTED_MS,
      requestTimeoutMs: vars.HOMESYNC_REQUEST_TIMEOUT_MS,
    },
    writes: {
      debounceMs: vars.HOMESYNC_DEBOUNCE_MS,
      requestTimeoutMs: vars.HOMESYNC_REQUEST_TIMEOUT_MS,
    },
  };
}
