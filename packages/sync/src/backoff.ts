/**
 * Reconnect backoff for the push channel.
 *
 * Consecutive failures back off exponentially from `baseDelayMs`, clamped
 * to `[baseDelayMs, maxDelayMs]`: 2s, 4s, 8s, 16s, 30s, 30s... with the
 * defaults. Once more than `maxAttempts` failures have piled up the channel
 * retries on the fixed `longIntervalMs` instead.
 */

export interface ReconnectPolicy {
  /** @default 2000 */
  baseDelayMs?: number;
  /** @default 30000 */
  maxDelayMs?: number;
  /** Backoff attempts before switching to the long interval. @default 5 */
  maxAttempts?: number;
  /** @default 120000 */
  longIntervalMs?: number;
}

export type ReconnectMode = 'backoff' | 'long-interval';

export interface ReconnectPlan {
  mode: ReconnectMode;
  delayMs: number;
}

export const DEFAULT_RECONNECT_POLICY: Required<ReconnectPolicy> = {
  baseDelayMs: 2000,
  maxDelayMs: 30000,
  maxAttempts: 5,
  longIntervalMs: 120000,
};

/**
 * Delay before reconnect attempt `attempt` (1-based).
 */
export function computeReconnectDelay(attempt: number, baseDelayMs: number, maxDelayMs: number): number {
  const exponent = Math.max(0, attempt - 1);
  const delay = baseDelayMs * Math.pow(2, exponent);
  return Math.min(Math.max(delay, baseDelayMs), maxDelayMs);
}

/**
 * Decide how to wait after `failures` consecutive failures.
 */
export function planReconnect(failures: number, policy: ReconnectPolicy = {}): ReconnectPlan {
  const { baseDelayMs, maxDelayMs, maxAttempts, longIntervalMs } = {
    ...DEFAULT_RECONNECT_POLICY,
    ...policy,
  };

  if (failures > maxAttempts) {
    return { mode: 'long-interval', delayMs: longIntervalMs };
  }
  return { mode: 'backoff', delayMs: computeReconnectDelay(failures, baseDelayMs, maxDelayMs) };
}
