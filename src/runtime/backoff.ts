export interface BackoffOptions {
  /** Delay of the first retry in milliseconds */
  baseDelayMs: number;
  /** Upper bound of the delay in milliseconds */
  maxDelayMs: number;
  /** Jitter factor (0-1, e.g. 0.2 = ±20%) */
  jitter?: number;
}

/**
 * Exponential backoff: `baseDelayMs * 2^(attempt-1)`, capped, with optional jitter
 */
export function backoffDelay(
  attempt: number,
  options: BackoffOptions,
  random: () => number = Math.random
): number {
  const exponentialDelay = options.baseDelayMs * 2 ** Math.max(attempt - 1, 0);
  const cappedDelay = Math.min(exponentialDelay, options.maxDelayMs);

  const jitterRange = cappedDelay * (options.jitter ?? 0);
  const jitter = (random() * 2 - 1) * jitterRange;

  return Math.max(0, Math.round(cappedDelay + jitter));
}
