export interface BackoffOptions {
  baseMs: number;
  maxMs: number;
  /** Upper bound of the uniform jitter added on top of the capped delay. */
  jitterMs?: number;
}

export const DEFAULT_BACKOFF: BackoffOptions = {
  baseMs: 1000,
  maxMs: 60000,
  jitterMs: 1000,
};

/**
 * Delay before reconnect attempt `attempt` (0-based):
 * min(base · 2^attempt, max) + uniform(0, jitter).
 */
export function backoffDelay(
  attempt: number,
  options: BackoffOptions = DEFAULT_BACKOFF,
  random: () => number = Math.random,
): number {
  const capped = Math.min(options.baseMs * Math.pow(2, Math.max(0, attempt)), options.maxMs);
  return capped + random() * (options.jitterMs ?? 0);
}
