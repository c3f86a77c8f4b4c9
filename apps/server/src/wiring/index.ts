import type { Env } from "@shared/env";

import { AnalyticsSession, type AnalyticsSessionOptions } from "./session";

/**
 * Build a session from validated environment settings. `overrides` lets tests
 * and embedders swap the sink, bus, socket factory or clock.
 */
export function createSessionFromEnv(
  env: Env,
  overrides: Partial<AnalyticsSessionOptions> = {},
): AnalyticsSession {
  return new AnalyticsSession({
    symbols: env.SYMBOLS,
    feedUrl: env.FEED_URL,
    flushIntervalMs: env.FLUSH_INTERVAL_MS,
    historyCapacity: env.HISTORY_CAPACITY,
    zScoreWindow: env.ZSCORE_WINDOW,
    correlationPairs: env.CORRELATION_PAIRS,
    alertLogCapacity: env.ALERT_LOG_CAPACITY,
    tradeQueueCapacity: env.TRADE_QUEUE_CAPACITY,
    retentionDays: env.RETENTION_DAYS,
    maxRetries: env.RECONNECT_MAX_ATTEMPTS,
    backoff: { baseMs: env.RECONNECT_BASE_MS, maxMs: env.RECONNECT_MAX_MS, jitterMs: 1000 },
    staleMs: env.FEED_STALE_MS,
    mock: env.FF_MOCK,
    ...overrides,
  });
}

export { AnalyticsSession };
export type { AnalyticsSessionOptions, FlushResult, SessionDiagnostics } from "./session";
