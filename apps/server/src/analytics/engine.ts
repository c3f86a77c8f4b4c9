import type { MetricsSnapshot } from "@shared/types";
import {
  INDICATOR_DEFAULTS,
  correlation,
  detectTrend,
  ema,
  mean,
  rsi,
  sma,
  stationarityHeuristic,
  std,
  volatilityForecast,
  zScore,
} from "@shared/indicators";

import type { HistoryStore } from "@server/history/store";

export const DEFAULT_ZSCORE_WINDOW = 60;
const ANOMALY_MIN_POINTS = 10;

export interface AnalyticsEngineOptions {
  /** Trailing price count the live z-score is measured against. */
  zScoreWindow?: number;
  /** Symbol pairs whose correlation is carried on each other's snapshots. */
  correlationPairs?: ReadonlyArray<readonly [string, string]>;
}

/**
 * Derives a MetricsSnapshot from the history store after each flush and keeps
 * the latest one per symbol.
 */
export class AnalyticsEngine {
  private latest = new Map<string, MetricsSnapshot>();
  private peers = new Map<string, string>();
  private readonly zScoreWindow: number;

  constructor(
    private readonly history: HistoryStore,
    options: AnalyticsEngineOptions = {},
  ) {
    this.zScoreWindow = options.zScoreWindow ?? DEFAULT_ZSCORE_WINDOW;
    for (const [a, b] of options.correlationPairs ?? []) {
      this.peers.set(a, b);
      this.peers.set(b, a);
    }
  }

  /**
   * Recompute and cache the snapshot for `symbol`. Returns null when the store
   * holds no history for it.
   */
  computeSnapshot(symbol: string, timestamp: number): MetricsSnapshot | null {
    const prices = this.history.getPrices(symbol);
    const latestPrice = prices[prices.length - 1];
    if (latestPrice === undefined) return null;

    const returns = this.history.getReturns(symbol);

    const meanPrice = mean(prices);
    const stdPrice = std(prices, meanPrice);
    const volatility = meanPrice > 0 ? stdPrice / meanPrice : 0;

    const recent = prices.slice(-this.zScoreWindow);
    const recentMean = mean(recent);
    const z = zScore(latestPrice, recentMean, std(recent, recentMean));

    const sma20 = sma(prices, INDICATOR_DEFAULTS.smaPeriod);
    const ema20 = ema(prices, INDICATOR_DEFAULTS.emaPeriod);

    const peer = this.peers.get(symbol) ?? null;

    const snapshot: MetricsSnapshot = Object.freeze({
      timestamp,
      symbol,
      meanPrice,
      stdPrice,
      volatility,
      zScore: z,
      sma20,
      ema20,
      rsi14: rsi(prices, INDICATOR_DEFAULTS.rsiPeriod),
      correlation: peer ? this.pairCorrelation(symbol, peer) : null,
      correlationPeer: peer,
      garchForecast: volatilityForecast(returns),
      adfPValue: stationarityHeuristic(prices),
      trend: detectTrend(sma20, ema20, latestPrice),
    });

    this.latest.set(symbol, snapshot);
    return snapshot;
  }

  getSnapshot(symbol: string): MetricsSnapshot | null {
    return this.latest.get(symbol) ?? null;
  }

  getAllSnapshots(): Record<string, MetricsSnapshot> {
    return Object.fromEntries(this.latest);
  }

  /**
   * Correlation of every pair of tracked symbols, keyed "A-B" in first-seen
   * order. Pairs that cannot be computed from one consistent flush are left out.
   */
  getCorrelationMatrix(): Record<string, number> {
    const result: Record<string, number> = {};
    const symbols = this.history.symbols();

    for (let i = 0; i < symbols.length; i++) {
      for (let j = i + 1; j < symbols.length; j++) {
        const a = symbols[i];
        const b = symbols[j];
        if (a === undefined || b === undefined) continue;

        const value = this.pairCorrelation(a, b);
        if (value !== null) result[`${a}-${b}`] = value;
      }
    }
    return result;
  }

  /**
   * Prices whose z-score against the whole history exceeds `zThreshold`.
   */
  detectAnomalies(symbol: string, zThreshold = 3): number[] {
    const prices = this.history.getPrices(symbol);
    if (prices.length < ANOMALY_MIN_POINTS) return [];

    const m = mean(prices);
    const sd = std(prices, m);
    return prices.filter((p) => Math.abs(zScore(p, m, sd)) > zThreshold);
  }

  /**
   * Pearson correlation of two price histories read from the same flush
   * generation. Null when the histories are out of step or unequal in length.
   */
  pairCorrelation(a: string, b: string): number | null {
    const pair = this.history.readPair(a, b);
    if (!pair) return null;

    const [left, right] = pair;
    if (left.prices.length !== right.prices.length) return null;
    return correlation(left.prices, right.prices);
  }
}
