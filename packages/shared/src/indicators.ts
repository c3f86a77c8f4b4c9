import type { Trend } from "./types";

/**
 * Periods and thresholds used by the live snapshot. Callers that need a
 * different lookback pass it explicitly.
 */
export const INDICATOR_DEFAULTS = {
  smaPeriod: 20,
  emaPeriod: 20,
  rsiPeriod: 14,
  stationarityMinPoints: 10,
  volatilityForecastMinReturns: 10,
  garchAlpha: 0.1,
  garchBeta: 0.85,
  equalityEpsilon: 1e-6,
} as const;

/**
 * Arithmetic mean. Returns 0 for an empty series.
 */
export function mean(values: readonly number[]): number {
  if (values.length === 0) return 0;

  let sum = 0;
  for (const v of values) sum += v;
  return sum / values.length;
}

/**
 * Population standard deviation (divides by N). Returns 0 when N < 2.
 *
 * @param precomputedMean - mean of `values`, when the caller already has it
 */
export function std(values: readonly number[], precomputedMean?: number): number {
  if (values.length < 2) return 0;

  const m = precomputedMean ?? mean(values);
  let variance = 0;
  for (const v of values) {
    const diff = v - m;
    variance += diff * diff;
  }
  return Math.sqrt(variance / values.length);
}

/**
 * Volume-weighted average price: Σ(price × volume) / Σvolume.
 * Returns 0 when the series lengths differ, are empty, or total volume is 0.
 */
export function vwap(prices: readonly number[], volumes: readonly number[]): number {
  if (prices.length === 0 || prices.length !== volumes.length) return 0;

  let pv = 0;
  let totalVolume = 0;
  for (let i = 0; i < prices.length; i++) {
    const price = prices[i] ?? 0;
    const volume = volumes[i] ?? 0;
    pv += price * volume;
    totalVolume += volume;
  }

  return totalVolume > 0 ? pv / totalVolume : 0;
}

/**
 * Mean of the last `period` values, or of everything when fewer are available.
 */
export function sma(values: readonly number[], period: number = INDICATOR_DEFAULTS.smaPeriod): number {
  if (values.length < period) return mean(values);
  return mean(values.slice(-period));
}

/**
 * Exponential moving average seeded with the first value and walked oldest to
 * newest with k = 2 / (period + 1). Falls back to the SMA while fewer than
 * `period` values exist.
 */
export function ema(values: readonly number[], period: number = INDICATOR_DEFAULTS.emaPeriod): number {
  if (values.length < period) return sma(values, period);

  const k = 2 / (period + 1);
  let current = values[0] ?? 0;
  for (let i = 1; i < values.length; i++) {
    const v = values[i] ?? current;
    current = v * k + current * (1 - k);
  }
  return current;
}

/**
 * Relative Strength Index over the last `period` price changes.
 *
 * Neutral 50 until `period + 1` values exist. With no losses in the lookback it
 * returns 100 if there were gains and 50 if the series was flat.
 */
export function rsi(values: readonly number[], period: number = INDICATOR_DEFAULTS.rsiPeriod): number {
  if (values.length < period + 1) return 50;

  let gains = 0;
  let losses = 0;
  for (let i = values.length - period; i < values.length; i++) {
    const change = (values[i] ?? 0) - (values[i - 1] ?? 0);
    if (change > 0) gains += change;
    else losses -= change;
  }

  const avgGain = gains / period;
  const avgLoss = losses / period;

  if (avgLoss === 0) {
    return avgGain > 0 ? 100 : 50;
  }

  const rs = avgGain / avgLoss;
  return 100 - 100 / (1 + rs);
}

export function zScore(value: number, m: number, sd: number): number {
  if (sd === 0) return 0;
  return (value - m) / sd;
}

/**
 * Pearson correlation coefficient.
 *
 * Null when the series differ in length, have fewer than two points, or either
 * one is constant.
 */
export function correlation(xs: readonly number[], ys: readonly number[]): number | null {
  if (xs.length < 2 || xs.length !== ys.length) return null;

  const xMean = mean(xs);
  const yMean = mean(ys);
  const xStd = std(xs, xMean);
  const yStd = std(ys, yMean);
  if (xStd === 0 || yStd === 0) return null;

  let numerator = 0;
  for (let i = 0; i < xs.length; i++) {
    numerator += ((xs[i] ?? xMean) - xMean) * ((ys[i] ?? yMean) - yMean);
  }

  return numerator / (xs.length * xStd * yStd);
}

export function detectTrend(smaValue: number, emaValue: number, price: number): Trend {
  if (price > smaValue && smaValue > emaValue) return "uptrend";
  if (price < smaValue && smaValue < emaValue) return "downtrend";
  return "neutral";
}

/**
 * Cheap stand-in for an ADF p-value: 1 / (1 + |lag-1 autocorrelation|).
 * Lower means more mean-reverting. This is a heuristic, not a test statistic.
 *
 * Null below the minimum point count; 1 for a constant series.
 */
export function stationarityHeuristic(
  values: readonly number[],
  minPoints: number = INDICATOR_DEFAULTS.stationarityMinPoints,
): number | null {
  if (values.length < minPoints) return null;

  const m = mean(values);
  let autocov = 0;
  for (let i = 1; i < values.length; i++) {
    autocov += ((values[i] ?? m) - m) * ((values[i - 1] ?? m) - m);
  }
  autocov /= values.length;

  let variance = 0;
  for (const v of values) variance += (v - m) * (v - m);
  variance /= values.length;

  if (variance === 0) return 1;

  const autocorr = autocov / variance;
  return 1 / (1 + Math.abs(autocorr));
}

/**
 * One-step GARCH(1,1)-shaped volatility forecast:
 *   ω = (1 − α − β)·Var(r),  σ² = ω + α·r_last² + β·σ_recent²
 *
 * σ_recent is the population std of the same returns, so Var(r) and σ_recent²
 * coincide; the formula is kept in its documented form.
 */
export function volatilityForecast(
  returns: readonly number[],
  alpha: number = INDICATOR_DEFAULTS.garchAlpha,
  beta: number = INDICATOR_DEFAULTS.garchBeta,
  minReturns: number = INDICATOR_DEFAULTS.volatilityForecastMinReturns,
): number | null {
  if (returns.length < minReturns) return null;

  const lastReturn = returns[returns.length - 1] ?? 0;
  const recentStd = std(returns);
  const m = mean(returns);
  let longTermVar = 0;
  for (const r of returns) longTermVar += (r - m) * (r - m);
  longTermVar /= returns.length;

  const omega = (1 - alpha - beta) * longTermVar;
  const forecastVar = omega + alpha * lastReturn * lastReturn + beta * recentStd * recentStd;
  return Math.sqrt(Math.max(forecastVar, 0));
}
