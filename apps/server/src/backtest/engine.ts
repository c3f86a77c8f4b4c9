/**
 * Mean-reversion backtest over one instrument's price history.
 *
 * Replays prices from index `period` onward. Each step measures the current
 * price against the mean/std of the `period` prices before it; the window is
 * recomputed from scratch every step rather than updated incrementally.
 */

import { backtestOptionsSchema, type BacktestOptions } from "@shared/schemas";
import { mean, std, zScore } from "@shared/indicators";

/**
 * Custom error for backtest validation failures
 */
export class BacktestValidationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "BacktestValidationError";
  }
}

export type PositionSide = "long" | "short";

export interface Position {
  side: PositionSide;
  entryPrice: number;
  entryIndex: number;
}

export interface BacktestTrade {
  side: PositionSide;
  entryIndex: number;
  exitIndex: number;
  entryPrice: number;
  exitPrice: number;
  pnl: number;
}

export interface BacktestResult {
  tradeCount: number;
  wins: number;
  losses: number;
  winRate: number;
  totalPnl: number;
  avgPnl: number;
  trades: BacktestTrade[];
}

const EMPTY_RESULT: BacktestResult = Object.freeze({
  tradeCount: 0,
  wins: 0,
  losses: 0,
  winRate: 0,
  totalPnl: 0,
  avgPnl: 0,
  trades: [],
});

export function parseBacktestOptions(options: BacktestOptions = {}) {
  const parsed = backtestOptionsSchema.safeParse(options);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    throw new BacktestValidationError(
      issue ? `Invalid backtest option ${issue.path.join(".")}: ${issue.message}` : "Invalid backtest options",
    );
  }
  return parsed.data;
}

/**
 * Run the position state machine:
 * - flat, z > entry  → open short
 * - flat, z < -entry → open long
 * - open, |z| < exit → close and book pnl
 * A position still open when the history ends is dropped unrealized.
 */
export function runMeanReversionBacktest(prices: readonly number[], options: BacktestOptions = {}): BacktestResult {
  const { period, entryThreshold, exitThreshold } = parseBacktestOptions(options);

  if (prices.length < period) {
    return { ...EMPTY_RESULT, trades: [] };
  }

  const trades: BacktestTrade[] = [];
  let position: Position | null = null;

  for (let i = period; i < prices.length; i++) {
    const price = prices[i];
    if (price === undefined) continue;

    const trailing = prices.slice(i - period, i);
    const m = mean(trailing);
    const z = zScore(price, m, std(trailing, m));

    if (position === null) {
      if (z > entryThreshold) {
        position = { side: "short", entryPrice: price, entryIndex: i };
      } else if (z < -entryThreshold) {
        position = { side: "long", entryPrice: price, entryIndex: i };
      }
    } else if (Math.abs(z) < exitThreshold) {
      const pnl = position.side === "long" ? price - position.entryPrice : position.entryPrice - price;
      trades.push({
        side: position.side,
        entryIndex: position.entryIndex,
        exitIndex: i,
        entryPrice: position.entryPrice,
        exitPrice: price,
        pnl,
      });
      position = null;
    }
  }

  return summarize(trades);
}

function summarize(trades: BacktestTrade[]): BacktestResult {
  if (trades.length === 0) {
    return { ...EMPTY_RESULT, trades: [] };
  }

  let wins = 0;
  let totalPnl = 0;
  for (const trade of trades) {
    if (trade.pnl > 0) wins++;
    totalPnl += trade.pnl;
  }

  return {
    tradeCount: trades.length,
    wins,
    losses: trades.length - wins,
    winRate: wins / trades.length,
    totalPnl,
    avgPnl: totalPnl / trades.length,
    trades,
  };
}
