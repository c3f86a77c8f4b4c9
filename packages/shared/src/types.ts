/**
 * One trade print from the exchange feed. Created by the feed client when a
 * frame parses, consumed by the window aggregator.
 */
export interface TradeEvent {
  timestamp: number; // ms since epoch
  symbol: string;
  price: number;
  quantity: number;
}

/**
 * All trades of one symbol inside one flush interval.
 * minPrice <= meanPrice <= maxPrice, tradeCount >= 1.
 */
export interface AggregatedWindow {
  timestamp: number;
  symbol: string;
  meanPrice: number;
  stdPrice: number;
  minPrice: number;
  maxPrice: number;
  totalVolume: number;
  tradeCount: number;
  vwap: number;
}

export type Trend = "uptrend" | "downtrend" | "neutral";

/**
 * Indicators for one symbol, recomputed on every flush that produced a window
 * for it. Nullable fields are null while there is not enough history or no
 * correlated peer is configured.
 */
export interface MetricsSnapshot {
  timestamp: number;
  symbol: string;
  meanPrice: number;
  stdPrice: number;
  volatility: number;
  zScore: number;
  sma20: number;
  ema20: number;
  rsi14: number;
  correlation: number | null;
  correlationPeer: string | null;
  garchForecast: number | null;
  adfPValue: number | null;
  trend: Trend;
}

export type FeedState =
  | "disconnected"
  | "connecting"
  | "connected"
  | "reconnecting"
  | "failed"
  | "closed";

export interface FeedStatus {
  state: FeedState;
  uptimeSeconds: number;
  ticksReceived: number;
  lastTickTimestamp: number | null;
  reconnectAttempts: number;
}
