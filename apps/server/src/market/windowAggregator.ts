import type { AggregatedWindow, TradeEvent } from "@shared/types";
import { mean, std, vwap } from "@shared/indicators";

export const DEFAULT_FLUSH_INTERVAL_MS = 5000;

interface SymbolBuffer {
  prices: number[];
  quantities: number[];
}

/**
 * Buffers trades per symbol and turns each non-empty buffer into one
 * AggregatedWindow per flush interval. Symbols without trades in an interval
 * produce nothing for it.
 */
export class WindowAggregator {
  private buffers = new Map<string, SymbolBuffer>();
  private lastFlushAt: number;

  constructor(private readonly now: () => number = Date.now) {
    this.lastFlushAt = now();
  }

  add(event: TradeEvent): void {
    let buffer = this.buffers.get(event.symbol);
    if (!buffer) {
      buffer = { prices: [], quantities: [] };
      this.buffers.set(event.symbol, buffer);
    }
    buffer.prices.push(event.price);
    buffer.quantities.push(event.quantity);
  }

  shouldFlush(intervalMs: number = DEFAULT_FLUSH_INTERVAL_MS): boolean {
    return this.now() - this.lastFlushAt >= intervalMs;
  }

  /**
   * Emit one window per buffered symbol, then clear every buffer and restart
   * the interval clock. Runs synchronously, so a trade added by the feed lands
   * either in this flush or the next one.
   */
  flush(): AggregatedWindow[] {
    const timestamp = this.now();
    const windows: AggregatedWindow[] = [];

    for (const [symbol, { prices, quantities }] of this.buffers) {
      if (prices.length === 0) continue;

      let minPrice = Infinity;
      let maxPrice = -Infinity;
      let totalVolume = 0;
      for (let i = 0; i < prices.length; i++) {
        const price = prices[i] ?? 0;
        if (price < minPrice) minPrice = price;
        if (price > maxPrice) maxPrice = price;
        totalVolume += quantities[i] ?? 0;
      }
      // Summation rounding can push the mean of equal prices past the extremes
      const meanPrice = Math.min(Math.max(mean(prices), minPrice), maxPrice);

      windows.push(
        Object.freeze({
          timestamp,
          symbol,
          meanPrice,
          stdPrice: std(prices, meanPrice),
          minPrice,
          maxPrice,
          totalVolume,
          tradeCount: prices.length,
          vwap: vwap(prices, quantities),
        }),
      );
    }

    this.buffers.clear();
    this.lastFlushAt = timestamp;
    return windows;
  }

  pendingCount(): number {
    let total = 0;
    for (const buffer of this.buffers.values()) total += buffer.prices.length;
    return total;
  }
}
