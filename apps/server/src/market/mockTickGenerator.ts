import type { FeedSocket, FeedSocketFactory } from "./feedClient";

interface SymbolConfig {
  basePrice: number;
  volatility: number; // percentage
  ticksPerSecond: number;
}

const DEFAULT_CONFIGS: Record<string, SymbolConfig> = {
  BTCUSDT: { basePrice: 65000, volatility: 0.02, ticksPerSecond: 8 },
  ETHUSDT: { basePrice: 3200, volatility: 0.025, ticksPerSecond: 6 },
  SOLUSDT: { basePrice: 150, volatility: 0.04, ticksPerSecond: 5 },
};

const FALLBACK_CONFIG: SymbolConfig = { basePrice: 100, volatility: 0.03, ticksPerSecond: 4 };

interface SymbolState {
  config: SymbolConfig;
  price: number;
  trend: number;
}

/**
 * Synthetic aggregate-trade source for offline runs (FF_MOCK). Produces the
 * same combined-stream frames as the exchange so everything downstream of the
 * socket runs unchanged.
 */
export class MockTickGenerator {
  private states = new Map<string, SymbolState>();

  constructor(
    symbols: string[],
    private readonly random: () => number = Math.random,
    private readonly now: () => number = Date.now,
  ) {
    for (const symbol of symbols) {
      const config = DEFAULT_CONFIGS[symbol] ?? FALLBACK_CONFIG;
      this.states.set(symbol, { config, price: config.basePrice, trend: 0 });
    }
  }

  symbols(): string[] {
    return Array.from(this.states.keys());
  }

  ticksPerSecond(symbol: string): number {
    return this.states.get(symbol)?.config.ticksPerSecond ?? FALLBACK_CONFIG.ticksPerSecond;
  }

  /**
   * Next frame for `symbol`: a random walk with trend and pull back to base.
   */
  nextFrame(symbol: string): string {
    const state = this.states.get(symbol) ?? {
      config: FALLBACK_CONFIG,
      price: FALLBACK_CONFIG.basePrice,
      trend: 0,
    };
    const { config } = state;

    const trendPull = state.trend * 0.3;
    const meanReversion = (config.basePrice - state.price) * 0.05;
    const randomWalk = (this.random() - 0.5) * 2;

    // Occasionally pick a new trend direction
    if (this.random() < 0.1) {
      state.trend = (this.random() - 0.5) * 2;
    }

    const change = ((trendPull + meanReversion + randomWalk) * config.volatility * config.basePrice) / 100;
    const price = Math.round(Math.max(state.price + change, config.basePrice * 0.9) * 100) / 100;
    state.price = price;
    this.states.set(symbol, state);

    const quantity = Math.round((1 + Math.abs(change)) * (this.random() + 0.5) * 1000) / 1000;

    return JSON.stringify({
      stream: `${symbol.toLowerCase()}@aggTrade`,
      data: { e: "aggTrade", s: symbol, p: price.toFixed(2), q: quantity.toString(), T: this.now() },
    });
  }

  /**
   * Socket factory that opens immediately and emits frames on timers until
   * closed. The URL is ignored.
   */
  socketFactory(): FeedSocketFactory {
    return (_url, handlers): FeedSocket => {
      const timers: NodeJS.Timeout[] = [];
      let open = true;

      const opening = setTimeout(() => {
        if (!open) return;
        handlers.onOpen();
        for (const symbol of this.symbols()) {
          timers.push(setInterval(() => handlers.onMessage(this.nextFrame(symbol)), 1000 / this.ticksPerSecond(symbol)));
        }
      }, 0);

      return {
        close: () => {
          if (!open) return;
          open = false;
          clearTimeout(opening);
          for (const timer of timers) clearInterval(timer);
          handlers.onClose();
        },
      };
    };
  }
}
