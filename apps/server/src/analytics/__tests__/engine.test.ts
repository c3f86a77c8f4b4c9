import { describe, it, expect, beforeEach } from "vitest";
import type { AggregatedWindow } from "@shared/types";

import { HistoryStore } from "@server/history/store";
import { AnalyticsEngine } from "../engine";

function window(symbol: string, meanPrice: number, timestamp: number): AggregatedWindow {
  return {
    timestamp,
    symbol,
    meanPrice,
    stdPrice: 0,
    minPrice: meanPrice,
    maxPrice: meanPrice,
    totalVolume: 1,
    tradeCount: 1,
    vwap: meanPrice,
  };
}

function fill(store: HistoryStore, symbol: string, prices: number[], firstGeneration = 1) {
  prices.forEach((price, i) => store.append(window(symbol, price, i * 5000), firstGeneration + i));
}

function repeat(value: number, count: number): number[] {
  return Array.from({ length: count }, () => value);
}

describe("AnalyticsEngine", () => {
  let store: HistoryStore;

  beforeEach(() => {
    store = new HistoryStore();
  });

  it("has no snapshot for a symbol without history", () => {
    const engine = new AnalyticsEngine(store);

    expect(engine.computeSnapshot("BTCUSDT", 1)).toBeNull();
    expect(engine.getSnapshot("BTCUSDT")).toBeNull();
  });

  it("summarises a steadily rising history", () => {
    const rising = Array.from({ length: 21 }, (_, i) => 100 + i);
    fill(store, "BTCUSDT", rising);
    const engine = new AnalyticsEngine(store);

    const snapshot = engine.computeSnapshot("BTCUSDT", 123);

    expect(snapshot).not.toBeNull();
    if (!snapshot) return;
    expect(snapshot.timestamp).toBe(123);
    expect(snapshot.meanPrice).toBe(110);
    expect(snapshot.sma20).toBe(110.5);
    expect(snapshot.rsi14).toBe(100);
    expect(snapshot.stdPrice).toBeCloseTo(Math.sqrt(770 / 21), 10);
    expect(snapshot.volatility).toBeCloseTo(Math.sqrt(770 / 21) / 110, 12);
    expect(snapshot.zScore).toBeCloseTo(10 / Math.sqrt(770 / 21), 10);
    expect(snapshot.garchForecast).not.toBeNull();
    expect(snapshot.adfPValue).not.toBeNull();
    expect(snapshot.correlation).toBeNull();
    expect(snapshot.correlationPeer).toBeNull();
    // The EMA is seeded with the first price and runs ahead of the SMA on a
    // steady ramp, so price > sma > ema does not hold
    expect(snapshot.ema20).toBeGreaterThan(snapshot.sma20);
    expect(snapshot.trend).toBe("neutral");
  });

  it("labels a breakout above a flat range as an uptrend", () => {
    fill(store, "BTCUSDT", [1, ...repeat(100, 19), 120]);
    const engine = new AnalyticsEngine(store);

    const snapshot = engine.computeSnapshot("BTCUSDT", 1);

    expect(snapshot?.sma20).toBe(101);
    expect(snapshot?.trend).toBe("uptrend");
  });

  it("labels a breakdown below a flat range as a downtrend", () => {
    fill(store, "BTCUSDT", [200, ...repeat(100, 19), 80]);
    const engine = new AnalyticsEngine(store);

    expect(engine.computeSnapshot("BTCUSDT", 1)?.trend).toBe("downtrend");
  });

  it("measures the z-score against the trailing window only", () => {
    fill(store, "BTCUSDT", [500, ...repeat(100, 9), 110]);
    const engine = new AnalyticsEngine(store, { zScoreWindow: 10 });

    expect(engine.computeSnapshot("BTCUSDT", 1)?.zScore).toBe(3);
  });

  it("leaves history-hungry fields empty for a short history", () => {
    fill(store, "BTCUSDT", [100, 101, 102]);
    const engine = new AnalyticsEngine(store);

    const snapshot = engine.computeSnapshot("BTCUSDT", 1);

    expect(snapshot?.rsi14).toBe(50);
    expect(snapshot?.garchForecast).toBeNull();
    expect(snapshot?.adfPValue).toBeNull();
  });

  describe("correlation", () => {
    function fillPair(btc: number[], eth: number[]) {
      btc.forEach((price, i) => {
        store.append(window("BTCUSDT", price, i), i + 1);
        store.append(window("ETHUSDT", eth[i] ?? price, i), i + 1);
      });
    }

    it("carries the configured peer's correlation on the snapshot", () => {
      fillPair([10, 20, 15, 30, 25], [20, 40, 30, 60, 50]);
      const engine = new AnalyticsEngine(store, { correlationPairs: [["BTCUSDT", "ETHUSDT"]] });

      const btc = engine.computeSnapshot("BTCUSDT", 1);
      const eth = engine.computeSnapshot("ETHUSDT", 1);

      expect(btc?.correlationPeer).toBe("ETHUSDT");
      expect(btc?.correlation).toBeCloseTo(1, 10);
      expect(eth?.correlationPeer).toBe("BTCUSDT");
      expect(eth?.correlation).toBeCloseTo(1, 10);
    });

    it("is absent when the pair was not written by the same flush", () => {
      fillPair([10, 20, 15], [20, 40, 30]);
      store.append(window("BTCUSDT", 40, 9), 99);
      const engine = new AnalyticsEngine(store, { correlationPairs: [["BTCUSDT", "ETHUSDT"]] });

      expect(engine.computeSnapshot("BTCUSDT", 1)?.correlation).toBeNull();
      expect(engine.pairCorrelation("BTCUSDT", "ETHUSDT")).toBeNull();
    });

    it("builds the matrix over every symbol pair with a defined value", () => {
      fillPair([10, 20, 15, 30], [40, 20, 30, 0.5]);
      const engine = new AnalyticsEngine(store);

      const matrix = engine.getCorrelationMatrix();

      expect(Object.keys(matrix)).toEqual(["BTCUSDT-ETHUSDT"]);
      expect(matrix["BTCUSDT-ETHUSDT"]).toBeLessThan(0);
      expect(engine.pairCorrelation("ETHUSDT", "BTCUSDT")).toBeCloseTo(matrix["BTCUSDT-ETHUSDT"] ?? NaN, 12);
    });
  });

  it("returns the same results for repeated queries without a new flush", () => {
    fill(store, "BTCUSDT", [100, 101, 99, 102]);
    const engine = new AnalyticsEngine(store);
    engine.computeSnapshot("BTCUSDT", 1);

    expect(engine.getSnapshot("BTCUSDT")).toBe(engine.getSnapshot("BTCUSDT"));
    expect(engine.getAllSnapshots()).toEqual(engine.getAllSnapshots());
    expect(engine.getCorrelationMatrix()).toEqual(engine.getCorrelationMatrix());
  });

  it("flags prices far from the historical mean", () => {
    fill(store, "BTCUSDT", [...repeat(100, 19), 200]);
    const engine = new AnalyticsEngine(store);

    expect(engine.detectAnomalies("BTCUSDT")).toEqual([200]);
    expect(engine.detectAnomalies("BTCUSDT", 5)).toEqual([]);
  });

  it("needs at least ten points to look for anomalies", () => {
    fill(store, "BTCUSDT", [...repeat(100, 8), 500]);
    const engine = new AnalyticsEngine(store);

    expect(engine.detectAnomalies("BTCUSDT")).toEqual([]);
  });
});
