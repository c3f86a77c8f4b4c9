import { describe, it, expect } from "vitest";

import {
  correlation,
  detectTrend,
  ema,
  mean,
  rsi,
  sma,
  stationarityHeuristic,
  std,
  volatilityForecast,
  vwap,
  zScore,
} from "../indicators";

const rising = (n: number, start = 100): number[] => Array.from({ length: n }, (_, i) => start + i);

describe("mean / std", () => {
  it("returns 0 for empty input", () => {
    expect(mean([])).toBe(0);
    expect(std([])).toBe(0);
  });

  it("uses the population formula", () => {
    expect(mean([2, 4, 4, 4, 5, 5, 7, 9])).toBe(5);
    expect(std([2, 4, 4, 4, 5, 5, 7, 9])).toBe(2);
  });

  it("std is 0 for a single point", () => {
    expect(std([42])).toBe(0);
  });
});

describe("vwap", () => {
  it("weights prices by volume", () => {
    expect(vwap([100, 101, 99], [1, 2, 1])).toBeCloseTo(100.25, 10);
  });

  it("returns 0 when every volume is 0", () => {
    expect(vwap([100, 101, 99], [0, 0, 0])).toBe(0);
  });

  it("equals the mean under uniform volume", () => {
    expect(vwap([1, 2, 3], [5, 5, 5])).toBe(mean([1, 2, 3]));
  });

  it("returns 0 for mismatched lengths", () => {
    expect(vwap([1, 2], [1])).toBe(0);
  });
});

describe("sma", () => {
  it("averages the last `period` values", () => {
    expect(sma([1, 2, 3, 4, 5, 6], 3)).toBe(5);
  });

  it("falls back to the mean of everything when short", () => {
    expect(sma([1, 2, 3], 5)).toBe(2);
  });
});

describe("ema", () => {
  it("equals the only element of a one-element series", () => {
    expect(ema([7], 20)).toBe(7);
  });

  it("equals the constant of a constant series", () => {
    expect(ema(new Array(25).fill(3), 20)).toBeCloseTo(3, 12);
  });

  it("seeds with the first value and walks forward", () => {
    // k = 2/3: 1 → 5/3 → 23/9
    expect(ema([1, 2, 3], 2)).toBeCloseTo(23 / 9, 12);
  });
});

describe("rsi", () => {
  it("is neutral below period + 1 points", () => {
    expect(rsi(rising(14))).toBe(50);
    expect(rsi([])).toBe(50);
  });

  it("is 100 for a strictly rising series", () => {
    expect(rsi(rising(21))).toBe(100);
  });

  it("is 50 for a flat series", () => {
    expect(rsi(new Array(15).fill(10))).toBe(50);
  });

  it("uses average gain over average loss", () => {
    // changes +2, -1 → rs = 2 → 100 - 100/3
    expect(rsi([1, 3, 2], 2)).toBeCloseTo(200 / 3, 10);
  });
});

describe("zScore", () => {
  it("is exactly 0 when std is 0", () => {
    expect(zScore(1234, 5, 0)).toBe(0);
  });

  it("measures distance in std units", () => {
    expect(zScore(12, 10, 2)).toBe(1);
  });
});

describe("correlation", () => {
  it("is 1 and -1 for perfectly linear series", () => {
    expect(correlation([1, 2, 3], [2, 4, 6])).toBeCloseTo(1, 12);
    expect(correlation([1, 2, 3], [6, 4, 2])).toBeCloseTo(-1, 12);
  });

  it("is symmetric", () => {
    const a = [1, 3, 2, 5, 4];
    const b = [2, 1, 4, 3, 6];
    const ab = correlation(a, b);
    const ba = correlation(b, a);
    expect(ab).not.toBeNull();
    expect(ab ?? NaN).toBeCloseTo(ba ?? NaN, 12);
  });

  it("is absent for mismatched, short or constant series", () => {
    expect(correlation([1, 2, 3], [1, 2])).toBeNull();
    expect(correlation([1], [1])).toBeNull();
    expect(correlation([1, 1, 1], [1, 2, 3])).toBeNull();
  });
});

describe("detectTrend", () => {
  it("classifies price against the averages", () => {
    expect(detectTrend(10, 9, 11)).toBe("uptrend");
    expect(detectTrend(10, 11, 9)).toBe("downtrend");
    expect(detectTrend(10, 10, 11)).toBe("neutral");
  });
});

describe("stationarityHeuristic", () => {
  it("is absent below ten points", () => {
    expect(stationarityHeuristic(rising(9))).toBeNull();
  });

  it("is 1 for a constant series", () => {
    expect(stationarityHeuristic(new Array(10).fill(5))).toBe(1);
  });

  it("maps lag-1 autocorrelation to 1 / (1 + |ρ|)", () => {
    const alternating = Array.from({ length: 10 }, (_, i) => (i % 2 === 0 ? 1 : -1));
    // autocov = -9/10, variance = 1
    expect(stationarityHeuristic(alternating)).toBeCloseTo(1 / 1.9, 12);
  });
});

describe("volatilityForecast", () => {
  it("is absent below ten returns", () => {
    expect(volatilityForecast(new Array(9).fill(0.01))).toBeNull();
  });

  it("reduces to sqrt(α·r²) for constant returns", () => {
    expect(volatilityForecast(new Array(10).fill(0.01))).toBeCloseTo(Math.sqrt(0.1 * 0.0001), 12);
  });

  it("is never negative", () => {
    const returns = [0.01, -0.02, 0.015, -0.005, 0.03, -0.01, 0.0, 0.02, -0.025, 0.01];
    expect(volatilityForecast(returns)).toBeGreaterThan(0);
  });
});
