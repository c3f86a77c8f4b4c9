import { describe, it, expect, beforeEach } from "vitest";

import { RuleNotFoundError, RuleRegistry, RuleValidationError } from "../registry";

const TRACKED = new Set(["BTCUSDT", "ETHUSDT"]);

describe("RuleRegistry", () => {
  let clock: number;
  let registry: RuleRegistry;

  beforeEach(() => {
    clock = 1000;
    registry = new RuleRegistry((symbol) => TRACKED.has(symbol), () => clock);
  });

  it("creates an enabled rule with a fresh id", () => {
    const rule = registry.create({ symbol: " btcusdt ", metric: "z_score", comparator: ">", threshold: 2 });

    expect(rule).toMatchObject({
      symbol: "BTCUSDT",
      metric: "z_score",
      comparator: ">",
      threshold: 2,
      enabled: true,
      triggeredCount: 0,
      createdAt: 1000,
    });
    expect(rule.ruleId).toMatch(/^[\w-]{21}$/);
    expect(registry.get(rule.ruleId)).toEqual(rule);
  });

  it.each([
    ["an untracked symbol", { symbol: "DOGEUSDT", metric: "z_score", comparator: ">", threshold: 1 }],
    ["an unknown metric", { symbol: "BTCUSDT", metric: "price", comparator: ">", threshold: 1 }],
    ["an unknown comparator", { symbol: "BTCUSDT", metric: "z_score", comparator: "=>", threshold: 1 }],
    ["a non-finite threshold", { symbol: "BTCUSDT", metric: "z_score", comparator: ">", threshold: Infinity }],
    ["a missing threshold", { symbol: "BTCUSDT", metric: "z_score", comparator: ">" }],
  ])("rejects %s", (_label, input) => {
    expect(() => registry.create(input)).toThrow(RuleValidationError);
    expect(registry.size).toBe(0);
  });

  it("updates only the fields it is given", () => {
    const rule = registry.create({ symbol: "BTCUSDT", metric: "rsi_14", comparator: ">", threshold: 70 });
    clock = 2000;

    const updated = registry.update(rule.ruleId, { threshold: 80 });

    expect(updated).toMatchObject({ metric: "rsi_14", comparator: ">", threshold: 80, createdAt: 1000, updatedAt: 2000 });
  });

  it("rejects an empty update", () => {
    const rule = registry.create({ symbol: "BTCUSDT", metric: "rsi_14", comparator: ">", threshold: 70 });

    expect(() => registry.update(rule.ruleId, {})).toThrow(RuleValidationError);
  });

  it("toggles a rule on and off", () => {
    const rule = registry.create({ symbol: "ETHUSDT", metric: "volatility", comparator: ">=", threshold: 0.01 });

    registry.setEnabled(rule.ruleId, false);
    expect(registry.enabledFor("ETHUSDT")).toEqual([]);

    registry.setEnabled(rule.ruleId, true);
    expect(registry.enabledFor("ETHUSDT").map((r) => r.ruleId)).toEqual([rule.ruleId]);
  });

  it("throws RuleNotFoundError for unknown ids", () => {
    expect(() => registry.update("missing", { threshold: 1 })).toThrow(RuleNotFoundError);
    expect(() => registry.setEnabled("missing", true)).toThrow(RuleNotFoundError);
    expect(() => registry.delete("missing")).toThrow(RuleNotFoundError);
    expect(registry.get("missing")).toBeNull();
  });

  it("deletes rules", () => {
    const rule = registry.create({ symbol: "BTCUSDT", metric: "z_score", comparator: "<", threshold: -2 });

    registry.delete(rule.ruleId);

    expect(registry.get(rule.ruleId)).toBeNull();
    expect(registry.list()).toEqual([]);
  });

  it("hands out copies from list()", () => {
    const rule = registry.create({ symbol: "BTCUSDT", metric: "z_score", comparator: "<", threshold: -2 });

    const [copy] = registry.list();
    if (copy) copy.threshold = 99;

    expect(registry.get(rule.ruleId)?.threshold).toBe(-2);
  });

  it("counts triggers on the stored rule", () => {
    const rule = registry.create({ symbol: "BTCUSDT", metric: "z_score", comparator: ">", threshold: 2 });

    registry.recordTrigger(rule.ruleId);
    registry.recordTrigger(rule.ruleId);

    expect(registry.get(rule.ruleId)?.triggeredCount).toBe(2);
  });

  it("restores a saved rule set in place of the current one", () => {
    registry.create({ symbol: "BTCUSDT", metric: "z_score", comparator: ">", threshold: 2 });

    registry.restore([
      {
        ruleId: "saved-1",
        symbol: "ETHUSDT",
        metric: "mean_price",
        comparator: "<",
        threshold: 3000,
        enabled: true,
        triggeredCount: 4,
        createdAt: 10,
      },
    ]);

    expect(registry.list().map((r) => r.ruleId)).toEqual(["saved-1"]);
    expect(registry.get("saved-1")?.triggeredCount).toBe(4);
  });
});
