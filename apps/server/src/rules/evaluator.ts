import type { MetricsSnapshot } from "@shared/types";
import type { AlertEvent, AlertMetric, Comparator } from "@shared/types/alerts";
import { INDICATOR_DEFAULTS } from "@shared/indicators";

import type { Logger } from "@server/logger";
import type { AlertLog } from "./alertLog";
import type { RuleRegistry } from "./registry";

const METRIC_RESOLVERS: Record<AlertMetric, (s: MetricsSnapshot) => number | null> = {
  z_score: (s) => s.zScore,
  volatility: (s) => s.volatility,
  mean_price: (s) => s.meanPrice,
  rsi_14: (s) => s.rsi14,
  std_price: (s) => s.stdPrice,
  sma_20: (s) => s.sma20,
  ema_20: (s) => s.ema20,
  correlation: (s) => s.correlation,
  garch_forecast: (s) => s.garchForecast,
  adf_pvalue: (s) => s.adfPValue,
};

function isAlertMetric(name: string): name is AlertMetric {
  return Object.prototype.hasOwnProperty.call(METRIC_RESOLVERS, name);
}

/**
 * Value of a named metric on a snapshot, or null when the name is unknown or
 * the snapshot has no value for it yet.
 */
export function resolveMetric(snapshot: MetricsSnapshot, name: string): number | null {
  if (!isAlertMetric(name)) return null;
  return METRIC_RESOLVERS[name](snapshot);
}

/**
 * Equality comparators use an absolute tolerance instead of exact match.
 */
export function checkCondition(
  value: number,
  comparator: Comparator,
  threshold: number,
  epsilon: number = INDICATOR_DEFAULTS.equalityEpsilon,
): boolean {
  switch (comparator) {
    case ">":
      return value > threshold;
    case "<":
      return value < threshold;
    case ">=":
      return value >= threshold;
    case "<=":
      return value <= threshold;
    case "==":
      return Math.abs(value - threshold) < epsilon;
    case "!=":
      return Math.abs(value - threshold) >= epsilon;
  }
}

/**
 * Matches a fresh snapshot against the enabled rules of its symbol. Each match
 * bumps the rule's trigger count and lands one event in the alert log. Rules
 * are independent; their order does not matter.
 */
export class AlertEvaluator {
  constructor(
    private readonly registry: RuleRegistry,
    private readonly alertLog: AlertLog,
    private readonly log?: Logger,
  ) {}

  evaluate(snapshot: MetricsSnapshot): AlertEvent[] {
    const triggered: AlertEvent[] = [];

    for (const rule of this.registry.enabledFor(snapshot.symbol)) {
      const actualValue = resolveMetric(snapshot, rule.metric);
      if (actualValue === null) continue;
      if (!checkCondition(actualValue, rule.comparator, rule.threshold)) continue;

      this.registry.recordTrigger(rule.ruleId);

      const event: AlertEvent = {
        ruleId: rule.ruleId,
        timestamp: snapshot.timestamp,
        symbol: snapshot.symbol,
        metric: rule.metric,
        comparator: rule.comparator,
        actualValue,
        threshold: rule.threshold,
      };
      this.alertLog.append(event);
      triggered.push(event);

      this.log?.warn(
        { ruleId: rule.ruleId, symbol: snapshot.symbol, metric: rule.metric, actualValue, threshold: rule.threshold },
        `Alert triggered: ${rule.metric} ${rule.comparator} ${rule.threshold}`,
      );
    }

    return triggered;
  }
}
