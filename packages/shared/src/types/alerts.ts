export const COMPARATORS = [">", "<", ">=", "<=", "==", "!="] as const;
export type Comparator = (typeof COMPARATORS)[number];

export const ALERT_METRICS = [
  "z_score",
  "volatility",
  "mean_price",
  "rsi_14",
  "std_price",
  "sma_20",
  "ema_20",
  "correlation",
  "garch_forecast",
  "adf_pvalue",
] as const;
export type AlertMetric = (typeof ALERT_METRICS)[number];

export interface AlertRule {
  ruleId: string;
  symbol: string;
  metric: string;
  comparator: Comparator;
  threshold: number;
  enabled: boolean;
  triggeredCount: number;
  createdAt: number;
  updatedAt?: number;
}

export interface AlertEvent {
  ruleId: string;
  timestamp: number;
  symbol: string;
  metric: string;
  comparator: Comparator;
  actualValue: number;
  threshold: number;
}
