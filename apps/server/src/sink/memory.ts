import type { AggregatedWindow, MetricsSnapshot } from "@shared/types";
import type { AlertEvent, AlertRule } from "@shared/types/alerts";

import { RingBuffer } from "@server/cache/ring";
import type { StorageSink } from "./types";

export const DEFAULT_SINK_CAPACITY = 50000;

const CSV_COLUMNS = [
  "timestamp",
  "symbol",
  "mean_price",
  "std_price",
  "volatility",
  "z_score",
  "sma_20",
  "ema_20",
  "rsi_14",
  "correlation",
  "garch_forecast",
  "adf_pvalue",
  "trend",
] as const;

function csvCell(value: string | number | null): string {
  if (value === null) return "";
  const text = String(value);
  return /[",\n]/.test(text) ? `"${text.replace(/"/g, '""')}"` : text;
}

/**
 * In-process sink holding bounded tails of every record type. Good enough for
 * local runs and tests; a database-backed sink implements the same interface.
 */
export class MemorySink implements StorageSink {
  private windows: RingBuffer<AggregatedWindow>;
  private snapshots: RingBuffer<MetricsSnapshot>;
  private alerts: RingBuffer<AlertEvent>;
  private rules: AlertRule[] = [];

  constructor(capacity: number = DEFAULT_SINK_CAPACITY) {
    this.windows = new RingBuffer<AggregatedWindow>(capacity);
    this.snapshots = new RingBuffer<MetricsSnapshot>(capacity);
    this.alerts = new RingBuffer<AlertEvent>(capacity);
  }

  saveWindow(window: AggregatedWindow): void {
    this.windows.push(window);
  }

  saveSnapshot(snapshot: MetricsSnapshot): void {
    this.snapshots.push(snapshot);
  }

  saveAlert(event: AlertEvent): void {
    this.alerts.push(event);
  }

  saveRules(rules: AlertRule[]): void {
    this.rules = rules.map((rule) => ({ ...rule }));
  }

  loadRules(): AlertRule[] {
    return this.rules.map((rule) => ({ ...rule }));
  }

  /**
   * Most recent windows for one symbol, oldest first.
   */
  recentWindows(symbol: string, limit = 100): AggregatedWindow[] {
    return this.windows
      .toArray()
      .filter((w) => w.symbol === symbol)
      .slice(-limit);
  }

  /**
   * Snapshots of one symbol newer than `sinceMs` as CSV, header included.
   */
  exportSnapshotsCsv(symbol: string, sinceMs: number): string {
    const lines: string[] = [CSV_COLUMNS.join(",")];

    for (const s of this.snapshots.toArray()) {
      if (s.symbol !== symbol || s.timestamp <= sinceMs) continue;
      lines.push(
        [
          s.timestamp,
          s.symbol,
          s.meanPrice,
          s.stdPrice,
          s.volatility,
          s.zScore,
          s.sma20,
          s.ema20,
          s.rsi14,
          s.correlation,
          s.garchForecast,
          s.adfPValue,
          s.trend,
        ]
          .map(csvCell)
          .join(","),
      );
    }

    return lines.join("\n") + "\n";
  }

  /**
   * Drop windows, snapshots and alerts stamped before `cutoffMs`. Records are
   * appended in time order, so only the oldest end is inspected.
   */
  pruneOlderThan(cutoffMs: number): number {
    return (
      this.windows.dropWhile((w) => w.timestamp < cutoffMs) +
      this.snapshots.dropWhile((s) => s.timestamp < cutoffMs) +
      this.alerts.dropWhile((a) => a.timestamp < cutoffMs)
    );
  }
}
