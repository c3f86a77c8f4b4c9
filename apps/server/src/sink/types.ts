import type { AggregatedWindow, MetricsSnapshot } from "@shared/types";
import type { AlertEvent, AlertRule } from "@shared/types/alerts";

export type MaybePromise<T> = T | Promise<T>;

/**
 * Where finished records go. The pipeline never reads back from a sink except
 * to restore alert rules on startup.
 */
export interface StorageSink {
  saveWindow(window: AggregatedWindow): MaybePromise<void>;
  saveSnapshot(snapshot: MetricsSnapshot): MaybePromise<void>;
  saveAlert(event: AlertEvent): MaybePromise<void>;
  saveRules?(rules: AlertRule[]): MaybePromise<void>;
  loadRules?(): MaybePromise<AlertRule[]>;
  pruneOlderThan?(cutoffMs: number): MaybePromise<number>;
}
