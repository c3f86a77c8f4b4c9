import type { AggregatedWindow, FeedStatus, MetricsSnapshot, TradeEvent } from "@shared/types";
import type { AlertEvent, AlertRule } from "@shared/types/alerts";
import type { AlertRuleInput, AlertRulePatch, BacktestOptions } from "@shared/schemas";

import { AnalyticsEngine } from "@server/analytics/engine";
import { buildCorrelationMatrix, clusterByCorrelation, DEFAULT_MIN_CORRELATION } from "@server/analytics/cluster";
import { BacktestValidationError, runMeanReversionBacktest, type BacktestResult } from "@server/backtest/engine";
import { HistoryStore } from "@server/history/store";
import { logger as baseLogger, type Logger } from "@server/logger";
import type { BackoffOptions } from "@server/market/backoff";
import { createEventBus, type TypedEventBus } from "@server/market/eventBus";
import { FeedClient, type FeedSocketFactory } from "@server/market/feedClient";
import { MockTickGenerator } from "@server/market/mockTickGenerator";
import { TradeQueue } from "@server/market/tradeQueue";
import { DEFAULT_FLUSH_INTERVAL_MS, WindowAggregator } from "@server/market/windowAggregator";
import { MetricsRegistry, type MetricsReport } from "@server/metrics/registry";
import { AlertLog } from "@server/rules/alertLog";
import { AlertEvaluator } from "@server/rules/evaluator";
import { RuleRegistry } from "@server/rules/registry";
import { MemorySink } from "@server/sink/memory";
import type { MaybePromise, StorageSink } from "@server/sink/types";

const DAY_MS = 24 * 60 * 60 * 1000;
const RETENTION_SWEEP_MS = 60 * 60 * 1000;
const MAX_FLUSH_CHECK_MS = 1000;
const DEFAULT_QUEUE_CAPACITY = 10000;
const DEFAULT_RETENTION_DAYS = 7;

export interface AnalyticsSessionOptions {
  symbols: string[];
  feedUrl: string;
  flushIntervalMs?: number;
  historyCapacity?: number;
  zScoreWindow?: number;
  correlationPairs?: ReadonlyArray<readonly [string, string]>;
  alertLogCapacity?: number;
  tradeQueueCapacity?: number;
  retentionDays?: number;
  maxRetries?: number;
  backoff?: BackoffOptions;
  staleMs?: number;
  /** Replace the exchange socket with the synthetic generator. */
  mock?: boolean;
  socketFactory?: FeedSocketFactory;
  sink?: StorageSink;
  bus?: TypedEventBus;
  logger?: Logger;
  now?: () => number;
}

export interface FlushResult {
  generation: number;
  windows: AggregatedWindow[];
  snapshots: MetricsSnapshot[];
  alerts: AlertEvent[];
}

export interface SessionDiagnostics {
  feed: FeedStatus;
  queue: { queued: number; dropped: number; capacity: number };
  pendingTrades: number;
  trackedSymbols: string[];
  metrics: MetricsReport;
}

/**
 * Owns one running pipeline: feed → queue → aggregator → history → snapshots
 * → alerts → sink. Everything mutable lives on the instance.
 *
 * The flush is synchronous end to end, so queries and rule commands (which run
 * on the same event loop) always observe the state between two flushes, never
 * one half-applied.
 */
export class AnalyticsSession {
  readonly bus: TypedEventBus;
  readonly metrics = new MetricsRegistry();
  readonly sink: StorageSink;

  private readonly queue: TradeQueue;
  private readonly aggregator: WindowAggregator;
  private readonly history: HistoryStore;
  private readonly engine: AnalyticsEngine;
  private readonly rules: RuleRegistry;
  private readonly alertLog: AlertLog;
  private readonly evaluator: AlertEvaluator;
  private readonly feed: FeedClient;
  private readonly log: Logger;
  private readonly now: () => number;

  private readonly symbols: Set<string>;
  private readonly flushIntervalMs: number;
  private readonly retentionDays: number;

  private generation = 0;
  private pumpScheduled = false;
  private flushTimer: NodeJS.Timeout | null = null;
  private retentionTimer: NodeJS.Timeout | null = null;
  private feedRun: Promise<void> | null = null;

  constructor(options: AnalyticsSessionOptions) {
    this.log = options.logger ?? baseLogger.child({ component: "session" });
    this.now = options.now ?? Date.now;
    this.bus = options.bus ?? createEventBus();
    this.sink = options.sink ?? new MemorySink();
    this.symbols = new Set(options.symbols.map((s) => s.toUpperCase()));
    this.flushIntervalMs = options.flushIntervalMs ?? DEFAULT_FLUSH_INTERVAL_MS;
    this.retentionDays = options.retentionDays ?? DEFAULT_RETENTION_DAYS;

    this.queue = new TradeQueue(options.tradeQueueCapacity ?? DEFAULT_QUEUE_CAPACITY, (stats) => {
      this.log.warn(stats, "Trade queue full, dropping oldest trades");
    });
    this.aggregator = new WindowAggregator(this.now);
    this.history = new HistoryStore(options.historyCapacity);
    this.engine = new AnalyticsEngine(this.history, {
      ...(options.zScoreWindow !== undefined && { zScoreWindow: options.zScoreWindow }),
      ...(options.correlationPairs !== undefined && { correlationPairs: options.correlationPairs }),
    });
    this.rules = new RuleRegistry((symbol) => this.symbols.has(symbol), this.now);
    this.alertLog = new AlertLog(options.alertLogCapacity);
    this.evaluator = new AlertEvaluator(this.rules, this.alertLog, this.log.child({ component: "alerts" }));

    const socketFactory = options.mock
      ? new MockTickGenerator(Array.from(this.symbols)).socketFactory()
      : options.socketFactory;

    this.feed = new FeedClient({
      url: options.feedUrl,
      symbols: Array.from(this.symbols),
      onTrade: (event) => this.ingest(event),
      bus: this.bus,
      logger: this.log.child({ component: "feed" }),
      now: this.now,
      ...(options.maxRetries !== undefined && { maxRetries: options.maxRetries }),
      ...(options.backoff !== undefined && { backoff: options.backoff }),
      ...(options.staleMs !== undefined && { staleMs: options.staleMs }),
      ...(socketFactory !== undefined && { socketFactory }),
    });

    this.bus.on("feed:status", (status) => {
      if (status.state === "reconnecting") this.metrics.counter("feed_reconnects");
    });
  }

  /**
   * Restore saved rules, start the flush and retention timers and connect the
   * feed in the background.
   */
  async start(): Promise<void> {
    if (this.flushTimer) return;

    await this.restoreRules();

    this.flushTimer = setInterval(() => this.tick(), Math.min(this.flushIntervalMs, MAX_FLUSH_CHECK_MS));
    this.retentionTimer = setInterval(() => this.pruneSink(), RETENTION_SWEEP_MS);

    this.feedRun = this.feed.connect().catch((err: unknown) => {
      this.log.error({ err }, "Feed loop stopped unexpectedly");
    });

    this.log.info(
      { symbols: Array.from(this.symbols), flushIntervalMs: this.flushIntervalMs },
      "Analytics session started",
    );
  }

  async stop(): Promise<void> {
    if (this.flushTimer) {
      clearInterval(this.flushTimer);
      this.flushTimer = null;
    }
    if (this.retentionTimer) {
      clearInterval(this.retentionTimer);
      this.retentionTimer = null;
    }

    this.feed.close();
    await this.feedRun;
    this.feedRun = null;
    this.log.info("Analytics session stopped");
  }

  ingest(event: TradeEvent): void {
    this.queue.push(event);
    this.metrics.counter("trades_ingested");
    this.bus.emit(`trade:${event.symbol}`, event);
    this.schedulePump();
  }

  /**
   * Move queued trades into the aggregator and, when the interval has elapsed
   * (or `force` is set), flush windows through history, analytics and alerts.
   */
  runFlush(force = false): FlushResult {
    this.pump();

    if (!force && !this.aggregator.shouldFlush(this.flushIntervalMs)) {
      return { generation: this.generation, windows: [], snapshots: [], alerts: [] };
    }

    const started = performance.now();
    const windows = this.aggregator.flush();
    if (windows.length === 0) {
      return { generation: this.generation, windows, snapshots: [], alerts: [] };
    }

    // All windows of one flush land under one generation before any snapshot
    // reads the store, so paired reads see a consistent state
    const generation = ++this.generation;
    for (const window of windows) {
      this.history.append(window, generation);
    }

    const snapshots: MetricsSnapshot[] = [];
    const alerts: AlertEvent[] = [];

    for (const window of windows) {
      this.persist("window", () => this.sink.saveWindow(window));
      this.bus.emit(`window:${window.symbol}`, window);

      const snapshot = this.engine.computeSnapshot(window.symbol, window.timestamp);
      if (!snapshot) continue;
      snapshots.push(snapshot);
      this.persist("snapshot", () => this.sink.saveSnapshot(snapshot));
      this.bus.emit(`metrics:${snapshot.symbol}`, snapshot);

      for (const event of this.evaluator.evaluate(snapshot)) {
        alerts.push(event);
        this.persist("alert", () => this.sink.saveAlert(event));
        this.bus.emit("alert:triggered", event);
      }
    }

    if (alerts.length > 0) {
      // Trigger counts changed
      this.persistRules();
    }

    this.metrics.incrementCounter("windows_emitted", windows.length);
    this.metrics.incrementCounter("alerts_triggered", alerts.length);
    this.metrics.histogram("flush_duration_ms", performance.now() - started);

    this.log.debug({ generation, windows: windows.length, alerts: alerts.length }, "Flushed windows");
    return { generation, windows, snapshots, alerts };
  }

  // Queries

  getSnapshot(symbol: string): MetricsSnapshot | null {
    return this.engine.getSnapshot(symbol.toUpperCase());
  }

  getAllSnapshots(): Record<string, MetricsSnapshot> {
    return this.engine.getAllSnapshots();
  }

  getRecentPrices(symbol: string, limit = 100): number[] {
    return this.history.getPrices(symbol.toUpperCase(), limit);
  }

  getCorrelationMatrix(): Record<string, number> {
    return this.engine.getCorrelationMatrix();
  }

  getClusters(minCorrelation: number = DEFAULT_MIN_CORRELATION): string[][] {
    const matrix = buildCorrelationMatrix(this.engine, this.history.symbols());
    return clusterByCorrelation(matrix, minCorrelation);
  }

  runBacktest(symbol: string, options: BacktestOptions = {}): BacktestResult {
    const key = symbol.toUpperCase();
    if (!this.symbols.has(key)) {
      throw new BacktestValidationError(`Unknown symbol: ${symbol}`);
    }
    return runMeanReversionBacktest(this.history.getPrices(key), options);
  }

  detectAnomalies(symbol: string, zThreshold = 3): number[] {
    return this.engine.detectAnomalies(symbol.toUpperCase(), zThreshold);
  }

  getAlertHistory(limit = 100): AlertEvent[] {
    return this.alertLog.recent(limit);
  }

  listRules(): AlertRule[] {
    return this.rules.list();
  }

  getRule(ruleId: string): AlertRule | null {
    return this.rules.get(ruleId);
  }

  getFeedStatus(): FeedStatus {
    return this.feed.getStatus();
  }

  getDiagnostics(): SessionDiagnostics {
    const queue = this.queue.getStats();
    this.metrics.gauge("trades_dropped", queue.dropped);
    this.metrics.gauge("queue_depth", queue.queued);

    return {
      feed: this.feed.getStatus(),
      queue,
      pendingTrades: this.aggregator.pendingCount(),
      trackedSymbols: Array.from(this.symbols),
      metrics: this.metrics.getMetrics(),
    };
  }

  // Commands. Synchronous, so they apply before the next flush evaluates.

  createRule(input: AlertRuleInput): AlertRule {
    const rule = this.rules.create(input);
    this.log.info({ ruleId: rule.ruleId, symbol: rule.symbol, metric: rule.metric }, "Alert rule created");
    this.persistRules();
    return rule;
  }

  updateRule(ruleId: string, patch: AlertRulePatch): AlertRule {
    const rule = this.rules.update(ruleId, patch);
    this.persistRules();
    return rule;
  }

  setRuleEnabled(ruleId: string, enabled: boolean): AlertRule {
    const rule = this.rules.setEnabled(ruleId, enabled);
    this.persistRules();
    return rule;
  }

  deleteRule(ruleId: string): void {
    this.rules.delete(ruleId);
    this.log.info({ ruleId }, "Alert rule deleted");
    this.persistRules();
  }

  private tick(): void {
    try {
      this.runFlush();
    } catch (err) {
      this.log.error({ err }, "Flush failed");
    }
  }

  private schedulePump(): void {
    if (this.pumpScheduled) return;
    this.pumpScheduled = true;
    setImmediate(() => this.pump());
  }

  private pump(): void {
    this.pumpScheduled = false;
    for (const event of this.queue.drain()) {
      this.aggregator.add(event);
    }
  }

  private async restoreRules(): Promise<void> {
    if (!this.sink.loadRules) return;
    try {
      const saved = await this.sink.loadRules();
      this.rules.restore(saved);
      if (saved.length > 0) this.log.info({ count: saved.length }, "Restored alert rules");
    } catch (err) {
      this.log.error({ err }, "Failed to restore alert rules");
    }
  }

  private persistRules(): void {
    const { sink } = this;
    if (!sink.saveRules) return;
    const rules = this.rules.list();
    this.persist("rules", () => sink.saveRules?.(rules));
  }

  private pruneSink(): void {
    const { sink } = this;
    if (!sink.pruneOlderThan) return;
    const cutoff = this.now() - this.retentionDays * DAY_MS;
    this.persist("retention", () => sink.pruneOlderThan?.(cutoff));
  }

  /**
   * Run one sink call. Failures, sync or async, are logged and never reach the
   * flush.
   */
  private persist(label: string, write: () => MaybePromise<unknown>): void {
    try {
      const pending = write();
      if (pending instanceof Promise) {
        void pending.catch((err: unknown) => {
          this.log.error({ err, record: label }, "Sink write failed");
        });
      }
    } catch (err) {
      this.log.error({ err, record: label }, "Sink write failed");
    }
  }
}
