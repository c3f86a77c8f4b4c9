import WebSocket from "ws";
import type { FeedState, FeedStatus, TradeEvent } from "@shared/types";

import { logger as baseLogger, type Logger } from "@server/logger";
import { backoffDelay, DEFAULT_BACKOFF, type BackoffOptions } from "./backoff";
import type { TypedEventBus } from "./eventBus";
import { parseTradeFrame } from "./parseTrade";

export interface FeedSocketHandlers {
  onOpen(): void;
  onMessage(data: string): void;
  onClose(): void;
  onError(err: Error): void;
}

export interface FeedSocket {
  close(): void;
}

/**
 * Opens one connection. Swapped out in tests and in mock mode.
 */
export type FeedSocketFactory = (url: string, handlers: FeedSocketHandlers) => FeedSocket;

export const wsSocketFactory: FeedSocketFactory = (url, handlers) => {
  const ws = new WebSocket(url);
  ws.on("open", () => handlers.onOpen());
  ws.on("message", (raw) => handlers.onMessage(raw.toString()));
  ws.on("error", (err) => handlers.onError(err));
  ws.on("close", () => handlers.onClose());
  return { close: () => ws.close() };
};

export interface FeedClientOptions {
  url: string;
  symbols: string[];
  onTrade: (event: TradeEvent) => void;
  maxRetries?: number;
  backoff?: BackoffOptions;
  /** Close a connection that has delivered nothing for this long. */
  staleMs?: number;
  socketFactory?: FeedSocketFactory;
  bus?: TypedEventBus;
  logger?: Logger;
  random?: () => number;
  now?: () => number;
}

const DEFAULT_MAX_RETRIES = 10;
const DEFAULT_STALE_MS = 60000;
const MAX_HEARTBEAT_CHECK_MS = 30000;

/**
 * Build the combined-stream URL, e.g.
 * wss://host/stream?streams=btcusdt@aggTrade/ethusdt@aggTrade
 */
export function buildStreamUrl(baseUrl: string, symbols: string[]): string {
  const streams = symbols.map((s) => `${s.toLowerCase()}@aggTrade`).join("/");
  return `${baseUrl}?streams=${streams}`;
}

/**
 * Streaming client for the exchange's aggregate-trade feed.
 *
 * `connect()` runs the connection loop and resolves only once the client is
 * `failed` (retry budget spent) or `closed`. Dropped connections are retried
 * with capped exponential backoff plus jitter; the retry counter resets every
 * time a connection opens.
 */
export class FeedClient {
  private state: FeedState = "disconnected";
  private socket: FeedSocket | null = null;
  private settleAttempt: (() => void) | null = null;
  private cancelSleep: (() => void) | null = null;
  private heartbeat: NodeJS.Timeout | null = null;
  private running: Promise<void> | null = null;
  private closed = false;

  private retries = 0;
  private ticksReceived = 0;
  private lastTickTimestamp: number | null = null;
  private lastMessageAt = 0;
  /** Set on every successful open; kept across drops. */
  private connectedAt: number | null = null;

  private readonly maxRetries: number;
  private readonly backoff: BackoffOptions;
  private readonly staleMs: number;
  private readonly socketFactory: FeedSocketFactory;
  private readonly log: Logger;
  private readonly random: () => number;
  private readonly now: () => number;

  constructor(private readonly options: FeedClientOptions) {
    this.maxRetries = options.maxRetries ?? DEFAULT_MAX_RETRIES;
    this.backoff = options.backoff ?? DEFAULT_BACKOFF;
    this.staleMs = options.staleMs ?? DEFAULT_STALE_MS;
    this.socketFactory = options.socketFactory ?? wsSocketFactory;
    this.log = options.logger ?? baseLogger.child({ component: "feed" });
    this.random = options.random ?? Math.random;
    this.now = options.now ?? Date.now;
  }

  connect(): Promise<void> {
    if (this.running) return this.running;

    this.closed = false;
    this.retries = 0;
    this.running = this.run().finally(() => {
      this.running = null;
    });
    return this.running;
  }

  close(): void {
    this.closed = true;
    this.cancelSleep?.();
    this.dropConnection();
    if (!this.running) {
      this.setState("closed");
    }
  }

  getState(): FeedState {
    return this.state;
  }

  /**
   * Seconds since the last successful open, 0 before the first one.
   */
  getUptimeSeconds(): number {
    if (this.connectedAt === null) return 0;
    return Math.max(0, Math.floor((this.now() - this.connectedAt) / 1000));
  }

  getTicksReceived(): number {
    return this.ticksReceived;
  }

  getStatus(): FeedStatus {
    return {
      state: this.state,
      uptimeSeconds: this.getUptimeSeconds(),
      ticksReceived: this.ticksReceived,
      lastTickTimestamp: this.lastTickTimestamp,
      reconnectAttempts: this.retries,
    };
  }

  private async run(): Promise<void> {
    while (!this.closed) {
      this.setState("connecting");
      await this.openOnce();
      if (this.closed) break;

      if (this.retries >= this.maxRetries) {
        this.log.error({ retries: this.retries }, "Feed reconnect budget exhausted, giving up");
        this.setState("failed");
        return;
      }

      const delay = backoffDelay(this.retries, this.backoff, this.random);
      this.retries++;
      this.setState("reconnecting");
      this.log.warn({ attempt: this.retries, delayMs: Math.round(delay) }, "Feed disconnected, reconnecting");
      await this.sleep(delay);
    }

    this.setState("closed");
  }

  /**
   * One connection attempt. Resolves when the socket is gone for any reason.
   */
  private openOnce(): Promise<void> {
    const url = buildStreamUrl(this.options.url, this.options.symbols);

    return new Promise<void>((resolve) => {
      let settled = false;
      const settle = () => {
        if (settled) return;
        settled = true;
        this.stopHeartbeat();
        this.socket = null;
        this.settleAttempt = null;
        resolve();
      };
      this.settleAttempt = settle;

      try {
        const socket = this.socketFactory(url, {
          onOpen: () => {
            if (settled) return;
            this.retries = 0;
            this.connectedAt = this.now();
            this.lastMessageAt = this.connectedAt;
            this.startHeartbeat();
            this.setState("connected");
          },
          onMessage: (data) => {
            if (settled) return;
            this.lastMessageAt = this.now();
            this.handleFrame(data);
          },
          onError: (err) => {
            this.log.error({ err }, "Feed socket error");
            settle();
          },
          onClose: settle,
        });
        if (!settled) this.socket = socket;
        this.log.info({ url }, "Connecting to trade feed");
      } catch (err) {
        this.log.error({ err, url }, "Failed to open feed socket");
        settle();
      }
    });
  }

  private handleFrame(data: string): void {
    const result = parseTradeFrame(data, this.now());
    if (!result.ok) {
      this.log.debug({ reason: result.reason }, "Dropped feed frame");
      return;
    }

    this.ticksReceived++;
    this.lastTickTimestamp = result.event.timestamp;
    this.options.onTrade(result.event);
  }

  private dropConnection(): void {
    const socket = this.socket;
    const settle = this.settleAttempt;
    this.socket = null;
    socket?.close();
    settle?.();
  }

  private sleep(ms: number): Promise<void> {
    return new Promise<void>((resolve) => {
      const timer = setTimeout(() => {
        this.cancelSleep = null;
        resolve();
      }, ms);
      this.cancelSleep = () => {
        clearTimeout(timer);
        this.cancelSleep = null;
        resolve();
      };
    });
  }

  private startHeartbeat(): void {
    this.stopHeartbeat();
    const checkEvery = Math.min(Math.max(1000, this.staleMs / 2), MAX_HEARTBEAT_CHECK_MS);

    this.heartbeat = setInterval(() => {
      const silentFor = this.now() - this.lastMessageAt;
      if (silentFor > this.staleMs) {
        this.log.warn({ silentFor }, "No feed message within stale limit, dropping connection");
        this.dropConnection();
      }
    }, checkEvery);
  }

  private stopHeartbeat(): void {
    if (this.heartbeat) {
      clearInterval(this.heartbeat);
      this.heartbeat = null;
    }
  }

  private setState(next: FeedState): void {
    if (next === this.state) return;
    const previous = this.state;
    this.state = next;
    this.log.info({ from: previous, to: next }, "Feed state changed");
    this.options.bus?.emit("feed:status", this.getStatus());
  }
}
