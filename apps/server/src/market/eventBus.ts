import { EventEmitter } from "events";
import type { AggregatedWindow, FeedStatus, MetricsSnapshot, TradeEvent } from "@shared/types";
import type { AlertEvent } from "@shared/types/alerts";

type EventMap = {
  [key: `trade:${string}`]: TradeEvent;
  [key: `window:${string}`]: AggregatedWindow;
  [key: `metrics:${string}`]: MetricsSnapshot;
  "alert:triggered": AlertEvent;
  "feed:status": FeedStatus;
};

export class TypedEventBus extends EventEmitter {
  emit<K extends keyof EventMap>(event: K, data: EventMap[K]): boolean {
    return super.emit(event, data);
  }

  on<K extends keyof EventMap>(event: K, listener: (data: EventMap[K]) => void): this {
    return super.on(event, listener);
  }

  once<K extends keyof EventMap>(event: K, listener: (data: EventMap[K]) => void): this {
    return super.once(event, listener);
  }

  off<K extends keyof EventMap>(event: K, listener: (data: EventMap[K]) => void): this {
    return super.off(event, listener);
  }
}

export function createEventBus(): TypedEventBus {
  const bus = new TypedEventBus();
  bus.setMaxListeners(100);
  return bus;
}
