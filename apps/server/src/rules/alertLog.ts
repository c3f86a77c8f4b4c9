import type { AlertEvent } from "@shared/types/alerts";

import { RingBuffer } from "@server/cache/ring";

export const DEFAULT_ALERT_LOG_CAPACITY = 1000;

/**
 * Trailing log of triggered alerts. Oldest entries fall off first.
 */
export class AlertLog {
  private entries: RingBuffer<AlertEvent>;

  constructor(capacity: number = DEFAULT_ALERT_LOG_CAPACITY) {
    this.entries = new RingBuffer<AlertEvent>(capacity);
  }

  append(event: AlertEvent): void {
    this.entries.push(Object.freeze({ ...event }));
  }

  recent(limit = 100): AlertEvent[] {
    return this.entries.latest(limit);
  }

  get size(): number {
    return this.entries.size;
  }
}
