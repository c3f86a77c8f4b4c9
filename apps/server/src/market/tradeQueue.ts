import type { TradeEvent } from "@shared/types";

import { RingBuffer } from "@server/cache/ring";

export interface TradeQueueStats {
  queued: number;
  dropped: number;
  capacity: number;
}

/**
 * Bounded hand-off between the feed client and the window aggregator.
 *
 * Policy is drop-oldest: when the consumer falls behind, the stalest trades are
 * discarded so the next window reflects the most recent market. Every drop is
 * counted; `onOverflow` fires once per burst (the first drop after the queue was
 * last drained).
 */
export class TradeQueue {
  private buffer: RingBuffer<TradeEvent>;
  private droppedCount = 0;
  private overflowing = false;

  constructor(
    readonly capacity: number,
    private onOverflow?: (stats: TradeQueueStats) => void,
  ) {
    this.buffer = new RingBuffer<TradeEvent>(capacity);
  }

  push(event: TradeEvent): void {
    const evicted = this.buffer.push(event);
    if (evicted === undefined) return;

    this.droppedCount++;
    if (!this.overflowing) {
      this.overflowing = true;
      this.onOverflow?.(this.getStats());
    }
  }

  /**
   * Remove and return everything queued, in arrival order.
   */
  drain(): TradeEvent[] {
    const events = this.buffer.toArray();
    this.buffer.dropWhile(() => true);
    this.overflowing = false;
    return events;
  }

  get size(): number {
    return this.buffer.size;
  }

  getStats(): TradeQueueStats {
    return {
      queued: this.buffer.size,
      dropped: this.droppedCount,
      capacity: this.capacity,
    };
  }
}
