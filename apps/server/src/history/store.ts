import type { AggregatedWindow } from "@shared/types";

import { RingBuffer } from "@server/cache/ring";

export const DEFAULT_HISTORY_CAPACITY = 500;

interface InstrumentHistory {
  prices: RingBuffer<number>;
  volumes: RingBuffer<number>;
  timestamps: RingBuffer<number>;
  returns: RingBuffer<number>;
  generation: number;
}

/**
 * Point-in-time copy of one instrument's history, oldest to newest.
 */
export interface HistorySnapshot {
  symbol: string;
  prices: number[];
  volumes: number[];
  timestamps: number[];
  returns: number[];
  generation: number;
}

/**
 * Bounded rolling history per instrument. The flush task is the only writer;
 * every read hands back copies.
 *
 * Each append is tagged with a flush generation so that readers combining two
 * instruments can tell whether both were last written by the same flush.
 */
export class HistoryStore {
  private histories = new Map<string, InstrumentHistory>();

  constructor(readonly capacity: number = DEFAULT_HISTORY_CAPACITY) {
    if (capacity < 2) {
      throw new Error(`HistoryStore: capacity must be at least 2, got ${capacity}`);
    }
  }

  append(window: AggregatedWindow, generation: number): void {
    const history = this.getOrCreate(window.symbol);
    const prior = history.prices.last();

    history.prices.push(window.meanPrice);
    history.volumes.push(window.totalVolume);
    history.timestamps.push(window.timestamp);
    history.generation = generation;

    // No return for the first window, and none across a zero price
    if (prior !== undefined && prior !== 0) {
      history.returns.push((window.meanPrice - prior) / prior);
    }
  }

  /**
   * Tracked symbols in the order they were first seen.
   */
  symbols(): string[] {
    return Array.from(this.histories.keys());
  }

  getPrices(symbol: string, limit?: number): number[] {
    return this.read(symbol, "prices", limit);
  }

  getVolumes(symbol: string, limit?: number): number[] {
    return this.read(symbol, "volumes", limit);
  }

  getTimestamps(symbol: string, limit?: number): number[] {
    return this.read(symbol, "timestamps", limit);
  }

  getReturns(symbol: string, limit?: number): number[] {
    return this.read(symbol, "returns", limit);
  }

  snapshot(symbol: string): HistorySnapshot | null {
    const history = this.histories.get(symbol);
    if (!history) return null;

    return {
      symbol,
      prices: history.prices.toArray(),
      volumes: history.volumes.toArray(),
      timestamps: history.timestamps.toArray(),
      returns: history.returns.toArray(),
      generation: history.generation,
    };
  }

  /**
   * Both snapshots, or null unless both instruments were last written by the
   * same flush generation.
   */
  readPair(a: string, b: string): [HistorySnapshot, HistorySnapshot] | null {
    const left = this.snapshot(a);
    const right = this.snapshot(b);
    if (!left || !right || left.generation !== right.generation) return null;
    return [left, right];
  }

  private read(symbol: string, series: "prices" | "volumes" | "timestamps" | "returns", limit?: number): number[] {
    const history = this.histories.get(symbol);
    if (!history) return [];

    const buffer = history[series];
    return limit === undefined ? buffer.toArray() : buffer.latest(limit);
  }

  private getOrCreate(symbol: string): InstrumentHistory {
    let history = this.histories.get(symbol);
    if (!history) {
      history = {
        prices: new RingBuffer<number>(this.capacity),
        volumes: new RingBuffer<number>(this.capacity),
        timestamps: new RingBuffer<number>(this.capacity),
        // One fewer return than prices, also once the window is full
        returns: new RingBuffer<number>(this.capacity - 1),
        generation: 0,
      };
      this.histories.set(symbol, history);
    }
    return history;
  }
}
