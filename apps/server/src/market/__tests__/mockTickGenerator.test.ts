import { describe, it, expect, vi, afterEach } from "vitest";

import { MockTickGenerator } from "../mockTickGenerator";
import { parseTradeFrame } from "../parseTrade";

describe("MockTickGenerator", () => {
  afterEach(() => {
    vi.useRealTimers();
  });

  it("produces frames the feed parser accepts", () => {
    const generator = new MockTickGenerator(["BTCUSDT"], () => 0.5, () => 42);

    const result = parseTradeFrame(generator.nextFrame("BTCUSDT"));

    expect(result.ok).toBe(true);
    if (result.ok) {
      expect(result.event.symbol).toBe("BTCUSDT");
      expect(result.event.timestamp).toBe(42);
      expect(result.event.price).toBeGreaterThan(0);
    }
  });

  it("stays above the price floor", () => {
    // Always the largest downward step
    const generator = new MockTickGenerator(["ETHUSDT"], () => 0, () => 0);

    for (let i = 0; i < 500; i++) {
      const result = parseTradeFrame(generator.nextFrame("ETHUSDT"));
      expect(result.ok && result.event.price >= 3200 * 0.9).toBe(true);
    }
  });

  it("opens and streams until closed", () => {
    vi.useFakeTimers();
    const generator = new MockTickGenerator(["BTCUSDT", "NEWUSDT"]);
    const onOpen = vi.fn();
    const onMessage = vi.fn();
    const onClose = vi.fn();

    const socket = generator.socketFactory()("ignored", { onOpen, onMessage, onClose, onError: vi.fn() });
    vi.advanceTimersByTime(0);
    expect(onOpen).toHaveBeenCalledTimes(1);

    // 8 ticks/s for BTCUSDT, 4 ticks/s for unknown symbols
    vi.advanceTimersByTime(1000);
    expect(onMessage).toHaveBeenCalledTimes(12);

    socket.close();
    vi.advanceTimersByTime(1000);
    expect(onMessage).toHaveBeenCalledTimes(12);
    expect(onClose).toHaveBeenCalledTimes(1);
  });
});
