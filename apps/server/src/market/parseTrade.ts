import { tradeFrameSchema } from "@shared/schemas";
import type { TradeEvent } from "@shared/types";

export type ParseResult =
  | { ok: true; event: TradeEvent }
  | { ok: false; reason: string };

/**
 * Turn one raw feed frame into a trade event. Never throws: frames that are
 * not JSON or do not look like an aggregate trade come back as `ok: false`.
 */
export function parseTradeFrame(raw: string, receivedAt: number = Date.now()): ParseResult {
  let json: unknown;
  try {
    json = JSON.parse(raw);
  } catch {
    return { ok: false, reason: "invalid json" };
  }

  const parsed = tradeFrameSchema.safeParse(json);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    return { ok: false, reason: issue ? `${issue.path.join(".") || "frame"}: ${issue.message}` : "schema mismatch" };
  }

  const payload = "data" in parsed.data ? parsed.data.data : parsed.data;

  const event: TradeEvent = Object.freeze({
    timestamp: payload.T ?? receivedAt,
    symbol: payload.s.toUpperCase(),
    price: payload.p,
    quantity: payload.q,
  });

  return { ok: true, event };
}
