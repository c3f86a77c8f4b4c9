import { z } from "zod";

import { ALERT_METRICS, COMPARATORS } from "./types/alerts";

const decimal = z.union([z.number(), z.string().trim().min(1)]);

/**
 * Aggregate-trade payload as the exchange sends it. Prices and quantities
 * arrive as decimal strings.
 */
export const tradePayloadSchema = z.object({
  s: z.string().min(1),
  p: decimal.pipe(z.coerce.number().finite().positive()),
  q: decimal.pipe(z.coerce.number().finite().nonnegative()),
  T: z.number().int().nonnegative().optional(),
});

// Combined-stream frames wrap the payload: { stream: "btcusdt@aggTrade", data: {...} }
export const combinedFrameSchema = z.object({
  stream: z.string(),
  data: tradePayloadSchema,
});

export const tradeFrameSchema = z.union([combinedFrameSchema, tradePayloadSchema]);

export type TradePayload = z.infer<typeof tradePayloadSchema>;
export type TradeFrame = z.infer<typeof tradeFrameSchema>;

export const alertRuleInputSchema = z.object({
  symbol: z.string().trim().min(1).transform((s) => s.toUpperCase()),
  metric: z.enum(ALERT_METRICS),
  comparator: z.enum(COMPARATORS),
  threshold: z.number().finite(),
  enabled: z.boolean().default(true),
});

export const alertRulePatchSchema = alertRuleInputSchema
  .partial()
  .refine((patch) => Object.keys(patch).length > 0, {
    message: "Update must change at least one field",
  });

export type AlertRuleInput = z.input<typeof alertRuleInputSchema>;
export type AlertRulePatch = z.input<typeof alertRulePatchSchema>;

export const backtestOptionsSchema = z.object({
  period: z.number().int().min(2).default(20),
  entryThreshold: z.number().finite().nonnegative().default(2.0),
  exitThreshold: z.number().finite().nonnegative().default(0.0),
});

export type BacktestOptions = z.input<typeof backtestOptionsSchema>;
