import { z } from "zod";

const symbolList = z
  .string()
  .transform((raw) =>
    raw
      .split(",")
      .map((s) => s.trim().toUpperCase())
      .filter((s) => s.length > 0),
  )
  .pipe(z.array(z.string().regex(/^[A-Z0-9]+$/)).min(1));

// "BTCUSDT:ETHUSDT,SOLUSDT:ETHUSDT" → [["BTCUSDT","ETHUSDT"], ["SOLUSDT","ETHUSDT"]]
const pairList = z
  .string()
  .transform((raw) =>
    raw
      .split(",")
      .map((p) => p.trim())
      .filter((p) => p.length > 0)
      .map((p) => p.split(":").map((s) => s.trim().toUpperCase())),
  )
  .pipe(z.array(z.tuple([z.string().min(1), z.string().min(1)])));

const flag = z
  .enum(["true", "false", "1", "0"])
  .default("false")
  .transform((v) => v === "true" || v === "1");

export const envSchema = z.object({
  NODE_ENV: z.enum(["development", "production", "test"]).default("development"),
  LOG_LEVEL: z.enum(["debug", "info", "warn", "error"]).default("info"),

  // Exchange feed
  FEED_URL: z.string().url().default("wss://fstream.binance.com/stream"),
  SYMBOLS: symbolList.default("BTCUSDT,ETHUSDT"),
  FEED_STALE_MS: z.coerce.number().min(5000).max(600000).default(60000),
  RECONNECT_MAX_ATTEMPTS: z.coerce.number().int().min(1).max(100).default(10),
  RECONNECT_BASE_MS: z.coerce.number().min(100).max(60000).default(1000),
  RECONNECT_MAX_MS: z.coerce.number().min(1000).max(600000).default(60000),
  TRADE_QUEUE_CAPACITY: z.coerce.number().int().min(100).max(1000000).default(10000),

  // Aggregation and analytics
  FLUSH_INTERVAL_MS: z.coerce.number().int().min(100).max(600000).default(5000),
  HISTORY_CAPACITY: z.coerce.number().int().min(20).max(100000).default(500),
  ZSCORE_WINDOW: z.coerce.number().int().min(2).max(100000).default(60),
  CORRELATION_PAIRS: pairList.default("BTCUSDT:ETHUSDT"),
  ALERT_LOG_CAPACITY: z.coerce.number().int().min(10).max(100000).default(1000),

  // Sink retention
  RETENTION_DAYS: z.coerce.number().min(1).max(365).default(7),

  FF_MOCK: flag,
});

export type Env = z.infer<typeof envSchema>;

export function validateEnv(env: Record<string, string | undefined>): Env {
  const result = envSchema.safeParse(env);

  if (!result.success) {
    console.error("❌ Environment validation failed:");
    console.error(result.error.format());
    throw new Error("Invalid environment variables");
  }

  return result.data;
}
