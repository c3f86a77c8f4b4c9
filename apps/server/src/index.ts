import { validateEnv } from "@shared/env";

import { installCrashHandlers } from "./crashHandlers";
import { logger } from "./logger";
import { createSessionFromEnv } from "./wiring";

installCrashHandlers(logger);

const env = validateEnv(process.env);
const session = createSessionFromEnv(env);

session.bus.on("alert:triggered", (event) => {
  logger.info({ alert: event }, "Alert");
});

session.bus.on("feed:status", (status) => {
  if (status.state === "failed") {
    logger.error({ status }, "Trade feed failed; restart the process to reconnect");
  }
});

await session.start();

logger.info(
  {
    env: env.NODE_ENV,
    symbols: env.SYMBOLS,
    feed: env.FF_MOCK ? "mock" : env.FEED_URL,
    flushIntervalMs: env.FLUSH_INTERVAL_MS,
  },
  "Trade analytics running",
);

let stopping = false;

function shutdown(signal: string) {
  if (stopping) return;
  stopping = true;
  logger.info({ signal }, "Shutting down");

  session
    .stop()
    .then(() => process.exit(0))
    .catch((err: unknown) => {
      logger.error({ err }, "Error during shutdown");
      process.exit(1);
    });
}

process.on("SIGTERM", () => shutdown("SIGTERM"));
process.on("SIGINT", () => shutdown("SIGINT"));
