import type { EventEmitter } from "events";

import type { Logger } from "./logger";

/**
 * Log fatal process faults and exit non-zero. Install before anything async
 * starts so startup failures are reported too.
 */
export function installCrashHandlers(
  log: Logger,
  target: EventEmitter = process,
  exit: (code: number) => void = (code) => process.exit(code),
): void {
  target.on("uncaughtException", (error: unknown) => {
    log.fatal({ err: error }, "Uncaught exception, exiting");
    exit(1);
  });

  target.on("unhandledRejection", (reason: unknown) => {
    log.fatal({ reason }, "Unhandled rejection, exiting");
    exit(1);
  });
}
