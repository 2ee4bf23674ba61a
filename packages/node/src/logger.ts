/**
 * @escrowpoint/node — Logger factory.
 *
 * JSON logs via pino; human-readable output through pino-pretty
 * in development, nothing at all under test.
 */

import { pino } from "pino";
import type { Logger } from "pino";
import type { AppConfig } from "./config.js";

export type { Logger } from "pino";

export function createLogger(
  config: Pick<AppConfig, "LOG_LEVEL" | "NODE_ENV">,
): Logger {
  if (config.NODE_ENV === "test") {
    return createSilentLogger();
  }
  return pino({
    level: config.LOG_LEVEL,
    ...(config.NODE_ENV === "development"
      ? { transport: { target: "pino-pretty" } }
      : {}),
  });
}

export function createSilentLogger(): Logger {
  return pino({ level: "silent" });
}
