/**
 * Logger for the CLI. Logs go to stderr so stdout stays free for CSV.
 */

import pino from "pino";
import type { Logger } from "pino";
import type { EnvConfig } from "./config.js";

export function createLogger(env: EnvConfig): Logger {
  if (env.NODE_ENV === "development") {
    return pino({
      level: env.LOG_LEVEL,
      transport: { target: "pino-pretty", options: { destination: 2 } },
    });
  }
  return pino({ level: env.LOG_LEVEL }, pino.destination(2));
}
