/**
 * Structured logging.
 *
 * pino JSON logs go to stderr; stdout is reserved for the account CSV.
 */

import pino from "pino";
import type { DestinationStream, Logger } from "pino";
import type { AppConfig } from "./config.js";

export type LoggerConfig = Pick<AppConfig, "LOG_LEVEL" | "LOG_PRETTY">;

/**
 * Create the run logger.
 *
 * `destination` overrides stderr for plain JSON output; it is ignored when
 * LOG_PRETTY routes logs through the pino-pretty transport.
 */
export function createLogger(config: LoggerConfig, destination?: DestinationStream): Logger {
  const options = { name: "ledgerline", level: config.LOG_LEVEL };

  if (config.LOG_PRETTY) {
    return pino({
      ...options,
      transport: { target: "pino-pretty", options: { destination: 2 } },
    });
  }

  return pino(options, destination ?? pino.destination({ dest: 2, sync: true }));
}
