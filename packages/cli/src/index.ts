/**
 * @ledgerline/cli — Command-line surface of the replay engine.
 */

export { run, USAGE } from "./run.js";
export type { RunIo } from "./run.js";
export { processTransactions } from "./processor.js";
export type { ProcessOptions, ProcessSummary, RejectedRecord } from "./processor.js";
export { loadConfig, ConfigSchema } from "./config.js";
export type { AppConfig, ErrorPolicy } from "./config.js";
export { createLogger } from "./logger.js";
export type { LoggerConfig } from "./logger.js";
export { EXIT_CODES, exitCodeFor } from "./exit-codes.js";
export type { ExitCode } from "./exit-codes.js";
