/**
 * @ledgerline/cli — Configuration.
 *
 * Loads and validates configuration from environment variables using Zod.
 */

import { z } from "zod";
import { DEFAULT_PRECISION, MAX_PRECISION } from "@ledgerline/ledger";

// =============================================================================
// Schema
// =============================================================================

export const ConfigSchema = z.object({
  LOG_LEVEL: z
    .enum(["fatal", "error", "warn", "info", "debug", "trace", "silent"])
    .default("warn"),
  LOG_PRETTY: z
    .string()
    .transform((v) => v === "true")
    .default("false"),

  // Processing
  ON_ERROR: z.enum(["halt", "skip"]).default("halt"),

  // CSV
  AMOUNT_PRECISION: z.coerce.number().int().min(0).max(MAX_PRECISION).default(DEFAULT_PRECISION),
  CSV_DELIMITER: z.string().length(1).default(","),
});

export type AppConfig = z.infer<typeof ConfigSchema>;

export type ErrorPolicy = AppConfig["ON_ERROR"];

// =============================================================================
// Loader
// =============================================================================

/**
 * Load and validate configuration from process.env.
 *
 * @throws {z.ZodError} if an env var is invalid
 */
export function loadConfig(
  env: Record<string, string | undefined> = process.env,
): AppConfig {
  return ConfigSchema.parse(env);
}
