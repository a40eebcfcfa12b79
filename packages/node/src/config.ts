/**
 * @glstream/node — Configuration.
 *
 * Loads and validates configuration from environment variables using Zod.
 * The entry point loads an optional `.env` file through dotenv first.
 */

import { z } from "zod";
import { MAX_TICK_INTERVAL_MS, parseIsoDate } from "@glstream/generator";

// =============================================================================
// Schema
// =============================================================================

export const ConfigSchema = z.object({
  PORT: z.coerce.number().int().min(1).max(65535).default(8000),
  HOST: z.string().default("0.0.0.0"),
  LOG_LEVEL: z
    .enum(["fatal", "error", "warn", "info", "debug", "trace"])
    .default("info"),
  NODE_ENV: z
    .enum(["development", "production", "test"])
    .default("development"),

  // Service identity
  SERVICE_NAME: z.string().min(1).default("GL Stream"),
  SERVICE_VERSION: z.string().min(1).default("1.0.0"),

  // Generation
  RANDOM_SEED: z.coerce.number().int().min(0).max(0xffffffff).default(42),
  FIXED_START_DATE: z
    .string()
    .refine((v) => parseIsoDate(v) !== undefined, {
      message: "FIXED_START_DATE must be a calendar date in YYYY-MM-DD format",
    })
    .default("2025-11-10"),
  HISTORICAL_DAYS: z.coerce.number().int().min(0).max(3650).default(365),
  STREAMING_INTERVAL_MS: z.coerce.number().int().min(1).max(MAX_TICK_INTERVAL_MS).default(30000),

  // Ingestion pulls
  BATCH_LIMIT_MAX: z.coerce.number().int().min(1).default(10000),
});

export type AppConfig = z.infer<typeof ConfigSchema>;

// =============================================================================
// Loader
// =============================================================================

/**
 * Load and validate configuration from process.env.
 *
 * @throws {z.ZodError} if env vars are invalid
 */
export function loadConfig(
  env: Record<string, string | undefined> = process.env,
): AppConfig {
  return ConfigSchema.parse(env);
}
