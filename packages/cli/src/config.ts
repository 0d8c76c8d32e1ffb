/**
 * @tally/cli — Configuration.
 *
 * Loads and validates configuration from environment variables using Zod.
 */

import { z } from "zod";

// =============================================================================
// Schema
// =============================================================================

export const ConfigSchema = z
  .object({
    LOG_LEVEL: z
      .enum(["fatal", "error", "warn", "info", "debug", "trace", "silent"])
      .default("error"),
    NODE_ENV: z
      .enum(["development", "production", "test"])
      .default("production"),

    // Route logs through pino-pretty (still on stderr); on by default in development
    LOG_PRETTY: z.string().optional(),
  })
  .transform((env) => ({
    LOG_LEVEL: env.LOG_LEVEL,
    NODE_ENV: env.NODE_ENV,
    LOG_PRETTY:
      env.LOG_PRETTY === undefined ? env.NODE_ENV === "development" : env.LOG_PRETTY === "true",
  }));

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
