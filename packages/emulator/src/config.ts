/**
 * Emulator configuration.
 *
 * Loads and validates configuration from environment variables using Zod.
 */

import { z } from "zod";

export const EmulatorConfigSchema = z.object({
  PORT: z.coerce.number().int().min(1).max(65535).default(4010),
  HOST: z.string().default("127.0.0.1"),
  LOG_LEVEL: z
    .enum(["fatal", "error", "warn", "info", "debug", "trace"])
    .default("info"),
  NODE_ENV: z
    .enum(["development", "production", "test"])
    .default("development"),

  /** Required X-Api-Key value. Unset means the API is open. */
  EMULATOR_API_KEY: z.string().min(1).optional(),
  /** Path to a JSON seed file. Unset means an empty broker. */
  EMULATOR_SEED: z.string().min(1).optional(),
});

export type EmulatorConfig = z.infer<typeof EmulatorConfigSchema>;

/**
 * @throws {z.ZodError} if env vars are invalid
 */
export function loadEmulatorConfig(
  env: Record<string, string | undefined> = process.env,
): EmulatorConfig {
  return EmulatorConfigSchema.parse(env);
}
