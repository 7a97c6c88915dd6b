/**
 * CLI configuration.
 *
 * Environment variables validated with Zod. Command-line flags
 * override the environment and the merged result is validated once.
 */

import { z } from "zod";
import { PreconditionError } from "./errors.js";

// =============================================================================
// Schema
// =============================================================================

export const CliConfigSchema = z.object({
  BROKER_URL: z.string().url(),
  BROKER_API_KEY: z.string().min(1).optional(),
  BROKER_TIMEOUT_MS: z.coerce.number().int().min(1).default(30000),
  REPORT_DIR: z.string().min(1).optional(),
  LOG_LEVEL: z
    .enum(["fatal", "error", "warn", "info", "debug", "trace", "silent"])
    .default("info"),
  LOG_FILE: z.string().min(1).optional(),
  NODE_ENV: z
    .enum(["development", "production", "test"])
    .default("production"),
});

export type CliConfig = z.infer<typeof CliConfigSchema>;

/** Values given on the command line. Undefined means "not given". */
export interface ConfigOverrides {
  readonly brokerUrl?: string | undefined;
  readonly apiKey?: string | undefined;
  readonly timeout?: string | undefined;
  readonly reportDir?: string | undefined;
  readonly logFile?: string | undefined;
}

// =============================================================================
// Loader
// =============================================================================

/**
 * Merge flags over the environment and validate.
 *
 * @throws {PreconditionError} INVALID_CONFIG naming every bad variable
 */
export function loadConfig(
  env: Record<string, string | undefined> = process.env,
  overrides: ConfigOverrides = {},
): CliConfig {
  const merged: Record<string, string | undefined> = { ...env };
  const flagValues: Record<string, string | undefined> = {
    BROKER_URL: overrides.brokerUrl,
    BROKER_API_KEY: overrides.apiKey,
    BROKER_TIMEOUT_MS: overrides.timeout,
    REPORT_DIR: overrides.reportDir,
    LOG_FILE: overrides.logFile,
  };
  for (const [key, value] of Object.entries(flagValues)) {
    if (value !== undefined) {
      merged[key] = value;
    }
  }

  const result = CliConfigSchema.safeParse(merged);
  if (!result.success) {
    const issues = result.error.issues
      .map((issue) => `${issue.path.join(".")}: ${issue.message}`)
      .join("; ");
    throw new PreconditionError("INVALID_CONFIG", `Invalid configuration: ${issues}`);
  }

  return result.data;
}
