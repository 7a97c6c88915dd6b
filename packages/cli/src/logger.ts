/**
 * Structured logging.
 *
 * JSON lines on stderr (pretty in development), plus an optional
 * transcript file.
 */

import pino from "pino";
import type { Logger, TransportTargetOptions } from "pino";
import type { ReconcilerLogger } from "@vdi-assign/reconciler";
import type { CliConfig } from "./config.js";

/** What the CLI needs from a logger. A pino Logger satisfies it. */
export interface CliLogger extends ReconcilerLogger {
  error(fields: Record<string, unknown>, message: string): void;
}

const STDERR = 2;

export function createLogger(config: CliConfig): Logger {
  const level = config.LOG_LEVEL;
  const targets: TransportTargetOptions[] = [
    config.NODE_ENV === "development"
      ? {
          target: "pino-pretty",
          level,
          options: { destination: STDERR, colorize: true, translateTime: "SYS:standard" },
        }
      : { target: "pino/file", level, options: { destination: STDERR } },
  ];

  if (config.LOG_FILE !== undefined) {
    targets.push({
      target: "pino/file",
      level,
      options: { destination: config.LOG_FILE, mkdir: true },
    });
  }

  return pino({ name: "vdi-assign", level }, pino.transport({ targets }));
}
