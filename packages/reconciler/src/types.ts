/**
 * @vdi-assign/reconciler domain types.
 */

import type { AssignmentOutcome } from "@vdi-assign/types";
import type { Broker } from "@vdi-assign/broker";

// =============================================================================
// Configuration
// =============================================================================

/**
 * Structured logger accepted by the reconciler.
 *
 * A pino logger satisfies it; tests pass a recording stub.
 */
export interface ReconcilerLogger {
  debug(fields: Record<string, unknown>, message: string): void;
  info(fields: Record<string, unknown>, message: string): void;
  warn(fields: Record<string, unknown>, message: string): void;
}

/** Called once per record, in input order, as soon as its outcome exists. */
export type OutcomeListener = (outcome: AssignmentOutcome, index: number) => void;

export interface ReconcilerConfig {
  readonly broker: Broker;
  readonly logger?: ReconcilerLogger | undefined;
  /** Run every read-only step but never call assignUser */
  readonly dryRun?: boolean | undefined;
}

// =============================================================================
// Run Report
// =============================================================================

export interface RunSummary {
  readonly total: number;
  readonly succeeded: number;
  readonly failed: number;
  readonly skipped: number;
}

export interface RunReport {
  /** One outcome per request, in input order */
  readonly outcomes: readonly AssignmentOutcome[];
  readonly summary: RunSummary;
  readonly startedAt: string;
  readonly finishedAt: string;
  readonly dryRun: boolean;
}

// =============================================================================
// Errors
// =============================================================================

export type ReconcilerErrorCode = "MACHINE_WITHOUT_DOMAIN";

export class ReconcilerError extends Error {
  constructor(
    public readonly code: ReconcilerErrorCode,
    message: string,
  ) {
    super(message);
    this.name = "ReconcilerError";
  }
}
