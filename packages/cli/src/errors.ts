/**
 * Precondition failures.
 *
 * Raised before any record is processed. The CLI prints the message,
 * writes no report and exits with code 1.
 */

export type PreconditionCode =
  | "INPUT_NOT_FOUND"
  | "MISSING_COLUMNS"
  | "MALFORMED_INPUT"
  | "BROKER_UNAVAILABLE"
  | "INVALID_CONFIG";

export class PreconditionError extends Error {
  constructor(
    public readonly code: PreconditionCode,
    message: string,
    /** Required columns absent from the input header (MISSING_COLUMNS only) */
    public readonly missingColumns: readonly string[] = [],
  ) {
    super(message);
    this.name = "PreconditionError";
  }
}
