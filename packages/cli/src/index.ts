/**
 * @vdi-assign/cli — Bulk desktop assignment from a CSV file.
 */

export { runCli, runMain } from "./cli.js";
export type { CliDependencies } from "./cli.js";
export { runAssignments } from "./run.js";
export type { RunAssignmentsOptions, RunAssignmentsResult } from "./run.js";
export { readAssignmentCsv, parseAssignmentCsv, REQUIRED_COLUMNS } from "./csv-input.js";
export type { CsvReadOptions } from "./csv-input.js";
export { reportFileName, renderReport, writeReport, REPORT_COLUMNS } from "./report.js";
export { loadConfig, CliConfigSchema } from "./config.js";
export type { CliConfig, ConfigOverrides } from "./config.js";
export { createLogger } from "./logger.js";
export type { CliLogger } from "./logger.js";
export { formatOutcome, formatSummary } from "./console.js";
export { PreconditionError } from "./errors.js";
export type { PreconditionCode } from "./errors.js";
