/**
 * One assignment run, end to end.
 *
 * Read the input, check the broker, reconcile every record, write
 * the report. Precondition failures throw before the first record
 * and leave no report behind.
 */

import { dirname, resolve } from "node:path";
import type { Broker } from "@vdi-assign/broker";
import { Reconciler } from "@vdi-assign/reconciler";
import type { OutcomeListener, ReconcilerLogger, RunReport } from "@vdi-assign/reconciler";
import { readAssignmentCsv } from "./csv-input.js";
import { writeReport } from "./report.js";
import { PreconditionError } from "./errors.js";

export interface RunAssignmentsOptions {
  readonly csvPath: string;
  readonly broker: Broker;
  readonly logger?: ReconcilerLogger | undefined;
  /** Where the report goes. Defaults to the input file's directory. */
  readonly reportDir?: string | undefined;
  readonly dryRun?: boolean | undefined;
  readonly delimiter?: string | undefined;
  /** Clock for the report file name */
  readonly now?: (() => Date) | undefined;
  readonly onOutcome?: OutcomeListener | undefined;
}

export interface RunAssignmentsResult {
  readonly report: RunReport;
  readonly reportPath: string;
}

export async function runAssignments(
  options: RunAssignmentsOptions,
): Promise<RunAssignmentsResult> {
  const { broker, logger } = options;
  const csvPath = resolve(options.csvPath);

  const requests = await readAssignmentCsv(csvPath, { delimiter: options.delimiter });
  logger?.info({ csvPath, records: requests.length }, "Input loaded");

  try {
    await broker.checkConnection();
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    throw new PreconditionError("BROKER_UNAVAILABLE", `Cannot connect to broker: ${message}`);
  }

  const reconciler = new Reconciler({ broker, logger, dryRun: options.dryRun });
  const report = await reconciler.run(requests, options.onOutcome);

  const directory = options.reportDir ?? dirname(csvPath);
  const now = options.now ?? (() => new Date());
  const reportPath = await writeReport(report.outcomes, directory, now());
  logger?.info({ reportPath }, "Report written");

  return { report, reportPath };
}
