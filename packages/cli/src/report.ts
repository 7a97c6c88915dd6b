/**
 * Results report.
 *
 * One row per outcome, in input order, with the rendered status.
 */

import { mkdir, writeFile } from "node:fs/promises";
import { join } from "node:path";
import Papa from "papaparse";
import type { AssignmentOutcome } from "@vdi-assign/types";
import { renderStatus } from "@vdi-assign/reconciler";

export const REPORT_COLUMNS = ["MachineName", "UserName", "DeliveryGroupName", "Status"];

function pad(value: number): string {
  return String(value).padStart(2, "0");
}

/**
 * `AssignmentResults_yyyyMMdd_HHmmss.csv`, in local time.
 */
export function reportFileName(date: Date): string {
  const day = `${date.getFullYear()}${pad(date.getMonth() + 1)}${pad(date.getDate())}`;
  const time = `${pad(date.getHours())}${pad(date.getMinutes())}${pad(date.getSeconds())}`;
  return `AssignmentResults_${day}_${time}.csv`;
}

export function renderReport(outcomes: readonly AssignmentOutcome[]): string {
  return Papa.unparse({
    fields: REPORT_COLUMNS,
    data: outcomes.map((outcome) => [
      outcome.machineName,
      outcome.userName,
      outcome.deliveryGroupName,
      renderStatus(outcome.status),
    ]),
  });
}

/**
 * Write the report into `directory`, creating it if needed.
 *
 * @returns the path of the written file
 */
export async function writeReport(
  outcomes: readonly AssignmentOutcome[],
  directory: string,
  date: Date,
): Promise<string> {
  await mkdir(directory, { recursive: true });
  const path = join(directory, reportFileName(date));
  await writeFile(path, `${renderReport(outcomes)}\r\n`, "utf8");
  return path;
}
