/**
 * Status rendering and run summaries.
 *
 * The rendered text is what lands in the report's Status column.
 */

import type {
  AssignmentOutcome,
  AssignmentStatus,
  StatusCategory,
} from "@vdi-assign/types";
import type { RunSummary } from "./types.js";

export function renderStatus(status: AssignmentStatus): string {
  switch (status.kind) {
    case "skipped-missing-info":
      return "Skipped - Missing required information";
    case "failed-machine-not-found":
      return "Failed - Machine not found";
    case "failed-wrong-group":
      return `Failed - Machine not in delivery group '${status.requestedGroup}' (current group: '${status.actualGroup}')`;
    case "skipped-already-assigned":
      return "Skipped - User already assigned";
    case "success-assigned":
      return "Success - User assigned";
    case "skipped-dry-run":
      return "Skipped - Dry run, user would be assigned";
    case "failed-user-not-found":
      return "Failed - User not found";
    case "failed-assignment-error":
      return `Failed - Assignment error: ${status.message}`;
    case "failed-error":
      return `Failed - Error: ${status.message}`;
  }
}

export function statusCategory(status: AssignmentStatus): StatusCategory {
  switch (status.kind) {
    case "success-assigned":
      return "success";
    case "skipped-missing-info":
    case "skipped-already-assigned":
    case "skipped-dry-run":
      return "skipped";
    case "failed-machine-not-found":
    case "failed-wrong-group":
    case "failed-user-not-found":
    case "failed-assignment-error":
    case "failed-error":
      return "failed";
  }
}

export function summarize(outcomes: readonly AssignmentOutcome[]): RunSummary {
  let succeeded = 0;
  let failed = 0;
  let skipped = 0;

  for (const outcome of outcomes) {
    switch (statusCategory(outcome.status)) {
      case "success":
        succeeded++;
        break;
      case "failed":
        failed++;
        break;
      case "skipped":
        skipped++;
        break;
    }
  }

  return { total: outcomes.length, succeeded, failed, skipped };
}
