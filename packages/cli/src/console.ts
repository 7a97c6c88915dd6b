/**
 * Human-facing console output.
 */

import chalk from "chalk";
import type { ChalkInstance } from "chalk";
import type { AssignmentOutcome, StatusCategory } from "@vdi-assign/types";
import { renderStatus, statusCategory } from "@vdi-assign/reconciler";
import type { RunSummary } from "@vdi-assign/reconciler";

const CATEGORY_STYLE: Record<StatusCategory, ChalkInstance> = {
  success: chalk.green,
  failed: chalk.red,
  skipped: chalk.yellow,
};

export function formatOutcome(outcome: AssignmentOutcome, index: number): string {
  const style = CATEGORY_STYLE[statusCategory(outcome.status)];
  const label = `${outcome.machineName} / ${outcome.userName} / ${outcome.deliveryGroupName}`;
  return `${chalk.dim(`#${index + 1}`)} ${label}: ${style(renderStatus(outcome.status))}`;
}

export function formatSummary(summary: RunSummary, reportPath: string, dryRun: boolean): string[] {
  return [
    chalk.bold(`Processed ${summary.total} record(s)${dryRun ? " (dry run)" : ""}`),
    `  ${chalk.green(`Success: ${summary.succeeded}`)}  ${chalk.red(`Failed: ${summary.failed}`)}  ${chalk.yellow(`Skipped: ${summary.skipped}`)}`,
    `  Report: ${chalk.cyan(reportPath)}`,
  ];
}

export function printOutcome(outcome: AssignmentOutcome, index: number): void {
  console.log(formatOutcome(outcome, index));
}

export function printSummary(summary: RunSummary, reportPath: string, dryRun: boolean): void {
  console.log();
  for (const line of formatSummary(summary, reportPath, dryRun)) {
    console.log(line);
  }
}

export function printError(message: string): void {
  console.error(chalk.red(`Error: ${message}`));
}
