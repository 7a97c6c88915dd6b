/**
 * Shared fixtures for CLI tests.
 */

import { mkdtemp, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import type { InMemoryBrokerSeed } from "@vdi-assign/broker";
import type { CliLogger } from "../src/logger.js";

export const SEED: InMemoryBrokerSeed = {
  machines: [
    { uid: "m-1", machineName: "CORP\\VDI-001", desktopGroupName: "Sales" },
    { uid: "m-2", machineName: "CORP\\VDI-002", desktopGroupName: "Engineering" },
  ],
  users: ["CORP\\jdoe", "CORP\\asmith"],
};

export const INPUT = [
  "MachineName,UserName,DeliveryGroupName",
  "VDI-001,jdoe,Sales",
  "VDI-002,asmith,Sales",
  "VDI-404,jdoe,Sales",
  ",jdoe,Sales",
  "",
].join("\n");

/** Report lines for INPUT against SEED on a first run. */
export const FIRST_RUN_REPORT = [
  "MachineName,UserName,DeliveryGroupName,Status",
  "VDI-001,CORP\\jdoe,Sales,Success - User assigned",
  "VDI-002,asmith,Sales,Failed - Machine not in delivery group 'Sales' (current group: 'Engineering')",
  "VDI-404,jdoe,Sales,Failed - Machine not found",
  ",jdoe,Sales,Skipped - Missing required information",
  "",
].join("\r\n");

export const FIXED_DATE = new Date(2024, 0, 2, 3, 4, 5);
export const REPORT_NAME = "AssignmentResults_20240102_030405.csv";

export interface LogRecord {
  readonly level: "debug" | "info" | "warn" | "error";
  readonly fields: Record<string, unknown>;
  readonly message: string;
}

export function createRecordingLogger(): CliLogger & { readonly records: LogRecord[] } {
  const records: LogRecord[] = [];
  return {
    records,
    debug: (fields, message) => records.push({ level: "debug", fields, message }),
    info: (fields, message) => records.push({ level: "info", fields, message }),
    warn: (fields, message) => records.push({ level: "warn", fields, message }),
    error: (fields, message) => records.push({ level: "error", fields, message }),
  };
}

/** A temp directory holding input.csv. */
export async function createWorkspace(content: string = INPUT): Promise<{ dir: string; csvPath: string }> {
  const dir = await mkdtemp(join(tmpdir(), "vdi-assign-run-"));
  const csvPath = join(dir, "input.csv");
  await writeFile(csvPath, content, "utf8");
  return { dir, csvPath };
}
