/**
 * Input file reading.
 *
 * The input is a delimited file with a header row naming at least
 * MachineName, UserName and DeliveryGroupName. Values are passed on
 * verbatim.
 */

import { readFile } from "node:fs/promises";
import Papa from "papaparse";
import type { AssignmentRequest } from "@vdi-assign/types";
import { PreconditionError } from "./errors.js";

export const REQUIRED_COLUMNS = ["MachineName", "UserName", "DeliveryGroupName"] as const;

export interface CsvReadOptions {
  /** Field delimiter. Detected from the content when omitted. */
  readonly delimiter?: string | undefined;
}

type CsvRow = Record<string, string | undefined>;

function isFileNotFound(error: unknown): boolean {
  return error instanceof Error && "code" in error && error.code === "ENOENT";
}

function stripBom(text: string): string {
  return text.charCodeAt(0) === 0xfeff ? text.slice(1) : text;
}

/**
 * Parse CSV text into assignment requests.
 *
 * @throws {PreconditionError} MISSING_COLUMNS when a required header is
 *   absent, MALFORMED_INPUT on unbalanced quotes
 */
export function parseAssignmentCsv(
  text: string,
  options: CsvReadOptions = {},
): AssignmentRequest[] {
  const result = Papa.parse<CsvRow>(stripBom(text), {
    header: true,
    // Only truly empty lines; a row of blank cells is still a record
    skipEmptyLines: true,
    // Empty string lets papaparse guess
    delimiter: options.delimiter ?? "",
  });

  // Short rows (TooFewFields) are tolerated; broken quoting is not
  const quoteError = result.errors.find((error) => error.type === "Quotes");
  if (quoteError !== undefined) {
    const where = quoteError.row !== undefined ? ` at record ${quoteError.row + 1}` : "";
    throw new PreconditionError("MALFORMED_INPUT", `Malformed input${where}: ${quoteError.message}`);
  }

  const fields = result.meta.fields ?? [];
  const missing = REQUIRED_COLUMNS.filter((column) => !fields.includes(column));
  if (missing.length > 0) {
    throw new PreconditionError(
      "MISSING_COLUMNS",
      `Input is missing required columns: ${missing.join(", ")}`,
      missing,
    );
  }

  return result.data.map((row) => ({
    machineName: row["MachineName"] ?? "",
    userName: row["UserName"] ?? "",
    deliveryGroupName: row["DeliveryGroupName"] ?? "",
  }));
}

/**
 * Read and parse an input file (UTF-8, optional BOM).
 *
 * @throws {PreconditionError} INPUT_NOT_FOUND, MISSING_COLUMNS or MALFORMED_INPUT
 */
export async function readAssignmentCsv(
  path: string,
  options: CsvReadOptions = {},
): Promise<AssignmentRequest[]> {
  let text: string;
  try {
    text = await readFile(path, "utf8");
  } catch (error) {
    if (isFileNotFound(error)) {
      throw new PreconditionError("INPUT_NOT_FOUND", `Input file not found: ${path}`);
    }
    throw error;
  }

  return parseAssignmentCsv(text, options);
}
