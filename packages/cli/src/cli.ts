/**
 * Command-line program.
 *
 * Exit code 0 when every record was processed, whatever the
 * per-record results; 1 on a precondition failure.
 */

import { Command, CommanderError } from "commander";
import { z } from "zod";
import { HttpBroker } from "@vdi-assign/broker";
import type { Broker } from "@vdi-assign/broker";
import { loadConfig } from "./config.js";
import type { CliConfig } from "./config.js";
import { createLogger } from "./logger.js";
import type { CliLogger } from "./logger.js";
import { runAssignments } from "./run.js";
import { PreconditionError } from "./errors.js";
import { printError, printOutcome, printSummary } from "./console.js";

// =============================================================================
// Dependencies
// =============================================================================

export interface CliDependencies {
  readonly env?: Record<string, string | undefined> | undefined;
  readonly createBroker?: ((config: CliConfig) => Broker) | undefined;
  readonly createLogger?: ((config: CliConfig) => CliLogger) | undefined;
  readonly now?: (() => Date) | undefined;
}

function createHttpBroker(config: CliConfig): Broker {
  return new HttpBroker({
    baseUrl: config.BROKER_URL,
    apiKey: config.BROKER_API_KEY,
    timeout: config.BROKER_TIMEOUT_MS,
  });
}

const FlagsSchema = z.object({
  brokerUrl: z.string().optional(),
  apiKey: z.string().optional(),
  reportDir: z.string().optional(),
  delimiter: z.string().length(1, "Delimiter must be a single character").optional(),
  dryRun: z.boolean().default(false),
  logFile: z.string().optional(),
  timeout: z.string().optional(),
});

type Flags = z.infer<typeof FlagsSchema>;

// =============================================================================
// Program
// =============================================================================

async function execute(csvPath: string, flags: Flags, deps: CliDependencies): Promise<number> {
  let config: CliConfig;
  try {
    config = loadConfig(deps.env ?? process.env, {
      brokerUrl: flags.brokerUrl,
      apiKey: flags.apiKey,
      timeout: flags.timeout,
      reportDir: flags.reportDir,
      logFile: flags.logFile,
    });
  } catch (error) {
    if (error instanceof PreconditionError) {
      printError(error.message);
      return 1;
    }
    throw error;
  }

  const logger: CliLogger = (deps.createLogger ?? createLogger)(config);
  const broker = (deps.createBroker ?? createHttpBroker)(config);

  try {
    const { report, reportPath } = await runAssignments({
      csvPath,
      broker,
      logger,
      reportDir: config.REPORT_DIR,
      dryRun: flags.dryRun,
      delimiter: flags.delimiter,
      now: deps.now,
      onOutcome: printOutcome,
    });
    printSummary(report.summary, reportPath, report.dryRun);
    return 0;
  } catch (error) {
    if (error instanceof PreconditionError) {
      logger.error({ code: error.code, csvPath }, error.message);
      printError(error.message);
      return 1;
    }
    throw error;
  }
}

/**
 * Parse `argv` (without the node and script entries) and run.
 *
 * @returns the process exit code
 */
export async function runCli(
  argv: readonly string[],
  deps: CliDependencies = {},
): Promise<number> {
  let exitCode = 0;

  const program = new Command()
    .name("vdi-assign")
    .description("Assign desktop machines to users from a CSV file")
    .argument("<csv>", "input file with MachineName, UserName, DeliveryGroupName columns")
    .option("--broker-url <url>", "broker REST base URL (env BROKER_URL)")
    .option("--api-key <key>", "broker API key (env BROKER_API_KEY)")
    .option("--report-dir <dir>", "report directory (default: the input file's directory)")
    .option("--delimiter <char>", "field delimiter (default: detected)")
    .option("--dry-run", "check every record without assigning")
    .option("--log-file <path>", "also write structured logs to this file")
    .option("--timeout <ms>", "per-request timeout in milliseconds")
    .exitOverride()
    .action(async (csvPath: string, options: unknown) => {
      const flags = FlagsSchema.safeParse(options);
      if (!flags.success) {
        printError(flags.error.issues.map((issue) => issue.message).join("; "));
        exitCode = 1;
        return;
      }
      exitCode = await execute(csvPath, flags.data, deps);
    });

  try {
    await program.parseAsync([...argv], { from: "user" });
  } catch (error) {
    if (error instanceof CommanderError) {
      return error.exitCode;
    }
    throw error;
  }

  return exitCode;
}

/**
 * Process entry: like runCli, but an unexpected error is printed and
 * mapped to exit code 1 instead of rejecting.
 */
export async function runMain(
  argv: readonly string[],
  deps: CliDependencies = {},
): Promise<number> {
  try {
    return await runCli(argv, deps);
  } catch (err) {
    // eslint-disable-next-line no-console
    console.error("Fatal error:", err);
    return 1;
  }
}
