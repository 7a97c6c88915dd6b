/**
 * Reconciler — per-record assignment loop
 *
 * Turns each AssignmentRequest into exactly one AssignmentOutcome:
 * validate → resolve machine → check delivery group → qualify user
 * name → resolve user → skip if already assigned → assign.
 *
 * Records are processed strictly one after another. Nothing a single
 * record does can throw out of the loop; every failure becomes that
 * record's outcome.
 *
 * Usage:
 *   const reconciler = new Reconciler({ broker, logger });
 *   const report = await reconciler.run(requests, (outcome) => print(outcome));
 */

import type {
  AssignmentRequest,
  AssignmentOutcome,
  AssignmentStatus,
  Machine,
} from "@vdi-assign/types";
import type { Broker } from "@vdi-assign/broker";
import { BrokerError, isTransientBrokerError } from "@vdi-assign/broker";
import { normalizeUserName, sameAccount } from "./user-name.js";
import { renderStatus, statusCategory, summarize } from "./status.js";
import type {
  OutcomeListener,
  ReconcilerConfig,
  ReconcilerLogger,
  RunReport,
} from "./types.js";

const SILENT_LOGGER: ReconcilerLogger = {
  debug: () => {},
  info: () => {},
  warn: () => {},
};

function isBlank(value: string): boolean {
  return value.trim().length === 0;
}

function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

function errorCode(error: unknown): string | undefined {
  return error instanceof BrokerError ? error.code : undefined;
}

function failedWith(error: unknown): AssignmentStatus {
  return {
    kind: "failed-error",
    message: errorMessage(error),
    retryable: isTransientBrokerError(error),
  };
}

function assignmentFailedWith(error: unknown): AssignmentStatus {
  return {
    kind: "failed-assignment-error",
    message: errorMessage(error),
    retryable: isTransientBrokerError(error),
  };
}

export class Reconciler {
  private readonly broker: Broker;
  private readonly logger: ReconcilerLogger;
  private readonly dryRun: boolean;

  constructor(config: ReconcilerConfig) {
    this.broker = config.broker;
    this.logger = config.logger ?? SILENT_LOGGER;
    this.dryRun = config.dryRun ?? false;
  }

  /**
   * Reconcile every request in order and summarize the results.
   */
  async run(
    requests: readonly AssignmentRequest[],
    onOutcome?: OutcomeListener,
  ): Promise<RunReport> {
    const startedAt = new Date().toISOString();
    const outcomes: AssignmentOutcome[] = [];

    this.logger.info(
      { records: requests.length, dryRun: this.dryRun },
      "Assignment run started",
    );

    for (const [index, request] of requests.entries()) {
      const outcome = await this.reconcileRecord(request);
      outcomes.push(outcome);
      this.logOutcome(outcome, index);
      onOutcome?.(outcome, index);
    }

    const summary = summarize(outcomes);
    this.logger.info({ ...summary }, "Assignment run finished");

    return {
      outcomes,
      summary,
      startedAt,
      finishedAt: new Date().toISOString(),
      dryRun: this.dryRun,
    };
  }

  /**
   * Reconcile a single request. Never rejects.
   */
  async reconcileRecord(request: AssignmentRequest): Promise<AssignmentOutcome> {
    if (
      isBlank(request.machineName) ||
      isBlank(request.userName) ||
      isBlank(request.deliveryGroupName)
    ) {
      return this.outcome(request, request.userName, { kind: "skipped-missing-info" });
    }

    try {
      const machine = await this.resolveMachine(request.machineName);
      if (machine === null) {
        return this.outcome(request, request.userName, { kind: "failed-machine-not-found" });
      }

      if (machine.desktopGroupName !== request.deliveryGroupName) {
        return this.outcome(request, request.userName, {
          kind: "failed-wrong-group",
          requestedGroup: request.deliveryGroupName,
          actualGroup: machine.desktopGroupName,
        });
      }

      const userName = normalizeUserName(request.userName, machine.machineName);
      return await this.assign(request, machine, userName);
    } catch (error) {
      return this.outcome(request, request.userName, failedWith(error));
    }
  }

  // ===========================================================================
  // Steps
  // ===========================================================================

  /**
   * A failed lookup counts as "not found"; the cause is logged.
   */
  private async resolveMachine(machineName: string): Promise<Machine | null> {
    try {
      return await this.broker.findMachine(machineName);
    } catch (error) {
      this.logger.warn(
        { machineName, code: errorCode(error), error: errorMessage(error) },
        "Machine lookup failed",
      );
      return null;
    }
  }

  /**
   * Resolve the user and bind it to the machine. Guarded on its own so
   * user-side failures never read as machine-side ones.
   */
  private async assign(
    request: AssignmentRequest,
    machine: Machine,
    userName: string,
  ): Promise<AssignmentOutcome> {
    let found: boolean;
    try {
      found = (await this.broker.findUser(userName)) !== null;
    } catch (error) {
      this.logger.warn(
        { userName, code: errorCode(error), error: errorMessage(error) },
        "User lookup failed",
      );
      found = false;
    }

    if (!found) {
      return this.outcome(request, userName, { kind: "failed-user-not-found" });
    }

    try {
      const assigned = await this.broker.listAssignedUsers(machine.uid);
      if (assigned.some((name) => sameAccount(name, userName))) {
        return this.outcome(request, userName, { kind: "skipped-already-assigned" });
      }

      if (this.dryRun) {
        return this.outcome(request, userName, { kind: "skipped-dry-run" });
      }

      await this.broker.assignUser(userName, machine.uid);
      return this.outcome(request, userName, { kind: "success-assigned" });
    } catch (error) {
      return this.outcome(request, userName, assignmentFailedWith(error));
    }
  }

  // ===========================================================================
  // Helpers
  // ===========================================================================

  private outcome(
    request: AssignmentRequest,
    userName: string,
    status: AssignmentStatus,
  ): AssignmentOutcome {
    return {
      machineName: request.machineName,
      userName,
      deliveryGroupName: request.deliveryGroupName,
      status,
    };
  }

  private logOutcome(outcome: AssignmentOutcome, index: number): void {
    const fields: Record<string, unknown> = {
      index,
      machineName: outcome.machineName,
      userName: outcome.userName,
      deliveryGroupName: outcome.deliveryGroupName,
      status: renderStatus(outcome.status),
    };
    if (
      outcome.status.kind === "failed-error" ||
      outcome.status.kind === "failed-assignment-error"
    ) {
      fields.retryable = outcome.status.retryable;
    }

    if (statusCategory(outcome.status) === "failed") {
      this.logger.warn(fields, "Record failed");
    } else {
      this.logger.info(fields, "Record processed");
    }
  }
}
