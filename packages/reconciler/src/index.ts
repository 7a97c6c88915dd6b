/**
 * @vdi-assign/reconciler — Per-record assignment reconciliation.
 *
 * For each (machine, user, delivery group) request:
 * 1. Skip records with blank fields
 * 2. Resolve the machine and check its delivery group
 * 3. Qualify the user name with the machine's domain
 * 4. Resolve the user, skip existing assignments, assign
 *
 * Every request yields exactly one outcome, in input order.
 */

export { Reconciler } from "./reconciler.js";

export {
  machineDomain,
  isQualifiedUserName,
  normalizeUserName,
  sameAccount,
} from "./user-name.js";

export { renderStatus, statusCategory, summarize } from "./status.js";

export type {
  ReconcilerConfig,
  ReconcilerLogger,
  ReconcilerErrorCode,
  OutcomeListener,
  RunReport,
  RunSummary,
} from "./types.js";
export { ReconcilerError } from "./types.js";
