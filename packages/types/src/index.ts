/**
 * @vdi-assign/types — Shared domain types.
 *
 * Used by every package in the workspace:
 * - Assignment requests and outcomes
 * - Broker entities (machines, users)
 *
 * Design rules:
 * - All types are immutable (readonly)
 * - No runtime dependencies
 */

export type {
  AssignmentRequest,
  AssignmentStatus,
  AssignmentStatusKind,
  AssignmentOutcome,
  StatusCategory,
} from "./assignment.js";

export type { Machine, BrokerUser } from "./broker.js";
export { DOMAIN_SEPARATOR } from "./broker.js";
