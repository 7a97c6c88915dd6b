/**
 * Assignment Types
 *
 * A run starts from AssignmentRequests (one per CSV row) and ends
 * with exactly one AssignmentOutcome per request, in input order.
 */

// =============================================================================
// Request
// =============================================================================

/**
 * One row of the input file.
 *
 * Values are kept verbatim; any of them may be empty or whitespace.
 */
export interface AssignmentRequest {
  readonly machineName: string;
  readonly userName: string;
  readonly deliveryGroupName: string;
}

// =============================================================================
// Status
// =============================================================================

export type AssignmentStatus =
  | { readonly kind: "skipped-missing-info" }
  | { readonly kind: "failed-machine-not-found" }
  | {
      readonly kind: "failed-wrong-group";
      readonly requestedGroup: string;
      /** The group the machine actually belongs to */
      readonly actualGroup: string;
    }
  | { readonly kind: "skipped-already-assigned" }
  | { readonly kind: "success-assigned" }
  | { readonly kind: "skipped-dry-run" }
  | { readonly kind: "failed-user-not-found" }
  | {
      /** The assigned-user listing or the assignment call failed */
      readonly kind: "failed-assignment-error";
      readonly message: string;
      readonly retryable: boolean;
    }
  | {
      readonly kind: "failed-error";
      /** Raw text of the underlying error */
      readonly message: string;
      /** True when the underlying broker failure was transient */
      readonly retryable: boolean;
    };

export type AssignmentStatusKind = AssignmentStatus["kind"];

export type StatusCategory = "success" | "failed" | "skipped";

// =============================================================================
// Outcome
// =============================================================================

/**
 * Result of reconciling one request.
 *
 * `userName` holds the domain-qualified name once it has been
 * normalized against the machine's domain.
 */
export interface AssignmentOutcome {
  readonly machineName: string;
  readonly userName: string;
  readonly deliveryGroupName: string;
  readonly status: AssignmentStatus;
}
