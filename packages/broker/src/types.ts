/**
 * @vdi-assign/broker — Broker contract.
 *
 * The reconciler depends only on this interface. Session setup,
 * transport and the broker's own data store live behind it.
 */

import type { Machine, BrokerUser } from "@vdi-assign/types";

// =============================================================================
// Broker
// =============================================================================

export interface Broker {
  /** Resolves when the broker is reachable and accepts our credentials. */
  checkConnection(): Promise<void>;

  /** Find a machine by name. Resolves null when the broker has none. */
  findMachine(name: string): Promise<Machine | null>;

  /** Find a directory user by "DOMAIN\user". Resolves null when unknown. */
  findUser(name: string): Promise<BrokerUser | null>;

  /** Names of the users already assigned to a machine. */
  listAssignedUsers(machineUid: string): Promise<readonly string[]>;

  /** Bind a user to a machine. The only mutating call. */
  assignUser(userName: string, machineUid: string): Promise<void>;
}

// =============================================================================
// Errors
// =============================================================================

/**
 * Error codes for broker operations.
 */
export type BrokerErrorCode =
  | "NOT_FOUND"
  | "UNAUTHORIZED"
  | "FORBIDDEN"
  | "CONFLICT"
  | "INVALID_REQUEST"
  | "INVALID_RESPONSE"
  | "SERVER_ERROR"
  | "TIMEOUT"
  | "NETWORK_ERROR";

const TRANSIENT_CODES = new Set<BrokerErrorCode>([
  "SERVER_ERROR",
  "TIMEOUT",
  "NETWORK_ERROR",
]);

/**
 * Error thrown by Broker implementations.
 *
 * The message is the text the broker (or the transport) reported.
 */
export class BrokerError extends Error {
  constructor(
    public readonly code: BrokerErrorCode,
    message: string,
    /** HTTP status, 0 when no response was received */
    public readonly statusCode: number = 0,
  ) {
    super(message);
    this.name = "BrokerError";
  }

  /** Whether the same call could succeed if issued again later. */
  get transient(): boolean {
    return TRANSIENT_CODES.has(this.code);
  }
}

export function isTransientBrokerError(error: unknown): boolean {
  return error instanceof BrokerError && error.transient;
}

// =============================================================================
// HTTP client configuration
// =============================================================================

export interface HttpBrokerConfig {
  /** Base URL of the broker's REST management endpoint */
  readonly baseUrl: string;
  /** API key sent as X-Api-Key */
  readonly apiKey?: string | undefined;
  /** Request timeout in milliseconds (default: 30000) */
  readonly timeout?: number | undefined;
  /** Custom fetch function (for testing) */
  readonly fetchFn?: typeof fetch | undefined;
}
