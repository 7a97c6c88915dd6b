/**
 * Global error handler.
 *
 * Maps BrokerError codes raised by the in-memory broker to HTTP
 * statuses and the standard error envelope. Anything else is a 500.
 */

import type { Context } from "hono";
import { BrokerError } from "@vdi-assign/broker";
import type { BrokerErrorCode } from "@vdi-assign/broker";
import { createErrorEnvelope } from "../types.js";

type ErrorStatus = 400 | 401 | 403 | 404 | 409 | 500 | 502 | 503 | 504;

const STATUS_MAP: Record<BrokerErrorCode, ErrorStatus> = {
  NOT_FOUND: 404,
  UNAUTHORIZED: 401,
  FORBIDDEN: 403,
  CONFLICT: 409,
  INVALID_REQUEST: 400,
  INVALID_RESPONSE: 502,
  SERVER_ERROR: 500,
  TIMEOUT: 504,
  NETWORK_ERROR: 503,
};

export function handleError(err: Error, c: Context): Response {
  if (err instanceof BrokerError) {
    return c.json(createErrorEnvelope(err.code, err.message), STATUS_MAP[err.code]);
  }

  // Don't leak internals
  return c.json(createErrorEnvelope("INTERNAL_ERROR", "Internal server error"), 500);
}
