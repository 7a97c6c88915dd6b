/**
 * Emulator application types.
 *
 * All error responses follow the shape:
 * { error: { code: string, message: string } }
 */

/**
 * Hono environment type for the emulator app.
 *
 * Middleware populates Variables; route handlers read them via c.get().
 */
export interface AppEnv {
  Variables: {
    /** Unique request identifier (set by request-id middleware) */
    requestId: string;
  };
}

export type EmulatorErrorCode =
  | "VALIDATION_ERROR"
  | "NOT_FOUND"
  | "UNAUTHORIZED"
  | "FORBIDDEN"
  | "CONFLICT"
  | "INTERNAL_ERROR";

export interface ErrorEnvelope {
  readonly error: {
    readonly code: EmulatorErrorCode | string;
    readonly message: string;
    readonly details?: Record<string, unknown>;
  };
}

export function createErrorEnvelope(
  code: EmulatorErrorCode | string,
  message: string,
  details?: Record<string, unknown>,
): ErrorEnvelope {
  if (details !== undefined) {
    return { error: { code, message, details } };
  }
  return { error: { code, message } };
}
