/**
 * Zod request body validation.
 */

import type { Context } from "hono";
import type { ZodError, ZodType } from "zod";
import { createErrorEnvelope } from "../types.js";

export type BodyResult<T> =
  | { readonly ok: true; readonly data: T }
  | { readonly ok: false; readonly response: Response };

/**
 * Parse and validate the JSON body of a request.
 *
 * On failure, the result carries a ready-made 400 response.
 */
export async function readBody<T>(c: Context, schema: ZodType<T>): Promise<BodyResult<T>> {
  let body: unknown;
  try {
    body = await c.req.json();
  } catch {
    return {
      ok: false,
      response: c.json(
        createErrorEnvelope("VALIDATION_ERROR", "Invalid JSON in request body"),
        400,
      ),
    };
  }

  const result = schema.safeParse(body);
  if (!result.success) {
    return {
      ok: false,
      response: c.json(
        createErrorEnvelope("VALIDATION_ERROR", "Request body validation failed", {
          issues: formatZodErrors(result.error),
        }),
        400,
      ),
    };
  }

  return { ok: true, data: result.data };
}

function formatZodErrors(
  error: ZodError,
): readonly { path: string; message: string }[] {
  return error.issues.map((issue) => ({
    path: issue.path.join("."),
    message: issue.message,
  }));
}
