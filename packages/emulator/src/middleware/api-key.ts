/**
 * API key middleware.
 *
 * Rejects requests whose X-Api-Key header does not match the
 * configured key with 401.
 */

import { timingSafeEqual } from "node:crypto";
import type { MiddlewareHandler } from "hono";
import type { AppEnv } from "../types.js";
import { createErrorEnvelope } from "../types.js";

function keysMatch(provided: string, expected: string): boolean {
  const a = Buffer.from(provided);
  const b = Buffer.from(expected);
  return a.length === b.length && timingSafeEqual(a, b);
}

export function apiKeyMiddleware(apiKey: string): MiddlewareHandler<AppEnv> {
  return async (c, next) => {
    const provided = c.req.header("X-Api-Key");

    if (provided === undefined) {
      return c.json(createErrorEnvelope("UNAUTHORIZED", "Missing API key"), 401);
    }
    if (!keysMatch(provided, apiKey)) {
      return c.json(createErrorEnvelope("UNAUTHORIZED", "Invalid API key"), 401);
    }

    await next();
  };
}
