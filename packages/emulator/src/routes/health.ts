/**
 * Health route (no auth).
 *
 * GET /health — Liveness probe
 */

import { Hono } from "hono";
import type { AppEnv } from "../types.js";

export function createHealthRoutes(): Hono<AppEnv> {
  const routes = new Hono<AppEnv>();

  routes.get("/health", (c) => {
    return c.json({ status: "ok", timestamp: new Date().toISOString() });
  });

  return routes;
}
