/**
 * Hono application factory.
 *
 * Serves the broker REST contract from an InMemoryBroker. Tests create
 * the app and call app.request() without starting a server.
 */

import { Hono } from "hono";
import { InMemoryBroker } from "@vdi-assign/broker";
import type { InMemoryBrokerSeed } from "@vdi-assign/broker";
import type { AppEnv } from "./types.js";
import { createErrorEnvelope } from "./types.js";
import { handleError } from "./middleware/error-handler.js";
import { requestIdMiddleware } from "./middleware/request-id.js";
import { loggerMiddleware } from "./middleware/logger.js";
import type { RequestLogEntry } from "./middleware/logger.js";
import { apiKeyMiddleware } from "./middleware/api-key.js";
import { createHealthRoutes } from "./routes/health.js";
import { createBrokerRoutes } from "./routes/broker.js";

// =============================================================================
// App Config
// =============================================================================

export interface CreateEmulatorAppOptions {
  /** Broker to serve. Takes precedence over `seed`. */
  readonly broker?: InMemoryBroker | undefined;
  /** Initial state for a fresh InMemoryBroker */
  readonly seed?: InMemoryBrokerSeed | undefined;
  /** When set, every /api/* request must carry this X-Api-Key */
  readonly apiKey?: string | undefined;
  readonly logFn?: ((entry: RequestLogEntry) => void) | undefined;
}

export interface EmulatorAppInstance {
  readonly app: Hono<AppEnv>;
  readonly broker: InMemoryBroker;
}

// =============================================================================
// Factory
// =============================================================================

export function createEmulatorApp(
  options: CreateEmulatorAppOptions = {},
): EmulatorAppInstance {
  const broker = options.broker ?? new InMemoryBroker(options.seed);

  const app = new Hono<AppEnv>();

  // ─── Global Middleware ───────────────────────────────────────────
  app.use("*", requestIdMiddleware());

  if (options.logFn !== undefined) {
    app.use("*", loggerMiddleware(options.logFn));
  }

  app.onError(handleError);
  app.notFound((c) =>
    c.json(createErrorEnvelope("NOT_FOUND", `No route for ${c.req.method} ${c.req.path}`), 404),
  );

  // ─── Public Routes ──────────────────────────────────────────────
  app.route("/", createHealthRoutes());

  // ─── API Routes ─────────────────────────────────────────────────
  if (options.apiKey !== undefined) {
    app.use("/api/*", apiKeyMiddleware(options.apiKey));
  }

  app.route("/api/v1", createBrokerRoutes(broker));

  return { app, broker };
}
