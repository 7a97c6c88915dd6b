/**
 * Emulator entry point.
 *
 * Loads config and seed, starts the HTTP server and handles shutdown.
 */

import { serve } from "@hono/node-server";
import pino from "pino";
import { loadEmulatorConfig } from "./config.js";
import { loadSeed } from "./seed.js";
import { createEmulatorApp } from "./app.js";

async function main(): Promise<void> {
  const config = loadEmulatorConfig();
  const logger = pino({
    level: config.LOG_LEVEL,
    ...(config.NODE_ENV === "development"
      ? { transport: { target: "pino-pretty" } }
      : {}),
  });

  const seed =
    config.EMULATOR_SEED !== undefined ? await loadSeed(config.EMULATOR_SEED) : undefined;

  if (config.EMULATOR_API_KEY === undefined) {
    logger.warn("No EMULATOR_API_KEY configured, API is open");
  }

  const { app, broker } = createEmulatorApp({
    seed,
    apiKey: config.EMULATOR_API_KEY,
    logFn: (entry) => {
      logger.info(entry, `${entry.method} ${entry.path} ${entry.status}`);
    },
  });

  const state = broker.snapshot();
  const server = serve({
    fetch: app.fetch,
    port: config.PORT,
    hostname: config.HOST,
  });

  logger.info(
    {
      port: config.PORT,
      host: config.HOST,
      machines: state.machines.length,
      users: state.users.length,
    },
    "Broker emulator started",
  );

  const shutdown = (signal: string): void => {
    logger.info({ signal }, "Shutdown signal received");
    server.close();
    process.exit(0);
  };

  process.on("SIGTERM", () => shutdown("SIGTERM"));
  process.on("SIGINT", () => shutdown("SIGINT"));
}

main().catch((err: unknown) => {
  // eslint-disable-next-line no-console
  console.error("Fatal startup error:", err);
  process.exit(1);
});
