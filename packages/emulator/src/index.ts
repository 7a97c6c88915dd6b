/**
 * @vdi-assign/emulator — Local broker emulator.
 *
 * Serves the broker REST contract from an InMemoryBroker so the CLI
 * can be exercised end to end without a real broker.
 */

export { createEmulatorApp } from "./app.js";
export type { CreateEmulatorAppOptions, EmulatorAppInstance } from "./app.js";
export { createEmulatorFetch } from "./fetch-bridge.js";
export { loadEmulatorConfig, EmulatorConfigSchema } from "./config.js";
export type { EmulatorConfig } from "./config.js";
export { loadSeed, parseSeed, SeedSchema } from "./seed.js";
export { REQUEST_ID_HEADER } from "./middleware/request-id.js";
export type { RequestLogEntry } from "./middleware/logger.js";
export { createErrorEnvelope } from "./types.js";
export type { AppEnv, ErrorEnvelope, EmulatorErrorCode } from "./types.js";
