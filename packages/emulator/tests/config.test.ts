/**
 * Tests for config.ts — loadEmulatorConfig.
 */

import { describe, it, expect } from "vitest";
import { loadEmulatorConfig } from "../src/config.js";

describe("loadEmulatorConfig", () => {
  it("returns defaults when env is empty", () => {
    const config = loadEmulatorConfig({});
    expect(config.PORT).toBe(4010);
    expect(config.HOST).toBe("127.0.0.1");
    expect(config.LOG_LEVEL).toBe("info");
    expect(config.NODE_ENV).toBe("development");
    expect(config.EMULATOR_API_KEY).toBeUndefined();
    expect(config.EMULATOR_SEED).toBeUndefined();
  });

  it("parses overridden values", () => {
    const config = loadEmulatorConfig({
      PORT: "8080",
      EMULATOR_API_KEY: "test-api-key",
      EMULATOR_SEED: "./seed.json",
    });
    expect(config.PORT).toBe(8080);
    expect(config.EMULATOR_API_KEY).toBe("test-api-key");
    expect(config.EMULATOR_SEED).toBe("./seed.json");
  });

  it("throws on an out-of-range port", () => {
    expect(() => loadEmulatorConfig({ PORT: "70000" })).toThrow();
  });

  it("throws on an unknown log level", () => {
    expect(() => loadEmulatorConfig({ LOG_LEVEL: "verbose" })).toThrow();
  });
});
