/**
 * HttpBroker ↔ emulator integration
 *
 * Wires the HttpBroker client to a real createEmulatorApp() instance
 * (in-memory, no HTTP server). Proves the client and the emulator
 * agree on the REST contract.
 */

import { describe, it, expect, beforeEach } from "vitest";
import { HttpBroker, BrokerError } from "@vdi-assign/broker";
import { createEmulatorApp } from "../src/app.js";
import type { EmulatorAppInstance } from "../src/app.js";
import { createEmulatorFetch } from "../src/fetch-bridge.js";
import { SEED, TEST_API_KEY } from "./helpers.js";

let instance: EmulatorAppInstance;
let broker: HttpBroker;

beforeEach(() => {
  instance = createEmulatorApp({ seed: SEED, apiKey: TEST_API_KEY });
  broker = new HttpBroker({
    baseUrl: "http://emulator.test",
    apiKey: TEST_API_KEY,
    fetchFn: createEmulatorFetch(instance),
  });
});

describe("HttpBroker against the emulator", () => {
  it("passes the connection check with valid credentials", async () => {
    await expect(broker.checkConnection()).resolves.toBeUndefined();
  });

  it("fails the connection check with a bad key", async () => {
    const badKey = new HttpBroker({
      baseUrl: "http://emulator.test",
      apiKey: "wrong-key",
      fetchFn: createEmulatorFetch(instance),
    });

    const error = await badKey.checkConnection().catch((e: unknown) => e);

    expect(error).toBeInstanceOf(BrokerError);
    expect(error).toMatchObject({
      code: "UNAUTHORIZED",
      message: "Invalid API key",
      statusCode: 401,
    });
  });

  it("resolves machines and users, null when unknown", async () => {
    expect(await broker.findMachine("CORP\\VDI-002")).toEqual({
      uid: "m-2",
      machineName: "CORP\\VDI-002",
      desktopGroupName: "Sales",
    });
    expect(await broker.findMachine("VDI-404")).toBeNull();
    expect(await broker.findUser("CORP\\JDOE")).toEqual({ name: "CORP\\jdoe" });
    expect(await broker.findUser("CORP\\ghost")).toBeNull();
  });

  it("assigns a user and sees it in the listing", async () => {
    await broker.assignUser("CORP\\jdoe", "m-1");

    expect(await broker.listAssignedUsers("m-1")).toEqual(["CORP\\jdoe"]);
  });

  it("surfaces a conflict as a permanent BrokerError", async () => {
    const error = await broker.assignUser("CORP\\asmith", "m-2").catch((e: unknown) => e);

    expect(error).toBeInstanceOf(BrokerError);
    expect(error).toMatchObject({ code: "CONFLICT", statusCode: 409 });
    expect(error instanceof BrokerError && error.transient).toBe(false);
  });
});
