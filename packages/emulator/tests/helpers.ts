/**
 * Shared test fixtures for the emulator.
 */

import type { InMemoryBrokerSeed } from "@vdi-assign/broker";

export const TEST_API_KEY = "test-api-key";

export const SEED: InMemoryBrokerSeed = {
  machines: [
    { uid: "m-1", machineName: "CORP\\VDI-001", desktopGroupName: "Sales" },
    { uid: "m-2", machineName: "CORP\\VDI-002", desktopGroupName: "Sales" },
  ],
  users: ["CORP\\jdoe", "CORP\\asmith"],
  assignments: { "m-2": ["CORP\\asmith"] },
};
