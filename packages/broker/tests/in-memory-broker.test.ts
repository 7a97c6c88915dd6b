/**
 * InMemoryBroker tests
 *
 * Covers seeding, name matching, assignment and snapshot behavior.
 */
import { describe, it, expect } from "vitest";
import { InMemoryBroker } from "../src/in-memory-broker.js";
import { BrokerError, isTransientBrokerError } from "../src/types.js";

function seededBroker(): InMemoryBroker {
  return new InMemoryBroker({
    machines: [
      { uid: "m-1", machineName: "CORP\\VDI-001", desktopGroupName: "Sales" },
      { uid: "m-2", machineName: "CORP\\VDI-002", desktopGroupName: "Engineering" },
    ],
    users: ["CORP\\jdoe", "CORP\\asmith"],
    assignments: { "m-2": ["CORP\\asmith"] },
  });
}

describe("InMemoryBroker", () => {
  describe("seeding", () => {
    it("rejects duplicate machine uids", () => {
      expect(
        () =>
          new InMemoryBroker({
            machines: [
              { uid: "m-1", machineName: "CORP\\A", desktopGroupName: "G" },
              { uid: "m-1", machineName: "CORP\\B", desktopGroupName: "G" },
            ],
            users: [],
          }),
      ).toThrow('Duplicate machine uid "m-1" in seed');
    });

    it("rejects assignments to unknown machines", () => {
      expect(
        () => new InMemoryBroker({ machines: [], users: [], assignments: { "m-9": ["CORP\\jdoe"] } }),
      ).toThrow(BrokerError);
    });

    it("starts empty by default", async () => {
      const broker = new InMemoryBroker();
      expect(await broker.findMachine("anything")).toBeNull();
      expect(broker.snapshot()).toEqual({ machines: [], users: [], assignments: {} });
    });
  });

  describe("findMachine", () => {
    it("matches the bare machine name", async () => {
      const machine = await seededBroker().findMachine("VDI-001");
      expect(machine?.uid).toBe("m-1");
    });

    it("matches the full domain-qualified name", async () => {
      const machine = await seededBroker().findMachine("CORP\\VDI-002");
      expect(machine?.uid).toBe("m-2");
    });

    it("ignores case", async () => {
      const machine = await seededBroker().findMachine("vdi-001");
      expect(machine?.machineName).toBe("CORP\\VDI-001");
    });

    it("returns null for unknown names", async () => {
      expect(await seededBroker().findMachine("VDI-404")).toBeNull();
    });
  });

  describe("findUser", () => {
    it("returns the stored spelling", async () => {
      expect(await seededBroker().findUser("corp\\JDOE")).toEqual({ name: "CORP\\jdoe" });
    });

    it("returns null for unknown users", async () => {
      expect(await seededBroker().findUser("CORP\\ghost")).toBeNull();
    });
  });

  describe("assignUser", () => {
    it("records the assignment", async () => {
      const broker = seededBroker();
      await broker.assignUser("CORP\\jdoe", "m-1");
      expect(await broker.listAssignedUsers("m-1")).toEqual(["CORP\\jdoe"]);
      expect(broker.assignedUsers("m-1")).toEqual(["CORP\\jdoe"]);
    });

    it("rejects a repeated assignment with CONFLICT", async () => {
      const broker = seededBroker();
      await expect(broker.assignUser("corp\\asmith", "m-2")).rejects.toMatchObject({
        code: "CONFLICT",
        message: 'User "CORP\\asmith" is already assigned to machine "m-2"',
      });
    });

    it("rejects unknown users and machines with NOT_FOUND", async () => {
      const broker = seededBroker();
      await expect(broker.assignUser("CORP\\ghost", "m-1")).rejects.toMatchObject({ code: "NOT_FOUND" });
      await expect(broker.assignUser("CORP\\jdoe", "m-9")).rejects.toMatchObject({ code: "NOT_FOUND" });
    });

    it("reports NOT_FOUND as permanent", async () => {
      const error = await seededBroker().listAssignedUsers("m-9").catch((e: unknown) => e);
      expect(isTransientBrokerError(error)).toBe(false);
    });
  });

  describe("snapshot", () => {
    it("copies state so later assignments do not leak into it", async () => {
      const broker = seededBroker();
      const before = broker.snapshot();
      await broker.assignUser("CORP\\jdoe", "m-1");

      expect(before.assignments).toEqual({ "m-1": [], "m-2": ["CORP\\asmith"] });
      expect(broker.snapshot().assignments["m-1"]).toEqual(["CORP\\jdoe"]);
    });
  });
});

describe("isTransientBrokerError", () => {
  it("is true only for transient broker codes", () => {
    expect(isTransientBrokerError(new BrokerError("TIMEOUT", "slow"))).toBe(true);
    expect(isTransientBrokerError(new BrokerError("NETWORK_ERROR", "down"))).toBe(true);
    expect(isTransientBrokerError(new BrokerError("SERVER_ERROR", "oops", 500))).toBe(true);
    expect(isTransientBrokerError(new BrokerError("UNAUTHORIZED", "no", 401))).toBe(false);
    expect(isTransientBrokerError(new Error("TIMEOUT"))).toBe(false);
  });
});
