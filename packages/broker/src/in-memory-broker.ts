/**
 * @vdi-assign/broker — In-memory Broker implementation.
 *
 * Holds machines, users and assignments in plain maps. Suitable for:
 * - Unit and integration tests
 * - The local broker emulator
 * - Rehearsing a run before pointing at a real broker
 *
 * Name matching follows directory semantics: case-insensitive, and a
 * machine can be found by its full "DOMAIN\name" or by the bare name.
 */

import type { Machine, BrokerUser } from "@vdi-assign/types";
import { DOMAIN_SEPARATOR } from "@vdi-assign/types";
import type { Broker } from "./types.js";
import { BrokerError } from "./types.js";

/**
 * Initial state for an InMemoryBroker.
 */
export interface InMemoryBrokerSeed {
  readonly machines: readonly Machine[];
  readonly users: readonly string[];
  /** Existing assignments, keyed by machine uid */
  readonly assignments?: Readonly<Record<string, readonly string[]>> | undefined;
}

export interface InMemoryBrokerSnapshot {
  readonly machines: readonly Machine[];
  readonly users: readonly string[];
  readonly assignments: Readonly<Record<string, readonly string[]>>;
}

function fold(name: string): string {
  return name.toLowerCase();
}

function bareName(machineName: string): string {
  const index = machineName.indexOf(DOMAIN_SEPARATOR);
  return index === -1 ? machineName : machineName.slice(index + 1);
}

export class InMemoryBroker implements Broker {
  /** Machines by uid, in seed order */
  private readonly _machines = new Map<string, Machine>();

  /** Known users, keyed by folded name */
  private readonly _users = new Map<string, string>();

  /** Assigned user names per machine uid, in assignment order */
  private readonly _assignments = new Map<string, string[]>();

  constructor(seed: InMemoryBrokerSeed = { machines: [], users: [] }) {
    for (const machine of seed.machines) {
      if (this._machines.has(machine.uid)) {
        throw new BrokerError(
          "CONFLICT",
          `Duplicate machine uid "${machine.uid}" in seed`,
        );
      }
      this._machines.set(machine.uid, { ...machine });
      this._assignments.set(machine.uid, []);
    }

    for (const user of seed.users) {
      this._users.set(fold(user), user);
    }

    for (const [uid, users] of Object.entries(seed.assignments ?? {})) {
      const assigned = this._assignments.get(uid);
      if (assigned === undefined) {
        throw new BrokerError(
          "NOT_FOUND",
          `Seed assigns users to unknown machine "${uid}"`,
        );
      }
      assigned.push(...users);
    }
  }

  // ─── Broker ─────────────────────────────────────────────────────────

  async checkConnection(): Promise<void> {
    // Always reachable
  }

  async findMachine(name: string): Promise<Machine | null> {
    const wanted = fold(name);
    for (const machine of this._machines.values()) {
      if (
        fold(machine.machineName) === wanted ||
        fold(bareName(machine.machineName)) === wanted
      ) {
        return machine;
      }
    }
    return null;
  }

  async findUser(name: string): Promise<BrokerUser | null> {
    const stored = this._users.get(fold(name));
    return stored === undefined ? null : { name: stored };
  }

  async listAssignedUsers(machineUid: string): Promise<readonly string[]> {
    return [...this._requireAssignments(machineUid)];
  }

  async assignUser(userName: string, machineUid: string): Promise<void> {
    const assigned = this._requireAssignments(machineUid);
    const user = this._users.get(fold(userName));

    if (user === undefined) {
      throw new BrokerError("NOT_FOUND", `User "${userName}" not found`, 404);
    }
    if (assigned.some((existing) => fold(existing) === fold(user))) {
      throw new BrokerError(
        "CONFLICT",
        `User "${user}" is already assigned to machine "${machineUid}"`,
        409,
      );
    }

    assigned.push(user);
  }

  // ─── Inspection ─────────────────────────────────────────────────────

  /** Users assigned to a machine, or an empty list for an unknown uid. */
  assignedUsers(machineUid: string): readonly string[] {
    return [...(this._assignments.get(machineUid) ?? [])];
  }

  snapshot(): InMemoryBrokerSnapshot {
    const assignments: Record<string, readonly string[]> = {};
    for (const [uid, users] of this._assignments) {
      assignments[uid] = [...users];
    }
    return {
      machines: [...this._machines.values()],
      users: [...this._users.values()],
      assignments,
    };
  }

  // ─── Internals ──────────────────────────────────────────────────────

  private _requireAssignments(machineUid: string): string[] {
    const assigned = this._assignments.get(machineUid);
    if (assigned === undefined) {
      throw new BrokerError(
        "NOT_FOUND",
        `Machine "${machineUid}" not found`,
        404,
      );
    }
    return assigned;
  }
}
