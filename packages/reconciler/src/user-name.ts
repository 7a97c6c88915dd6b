/**
 * User name normalization.
 *
 * Bare account names ("jdoe") are qualified with the domain of the
 * machine they are being assigned to ("CORP\jdoe"). Names that already
 * carry a domain pass through untouched.
 */

import { DOMAIN_SEPARATOR } from "@vdi-assign/types";
import { ReconcilerError } from "./types.js";

/**
 * Domain part of a "DOMAIN\name" machine name, or null when there is none.
 */
export function machineDomain(machineName: string): string | null {
  const index = machineName.indexOf(DOMAIN_SEPARATOR);
  if (index <= 0) return null;
  return machineName.slice(0, index);
}

export function isQualifiedUserName(userName: string): boolean {
  return userName.includes(DOMAIN_SEPARATOR);
}

/**
 * @throws {ReconcilerError} MACHINE_WITHOUT_DOMAIN when a bare user name
 *   meets a machine name with no domain to borrow
 */
export function normalizeUserName(userName: string, machineName: string): string {
  if (isQualifiedUserName(userName)) {
    return userName;
  }

  const domain = machineDomain(machineName);
  if (domain === null) {
    throw new ReconcilerError(
      "MACHINE_WITHOUT_DOMAIN",
      `Machine name '${machineName}' has no domain prefix to qualify user '${userName}'`,
    );
  }

  return `${domain}${DOMAIN_SEPARATOR}${userName}`;
}

/** Windows account names compare case-insensitively. */
export function sameAccount(a: string, b: string): boolean {
  return a.toLowerCase() === b.toLowerCase();
}
