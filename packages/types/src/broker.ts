/**
 * Broker entity types.
 *
 * Read-only views of the broker's own records. The broker owns them;
 * this tool only queries them and binds users to machines.
 */

/**
 * A virtual desktop machine registered with the broker.
 */
export interface Machine {
  /** Opaque broker identifier */
  readonly uid: string;
  /** Machine name, usually "DOMAIN\name" */
  readonly machineName: string;
  /** Delivery group the machine currently belongs to */
  readonly desktopGroupName: string;
}

/**
 * A directory user known to the broker, identified by "DOMAIN\user".
 */
export interface BrokerUser {
  readonly name: string;
}

/** Separator between domain and account name, as in "CORP\jdoe". */
export const DOMAIN_SEPARATOR = "\\";
