/**
 * @vdi-assign/broker — Broker contract and implementations.
 *
 * - Broker: the interface the reconciler depends on
 * - BrokerError: typed failures, transient or permanent
 * - HttpBroker: REST client over native fetch
 * - InMemoryBroker: seeded in-process broker
 */

export type { Broker, BrokerErrorCode, HttpBrokerConfig } from "./types.js";
export { BrokerError, isTransientBrokerError } from "./types.js";

export { HttpBroker } from "./http-broker.js";

export { InMemoryBroker } from "./in-memory-broker.js";
export type { InMemoryBrokerSeed, InMemoryBrokerSnapshot } from "./in-memory-broker.js";
