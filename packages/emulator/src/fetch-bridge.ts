/**
 * In-process fetch bridge.
 *
 * Routes fetch calls to the emulator app's .request() method, so an
 * HttpBroker can talk to the emulator without a listening server.
 * The base URL of the request is ignored.
 */

import type { EmulatorAppInstance } from "./app.js";

export function createEmulatorFetch(instance: EmulatorAppInstance): typeof fetch {
  return async (input, init) => {
    const url =
      typeof input === "string" ? input : input instanceof URL ? input.toString() : input.url;
    const { pathname, search } = new URL(url);
    return instance.app.request(`${pathname}${search}`, init);
  };
}
