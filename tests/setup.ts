/**
 * Mocha bootstrap keeping the suite hermetic: outbound sockets and `fetch`
 * fail fast with `E-NETWORK-BLOCKED`. The original implementations are
 * restored once the run finishes.
 */

import { after, before } from "mocha";
import { Socket } from "node:net";

type RestoreHook = () => void;

const restores: RestoreHook[] = [];

export const NETWORK_BLOCKED_CODE = "E-NETWORK-BLOCKED";

function blockedError(primitive: string): Error & { code: string } {
  return Object.assign(new Error(`network access via ${primitive} is disabled during tests`), {
    code: NETWORK_BLOCKED_CODE,
  });
}

function installNetworkGuards(): void {
  const socketConnect = Object.getOwnPropertyDescriptor(Socket.prototype, "connect");
  Object.defineProperty(Socket.prototype, "connect", {
    configurable: true,
    writable: true,
    value: () => {
      throw blockedError("net.Socket#connect");
    },
  });
  restores.push(() => {
    if (socketConnect) {
      Object.defineProperty(Socket.prototype, "connect", socketConnect);
    }
  });

  if (typeof globalThis.fetch === "function") {
    const originalFetch = globalThis.fetch;
    globalThis.fetch = async () => {
      throw blockedError("fetch");
    };
    restores.push(() => {
      globalThis.fetch = originalFetch;
    });
  }
}

before(() => {
  installNetworkGuards();
});

after(() => {
  while (restores.length > 0) {
    restores.pop()?.();
  }
});
