/**
 * @fracta/ledger — Scoped busy markers.
 *
 * Every operation that moves value or an asset out of the engine runs
 * inside `guard.run(resourceKey, fn)`. While `fn` runs, any nested call
 * that tries to enter the same resource is rejected with
 * `REENTRANT_CALL`. The marker is released on every exit path.
 *
 * One guard instance is shared by all components so that a payout hook
 * re-entering through a different component still hits the marker.
 */

import { LedgerError } from "./types.js";

export class BusyGuard {
  private readonly busy = new Set<string>();

  run<T>(key: string, fn: () => T): T {
    if (this.busy.has(key)) {
      throw new LedgerError("REENTRANT_CALL", "RESOURCE_BUSY", `Resource "${key}" is busy`);
    }
    this.busy.add(key);
    try {
      return fn();
    } finally {
      this.busy.delete(key);
    }
  }

  /** Run `fn` holding every key, acquired in order. */
  runAll<T>(keys: readonly string[], fn: () => T): T {
    const [head, ...rest] = keys;
    if (head === undefined) {
      return fn();
    }
    return this.run(head, () => this.runAll(rest, fn));
  }
}

/** Resource keys used across components. */
export const resourceKey = {
  asset: (assetId: string): string => `asset:${assetId}`,
  payee: (address: string): string => `payee:${address}`,
  holder: (address: string): string => `holder:${address}`,
} as const;
