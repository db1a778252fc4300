/**
 * Clock
 *
 * Every deadline in the system (auction end, voting end, timelock eta)
 * is evaluated lazily against an injected clock. There are no timers.
 */

import type { Timestamp } from "./primitives.js";

export interface Clock {
  /** Current unix time in whole seconds. */
  now(): Timestamp;
}

/** Wall-clock time. */
export class SystemClock implements Clock {
  now(): Timestamp {
    return Math.floor(Date.now() / 1000);
  }
}

/**
 * A clock that only moves when told to.
 * Used by tests and by sandbox deployments.
 */
export class ManualClock implements Clock {
  private current: Timestamp;

  constructor(start: Timestamp = 1_700_000_000) {
    this.current = start;
  }

  now(): Timestamp {
    return this.current;
  }

  advance(seconds: number): Timestamp {
    if (!Number.isInteger(seconds) || seconds < 0) {
      throw new RangeError(`Clock can only advance by a non-negative integer, got ${seconds}`);
    }
    this.current += seconds;
    return this.current;
  }

  set(timestamp: Timestamp): void {
    if (timestamp < this.current) {
      throw new RangeError(`Clock cannot move backwards (${timestamp} < ${this.current})`);
    }
    this.current = timestamp;
  }
}

/** ISO 8601 rendering of a clock reading. */
export function isoAt(timestamp: Timestamp): string {
  return new Date(timestamp * 1000).toISOString();
}
