/**
 * Time sources for the ledger. Every time-bounded rule (voting windows,
 * suspensions, license expiry) compares stored timestamps against the
 * value the clock returns at the start of the current call.
 */

import type { UnixSeconds } from '@koinon/types';

/** A source of the current time in integer Unix seconds. */
export interface Clock {
  now(): UnixSeconds;
}

/** Wall-clock time, truncated to whole seconds. */
export class SystemClock implements Clock {
  now(): UnixSeconds {
    return Math.floor(Date.now() / 1000);
  }
}

/**
 * A clock that only moves when told to. Used by tests and simulations.
 *
 * ```ts
 * const clock = new ManualClock(1_700_000_000);
 * clock.advance(3600);
 * ```
 */
export class ManualClock implements Clock {
  private current: UnixSeconds;

  constructor(start: UnixSeconds = 1_700_000_000) {
    if (!Number.isSafeInteger(start) || start < 0) {
      throw new RangeError(`ManualClock start must be a non-negative integer (got ${start})`);
    }
    this.current = start;
  }

  now(): UnixSeconds {
    return this.current;
  }

  /** Move time forward by `seconds`. */
  advance(seconds: number): UnixSeconds {
    if (!Number.isSafeInteger(seconds) || seconds < 0) {
      throw new RangeError(`ManualClock can only advance by a non-negative integer (got ${seconds})`);
    }
    this.current += seconds;
    return this.current;
  }

  /** Jump to an absolute time, which must not be in the past. */
  set(timestamp: UnixSeconds): void {
    if (!Number.isSafeInteger(timestamp) || timestamp < this.current) {
      throw new RangeError(`ManualClock cannot move backwards to ${timestamp}`);
    }
    this.current = timestamp;
  }
}
