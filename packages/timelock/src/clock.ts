/**
 * Clocks — where the timelock reads "now" from.
 */

import type { UnixSeconds } from "@vestlock/types";

export interface Clock {
  /** Current time in whole unix seconds. */
  now(): UnixSeconds;
}

export const systemClock: Clock = {
  now: () => Math.floor(Date.now() / 1000),
};

/**
 * A clock that only moves when told to. Used by tests.
 */
export class ManualClock implements Clock {
  private current: UnixSeconds;

  constructor(start: UnixSeconds = 0) {
    this.current = start;
  }

  now(): UnixSeconds {
    return this.current;
  }

  set(time: UnixSeconds): void {
    this.current = time;
  }

  advance(seconds: number): UnixSeconds {
    this.current += seconds;
    return this.current;
  }
}
