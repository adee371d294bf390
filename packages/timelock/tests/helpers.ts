/**
 * Shared fixtures for @vestlock/timelock tests.
 */

import type { Address } from "@vestlock/types";
import { Timelock } from "../src/timelock.js";
import { InMemoryLockRegistry } from "../src/registry.js";
import { SingleControllerGuard } from "../src/access-guard.js";
import { InMemoryEventLog } from "../src/event-log.js";
import type { EventLogOptions } from "../src/event-log.js";
import { InMemoryAssetLedger } from "../src/in-memory-ledger.js";
import { ManualClock } from "../src/clock.js";

export const CONTROLLER: Address = "0x1000000000000000000000000000000000000001";
export const OTHER: Address = "0x2000000000000000000000000000000000000002";
export const VAULT: Address = "0x9000000000000000000000000000000000000009";
export const TOKEN_A: Address = "0x1111111111111111111111111111111111111111";
export const TOKEN_B: Address = "0x2222222222222222222222222222222222222222";

export const T0 = 1_700_000_000;
export const DAY = 86_400;

export interface Fixture {
  readonly timelock: Timelock;
  readonly registry: InMemoryLockRegistry;
  readonly guard: SingleControllerGuard;
  readonly ledger: InMemoryAssetLedger;
  readonly clock: ManualClock;
  readonly events: InMemoryEventLog;
}

/**
 * A timelock over an in-memory ledger. The controller starts with
 * 10_000 of TOKEN_A and TOKEN_B.
 */
export function createFixture(eventLog?: EventLogOptions): Fixture {
  const events = new InMemoryEventLog(eventLog);
  const registry = new InMemoryLockRegistry();
  const guard = new SingleControllerGuard({ controller: CONTROLLER, events });
  const ledger = new InMemoryAssetLedger(VAULT);
  const clock = new ManualClock(T0);

  ledger.mint(TOKEN_A, CONTROLLER, 10_000n);
  ledger.mint(TOKEN_B, CONTROLLER, 10_000n);

  const timelock = new Timelock({
    vault: VAULT,
    registry,
    guard,
    assets: ledger,
    native: ledger,
    clock,
    events,
  });

  return { timelock, registry, guard, ledger, clock, events };
}

/**
 * Await a promise expected to reject and return the rejection.
 */
export async function rejectionOf(promise: Promise<unknown>): Promise<unknown> {
  try {
    await promise;
  } catch (err) {
    return err;
  }
  throw new Error("Expected promise to reject");
}
