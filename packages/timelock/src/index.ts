/**
 * @vestlock/timelock — Custodial timelock.
 *
 * Holds fungible assets for a single controller and releases the full
 * held balance of an asset 182 days after its lock was initiated.
 *
 * Components:
 * - Timelock: the lock state machine
 * - LockRegistry: asset → maturity (in-memory or file-backed)
 * - AccessGuard: single-controller authorization
 * - InMemoryEventLog: notification sink
 * - InMemoryAssetLedger: reference transfer adapter
 *
 * Design rules:
 * - State is cleared before any outgoing transfer
 * - Failed pulls change nothing; failed pushes are not rolled back
 * - The registry never records amounts
 */

export {
  Timelock,
  TimelockError,
  LOCK_DURATION,
  LOCK_DURATION_DAYS,
  SECONDS_PER_DAY,
} from "./timelock.js";
export type { TimelockErrorCode, TimelockDeps, NativeSweepReceipt } from "./timelock.js";

export { InMemoryLockRegistry, RegistryError } from "./registry.js";
export type { LockRegistry, RegistryErrorCode } from "./registry.js";
export { FileLockRegistry } from "./file-registry.js";
export type { FileLockRegistryOptions } from "./file-registry.js";

export { SingleControllerGuard, AccessGuardError } from "./access-guard.js";
export type {
  AccessGuard,
  AccessGuardErrorCode,
  SingleControllerGuardOptions,
} from "./access-guard.js";

export { InMemoryEventLog, createEvent } from "./event-log.js";
export type {
  LoggedEvent,
  EventHandler,
  HandlerErrorReporter,
  EventLogOptions,
  Subscription,
  ReadEventsOptions,
  TypedEvent,
} from "./event-log.js";

export { InMemoryAssetLedger } from "./in-memory-ledger.js";
export type { TransferDirection, LedgerTransfer, TransferHook } from "./in-memory-ledger.js";

export { systemClock, ManualClock } from "./clock.js";
export type { Clock } from "./clock.js";

export { normalizeAddress, sameAddress } from "./address.js";
