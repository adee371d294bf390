/**
 * @vestlock/types — Shared domain types for the vestlock stack.
 *
 * These types are used across all vestlock packages:
 * - Lock timing (asset ids, maturities, lock status)
 * - The asset transfer adapter contract
 * - Notifications (domain events)
 *
 * Design rules:
 * - All types are immutable (readonly)
 * - No runtime dependencies
 * - No methods that mutate state
 */

// Lock types
export type {
  Address,
  AssetId,
  Identity,
  UnixSeconds,
  LockRecord,
  LockState,
  LockStatus,
  LockReceipt,
  ReleaseReceipt,
} from "./lock.js";

// Transfer types
export type {
  TransferErrorKind,
  TransferError,
  TransferResult,
  AssetTransferAdapter,
  NativeTransferAdapter,
} from "./transfer.js";
export { transferOk, transferFailed } from "./transfer.js";

// Event types
export type {
  EventMetadata,
  EventSource,
  EventPayloads,
  EventType,
  DomainEvent,
  EventSink,
} from "./event.js";

// Runtime type guards
export {
  isAddressLike,
  isUnixSeconds,
  isLockRecord,
  isTransferErrorKind,
  isTransferError,
  isEventType,
  isEventMetadata,
  isDomainEvent,
} from "./guards.js";
