/**
 * Runtime Type Guards
 *
 * Narrowing functions for vestlock domain types.
 * Used at system boundaries (persisted registry files, API inputs).
 */

import type { Address, LockRecord, UnixSeconds } from "./lock.js";
import type { DomainEvent, EventMetadata, EventType } from "./event.js";
import type { TransferError, TransferErrorKind } from "./transfer.js";

// =============================================================================
// Lock guards
// =============================================================================

const ADDRESS_PATTERN = /^0x[0-9a-fA-F]{40}$/;

/**
 * Shape check only: 0x followed by 40 hex digits. Checksums are not verified.
 */
export function isAddressLike(value: unknown): value is Address {
  return typeof value === "string" && ADDRESS_PATTERN.test(value);
}

export function isUnixSeconds(value: unknown): value is UnixSeconds {
  return typeof value === "number" && Number.isSafeInteger(value) && value >= 0;
}

export function isLockRecord(value: unknown): value is LockRecord {
  if (value === null || typeof value !== "object") return false;
  const v = value as Record<string, unknown>;
  return isAddressLike(v.asset) && isUnixSeconds(v.maturity) && v.maturity > 0;
}

// =============================================================================
// Transfer guards
// =============================================================================

const TRANSFER_ERROR_KINDS = new Set<string>([
  "rejected", "reverted", "ambiguous", "insufficient-funds", "unavailable",
]);

export function isTransferErrorKind(value: unknown): value is TransferErrorKind {
  return typeof value === "string" && TRANSFER_ERROR_KINDS.has(value);
}

export function isTransferError(value: unknown): value is TransferError {
  if (value === null || typeof value !== "object") return false;
  const v = value as Record<string, unknown>;
  return isTransferErrorKind(v.kind) && typeof v.message === "string";
}

// =============================================================================
// Event guards
// =============================================================================

const EVENT_SOURCES = new Set<string>(["timelock", "access-guard"]);
const EVENT_TYPES = new Set<string>([
  "lock.initiated", "lock.released", "native.withdrawn", "control.transferred",
]);

export function isEventType(value: unknown): value is EventType {
  return typeof value === "string" && EVENT_TYPES.has(value);
}

export function isEventMetadata(value: unknown): value is EventMetadata {
  if (value === null || typeof value !== "object") return false;
  const v = value as Record<string, unknown>;
  return (
    typeof v.eventId === "string" &&
    typeof v.timestamp === "string" &&
    typeof v.actor === "string" &&
    typeof v.source === "string" &&
    EVENT_SOURCES.has(v.source)
  );
}

export function isDomainEvent(value: unknown): value is DomainEvent {
  if (value === null || typeof value !== "object") return false;
  const v = value as Record<string, unknown>;
  return (
    isEventType(v.type) &&
    isEventMetadata(v.metadata) &&
    v.payload !== null &&
    typeof v.payload === "object"
  );
}
