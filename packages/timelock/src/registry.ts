/**
 * Lock Registry — asset → maturity.
 *
 * The sole mutable state of the timelock. It records *when* an asset
 * unlocks, never how much is held.
 *
 * Rules:
 * - At most one maturity per asset
 * - `set` refuses to overwrite a maturity that has not yet been reached
 * - `take` reads and clears in one step (release uses it before any transfer)
 * - `clear` is unconditional and idempotent
 */

import type { AssetId, LockRecord, UnixSeconds } from "@vestlock/types";

// =============================================================================
// Error
// =============================================================================

export class RegistryError extends Error {
  public readonly code: RegistryErrorCode;
  constructor(code: RegistryErrorCode, message: string) {
    super(message);
    this.name = "RegistryError";
    this.code = code;
  }
}

export type RegistryErrorCode =
  | "ALREADY_LOCKED"
  | "INVALID_MATURITY"
  | "REGISTRY_CORRUPT"
  | "REGISTRY_WRITE_FAILED";

// =============================================================================
// Contract
// =============================================================================

export interface LockRegistry {
  get(asset: AssetId): UnixSeconds | undefined;

  /**
   * Store a maturity for `asset`.
   *
   * @throws {RegistryError} ALREADY_LOCKED if a maturity later than `now` is stored
   * @throws {RegistryError} INVALID_MATURITY if `maturity` is not after `now`
   */
  set(asset: AssetId, maturity: UnixSeconds, now: UnixSeconds): void;

  clear(asset: AssetId): void;

  /** Read the stored maturity and clear it atomically. */
  take(asset: AssetId): UnixSeconds | undefined;

  /** All active records, sorted by asset. */
  entries(): readonly LockRecord[];
}

// =============================================================================
// In-memory implementation
// =============================================================================

export class InMemoryLockRegistry implements LockRegistry {
  protected readonly maturities = new Map<AssetId, UnixSeconds>();

  get(asset: AssetId): UnixSeconds | undefined {
    return this.maturities.get(asset);
  }

  set(asset: AssetId, maturity: UnixSeconds, now: UnixSeconds): void {
    const existing = this.maturities.get(asset);
    if (existing !== undefined && existing > now) {
      throw new RegistryError(
        "ALREADY_LOCKED",
        `Asset ${asset} is locked until ${String(existing)}`,
      );
    }
    if (!Number.isSafeInteger(maturity) || maturity <= now) {
      throw new RegistryError(
        "INVALID_MATURITY",
        `Maturity ${String(maturity)} must be an integer after ${String(now)}`,
      );
    }
    this.maturities.set(asset, maturity);
  }

  clear(asset: AssetId): void {
    this.maturities.delete(asset);
  }

  take(asset: AssetId): UnixSeconds | undefined {
    const maturity = this.maturities.get(asset);
    this.maturities.delete(asset);
    return maturity;
  }

  entries(): readonly LockRecord[] {
    return [...this.maturities.entries()]
      .map(([asset, maturity]) => ({ asset, maturity }))
      .sort((a, b) => a.asset.localeCompare(b.asset));
  }
}
