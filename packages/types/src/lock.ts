/**
 * Lock Types
 *
 * Timing primitives for the custodial timelock.
 *
 * Rules:
 * - The registry tracks *when* an asset unlocks, never *how much* is locked
 * - Timestamps are unix seconds (integers)
 * - Asset identifiers and identities are EVM addresses
 */

/**
 * A 20-byte hex address (e.g., an ERC-20 contract or an account).
 */
export type Address = `0x${string}`;

/**
 * Identifier of a fungible-asset ledger (the token contract address).
 */
export type AssetId = Address;

/**
 * An identity that may call mutating operations.
 */
export type Identity = Address;

/**
 * Unix timestamp in whole seconds.
 */
export type UnixSeconds = number;

/**
 * One active lock: the asset is locked until `maturity`.
 */
export interface LockRecord {
  readonly asset: AssetId;
  readonly maturity: UnixSeconds;
}

/**
 * Observable state of an asset's lock.
 *
 * - unlocked: no maturity stored
 * - locked: maturity stored and still in the future
 * - releasable: maturity stored and reached
 */
export type LockState = "unlocked" | "locked" | "releasable";

/**
 * Point-in-time view of an asset's lock.
 */
export interface LockStatus {
  readonly asset: AssetId;
  /** Stored maturity, or null when no lock is active */
  readonly maturity: UnixSeconds | null;
  readonly state: LockState;
  /** Seconds until maturity; 0 when unlocked or releasable */
  readonly secondsRemaining: number;
}

/**
 * Result of a successful lock initiation.
 */
export interface LockReceipt {
  readonly asset: AssetId;
  readonly amount: bigint;
  readonly maturity: UnixSeconds;
}

/**
 * Result of a successful release (or native sweep).
 */
export interface ReleaseReceipt {
  readonly asset: AssetId;
  readonly amount: bigint;
  readonly txHash?: string;
}
