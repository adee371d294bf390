/**
 * Asset Transfer Types
 *
 * The contract between the timelock and whatever moves funds on the
 * underlying ledger (an ERC-20 token, an in-memory book, ...).
 *
 * Rules:
 * - Amounts are bigint base units (no decimals, no floats)
 * - A transfer succeeds only on an explicit success indication
 * - Ambiguous outcomes are failures, never silent successes
 */

import type { Address, AssetId } from "./lock.js";

/**
 * Why a transfer did not complete.
 *
 * - rejected: the ledger answered with an explicit failure (e.g. `false`)
 * - reverted: the ledger call reverted, or its receipt did
 * - ambiguous: the ledger gave no explicit success indication
 * - insufficient-funds: the source balance or allowance is too small
 * - unavailable: the ledger could not be reached
 */
export type TransferErrorKind =
  | "rejected"
  | "reverted"
  | "ambiguous"
  | "insufficient-funds"
  | "unavailable";

export interface TransferError {
  readonly kind: TransferErrorKind;
  readonly message: string;
}

/**
 * Outcome of a pull or push.
 */
export type TransferResult =
  | { readonly ok: true; readonly txHash?: string }
  | { readonly ok: false; readonly error: TransferError };

/**
 * Moves fungible assets between the controller and the vault.
 */
export interface AssetTransferAdapter {
  /** Move `amount` of `asset` from `from` into `to` (the vault). */
  pull(asset: AssetId, from: Address, to: Address, amount: bigint): Promise<TransferResult>;

  /** Move `amount` of `asset` from the vault to `to`. */
  push(asset: AssetId, to: Address, amount: bigint): Promise<TransferResult>;

  /** Current balance of `asset` held by `holder`. */
  balanceOf(asset: AssetId, holder: Address): Promise<bigint>;
}

/**
 * Moves the ledger's native currency out of the vault.
 */
export interface NativeTransferAdapter {
  /** Native balance of `holder` that can actually be sent. */
  nativeBalanceOf(holder: Address): Promise<bigint>;

  /** Send `amount` of native currency from the vault to `to`. */
  pushNative(to: Address, amount: bigint): Promise<TransferResult>;
}

/**
 * Convenience constructors for adapter implementations.
 */
export function transferOk(txHash?: string): TransferResult {
  return txHash !== undefined ? { ok: true, txHash } : { ok: true };
}

export function transferFailed(kind: TransferErrorKind, message: string): TransferResult {
  return { ok: false, error: { kind, message } };
}
