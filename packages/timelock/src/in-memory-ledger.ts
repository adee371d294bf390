/**
 * In-memory asset ledger.
 *
 * A reference AssetTransferAdapter / NativeTransferAdapter that keeps
 * balances in maps. Used by tests and by the service in `memory` mode.
 *
 * Besides the adapter contract it can:
 * - credit balances directly (`mint`, `creditNative`)
 * - simulate unsolicited deposits into the vault (`deposit`)
 * - fail the next pull/push with a chosen error kind (`failNext`)
 * - call hooks during a transfer, the way a token callback would
 */

import type {
  Address,
  AssetId,
  AssetTransferAdapter,
  NativeTransferAdapter,
  TransferErrorKind,
  TransferResult,
} from "@vestlock/types";
import { transferFailed, transferOk } from "@vestlock/types";

export type TransferDirection = "pull" | "push" | "native";

export interface LedgerTransfer {
  readonly direction: TransferDirection;
  /** Undefined for native transfers */
  readonly asset: AssetId | undefined;
  readonly from: Address;
  readonly to: Address;
  readonly amount: bigint;
}

/**
 * Runs after balances have moved and before the transfer call returns.
 * A hook that throws reverts the transfer, like a failing token callback:
 * the balances move back and the call reports `reverted`.
 */
export type TransferHook = (transfer: LedgerTransfer) => void | Promise<void>;

interface QueuedFailure {
  readonly direction: TransferDirection;
  readonly kind: TransferErrorKind;
  readonly message: string;
}

export class InMemoryAssetLedger implements AssetTransferAdapter, NativeTransferAdapter {
  readonly vault: Address;
  private readonly balances = new Map<string, bigint>();
  private readonly nativeBalances = new Map<string, bigint>();
  private readonly failures: QueuedFailure[] = [];
  private readonly hooks = new Set<TransferHook>();
  private readonly history: LedgerTransfer[] = [];

  constructor(vault: Address) {
    this.vault = vault;
  }

  // ─── Adapter contract ───────────────────────────────────────────────

  async pull(asset: AssetId, from: Address, to: Address, amount: bigint): Promise<TransferResult> {
    return this.move({ direction: "pull", asset, from, to, amount });
  }

  async push(asset: AssetId, to: Address, amount: bigint): Promise<TransferResult> {
    return this.move({ direction: "push", asset, from: this.vault, to, amount });
  }

  async balanceOf(asset: AssetId, holder: Address): Promise<bigint> {
    return this.balances.get(key(asset, holder)) ?? 0n;
  }

  async nativeBalanceOf(holder: Address): Promise<bigint> {
    return this.nativeBalances.get(holder.toLowerCase()) ?? 0n;
  }

  async pushNative(to: Address, amount: bigint): Promise<TransferResult> {
    return this.move({ direction: "native", asset: undefined, from: this.vault, to, amount });
  }

  // ─── Test & dev controls ────────────────────────────────────────────

  mint(asset: AssetId, holder: Address, amount: bigint): void {
    this.credit(key(asset, holder), amount, this.balances);
  }

  creditNative(holder: Address, amount: bigint): void {
    this.credit(holder.toLowerCase(), amount, this.nativeBalances);
  }

  /**
   * Transfer straight from `from` into the vault, bypassing the timelock.
   */
  deposit(asset: AssetId, from: Address, amount: bigint): void {
    const source = key(asset, from);
    const available = this.balances.get(source) ?? 0n;
    if (available < amount) {
      throw new RangeError(`Deposit of ${amount.toString()} exceeds balance ${available.toString()}`);
    }
    this.balances.set(source, available - amount);
    this.credit(key(asset, this.vault), amount, this.balances);
  }

  /**
   * Make the next transfer in `direction` fail without moving funds.
   */
  failNext(direction: TransferDirection, kind: TransferErrorKind, message?: string): void {
    this.failures.push({ direction, kind, message: message ?? `simulated ${kind} ${direction}` });
  }

  onTransfer(hook: TransferHook): () => void {
    this.hooks.add(hook);
    return () => {
      this.hooks.delete(hook);
    };
  }

  transfers(): readonly LedgerTransfer[] {
    return [...this.history];
  }

  // ─── Private helpers ────────────────────────────────────────────────

  private async move(transfer: LedgerTransfer): Promise<TransferResult> {
    const failureIndex = this.failures.findIndex((f) => f.direction === transfer.direction);
    if (failureIndex !== -1) {
      const [failure] = this.failures.splice(failureIndex, 1);
      if (failure !== undefined) {
        return transferFailed(failure.kind, failure.message);
      }
    }

    const book = transfer.asset === undefined ? this.nativeBalances : this.balances;
    const source = transfer.asset === undefined
      ? transfer.from.toLowerCase()
      : key(transfer.asset, transfer.from);
    const target = transfer.asset === undefined
      ? transfer.to.toLowerCase()
      : key(transfer.asset, transfer.to);

    const available = book.get(source) ?? 0n;
    if (available < transfer.amount) {
      return transferFailed(
        "insufficient-funds",
        `${transfer.from} holds ${available.toString()}, needs ${transfer.amount.toString()}`,
      );
    }

    book.set(source, available - transfer.amount);
    this.credit(target, transfer.amount, book);
    this.history.push(transfer);

    try {
      for (const hook of this.hooks) {
        await hook(transfer);
      }
    } catch (err) {
      this.credit(target, -transfer.amount, book);
      this.credit(source, transfer.amount, book);
      this.history.splice(this.history.lastIndexOf(transfer), 1);
      return transferFailed(
        "reverted",
        `Transfer hook failed: ${err instanceof Error ? err.message : String(err)}`,
      );
    }
    return transferOk();
  }

  private credit(entry: string, amount: bigint, book: Map<string, bigint>): void {
    book.set(entry, (book.get(entry) ?? 0n) + amount);
  }
}

function key(asset: AssetId, holder: Address): string {
  return `${asset.toLowerCase()}:${holder.toLowerCase()}`;
}
