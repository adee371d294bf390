/**
 * Timelock — the lock state machine.
 *
 * Holds fungible assets for a single controller and releases the whole
 * held balance of an asset once its maturity is reached.
 *
 * Operations:
 * - initiateLock: guard → validate → pull into the vault → store maturity
 * - release: guard → validate → check maturity → read balance → clear → push
 * - sweepNativeBalance: guard → read native balance → push
 * - read-only queries (no authorization)
 *
 * Rules:
 * - Every precondition is checked before any external call
 * - A failed pull leaves no state behind
 * - release clears the registry *before* pushing, so a nested release
 *   made from inside the push finds no active lock
 * - A failed push does not restore the cleared maturity
 * - The registry tracks timing only; unsolicited deposits are released too
 */

import type {
  Address,
  AssetId,
  AssetTransferAdapter,
  EventSink,
  Identity,
  LockReceipt,
  LockStatus,
  NativeTransferAdapter,
  ReleaseReceipt,
  TransferError,
  TransferResult,
  UnixSeconds,
} from "@vestlock/types";
import { transferFailed } from "@vestlock/types";
import { normalizeAddress } from "./address.js";
import type { AccessGuard } from "./access-guard.js";
import type { Clock } from "./clock.js";
import { systemClock } from "./clock.js";
import { createEvent } from "./event-log.js";
import type { LockRegistry } from "./registry.js";
import { RegistryError } from "./registry.js";

// =============================================================================
// Constants
// =============================================================================

export const SECONDS_PER_DAY = 86_400;

export const LOCK_DURATION_DAYS = 182;

/** Fixed lock period in seconds (182 days). */
export const LOCK_DURATION: number = LOCK_DURATION_DAYS * SECONDS_PER_DAY;

// =============================================================================
// Error
// =============================================================================

export class TimelockError extends Error {
  public readonly code: TimelockErrorCode;
  /** The adapter's explanation, for TRANSFER_* failures */
  public readonly transferError: TransferError | undefined;
  constructor(code: TimelockErrorCode, message: string, transferError?: TransferError) {
    super(message);
    this.name = "TimelockError";
    this.code = code;
    this.transferError = transferError;
  }
}

export type TimelockErrorCode =
  | "NOT_AUTHORIZED"
  | "INVALID_ASSET"
  | "ZERO_AMOUNT"
  | "ALREADY_LOCKED"
  | "NOT_VESTED"
  | "STILL_LOCKED"
  | "NOTHING_TO_RELEASE"
  | "NOTHING_TO_SWEEP"
  | "TRANSFER_PULL_FAILED"
  | "TRANSFER_PUSH_FAILED";

// =============================================================================
// Configuration
// =============================================================================

export interface TimelockDeps {
  /** The vault's own address on the asset ledger */
  readonly vault: Address;
  readonly registry: LockRegistry;
  readonly guard: AccessGuard;
  readonly assets: AssetTransferAdapter;
  readonly native: NativeTransferAdapter;
  /** Default: system clock */
  readonly clock?: Clock;
  /** Receives lock.initiated, lock.released and native.withdrawn */
  readonly events?: EventSink;
}

export interface NativeSweepReceipt {
  readonly recipient: Identity;
  readonly amount: bigint;
  readonly txHash?: string;
}

/**
 * State captured by the first phase of a release: the registry entry is
 * already gone, only the transfer remains.
 */
interface PendingRelease {
  readonly asset: AssetId;
  readonly amount: bigint;
}

// =============================================================================
// Timelock
// =============================================================================

export class Timelock {
  readonly vault: Address;
  readonly guard: AccessGuard;
  private readonly registry: LockRegistry;
  private readonly assets: AssetTransferAdapter;
  private readonly native: NativeTransferAdapter;
  private readonly clock: Clock;
  private readonly events: EventSink | undefined;

  constructor(deps: TimelockDeps) {
    this.vault = deps.vault;
    this.guard = deps.guard;
    this.registry = deps.registry;
    this.assets = deps.assets;
    this.native = deps.native;
    this.clock = deps.clock ?? systemClock;
    this.events = deps.events;
  }

  // ───────────────────────────────────────────────────────────────────────
  // Mutating operations
  // ───────────────────────────────────────────────────────────────────────

  /**
   * Pull `amount` of `asset` from the controller and lock the asset for
   * LOCK_DURATION seconds.
   *
   * Whatever the vault already holds of `asset` becomes part of this lock.
   */
  async initiateLock(caller: string, asset: string, amount: bigint): Promise<LockReceipt> {
    const controller = this.requireController(caller);
    const assetId = this.requireAsset(asset);
    if (amount <= 0n) {
      throw new TimelockError("ZERO_AMOUNT", `Amount must be positive, got ${amount.toString()}`);
    }
    if (this.registry.get(assetId) !== undefined) {
      throw this.alreadyLocked(assetId);
    }

    const pulled = await this.attempt(() =>
      this.assets.pull(assetId, controller, this.vault, amount),
    );
    if (!pulled.ok) {
      throw new TimelockError(
        "TRANSFER_PULL_FAILED",
        `Pull of ${amount.toString()} ${assetId} failed: ${pulled.error.message}`,
        pulled.error,
      );
    }

    const now = this.clock.now();
    const maturity = now + LOCK_DURATION;
    try {
      this.registry.set(assetId, maturity, now);
    } catch (err) {
      // A nested initiateLock made during the pull got there first; the
      // pulled funds stay in the vault under that lock.
      if (err instanceof RegistryError && err.code === "ALREADY_LOCKED") {
        throw this.alreadyLocked(assetId);
      }
      throw err;
    }

    this.events?.emit(
      createEvent(
        "lock.initiated",
        { asset: assetId, amount: amount.toString(), maturity },
        controller,
        "timelock",
      ),
    );

    return { asset: assetId, amount, maturity };
  }

  /**
   * Send the entire held balance of a matured asset to the controller.
   */
  async release(caller: string, asset: string): Promise<ReleaseReceipt> {
    const controller = this.requireController(caller);
    const assetId = this.requireAsset(asset);

    const pending = await this.beginRelease(assetId);
    return this.completeRelease(pending, controller);
  }

  /**
   * Send whatever native currency the vault holds to the controller.
   */
  async sweepNativeBalance(caller: string): Promise<NativeSweepReceipt> {
    const controller = this.requireController(caller);

    const amount = await this.native.nativeBalanceOf(this.vault);
    if (amount <= 0n) {
      throw new TimelockError("NOTHING_TO_SWEEP", "Vault holds no native balance");
    }

    const pushed = await this.attempt(() => this.native.pushNative(controller, amount));
    if (!pushed.ok) {
      throw new TimelockError(
        "TRANSFER_PUSH_FAILED",
        `Native transfer of ${amount.toString()} failed: ${pushed.error.message}`,
        pushed.error,
      );
    }

    this.events?.emit(
      createEvent(
        "native.withdrawn",
        { recipient: controller, amount: amount.toString() },
        controller,
        "timelock",
      ),
    );

    return pushed.txHash !== undefined
      ? { recipient: controller, amount, txHash: pushed.txHash }
      : { recipient: controller, amount };
  }

  // ───────────────────────────────────────────────────────────────────────
  // Queries
  // ───────────────────────────────────────────────────────────────────────

  /** Stored maturity, or null when no lock is active. */
  maturityOf(asset: string): UnixSeconds | null {
    return this.registry.get(this.requireAsset(asset)) ?? null;
  }

  heldBalanceOf(asset: string): Promise<bigint> {
    return this.assets.balanceOf(this.requireAsset(asset), this.vault);
  }

  currentController(): Identity | null {
    return this.guard.controller();
  }

  lockDuration(): number {
    return LOCK_DURATION;
  }

  statusOf(asset: string): LockStatus {
    const assetId = this.requireAsset(asset);
    return this.describe(assetId, this.registry.get(assetId));
  }

  activeLocks(): readonly LockStatus[] {
    return this.registry.entries().map((r) => this.describe(r.asset, r.maturity));
  }

  // ───────────────────────────────────────────────────────────────────────
  // Release phases
  // ───────────────────────────────────────────────────────────────────────

  /**
   * Phase 1: check maturity, read the balance, clear the registry.
   * Nothing external has been moved when this returns.
   */
  private async beginRelease(asset: AssetId): Promise<PendingRelease> {
    const maturity = this.registry.get(asset);
    if (maturity === undefined) {
      throw this.notVested(asset);
    }
    const now = this.clock.now();
    if (now < maturity) {
      throw new TimelockError(
        "STILL_LOCKED",
        `Asset ${asset} is locked until ${String(maturity)} (${String(maturity - now)}s remaining)`,
      );
    }

    const amount = await this.assets.balanceOf(asset, this.vault);
    if (amount <= 0n) {
      throw new TimelockError("NOTHING_TO_RELEASE", `Vault holds no ${asset}`);
    }

    if (this.registry.take(asset) === undefined) {
      throw this.notVested(asset);
    }
    return { asset, amount };
  }

  /**
   * Phase 2: push the captured balance. The registry is already clear.
   */
  private async completeRelease(
    pending: PendingRelease,
    controller: Identity,
  ): Promise<ReleaseReceipt> {
    const { asset, amount } = pending;

    const pushed = await this.attempt(() => this.assets.push(asset, controller, amount));
    if (!pushed.ok) {
      throw new TimelockError(
        "TRANSFER_PUSH_FAILED",
        `Push of ${amount.toString()} ${asset} failed: ${pushed.error.message}`,
        pushed.error,
      );
    }

    this.events?.emit(
      createEvent(
        "lock.released",
        { asset, amount: amount.toString() },
        controller,
        "timelock",
      ),
    );

    return pushed.txHash !== undefined
      ? { asset, amount, txHash: pushed.txHash }
      : { asset, amount };
  }

  // ───────────────────────────────────────────────────────────────────────
  // Private helpers
  // ───────────────────────────────────────────────────────────────────────

  private requireController(caller: string): Identity {
    const controller = this.guard.controller();
    if (controller === null || !this.guard.authorize(caller)) {
      throw new TimelockError("NOT_AUTHORIZED", `Caller ${caller} is not the controller`);
    }
    return controller;
  }

  private requireAsset(asset: string): AssetId {
    const assetId = normalizeAddress(asset);
    if (assetId === undefined) {
      throw new TimelockError("INVALID_ASSET", `Invalid asset identifier: '${asset}'`);
    }
    return assetId;
  }

  /**
   * Run an adapter transfer; a thrown error counts as a failed transfer.
   */
  private async attempt(transfer: () => Promise<TransferResult>): Promise<TransferResult> {
    try {
      return await transfer();
    } catch (err) {
      return transferFailed("unavailable", err instanceof Error ? err.message : String(err));
    }
  }

  private describe(asset: AssetId, maturity: UnixSeconds | undefined): LockStatus {
    if (maturity === undefined) {
      return { asset, maturity: null, state: "unlocked", secondsRemaining: 0 };
    }
    const remaining = maturity - this.clock.now();
    return remaining > 0
      ? { asset, maturity, state: "locked", secondsRemaining: remaining }
      : { asset, maturity, state: "releasable", secondsRemaining: 0 };
  }

  private alreadyLocked(asset: AssetId): TimelockError {
    return new TimelockError("ALREADY_LOCKED", `Asset ${asset} already has an active lock`);
  }

  private notVested(asset: AssetId): TimelockError {
    return new TimelockError("NOT_VESTED", `Asset ${asset} has no active lock`);
  }
}
