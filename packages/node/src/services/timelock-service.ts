/**
 * TimelockService — the timelock as the HTTP layer sees it.
 *
 * Mutating operations are serialized through a SerialExecutor; queries
 * read the timelock directly. Results keep their domain types; routes
 * turn them into JSON views.
 */

import type {
  InMemoryEventLog,
  LoggedEvent,
  NativeSweepReceipt,
  ReadEventsOptions,
  Timelock,
} from "@vestlock/timelock";
import type {
  Identity,
  LockReceipt,
  LockStatus,
  ReleaseReceipt,
} from "@vestlock/types";
import { SerialExecutor } from "./serial-executor.js";

export interface TimelockServiceConfig {
  readonly timelock: Timelock;
  readonly events: InMemoryEventLog;
  readonly executor?: SerialExecutor;
}

export interface LockDetail {
  readonly status: LockStatus;
  readonly heldBalance: bigint;
}

export interface ControllerInfo {
  readonly controller: Identity | null;
  readonly lockDuration: number;
}

export class TimelockService {
  readonly timelock: Timelock;
  readonly events: InMemoryEventLog;
  private readonly executor: SerialExecutor;

  constructor(config: TimelockServiceConfig) {
    this.timelock = config.timelock;
    this.events = config.events;
    this.executor = config.executor ?? new SerialExecutor();
  }

  // ─── Mutations ──────────────────────────────────────────────────────

  initiateLock(caller: string, asset: string, amount: bigint): Promise<LockReceipt> {
    return this.executor.run(() => this.timelock.initiateLock(caller, asset, amount));
  }

  release(caller: string, asset: string): Promise<ReleaseReceipt> {
    return this.executor.run(() => this.timelock.release(caller, asset));
  }

  sweepNativeBalance(caller: string): Promise<NativeSweepReceipt> {
    return this.executor.run(() => this.timelock.sweepNativeBalance(caller));
  }

  transferControl(caller: string, newController: string): Promise<Identity> {
    return this.executor.run(async () =>
      this.timelock.guard.transferControl(caller, newController),
    );
  }

  renounceControl(caller: string): Promise<void> {
    return this.executor.run(async () => this.timelock.guard.renounce(caller));
  }

  // ─── Queries ────────────────────────────────────────────────────────

  listLocks(): readonly LockStatus[] {
    return this.timelock.activeLocks();
  }

  async getLock(asset: string): Promise<LockDetail> {
    const status = this.timelock.statusOf(asset);
    const heldBalance = await this.timelock.heldBalanceOf(asset);
    return { status, heldBalance };
  }

  controllerInfo(): ControllerInfo {
    return {
      controller: this.timelock.currentController(),
      lockDuration: this.timelock.lockDuration(),
    };
  }

  readEvents(options?: ReadEventsOptions): readonly LoggedEvent[] {
    return this.events.read(options);
  }

  // ─── Lifecycle ──────────────────────────────────────────────────────

  get pendingOperations(): number {
    return this.executor.pending;
  }

  /** Wait for in-flight mutations to settle. */
  drain(): Promise<void> {
    return this.executor.drain();
  }
}
