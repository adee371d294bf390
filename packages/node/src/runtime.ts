/**
 * Runtime wiring — turns a validated config into a running timelock.
 *
 * ADAPTER=memory  → InMemoryAssetLedger, vault at VAULT_ADDRESS, seeded
 *                   from MEMORY_BALANCES
 * ADAPTER=evm     → EvmTransferAdapter, vault derived from VAULT_PRIVATE_KEY
 * REGISTRY_PATH   → FileLockRegistry at that path, else in-memory
 */

import {
  FileLockRegistry,
  InMemoryAssetLedger,
  InMemoryEventLog,
  InMemoryLockRegistry,
  SingleControllerGuard,
  Timelock,
  normalizeAddress,
} from "@vestlock/timelock";
import type { Clock, HandlerErrorReporter, LockRegistry } from "@vestlock/timelock";
import { EvmTransferAdapter } from "@vestlock/evm-adapter";
import type {
  Address,
  AssetTransferAdapter,
  NativeTransferAdapter,
} from "@vestlock/types";
import { parseMemoryBalances } from "./config.js";
import type { AppConfig } from "./config.js";

export interface Runtime {
  readonly timelock: Timelock;
  readonly events: InMemoryEventLog;
  readonly adapterKind: AppConfig["ADAPTER"];
  /** Releases adapter connections */
  close(): void;
}

export interface RuntimeOptions {
  /** Receives errors thrown by event subscribers */
  readonly onEventHandlerError?: HandlerErrorReporter;
  /** Default: system clock */
  readonly clock?: Clock;
}

interface AdapterBinding {
  readonly vault: Address;
  readonly adapter: AssetTransferAdapter & NativeTransferAdapter;
  close(): void;
}

export function createRuntime(config: AppConfig, options: RuntimeOptions = {}): Runtime {
  const binding = config.ADAPTER === "evm" ? bindEvm(config) : bindMemory(config);
  const events = new InMemoryEventLog({
    capacity: 10_000,
    ...(options.onEventHandlerError !== undefined
      ? { onHandlerError: options.onEventHandlerError }
      : {}),
  });
  const registry: LockRegistry =
    config.REGISTRY_PATH !== undefined
      ? new FileLockRegistry({ filePath: config.REGISTRY_PATH })
      : new InMemoryLockRegistry();

  const timelock = new Timelock({
    vault: binding.vault,
    registry,
    guard: new SingleControllerGuard({ controller: config.CONTROLLER_ADDRESS, events }),
    assets: binding.adapter,
    native: binding.adapter,
    events,
    ...(options.clock !== undefined ? { clock: options.clock } : {}),
  });

  return {
    timelock,
    events,
    adapterKind: config.ADAPTER,
    close: () => binding.close(),
  };
}

function bindMemory(config: AppConfig): AdapterBinding {
  const vault = normalizeAddress(config.VAULT_ADDRESS ?? "");
  if (vault === undefined) {
    throw new Error(`VAULT_ADDRESS must be a non-zero address, got '${config.VAULT_ADDRESS ?? ""}'`);
  }
  const ledger = new InMemoryAssetLedger(vault);
  for (const seed of parseMemoryBalances(config.MEMORY_BALANCES)) {
    if (seed.asset === "native") {
      ledger.creditNative(seed.holder, seed.amount);
    } else {
      ledger.mint(seed.asset, seed.holder, seed.amount);
    }
  }

  return {
    vault,
    adapter: ledger,
    close: () => undefined,
  };
}

function bindEvm(config: AppConfig): AdapterBinding {
  const { EVM_RPC_URL: rpcUrl, VAULT_PRIVATE_KEY: privateKey } = config;
  if (rpcUrl === undefined || privateKey === undefined) {
    throw new Error("EVM_RPC_URL and VAULT_PRIVATE_KEY are required when ADAPTER=evm");
  }

  const adapter = new EvmTransferAdapter({
    chainId: config.EVM_CHAIN_ID,
    rpcUrl,
    privateKey,
    timeoutMs: config.RPC_TIMEOUT_MS,
    confirmations: config.EVM_CONFIRMATIONS,
  });
  adapter.connect();

  return {
    vault: adapter.vaultAddress,
    adapter,
    close: () => adapter.disconnect(),
  };
}
