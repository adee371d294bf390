/**
 * EVM Transfer Adapter — moves ERC-20 tokens and native currency for the
 * timelock vault.
 *
 * Uses viem for all chain interactions. The vault is the account derived
 * from the configured private key.
 *
 * - pull: vault calls `token.transferFrom(from, vault, amount)`
 * - push: vault calls `token.transfer(to, amount)`
 * - pushNative: plain value transfer from the vault
 *
 * Success requires an explicit `true`:
 * 1. The call is dry-run with eth_call. Empty return data (tokens that
 *    return nothing) is ambiguous; a decoded `false` is rejected.
 * 2. The transaction is sent and its receipt must report success.
 */

import {
  BaseError,
  ExecutionRevertedError,
  InsufficientFundsError,
  createPublicClient,
  createWalletClient,
  decodeFunctionResult,
  encodeFunctionData,
  http,
  parseAbi,
  type Chain,
  type Hash,
  type Hex,
  type HttpTransport,
  type PublicClient,
  type WalletClient,
} from "viem";
import { privateKeyToAccount, type PrivateKeyAccount } from "viem/accounts";
import type {
  Address,
  AssetId,
  AssetTransferAdapter,
  NativeTransferAdapter,
  TransferErrorKind,
  TransferResult,
} from "@vestlock/types";
import { transferFailed, transferOk } from "@vestlock/types";
import { VIEM_CHAINS, supportedChainIds } from "./chains.js";

// =============================================================================
// ABI
// =============================================================================

const ERC20_ABI = parseAbi([
  "function transfer(address to, uint256 amount) returns (bool)",
  "function transferFrom(address from, address to, uint256 amount) returns (bool)",
  "function balanceOf(address owner) view returns (uint256)",
]);

type TransferFunction = "transfer" | "transferFrom";

/** Gas used by a plain value transfer. */
export const NATIVE_TRANSFER_GAS = 21_000n;

// =============================================================================
// Error
// =============================================================================

export class EvmAdapterError extends Error {
  public readonly code: EvmAdapterErrorCode;
  constructor(code: EvmAdapterErrorCode, message: string) {
    super(message);
    this.name = "EvmAdapterError";
    this.code = code;
  }
}

export type EvmAdapterErrorCode =
  | "INVALID_CHAIN_ID"
  | "UNSUPPORTED_CHAIN"
  | "NOT_CONNECTED";

// =============================================================================
// Config
// =============================================================================

export interface EvmAdapterConfig {
  /** CAIP-2 chain id, e.g. "eip155:1" */
  readonly chainId: string;
  readonly rpcUrl: string;
  /** Private key of the vault account */
  readonly privateKey: Hex;
  /** RPC timeout. Default: 30 000 ms */
  readonly timeoutMs?: number;
  /** Confirmations to wait for. Default: 1 */
  readonly confirmations?: number;
}

interface Clients {
  readonly chain: Chain;
  readonly publicClient: PublicClient<HttpTransport, Chain>;
  readonly walletClient: WalletClient<HttpTransport, Chain, PrivateKeyAccount>;
}

// =============================================================================
// EVM Transfer Adapter
// =============================================================================

export class EvmTransferAdapter implements AssetTransferAdapter, NativeTransferAdapter {
  readonly chainId: string;
  private readonly config: EvmAdapterConfig;
  private readonly account: PrivateKeyAccount;
  private clients: Clients | null = null;

  constructor(config: EvmAdapterConfig) {
    if (!config.chainId.startsWith("eip155:")) {
      throw new EvmAdapterError(
        "INVALID_CHAIN_ID",
        `EvmTransferAdapter: expected EVM chain ID (eip155:*), got '${config.chainId}'`,
      );
    }
    this.chainId = config.chainId;
    this.config = config;
    this.account = privateKeyToAccount(config.privateKey);
  }

  /** The vault: the account that holds and sends funds. */
  get vaultAddress(): Address {
    return this.account.address;
  }

  connect(): void {
    const chain = VIEM_CHAINS[this.chainId];
    if (!chain) {
      throw new EvmAdapterError(
        "UNSUPPORTED_CHAIN",
        `EvmTransferAdapter: unsupported chain '${this.chainId}'. ` +
          `Supported: ${supportedChainIds().join(", ")}`,
      );
    }

    const transport = http(this.config.rpcUrl, {
      timeout: this.config.timeoutMs ?? 30_000,
    });
    this.clients = {
      chain,
      publicClient: createPublicClient({ chain, transport }),
      walletClient: createWalletClient({ account: this.account, chain, transport }),
    };
  }

  disconnect(): void {
    this.clients = null;
  }

  // ─── Asset transfers ────────────────────────────────────────────────

  async pull(asset: AssetId, from: Address, to: Address, amount: bigint): Promise<TransferResult> {
    const data = encodeFunctionData({
      abi: ERC20_ABI,
      functionName: "transferFrom",
      args: [from, to, amount],
    });
    return this.execute(asset, "transferFrom", data);
  }

  async push(asset: AssetId, to: Address, amount: bigint): Promise<TransferResult> {
    const data = encodeFunctionData({
      abi: ERC20_ABI,
      functionName: "transfer",
      args: [to, amount],
    });
    return this.execute(asset, "transfer", data);
  }

  async balanceOf(asset: AssetId, holder: Address): Promise<bigint> {
    const { publicClient } = this.requireClients();
    return publicClient.readContract({
      address: asset,
      abi: ERC20_ABI,
      functionName: "balanceOf",
      args: [holder],
    });
  }

  // ─── Native currency ────────────────────────────────────────────────

  /**
   * For the vault, the balance minus the fee of one plain transfer at the
   * current gas price; for any other holder, the raw balance.
   */
  async nativeBalanceOf(holder: Address): Promise<bigint> {
    const { publicClient } = this.requireClients();
    const balance = await publicClient.getBalance({ address: holder });
    if (holder.toLowerCase() !== this.vaultAddress.toLowerCase()) {
      return balance;
    }
    const reserve = (await publicClient.getGasPrice()) * NATIVE_TRANSFER_GAS;
    return balance > reserve ? balance - reserve : 0n;
  }

  async pushNative(to: Address, amount: bigint): Promise<TransferResult> {
    const { chain, publicClient, walletClient } = this.requireClients();

    let hash: Hash;
    try {
      const gasPrice = await publicClient.getGasPrice();
      hash = await walletClient.sendTransaction({
        account: this.account,
        chain,
        to,
        value: amount,
        gas: NATIVE_TRANSFER_GAS,
        gasPrice,
      });
    } catch (err) {
      return transferFailed(classify(err), describe(err));
    }
    return this.confirm(hash);
  }

  // ─── Private helpers ────────────────────────────────────────────────

  private async execute(token: AssetId, fn: TransferFunction, data: Hex): Promise<TransferResult> {
    const { chain, publicClient, walletClient } = this.requireClients();

    let returned: Hex | undefined;
    try {
      ({ data: returned } = await publicClient.call({
        account: this.account.address,
        to: token,
        data,
      }));
    } catch (err) {
      return transferFailed(classify(err), describe(err));
    }

    const verdict = interpretReturn(fn, returned);
    if (!verdict.ok) {
      return verdict;
    }

    let hash: Hash;
    try {
      hash = await walletClient.sendTransaction({
        account: this.account,
        chain,
        to: token,
        data,
      });
    } catch (err) {
      return transferFailed(classify(err), describe(err));
    }
    return this.confirm(hash);
  }

  private async confirm(hash: Hash): Promise<TransferResult> {
    const { publicClient } = this.requireClients();
    try {
      const receipt = await publicClient.waitForTransactionReceipt({
        hash,
        confirmations: this.config.confirmations ?? 1,
      });
      if (receipt.status !== "success") {
        return transferFailed("reverted", `Transaction ${hash} reverted`);
      }
    } catch (err) {
      // Sent, but the outcome is unknown.
      return transferFailed("ambiguous", `No receipt for ${hash}: ${describe(err)}`);
    }
    return transferOk(hash);
  }

  private requireClients(): Clients {
    if (!this.clients) {
      throw new EvmAdapterError(
        "NOT_CONNECTED",
        "EvmTransferAdapter: not connected. Call connect() first.",
      );
    }
    return this.clients;
  }
}

// =============================================================================
// Result interpretation
// =============================================================================

/**
 * Turn the raw eth_call return data of transfer/transferFrom into a verdict.
 */
export function interpretReturn(fn: TransferFunction, data: Hex | undefined): TransferResult {
  if (data === undefined || data === "0x") {
    return transferFailed("ambiguous", `${fn} returned no data`);
  }

  let decoded: unknown;
  try {
    decoded = decodeFunctionResult({ abi: ERC20_ABI, functionName: fn, data });
  } catch (err) {
    return transferFailed("ambiguous", `${fn} returned undecodable data: ${describe(err)}`);
  }

  return decoded === true
    ? transferOk()
    : transferFailed("rejected", `${fn} returned false`);
}

function classify(err: unknown): TransferErrorKind {
  if (err instanceof BaseError) {
    if (err.walk((e) => e instanceof ExecutionRevertedError)) {
      return "reverted";
    }
    if (err.walk((e) => e instanceof InsufficientFundsError)) {
      return "insufficient-funds";
    }
  }
  return "unavailable";
}

function describe(err: unknown): string {
  if (err instanceof BaseError) {
    return err.shortMessage;
  }
  return err instanceof Error ? err.message : String(err);
}
