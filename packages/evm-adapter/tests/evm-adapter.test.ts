/**
 * Tests for EvmTransferAdapter.
 *
 * Uses vitest mocking to replace viem's client factories.
 * No actual RPC calls are made.
 */

import { describe, it, expect, vi, beforeEach } from "vitest";
import {
  ExecutionRevertedError,
  InsufficientFundsError,
  encodeFunctionData,
  parseAbi,
} from "viem";
import type { Hex } from "viem";
import { privateKeyToAccount } from "viem/accounts";
import {
  EvmTransferAdapter,
  EvmAdapterError,
  NATIVE_TRANSFER_GAS,
  interpretReturn,
} from "../src/evm-adapter.js";
import type { EvmAdapterConfig } from "../src/evm-adapter.js";

// =============================================================================
// Mocks
// =============================================================================

const mockCall = vi.fn();
const mockReadContract = vi.fn();
const mockGetBalance = vi.fn();
const mockGetGasPrice = vi.fn();
const mockWaitForReceipt = vi.fn();
const mockSendTransaction = vi.fn();

vi.mock("viem", async () => {
  const actual = await vi.importActual("viem");
  return {
    ...actual,
    createPublicClient: vi.fn(() => ({
      call: mockCall,
      readContract: mockReadContract,
      getBalance: mockGetBalance,
      getGasPrice: mockGetGasPrice,
      waitForTransactionReceipt: mockWaitForReceipt,
    })),
    createWalletClient: vi.fn(() => ({
      sendTransaction: mockSendTransaction,
    })),
  };
});

const PRIVATE_KEY = `0x${"11".repeat(32)}` as const;
const TOKEN = "0x1111111111111111111111111111111111111111";
const CONTROLLER = "0x1000000000000000000000000000000000000001";
const TX_HASH = `0x${"ab".repeat(32)}`;

const TRUE_WORD: Hex = `0x${"0".repeat(63)}1`;
const FALSE_WORD: Hex = `0x${"0".repeat(64)}`;

const ABI = parseAbi([
  "function transfer(address to, uint256 amount) returns (bool)",
  "function transferFrom(address from, address to, uint256 amount) returns (bool)",
]);

function createConfig(overrides: Partial<EvmAdapterConfig> = {}): EvmAdapterConfig {
  return {
    chainId: "eip155:11155111",
    rpcUrl: "https://mock-rpc.example.com",
    privateKey: PRIVATE_KEY,
    timeoutMs: 5000,
    ...overrides,
  };
}

function connected(): EvmTransferAdapter {
  const adapter = new EvmTransferAdapter(createConfig());
  adapter.connect();
  return adapter;
}

// =============================================================================
// Tests
// =============================================================================

describe("EvmTransferAdapter", () => {
  beforeEach(() => {
    vi.clearAllMocks();
    mockCall.mockResolvedValue({ data: TRUE_WORD });
    mockSendTransaction.mockResolvedValue(TX_HASH);
    mockWaitForReceipt.mockResolvedValue({ status: "success" });
    mockGetGasPrice.mockResolvedValue(10n);
  });

  describe("constructor", () => {
    it("derives the vault address from the private key", () => {
      const adapter = new EvmTransferAdapter(createConfig());
      expect(adapter.vaultAddress).toBe(privateKeyToAccount(PRIVATE_KEY).address);
      expect(adapter.chainId).toBe("eip155:11155111");
    });

    it("rejects non-EVM chain IDs", () => {
      expect(
        () => new EvmTransferAdapter(createConfig({ chainId: "solana:mainnet-beta" })),
      ).toThrow("expected EVM chain ID");
    });
  });

  describe("connect", () => {
    it("rejects chains without a viem definition", () => {
      const adapter = new EvmTransferAdapter(createConfig({ chainId: "eip155:999999" }));
      expect(() => adapter.connect()).toThrow(EvmAdapterError);
      expect(() => adapter.connect()).toThrow("unsupported chain 'eip155:999999'");
    });

    it("requires connect() before use", async () => {
      const adapter = new EvmTransferAdapter(createConfig());
      await expect(adapter.balanceOf(TOKEN, CONTROLLER)).rejects.toThrow("not connected");
    });

    it("disconnect() drops the clients", async () => {
      const adapter = connected();
      adapter.disconnect();
      await expect(adapter.push(TOKEN, CONTROLLER, 1n)).rejects.toThrow("not connected");
    });
  });

  describe("push", () => {
    it("dry-runs then sends transfer(to, amount)", async () => {
      const adapter = connected();
      const data = encodeFunctionData({
        abi: ABI,
        functionName: "transfer",
        args: [CONTROLLER, 500n],
      });

      const result = await adapter.push(TOKEN, CONTROLLER, 500n);

      expect(result).toEqual({ ok: true, txHash: TX_HASH });
      expect(mockCall).toHaveBeenCalledWith({
        account: adapter.vaultAddress,
        to: TOKEN,
        data,
      });
      expect(mockSendTransaction).toHaveBeenCalledWith(
        expect.objectContaining({ to: TOKEN, data }),
      );
      expect(mockWaitForReceipt).toHaveBeenCalledWith({ hash: TX_HASH, confirmations: 1 });
    });

    it("treats empty return data as ambiguous and sends nothing", async () => {
      mockCall.mockResolvedValue({ data: undefined });
      const adapter = connected();

      const result = await adapter.push(TOKEN, CONTROLLER, 500n);

      expect(result).toEqual({
        ok: false,
        error: { kind: "ambiguous", message: "transfer returned no data" },
      });
      expect(mockSendTransaction).not.toHaveBeenCalled();
    });

    it("treats a false return as rejected", async () => {
      mockCall.mockResolvedValue({ data: FALSE_WORD });
      const adapter = connected();

      const result = await adapter.push(TOKEN, CONTROLLER, 500n);

      expect(result).toEqual({
        ok: false,
        error: { kind: "rejected", message: "transfer returned false" },
      });
      expect(mockSendTransaction).not.toHaveBeenCalled();
    });

    it("classifies a reverting dry run as reverted", async () => {
      mockCall.mockRejectedValue(
        new ExecutionRevertedError({ message: "execution reverted: balance too low" }),
      );
      const adapter = connected();

      const result = await adapter.push(TOKEN, CONTROLLER, 500n);

      expect(result.ok).toBe(false);
      if (!result.ok) {
        expect(result.error.kind).toBe("reverted");
      }
    });

    it("classifies transport failures as unavailable", async () => {
      mockCall.mockRejectedValue(new Error("fetch failed"));
      const adapter = connected();

      const result = await adapter.push(TOKEN, CONTROLLER, 500n);

      expect(result).toEqual({
        ok: false,
        error: { kind: "unavailable", message: "fetch failed" },
      });
    });

    it("reports a reverted receipt", async () => {
      mockWaitForReceipt.mockResolvedValue({ status: "reverted" });
      const adapter = connected();

      const result = await adapter.push(TOKEN, CONTROLLER, 500n);

      expect(result).toEqual({
        ok: false,
        error: { kind: "reverted", message: `Transaction ${TX_HASH} reverted` },
      });
    });

    it("reports a missing receipt as ambiguous", async () => {
      mockWaitForReceipt.mockRejectedValue(new Error("timed out"));
      const adapter = connected();

      const result = await adapter.push(TOKEN, CONTROLLER, 500n);

      expect(result).toEqual({
        ok: false,
        error: { kind: "ambiguous", message: `No receipt for ${TX_HASH}: timed out` },
      });
    });

    it("waits for the configured confirmations", async () => {
      const adapter = new EvmTransferAdapter(createConfig({ confirmations: 3 }));
      adapter.connect();

      await adapter.push(TOKEN, CONTROLLER, 1n);

      expect(mockWaitForReceipt).toHaveBeenCalledWith({ hash: TX_HASH, confirmations: 3 });
    });
  });

  describe("pull", () => {
    it("sends transferFrom(from, to, amount)", async () => {
      const adapter = connected();
      const data = encodeFunctionData({
        abi: ABI,
        functionName: "transferFrom",
        args: [CONTROLLER, adapter.vaultAddress, 750n],
      });

      const result = await adapter.pull(TOKEN, CONTROLLER, adapter.vaultAddress, 750n);

      expect(result).toEqual({ ok: true, txHash: TX_HASH });
      expect(mockCall).toHaveBeenCalledWith({
        account: adapter.vaultAddress,
        to: TOKEN,
        data,
      });
    });

    it("names transferFrom in ambiguity messages", async () => {
      mockCall.mockResolvedValue({ data: "0x" });
      const adapter = connected();

      const result = await adapter.pull(TOKEN, CONTROLLER, adapter.vaultAddress, 750n);

      expect(result).toEqual({
        ok: false,
        error: { kind: "ambiguous", message: "transferFrom returned no data" },
      });
    });
  });

  describe("balanceOf", () => {
    it("reads the token balance", async () => {
      mockReadContract.mockResolvedValue(4200n);
      const adapter = connected();

      await expect(adapter.balanceOf(TOKEN, CONTROLLER)).resolves.toBe(4200n);
      expect(mockReadContract).toHaveBeenCalledWith(
        expect.objectContaining({
          address: TOKEN,
          functionName: "balanceOf",
          args: [CONTROLLER],
        }),
      );
    });
  });

  describe("native currency", () => {
    it("reserves one transfer fee from the vault balance", async () => {
      mockGetBalance.mockResolvedValue(1_000_000n);
      const adapter = connected();

      // 1_000_000 - 10 * 21_000
      await expect(adapter.nativeBalanceOf(adapter.vaultAddress)).resolves.toBe(790_000n);
    });

    it("reports zero when the balance cannot cover the fee", async () => {
      mockGetBalance.mockResolvedValue(100_000n);
      const adapter = connected();

      await expect(adapter.nativeBalanceOf(adapter.vaultAddress)).resolves.toBe(0n);
    });

    it("reports other holders' raw balance", async () => {
      mockGetBalance.mockResolvedValue(1_000_000n);
      const adapter = connected();

      await expect(adapter.nativeBalanceOf(CONTROLLER)).resolves.toBe(1_000_000n);
      expect(mockGetGasPrice).not.toHaveBeenCalled();
    });

    it("sends a plain value transfer", async () => {
      const adapter = connected();

      const result = await adapter.pushNative(CONTROLLER, 790_000n);

      expect(result).toEqual({ ok: true, txHash: TX_HASH });
      expect(mockSendTransaction).toHaveBeenCalledWith(
        expect.objectContaining({
          to: CONTROLLER,
          value: 790_000n,
          gas: NATIVE_TRANSFER_GAS,
          gasPrice: 10n,
        }),
      );
    });

    it("classifies insufficient funds", async () => {
      mockSendTransaction.mockRejectedValue(new InsufficientFundsError());
      const adapter = connected();

      const result = await adapter.pushNative(CONTROLLER, 790_000n);

      expect(result.ok).toBe(false);
      if (!result.ok) {
        expect(result.error.kind).toBe("insufficient-funds");
      }
    });
  });
});

describe("interpretReturn", () => {
  it("accepts an encoded true", () => {
    expect(interpretReturn("transfer", TRUE_WORD)).toEqual({ ok: true });
  });

  it("treats undecodable data as ambiguous", () => {
    const result = interpretReturn("transfer", "0x01");
    expect(result.ok).toBe(false);
    if (!result.ok) {
      expect(result.error.kind).toBe("ambiguous");
    }
  });
});
