/**
 * @vestlock/node — Configuration.
 *
 * Loads and validates configuration from environment variables using Zod.
 */

import { z } from "zod";
import type { Address } from "@vestlock/types";
import { normalizeAddress } from "@vestlock/timelock";

// =============================================================================
// Schema
// =============================================================================

const PrivateKeySchema = z
  .string()
  .refine(
    (value): value is `0x${string}` => /^0x[0-9a-fA-F]{64}$/.test(value),
    "Expected a 32-byte hex private key",
  );

export const ConfigSchema = z
  .object({
    PORT: z.coerce.number().int().min(1).max(65535).default(3000),
    HOST: z.string().default("0.0.0.0"),
    LOG_LEVEL: z
      .enum(["fatal", "error", "warn", "info", "debug", "trace"])
      .default("info"),
    NODE_ENV: z
      .enum(["development", "production", "test"])
      .default("development"),

    // Timelock
    CONTROLLER_ADDRESS: z.string().min(1),
    REGISTRY_PATH: z.string().min(1).optional(),

    // Auth
    API_KEYS: z.string().default(""),

    // Transfer adapter
    ADAPTER: z.enum(["memory", "evm"]).default("memory"),
    VAULT_ADDRESS: z.string().optional(),
    MEMORY_BALANCES: z.string().default(""),
    EVM_CHAIN_ID: z.string().default("eip155:11155111"),
    EVM_RPC_URL: z.string().url().optional(),
    VAULT_PRIVATE_KEY: PrivateKeySchema.optional(),
    RPC_TIMEOUT_MS: z.coerce.number().int().min(1000).default(30000),
    EVM_CONFIRMATIONS: z.coerce.number().int().min(1).default(1),
  })
  .superRefine((config, ctx) => {
    const requireKey = (key: keyof typeof config, reason: string): void => {
      if (config[key] === undefined) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: [key],
          message: `${key} is required ${reason}`,
        });
      }
    };

    if (config.ADAPTER === "memory") {
      requireKey("VAULT_ADDRESS", "when ADAPTER=memory");
    } else {
      requireKey("EVM_RPC_URL", "when ADAPTER=evm");
      requireKey("VAULT_PRIVATE_KEY", "when ADAPTER=evm");
    }
  });

export type AppConfig = z.infer<typeof ConfigSchema>;

// =============================================================================
// API Key Parsing
// =============================================================================

export interface ParsedApiKey {
  readonly key: string;
  readonly address: Address;
}

/**
 * Parse the API_KEYS env var into structured records.
 *
 * Format: "key1:0xAddress1,key2:0xAddress2"
 */
export function parseApiKeys(raw: string): readonly ParsedApiKey[] {
  if (raw.trim() === "") {
    return [];
  }

  const keys: ParsedApiKey[] = [];
  const seen = new Set<string>();

  for (const entry of raw.split(",")) {
    const parts = entry.trim().split(":");
    const [key, rawAddress] = parts;
    if (parts.length !== 2 || key === undefined || rawAddress === undefined) {
      throw new Error(
        `Invalid API_KEYS entry: "${entry.trim()}". Expected format: key:address`,
      );
    }

    if (key === "") {
      throw new Error("API key cannot be empty");
    }
    if (seen.has(key)) {
      throw new Error(`Duplicate API key "${key}" in API_KEYS`);
    }

    const address = normalizeAddress(rawAddress);
    if (address === undefined) {
      throw new Error(`Invalid address "${rawAddress}" in API_KEYS`);
    }

    seen.add(key);
    keys.push({ key, address });
  }

  return keys;
}

// =============================================================================
// Memory Ledger Seeding
// =============================================================================

/**
 * A starting balance for the in-memory ledger. `asset` is "native" for
 * the ledger's native currency.
 */
export interface SeedBalance {
  readonly asset: Address | "native";
  readonly holder: Address;
  readonly amount: bigint;
}

/**
 * Parse the MEMORY_BALANCES env var.
 *
 * Format: "0xAsset:0xHolder:1000,native:0xHolder:5"
 */
export function parseMemoryBalances(raw: string): readonly SeedBalance[] {
  if (raw.trim() === "") {
    return [];
  }

  return raw.split(",").map((entry): SeedBalance => {
    const parts = entry.trim().split(":");
    const [rawAsset, rawHolder, rawAmount] = parts;
    if (
      parts.length !== 3 ||
      rawAsset === undefined ||
      rawHolder === undefined ||
      rawAmount === undefined
    ) {
      throw new Error(
        `Invalid MEMORY_BALANCES entry: "${entry.trim()}". Expected format: asset:holder:amount`,
      );
    }

    const asset: SeedBalance["asset"] | undefined =
      rawAsset === "native" ? "native" : normalizeAddress(rawAsset);
    if (asset === undefined) {
      throw new Error(`Invalid asset "${rawAsset}" in MEMORY_BALANCES`);
    }
    const holder = normalizeAddress(rawHolder);
    if (holder === undefined) {
      throw new Error(`Invalid holder "${rawHolder}" in MEMORY_BALANCES`);
    }
    if (!/^\d+$/.test(rawAmount)) {
      throw new Error(`Invalid amount "${rawAmount}" in MEMORY_BALANCES`);
    }

    return { asset, holder, amount: BigInt(rawAmount) };
  });
}

// =============================================================================
// Loader
// =============================================================================

/**
 * Load and validate configuration from process.env.
 *
 * @throws {z.ZodError} if required env vars are missing or invalid
 */
export function loadConfig(
  env: Record<string, string | undefined> = process.env,
): AppConfig {
  return ConfigSchema.parse(env);
}
