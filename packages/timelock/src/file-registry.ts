/**
 * File-backed Lock Registry.
 *
 * Same contract as InMemoryLockRegistry, with every mutation written
 * through to a JSON file so active locks survive a process restart.
 *
 * File format:
 * {"version":1,"locks":{"0xAsset...":1715000000}}
 *
 * Writes go to `<path>.tmp` and are renamed over the target, so a crash
 * mid-write leaves the previous file intact. A failed write rolls the
 * in-memory map back and throws REGISTRY_WRITE_FAILED.
 */

import {
  existsSync,
  mkdirSync,
  readFileSync,
  renameSync,
  writeFileSync,
} from "node:fs";
import { dirname } from "node:path";
import type { AssetId, UnixSeconds } from "@vestlock/types";
import { isUnixSeconds } from "@vestlock/types";
import { normalizeAddress } from "./address.js";
import { InMemoryLockRegistry, RegistryError } from "./registry.js";

interface RegistryFile {
  readonly version: 1;
  readonly locks: Record<string, UnixSeconds>;
}

export interface FileLockRegistryOptions {
  /** Path to the JSON file */
  readonly filePath: string;
}

export class FileLockRegistry extends InMemoryLockRegistry {
  private readonly _filePath: string;

  /**
   * Load the registry from `filePath`, or start empty if it does not exist.
   *
   * @throws {RegistryError} REGISTRY_CORRUPT if the file cannot be read back
   */
  constructor(options: FileLockRegistryOptions) {
    super();
    this._filePath = options.filePath;
    mkdirSync(dirname(this._filePath), { recursive: true });
    this._load();
  }

  get filePath(): string {
    return this._filePath;
  }

  override set(asset: AssetId, maturity: UnixSeconds, now: UnixSeconds): void {
    this._writeThrough(() => super.set(asset, maturity, now));
  }

  override clear(asset: AssetId): void {
    if (!this.maturities.has(asset)) {
      return;
    }
    this._writeThrough(() => super.clear(asset));
  }

  override take(asset: AssetId): UnixSeconds | undefined {
    if (!this.maturities.has(asset)) {
      return undefined;
    }
    return this._writeThrough(() => super.take(asset));
  }

  // ─── File I/O ───────────────────────────────────────────────────────

  private _load(): void {
    if (!existsSync(this._filePath)) {
      return;
    }

    let parsed: unknown;
    try {
      parsed = JSON.parse(readFileSync(this._filePath, "utf-8"));
    } catch (err) {
      throw new RegistryError(
        "REGISTRY_CORRUPT",
        `Registry file ${this._filePath} is not valid JSON: ${err instanceof Error ? err.message : String(err)}`,
      );
    }

    if (parsed === null || typeof parsed !== "object") {
      throw new RegistryError("REGISTRY_CORRUPT", `Registry file ${this._filePath} is not an object`);
    }
    const file = parsed as Record<string, unknown>;
    if (file.version !== 1) {
      throw new RegistryError(
        "REGISTRY_CORRUPT",
        `Unsupported registry version: ${String(file.version)}`,
      );
    }
    if (file.locks === null || typeof file.locks !== "object") {
      throw new RegistryError("REGISTRY_CORRUPT", `Registry file ${this._filePath} has no locks map`);
    }

    const locks = file.locks as Record<string, unknown>;
    for (const [key, maturity] of Object.entries(locks)) {
      const asset = normalizeAddress(key);
      if (asset === undefined || !isUnixSeconds(maturity) || maturity === 0) {
        throw new RegistryError(
          "REGISTRY_CORRUPT",
          `Invalid lock entry in ${this._filePath}: ${key}`,
        );
      }
      this.maturities.set(asset, maturity);
    }
  }

  private _writeThrough<T>(mutate: () => T): T {
    const previous = new Map(this.maturities);
    const result = mutate();
    try {
      this._persist();
    } catch (err) {
      this.maturities.clear();
      for (const [asset, maturity] of previous) {
        this.maturities.set(asset, maturity);
      }
      throw new RegistryError(
        "REGISTRY_WRITE_FAILED",
        `Could not write registry file ${this._filePath}: ${err instanceof Error ? err.message : String(err)}`,
      );
    }
    return result;
  }

  private _persist(): void {
    const locks: Record<string, UnixSeconds> = {};
    for (const record of this.entries()) {
      locks[record.asset] = record.maturity;
    }
    const file: RegistryFile = { version: 1, locks };

    const tmpPath = `${this._filePath}.tmp`;
    writeFileSync(tmpPath, JSON.stringify(file, null, 2), "utf-8");
    renameSync(tmpPath, this._filePath);
  }
}
