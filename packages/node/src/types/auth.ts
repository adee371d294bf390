/**
 * Authentication types.
 *
 * Callers present an API key in the X-Api-Key header. Each key maps to
 * the ledger address the request acts as; whether that address may act
 * is decided by the timelock's access guard, not here.
 */

import type { Address } from "@vestlock/types";

/**
 * Resolved authentication context, set by the auth middleware.
 */
export interface AuthContext {
  readonly type: "api-key";
  /** The address the request acts as */
  readonly caller: Address;
}

export interface ApiKeyRecord {
  readonly key: string;
  readonly address: Address;
}
