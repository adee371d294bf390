/**
 * Authentication middleware.
 *
 * Mutating requests must carry an X-Api-Key header; the key is looked up
 * in the configured key map and the request then acts as the mapped
 * address. Safe methods (GET, HEAD, OPTIONS) pass through untouched.
 *
 * On success, sets `c.set("auth", authContext)`.
 * On failure, returns 401. Whether the caller may act is decided later
 * by the timelock's access guard (403 NOT_AUTHORIZED).
 */

import type { Context, MiddlewareHandler } from "hono";
import { HTTPException } from "hono/http-exception";
import type { Address } from "@vestlock/types";
import type { AppEnv } from "../types/api-contract.js";
import { createErrorEnvelope } from "../types/error.js";

export const API_KEY_HEADER = "X-Api-Key";

const SAFE_METHODS = new Set(["GET", "HEAD", "OPTIONS"]);

export interface AuthConfig {
  /** Map of API key → caller address */
  readonly apiKeys: ReadonlyMap<string, Address>;
}

export function authMiddleware(config: AuthConfig): MiddlewareHandler<AppEnv> {
  return async (c, next) => {
    if (SAFE_METHODS.has(c.req.method)) {
      return next();
    }

    const apiKey = c.req.header(API_KEY_HEADER);
    if (apiKey === undefined) {
      return c.json(
        createErrorEnvelope("UNAUTHORIZED", "Authentication required"),
        401,
      );
    }

    const caller = config.apiKeys.get(apiKey);
    if (caller === undefined) {
      return c.json(
        createErrorEnvelope("UNAUTHORIZED", "Invalid API key"),
        401,
      );
    }

    c.set("auth", { type: "api-key", caller });
    return next();
  };
}

/**
 * The authenticated caller of a mutating request.
 */
export function callerOf(c: Context<AppEnv>): Address {
  const auth = c.get("auth");
  if (auth === undefined) {
    throw new HTTPException(401, { message: "Authentication required" });
  }
  return auth.caller;
}
