/**
 * Request logging middleware.
 *
 * Emits one structured entry per request once the response is known.
 * The sink is pino in main.ts and a plain array in tests.
 */

import type { MiddlewareHandler } from "hono";
import type { AppEnv } from "../types/api-contract.js";

export interface RequestLogEntry {
  readonly requestId: string;
  readonly method: string;
  readonly path: string;
  readonly status: number;
  readonly durationMs: number;
  /** Only on authenticated (mutating) requests */
  readonly caller?: string;
}

export type RequestLogSink = (entry: RequestLogEntry) => void;

export function loggerMiddleware(sink: RequestLogSink): MiddlewareHandler<AppEnv> {
  return async (c, next) => {
    const startedAt = performance.now();
    try {
      await next();
    } finally {
      const auth = c.get("auth");
      const entry: RequestLogEntry = {
        requestId: c.get("requestId"),
        method: c.req.method,
        path: c.req.path,
        status: c.res.status,
        durationMs: Math.round((performance.now() - startedAt) * 100) / 100,
        ...(auth !== undefined ? { caller: auth.caller } : {}),
      };
      sink(entry);
    }
  };
}
