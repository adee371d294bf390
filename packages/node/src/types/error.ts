/**
 * Error responses.
 *
 * Every non-2xx JSON body is `{ error: { code, message, details? } }`.
 * `code` is either one of the API codes below or the `code` of the
 * domain error that caused the response (ALREADY_LOCKED, NOT_VESTED, ...).
 */

import type {
  AccessGuardErrorCode,
  RegistryErrorCode,
  TimelockErrorCode,
} from "@vestlock/timelock";

/** Codes produced by the HTTP layer itself. */
export type ApiErrorCode = "VALIDATION_ERROR" | "UNAUTHORIZED" | "INTERNAL_ERROR";

export type ErrorCode =
  | ApiErrorCode
  | TimelockErrorCode
  | AccessGuardErrorCode
  | RegistryErrorCode;

export interface ErrorDetail {
  readonly code: ErrorCode;
  readonly message: string;
  readonly details?: Record<string, unknown>;
}

export interface ErrorEnvelope {
  readonly error: ErrorDetail;
}

export function createErrorEnvelope(
  code: ErrorCode,
  message: string,
  details?: Record<string, unknown>,
): ErrorEnvelope {
  return details === undefined
    ? { error: { code, message } }
    : { error: { code, message, details } };
}

// ─── Request validation ───────────────────────────────────────────────

export interface ValidationIssue {
  /** Dotted path of the offending field; empty for the root */
  readonly path: string;
  readonly message: string;
}

/**
 * A request body or query string did not match its schema.
 */
export class RequestValidationError extends Error {
  public readonly code = "VALIDATION_ERROR";
  public readonly issues: readonly ValidationIssue[];
  constructor(message: string, issues: readonly ValidationIssue[] = []) {
    super(message);
    this.name = "RequestValidationError";
    this.issues = issues;
  }
}
