/**
 * Global error handler.
 *
 * Catches all errors thrown by route handlers and produces a consistent
 * error envelope response. Domain errors carry a string `code`; the code
 * alone decides the HTTP status.
 */

import type { Context } from "hono";
import { HTTPException } from "hono/http-exception";
import type { ContentfulStatusCode } from "hono/utils/http-status";
import { AccessGuardError, RegistryError, TimelockError } from "@vestlock/timelock";
import { createErrorEnvelope, RequestValidationError } from "../types/error.js";

// =============================================================================
// Domain Error → HTTP Status Mapping
// =============================================================================

const STATUS_MAP: Readonly<Record<string, ContentfulStatusCode>> = {
  // Authorization
  NOT_AUTHORIZED: 403,

  // Validation
  VALIDATION_ERROR: 400,
  INVALID_ASSET: 400,
  ZERO_AMOUNT: 400,
  INVALID_CONTROLLER: 400,

  // State preconditions
  ALREADY_LOCKED: 409,
  NOT_VESTED: 409,
  STILL_LOCKED: 409,
  NOTHING_TO_RELEASE: 409,
  NOTHING_TO_SWEEP: 409,

  // External transfers
  TRANSFER_PULL_FAILED: 502,
  TRANSFER_PUSH_FAILED: 502,
};

type DomainError = TimelockError | AccessGuardError | RegistryError | RequestValidationError;

function isDomainError(err: Error): err is DomainError {
  return (
    err instanceof TimelockError ||
    err instanceof AccessGuardError ||
    err instanceof RegistryError ||
    err instanceof RequestValidationError
  );
}

export function statusFor(code: string): ContentfulStatusCode {
  return STATUS_MAP[code] ?? 500;
}

function detailsOf(err: DomainError): Record<string, unknown> | undefined {
  if (err instanceof RequestValidationError && err.issues.length > 0) {
    return { issues: err.issues };
  }
  if (err instanceof TimelockError && err.transferError !== undefined) {
    return { transfer: err.transferError };
  }
  return undefined;
}

// =============================================================================
// Handler
// =============================================================================

/**
 * Build the app's onError handler. `onUnexpected` sees every error that
 * ends up as a 500.
 */
export function createErrorHandler(
  onUnexpected?: (err: Error) => void,
): (err: Error, c: Context) => Response {
  return (err, c) => {
    if (err instanceof HTTPException) {
      return err.getResponse();
    }
    if (!isDomainError(err) || statusFor(err.code) === 500) {
      onUnexpected?.(err);
      return c.json(
        createErrorEnvelope("INTERNAL_ERROR", "Internal server error"),
        500,
      );
    }

    return c.json(
      createErrorEnvelope(err.code, err.message, detailsOf(err)),
      statusFor(err.code),
    );
  };
}
