/**
 * Access Guard — single privileged controller.
 *
 * Injected into the timelock rather than inherited. Exactly one identity
 * (the controller) is authorized at a time; control can be handed over or
 * renounced, and after renouncement nobody is ever authorized again.
 */

import type { EventSink, Identity } from "@vestlock/types";
import { normalizeAddress, sameAddress } from "./address.js";
import { createEvent } from "./event-log.js";

// =============================================================================
// Error
// =============================================================================

export class AccessGuardError extends Error {
  public readonly code: AccessGuardErrorCode;
  constructor(code: AccessGuardErrorCode, message: string) {
    super(message);
    this.name = "AccessGuardError";
    this.code = code;
  }
}

export type AccessGuardErrorCode =
  | "NOT_AUTHORIZED"
  | "INVALID_CONTROLLER";

// =============================================================================
// Contract
// =============================================================================

export interface AccessGuard {
  /** True only when `caller` is the current controller. */
  authorize(caller: string): boolean;

  /** The current controller, or null once renounced. */
  controller(): Identity | null;

  /** Hand control to `newController`. Only the controller may call this. */
  transferControl(caller: string, newController: string): Identity;

  /** Give up control for good. Only the controller may call this. */
  renounce(caller: string): void;
}

export interface SingleControllerGuardOptions {
  readonly controller: string;
  readonly events?: EventSink;
}

// =============================================================================
// Implementation
// =============================================================================

export class SingleControllerGuard implements AccessGuard {
  private current: Identity | null;
  private readonly events: EventSink | undefined;

  constructor(options: SingleControllerGuardOptions) {
    this.current = SingleControllerGuard.requireIdentity(options.controller);
    this.events = options.events;
  }

  authorize(caller: string): boolean {
    return this.current !== null && sameAddress(caller, this.current);
  }

  controller(): Identity | null {
    return this.current;
  }

  transferControl(caller: string, newController: string): Identity {
    const previous = this.requireAuthorized(caller);
    const next = SingleControllerGuard.requireIdentity(newController);

    this.current = next;
    this.events?.emit(
      createEvent(
        "control.transferred",
        { previousController: previous, newController: next },
        previous,
        "access-guard",
      ),
    );
    return next;
  }

  renounce(caller: string): void {
    const previous = this.requireAuthorized(caller);

    this.current = null;
    this.events?.emit(
      createEvent(
        "control.transferred",
        { previousController: previous, newController: null },
        previous,
        "access-guard",
      ),
    );
  }

  // ─── Private helpers ────────────────────────────────────────────────

  private requireAuthorized(caller: string): Identity {
    const current = this.current;
    if (current === null || !this.authorize(caller)) {
      throw new AccessGuardError(
        "NOT_AUTHORIZED",
        `Caller ${caller} is not the controller`,
      );
    }
    return current;
  }

  private static requireIdentity(value: string): Identity {
    const identity = normalizeAddress(value);
    if (identity === undefined) {
      throw new AccessGuardError(
        "INVALID_CONTROLLER",
        `Controller must be a non-zero address, got '${value}'`,
      );
    }
    return identity;
  }
}
