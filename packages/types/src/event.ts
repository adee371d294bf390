/**
 * Event Types
 *
 * Every notification the timelock emits is a DomainEvent.
 *
 * Rules:
 * - Events are immutable after creation
 * - Every event has metadata (who, when)
 * - Payload values are JSON-safe (amounts as decimal strings)
 */

/**
 * Metadata common to all domain events.
 */
export interface EventMetadata {
  /** Unique event ID */
  readonly eventId: string;

  /** ISO 8601 timestamp */
  readonly timestamp: string;

  /** Who caused this event */
  readonly actor: string;

  /** Which subsystem emitted this event */
  readonly source: EventSource;
}

export type EventSource = "timelock" | "access-guard";

/**
 * Notification types and their payloads.
 */
export interface EventPayloads {
  "lock.initiated": {
    readonly asset: string;
    readonly amount: string;
    readonly maturity: number;
  };
  "lock.released": {
    readonly asset: string;
    readonly amount: string;
  };
  "native.withdrawn": {
    readonly recipient: string;
    readonly amount: string;
  };
  "control.transferred": {
    readonly previousController: string;
    readonly newController: string | null;
  };
}

export type EventType = keyof EventPayloads;

/**
 * A domain event, discriminated by `type`.
 */
export type DomainEvent = {
  [K in EventType]: {
    readonly type: K;
    readonly metadata: EventMetadata;
    readonly payload: EventPayloads[K];
  };
}[EventType];

/**
 * Anything that accepts emitted notifications.
 */
export interface EventSink {
  emit(event: DomainEvent): void;
}
