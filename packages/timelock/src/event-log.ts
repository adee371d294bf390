/**
 * In-memory notification log.
 *
 * Collects every DomainEvent the timelock and access guard emit, in
 * emission order, and dispatches them synchronously to subscribers.
 *
 * Properties:
 * - O(1) append (amortized)
 * - Optional capacity: the oldest events are dropped beyond it
 * - Positions keep increasing even after old events are dropped
 * - A failing subscriber never fails the operation that emitted the event;
 *   its error goes to `onHandlerError`
 */

import { randomUUID } from "node:crypto";
import type {
  DomainEvent,
  EventPayloads,
  EventSink,
  EventSource,
  EventType,
  EventMetadata,
} from "@vestlock/types";

// =============================================================================
// Types
// =============================================================================

export interface LoggedEvent {
  readonly event: DomainEvent;
  /** 1-based position in emission order */
  readonly position: number;
}

export type EventHandler = (entry: LoggedEvent) => void;

export type HandlerErrorReporter = (error: unknown, entry: LoggedEvent) => void;

export interface EventLogOptions {
  /** Maximum retained events. Default: unlimited */
  readonly capacity?: number;
  /** Receives subscriber errors. Default: a process warning */
  readonly onHandlerError?: HandlerErrorReporter;
}

export interface Subscription {
  unsubscribe(): void;
}

export interface ReadEventsOptions {
  /** Start from this position (inclusive). Default: oldest retained */
  readonly fromPosition?: number;
  /** Maximum number of events. Default: unlimited */
  readonly maxCount?: number;
}

/**
 * A single notification with a concrete type.
 */
export interface TypedEvent<K extends EventType> {
  readonly type: K;
  readonly metadata: EventMetadata;
  readonly payload: EventPayloads[K];
}

/**
 * Build a notification with fresh metadata.
 */
export function createEvent<K extends EventType>(
  type: K,
  payload: EventPayloads[K],
  actor: string,
  source: EventSource,
): TypedEvent<K> {
  return {
    type,
    metadata: {
      eventId: randomUUID(),
      timestamp: new Date().toISOString(),
      actor,
      source,
    },
    payload,
  };
}

// =============================================================================
// Event Log
// =============================================================================

export class InMemoryEventLog implements EventSink {
  private readonly _entries: LoggedEvent[] = [];
  private readonly _subscribers = new Set<EventHandler>();
  private readonly _capacity: number | undefined;
  private readonly _onHandlerError: HandlerErrorReporter;
  private _nextPosition = 1;

  constructor(options?: EventLogOptions) {
    const capacity = options?.capacity;
    if (capacity !== undefined && (!Number.isInteger(capacity) || capacity < 1)) {
      throw new RangeError(`Event log capacity must be a positive integer, got ${String(capacity)}`);
    }
    this._capacity = capacity;
    this._onHandlerError = options?.onHandlerError ?? warnHandlerError;
  }

  emit(event: DomainEvent): void {
    const entry: LoggedEvent = { event, position: this._nextPosition++ };
    this._entries.push(entry);

    if (this._capacity !== undefined && this._entries.length > this._capacity) {
      this._entries.splice(0, this._entries.length - this._capacity);
    }

    for (const handler of this._subscribers) {
      try {
        handler(entry);
      } catch (err) {
        this._onHandlerError(err, entry);
      }
    }
  }

  read(options?: ReadEventsOptions): readonly LoggedEvent[] {
    const from = options?.fromPosition ?? 1;
    const matching = this._entries.filter((e) => e.position >= from);
    return options?.maxCount !== undefined
      ? matching.slice(0, options.maxCount)
      : matching;
  }

  /** The last `limit` events, oldest first. */
  recent(limit: number): readonly LoggedEvent[] {
    return limit <= 0 ? [] : this._entries.slice(-limit);
  }

  subscribe(handler: EventHandler): Subscription {
    this._subscribers.add(handler);
    return {
      unsubscribe: () => {
        this._subscribers.delete(handler);
      },
    };
  }

  get size(): number {
    return this._entries.length;
  }
}

function warnHandlerError(error: unknown, entry: LoggedEvent): void {
  const reason = error instanceof Error ? error.message : String(error);
  process.emitWarning(
    `Subscriber failed on ${entry.event.type} at position ${String(entry.position)}: ${reason}`,
    "EventHandlerWarning",
  );
}
