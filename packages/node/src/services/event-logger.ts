/**
 * Forwards timelock notifications to a pino logger.
 */

import type { Logger } from "pino";
import type { InMemoryEventLog, Subscription } from "@vestlock/timelock";

export function attachEventLogger(events: InMemoryEventLog, logger: Logger): Subscription {
  return events.subscribe(({ event, position }) => {
    logger.info(
      {
        event: event.type,
        position,
        eventId: event.metadata.eventId,
        actor: event.metadata.actor,
        source: event.metadata.source,
        payload: event.payload,
      },
      `timelock ${event.type}`,
    );
  });
}
