import { Hono } from "hono";
import type { Logger } from "pino";
import { z } from "zod";
import type { EventStore, RecentEvent } from "../events/types.ts";

interface EventRouteDeps {
  store: EventStore;
  logger: Logger;
}

export const DEFAULT_EVENTS_LIMIT = 50;
export const MAX_EVENTS_LIMIT = 500;

const eventsQuerySchema = z.object({
  limit: z.coerce.number().int().min(1).max(MAX_EVENTS_LIMIT).default(DEFAULT_EVENTS_LIMIT),
});

function toEventResponse(event: RecentEvent) {
  return {
    delivery_id: event.deliveryId,
    event_type: event.eventType,
    action: event.action,
    issue_number: event.issueNumber,
    timestamp: event.timestamp,
  };
}

export function createEventRoutes(deps: EventRouteDeps): Hono {
  const { store, logger } = deps;
  const app = new Hono();

  // Debugging view over the webhook log. A storage failure degrades to an empty list.
  app.get("/events", (c) => {
    const query = eventsQuerySchema.safeParse({ limit: c.req.query("limit") });
    if (!query.success) {
      return c.json(
        { error: `limit must be an integer between 1 and ${MAX_EVENTS_LIMIT}` },
        400,
      );
    }

    const result = store.recentEvents(query.data.limit);
    if (!result.ok) {
      logger.warn({ limit: query.data.limit }, "Serving empty event list after store failure");
      return c.json({ events: [] });
    }

    return c.json({ events: result.value.map(toEventResponse) });
  });

  // One stored delivery with its original payload
  app.get("/events/:deliveryId", (c) => {
    const deliveryId = c.req.param("deliveryId");
    const result = store.findByDeliveryId(deliveryId);
    if (!result.ok) {
      return c.json({ error: "Failed to retrieve event" }, 500);
    }
    if (!result.value) {
      return c.json({ error: "Event not found" }, 404);
    }

    return c.json({ ...toEventResponse(result.value), payload: result.value.payload });
  });

  return app;
}
