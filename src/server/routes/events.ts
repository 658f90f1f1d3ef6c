import { Router } from "express";
import { EventBus, isEventType } from "../../core/eventBus";
import { EventsQuerySchema } from "./schemas";
import { validateQuery } from "../middleware/validation";
import { ValidationError } from "../../core/errors";

export function eventRoutes(eventBus: EventBus) {
  const r = Router();

  r.get(
    "/",
    validateQuery(EventsQuerySchema, ({ type, since, limit }, req, res) => {
      if (type !== undefined && !isEventType(type)) {
        throw new ValidationError(`Unknown event type: ${type}`, { type });
      }
      res.json({ events: eventBus.getHistory({ type, since, limit }) });
    })
  );

  return r;
}
