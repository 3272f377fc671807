import { Hono } from "hono";
import { InvalidSignalTypeError, StorageUnavailableError } from "../../signals/errors.js";
import type { SignalSink } from "../../signals/signal-sink.js";
import { RECENT_SIGNAL_LIMIT, SIGNAL_TYPES, signalTypeSchema, toSignalRecordDto } from "../../signals/types.js";

/**
 * GET /signals/:signalType
 *
 * Returns the most recent readings of one stream, newest first. An unknown type is a
 * client error and never reaches storage; an unreachable store is a 503.
 */
export function createSignalRoutes(sink: Pick<SignalSink, "queryRecent">): Hono {
  const routes = new Hono();

  routes.get("/:signalType", async (c) => {
    const raw = c.req.param("signalType");
    const parsed = signalTypeSchema.safeParse(raw);
    if (!parsed.success) {
      const err = new InvalidSignalTypeError(raw);
      return c.json({ error: "Invalid signal type", message: err.message, allowed: [...SIGNAL_TYPES] }, 400);
    }

    try {
      const records = await sink.queryRecent(parsed.data, RECENT_SIGNAL_LIMIT);
      return c.json(records.map(toSignalRecordDto));
    } catch (err) {
      if (err instanceof StorageUnavailableError) {
        return c.json({ error: "Storage unavailable", message: err.message }, 503);
      }
      throw err;
    }
  });

  return routes;
}
