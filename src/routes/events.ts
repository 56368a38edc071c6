/**
 * SSE routes — real-time push over text/event-stream.
 *
 * GET  /events?channel_id=<id>[&token=<jwt>]
 *   Opens a stream. Without channel_id the subscriber gets a personal
 *   channel named by its generated id.
 *
 * POST /events/publish   (Authorization: Bearer <PUBLISH_TOKEN>)
 *   { data, channelId?, id?, event?, retry? } -> 202 { delivered }
 *   Omitting channelId broadcasts to every subscriber.
 *
 * Heartbeat every SSE_PING_INTERVAL_MS:
 *   : ping\r\n\r\n
 */

import { Router } from "express";
import { requirePublishToken } from "../middleware/auth.js";
import { logger } from "../middleware/logging.js";
import { schemas, validate, type PublishEventBody } from "../middleware/validation.js";
import type { Sse } from "../services/sse.js";

export function createEventRoutes(sse: Sse, options: { publishToken: string }): Router {
  const router = Router();

  router.get("/", sse.handler());

  router.post(
    "/publish",
    requirePublishToken(options.publishToken),
    validate({ body: schemas.publishEvent }),
    async (req, res, next) => {
      const body: PublishEventBody = req.body;
      try {
        const delivered = await sse.send(body.data, {
          channelId: body.channelId,
          id: body.id,
          event: body.event,
          retry: body.retry,
        });
        logger.debug("Event published", { requestId: req.requestId, channelId: body.channelId, delivered });
        res.status(202).json({ data: { delivered } });
      } catch (error) {
        next(error);
      }
    },
  );

  return router;
}
