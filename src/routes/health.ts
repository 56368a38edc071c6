import { Router } from "express";
import type { Sse } from "../services/sse.js";

export function createHealthRoutes(sse: Sse): Router {
  const router = Router();

  /** Liveness probe — is the process alive? */
  router.get("/live", (_req, res) => {
    res.json({ status: "ok", service: "event-relay" });
  });

  /** Readiness probe — is the keep-alive loop running? */
  router.get("/ready", (_req, res) => {
    const ready = sse.running;
    res.status(ready ? 200 : 503).json({
      status: ready ? "ok" : "degraded",
      service: "event-relay",
      checks: { keepAlive: ready ? "ok" : "stopped" },
      subscribers: sse.size(),
      channelMode: sse.pubsub.mode,
    });
  });

  return router;
}
