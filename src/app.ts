import express, { type NextFunction, type Request, type Response } from "express";
import cors from "cors";
import { logger, requestLogger } from "./middleware/index.js";
import { createEventRoutes } from "./routes/events.js";
import { createHealthRoutes } from "./routes/health.js";
import { RelayError } from "./services/errors.js";
import type { Sse } from "./services/sse.js";

export interface AppOptions {
  eventsPath: string;
  publishToken: string;
  nodeEnv: string;
  allowedOrigins: readonly string[];
}

export function createApp(sse: Sse, options: AppOptions) {
  const app = express();
  app.disable("x-powered-by");
  app.set("trust proxy", 1);

  // Security: CORS restricted to explicit origins in production
  app.use(
    cors({
      origin: options.nodeEnv === "production" && options.allowedOrigins.length > 0 ? [...options.allowedOrigins] : true,
      methods: ["GET", "POST"],
      allowedHeaders: ["Content-Type", "Authorization", "Last-Event-ID"],
      maxAge: 86400,
    }),
  );
  app.use(express.json({ limit: "1mb" }));
  app.use(requestLogger);

  app.use("/health", createHealthRoutes(sse));
  app.use(options.eventsPath, createEventRoutes(sse, { publishToken: options.publishToken }));

  app.use((err: unknown, req: Request, res: Response, next: NextFunction) => {
    if (res.headersSent) {
      next(err);
      return;
    }

    if (err instanceof RelayError) {
      res.status(err.status).json({ error: { code: err.code, message: err.message } });
      return;
    }

    logger.error("Unhandled error", err, {
      requestId: req.requestId,
      method: req.method,
      path: req.path,
    });
    res.status(500).json({
      error: {
        code: "INTERNAL_ERROR",
        message:
          options.nodeEnv === "production" || !(err instanceof Error) ? "An unexpected error occurred" : err.message,
      },
    });
  });

  // 404 catch-all
  app.use((req, res) => {
    res.status(404).json({
      error: { code: "NOT_FOUND", message: `Route ${req.method} ${req.path} not found` },
    });
  });

  return app;
}
