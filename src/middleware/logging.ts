import type { Request, Response, NextFunction } from "express";
import { randomUUID } from "node:crypto";

// Extend Express Request to include requestId
declare global {
  namespace Express {
    interface Request {
      requestId: string;
      startTime: number;
    }
  }
}

export type LogLevel = "debug" | "info" | "warn" | "error";

const levelPriority: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

function isLogLevel(value: string | undefined): value is LogLevel {
  return value !== undefined && value in levelPriority;
}

function getMinLevel(): LogLevel {
  const configured = process.env.LOG_LEVEL;
  return isLogLevel(configured) ? configured : "info";
}

function shouldLog(level: LogLevel): boolean {
  return levelPriority[level] >= levelPriority[getMinLevel()];
}

const sensitiveKeys = ["password", "token", "secret", "authorization", "apikey"];

export function formatEntry(level: LogLevel, message: string, meta?: Record<string, unknown>): string {
  const entry: Record<string, unknown> = {
    timestamp: new Date().toISOString(),
    level,
    service: "event-relay",
    message,
    ...meta,
  };

  // Redact sensitive fields
  for (const key of Object.keys(entry)) {
    if (sensitiveKeys.some((sk) => key.toLowerCase().includes(sk))) {
      entry[key] = "[REDACTED]";
    }
  }

  return JSON.stringify(entry);
}

function describeError(error: unknown): Record<string, unknown> | undefined {
  if (error === undefined) return undefined;
  if (error instanceof Error) {
    return {
      name: error.name,
      message: error.message,
      stack: process.env.NODE_ENV !== "production" ? error.stack : undefined,
    };
  }
  return { name: "NonError", message: String(error) };
}

export interface Logger {
  debug(message: string, meta?: Record<string, unknown>): void;
  info(message: string, meta?: Record<string, unknown>): void;
  warn(message: string, meta?: Record<string, unknown>): void;
  error(message: string, error?: unknown, meta?: Record<string, unknown>): void;
}

export const logger: Logger = {
  debug(message, meta) {
    if (shouldLog("debug")) console.log(formatEntry("debug", message, meta));
  },
  info(message, meta) {
    if (shouldLog("info")) console.log(formatEntry("info", message, meta));
  },
  warn(message, meta) {
    if (shouldLog("warn")) console.warn(formatEntry("warn", message, meta));
  },
  error(message, error, meta) {
    if (shouldLog("error")) {
      console.error(formatEntry("error", message, { ...meta, error: describeError(error) }));
    }
  },
};

/**
 * Request logging middleware.
 * Adds requestId and logs request/response timing. Event streams are logged
 * when the connection ends, so durationMs is the stream lifetime; a stream
 * the client drops never emits `finish` and is logged from `close` instead.
 */
export function requestLogger(req: Request, res: Response, next: NextFunction) {
  const incoming = req.headers["x-request-id"];
  req.requestId = typeof incoming === "string" && incoming ? incoming : randomUUID();
  req.startTime = Date.now();

  res.setHeader("x-request-id", req.requestId);

  if (!req.path.startsWith("/health")) {
    logger.info("Request received", {
      requestId: req.requestId,
      method: req.method,
      path: req.path,
    });
  }

  let logged = false;
  const complete = (clientClosed: boolean) => {
    if (logged) return;
    logged = true;
    if (req.path.startsWith("/health") && res.statusCode < 400) return;

    const meta = {
      requestId: req.requestId,
      method: req.method,
      path: req.path,
      statusCode: res.statusCode,
      durationMs: Date.now() - req.startTime,
      stream: isEventStream(res),
    };

    if (clientClosed) {
      logger.info("Request closed by client", meta);
    } else if (res.statusCode >= 500) {
      logger.error("Request failed", undefined, meta);
    } else if (res.statusCode >= 400) {
      logger.warn("Request completed with error", meta);
    } else {
      logger.info("Request completed", meta);
    }
  };

  res.on("finish", () => complete(false));
  res.on("close", () => complete(!res.writableFinished));

  next();
}

function isEventStream(res: Response): boolean {
  const contentType = res.getHeader("content-type");
  return typeof contentType === "string" && contentType.startsWith("text/event-stream");
}
