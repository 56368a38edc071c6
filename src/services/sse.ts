/**
 * Sse — publishes, subscribes to and streams server-sent events.
 *
 * Owns the PubSub registry and the keep-alive ticker. The routing layer
 * mounts `handler()` on a GET endpoint; application code pushes events with
 * `send()` / `sendNowait()`. Call `start()` once the server is listening and
 * `stop()` before it shuts down.
 */

import type { Request, RequestHandler } from "express";
import { logger } from "../middleware/logging.js";
import { schemas, validationErrorBody } from "../middleware/validation.js";
import { RelayError, ValidationError } from "./errors.js";
import { formatEvent, type EventFields } from "./eventFormat.js";
import { DEFAULT_PING_INTERVAL_MS, KeepAliveTicker } from "./keepAlive.js";
import { PubSub } from "./pubSub.js";
import { runStream, writeToResponse, type StreamExit } from "./streamLoop.js";

/** Runs before a subscription is created; throwing refuses the connection. */
export type BeforeRequestHook = (req: Request) => Promise<void>;

export interface SseOptions {
  pingIntervalMs?: number;
  exclusiveChannels?: boolean;
  beforeRequest?: BeforeRequestHook;
}

export interface SendOptions extends EventFields {
  /** Deliver only to this channel; omitted means every subscriber */
  channelId?: string;
}

export const SSE_HEADERS = {
  "Content-Type": "text/event-stream",
  "Cache-Control": "no-cache",
  Connection: "keep-alive",
  "X-Accel-Buffering": "no", // Tell nginx not to buffer this response
} as const;

export class Sse {
  readonly pubsub: PubSub;
  private ticker: KeepAliveTicker;
  private beforeRequest: BeforeRequestHook | null = null;

  constructor(options: SseOptions = {}) {
    this.pubsub = new PubSub({ exclusiveChannels: options.exclusiveChannels });
    this.ticker = new KeepAliveTicker(this.pubsub, options.pingIntervalMs ?? DEFAULT_PING_INTERVAL_MS);
    if (options.beforeRequest !== undefined) {
      this.setBeforeRequestCallback(options.beforeRequest);
    }
  }

  get running(): boolean {
    return this.ticker.running;
  }

  /**
   * Send an event. Resolves with the number of subscribers it was queued for.
   *
   * @param data - Payload; each line becomes its own `data:` line
   */
  async send(data: string, options: SendOptions = {}): Promise<number> {
    const { channelId, ...fields } = options;
    return this.pubsub.publish(formatEvent(data, fields), channelId);
  }

  /** Same as `send()` without waiting. */
  sendNowait(data: string, options: SendOptions = {}): number {
    const { channelId, ...fields } = options;
    return this.pubsub.publishNowait(formatEvent(data, fields), channelId);
  }

  /**
   * Set a hook called before every subscription, e.g. for authorization.
   * It must be a function taking exactly one parameter, the request.
   */
  setBeforeRequestCallback(hook: BeforeRequestHook): void {
    if (typeof hook !== "function") {
      throw new ValidationError("before-request callback must be a function");
    }
    if (hook.length !== 1) {
      throw new ValidationError("before-request callback must take exactly one parameter (the request)");
    }
    this.beforeRequest = hook;
  }

  start(): void {
    this.ticker.start();
    logger.info("SSE keep-alive started");
  }

  /** Stop the ticker, wait for it, then close every open stream. */
  async stop(): Promise<void> {
    await this.ticker.stop();
    const closed = await this.pubsub.close();
    logger.info("SSE streams closed", { subscribers: closed });
  }

  size(): number {
    return this.pubsub.size();
  }

  /** Express handler for the subscribe endpoint. */
  handler(): RequestHandler {
    return async (req, res, next) => {
      try {
        if (this.beforeRequest) {
          await this.beforeRequest(req);
        }
      } catch (error) {
        if (error instanceof RelayError) {
          res.status(error.status).json({ error: { code: error.code, message: error.message } });
          return;
        }
        next(error);
        return;
      }

      const query = schemas.subscribeQuery.safeParse(req.query);
      if (!query.success) {
        res.status(400).json(validationErrorBody(query.error));
        return;
      }
      const channelId = query.data.channel_id;

      let subscriberId: string;
      try {
        subscriberId = this.pubsub.register(channelId);
      } catch (error) {
        if (error instanceof RelayError) {
          res.status(error.status).json({ error: { code: error.code, message: error.message } });
          return;
        }
        next(error);
        return;
      }

      res.writeHead(200, SSE_HEADERS);
      res.flushHeaders();

      const controller = new AbortController();
      res.on("close", () => controller.abort());

      let exit: StreamExit;
      try {
        exit = await runStream({
          pubsub: this.pubsub,
          subscriberId,
          channelId,
          write: writeToResponse(res),
          signal: controller.signal,
        });
      } catch (error) {
        logger.error("Event stream crashed", error, { requestId: req.requestId, subscriberId, channelId });
        if (!res.writableEnded) res.end();
        return;
      }

      if (!res.writableEnded) res.end();
      logger.info("Event stream ended", {
        requestId: req.requestId,
        subscriberId,
        channelId,
        subject: req.subscriberSub,
        reason: exit.reason,
      });
    };
  }
}
