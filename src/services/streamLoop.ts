import type { ServerResponse } from "node:http";
import { logger } from "../middleware/logging.js";
import type { PubSub } from "./pubSub.js";

/** Writes one frame to a connection; rejects when the peer is gone. */
export type FrameWriter = (frame: Buffer) => Promise<void>;

export type StreamExit =
  | { reason: "closed" }
  | { reason: "aborted" }
  | { reason: "write_failed"; error: unknown };

export interface StreamOptions {
  pubsub: PubSub;
  subscriberId: string;
  channelId?: string;
  write: FrameWriter;
  /** Aborted by the connection owner, e.g. when the client disconnects */
  signal?: AbortSignal;
}

/**
 * Drain a subscriber's queue into its connection until the queue closes,
 * a write fails or the signal aborts. The subscription is always released
 * on the way out.
 */
export async function runStream(options: StreamOptions): Promise<StreamExit> {
  const { pubsub, subscriberId, channelId, write, signal } = options;

  // Pinned once: the id can be registered again by a reconnecting client
  // while this loop is still finishing a write.
  const subscription = pubsub.lookup(subscriberId);
  if (!subscription) {
    return signal?.aborted ? { reason: "aborted" } : { reason: "closed" };
  }

  // Unregistering closes the queue, which wakes the pending receive()
  const onAbort = () => {
    pubsub.unregister(subscription, channelId);
  };
  signal?.addEventListener("abort", onAbort, { once: true });

  try {
    while (true) {
      if (signal?.aborted) return { reason: "aborted" };

      const delivery = await pubsub.receive(subscription);
      if (delivery.kind === "closed") {
        return signal?.aborted ? { reason: "aborted" } : { reason: "closed" };
      }

      try {
        await write(delivery.frame);
      } catch (error) {
        logger.warn("Stream write failed, dropping subscriber", {
          subscriberId,
          channelId,
          error: error instanceof Error ? error.message : String(error),
        });
        return { reason: "write_failed", error };
      }
      pubsub.taskDone(subscription);
    }
  } finally {
    signal?.removeEventListener("abort", onAbort);
    pubsub.unregister(subscription, channelId);
  }
}

/** Adapt a Node/Express response into a FrameWriter. */
export function writeToResponse(res: ServerResponse): FrameWriter {
  return (frame) =>
    new Promise<void>((resolve, reject) => {
      if (res.destroyed || res.writableEnded) {
        reject(new Error("connection closed"));
        return;
      }
      res.write(frame, (err) => {
        if (err) {
          reject(err);
        } else {
          resolve();
        }
      });
    });
}
