/**
 * Keep-alive ticker
 *
 * Publishes a comment frame to every subscriber on a fixed interval so
 * proxies and browsers don't drop idle connections. EventSource ignores
 * lines starting with ":".
 */

import { setTimeout as sleep } from "node:timers/promises";
import { logger } from "../middleware/logging.js";
import { PING_FRAME } from "./eventFormat.js";
import type { PubSub } from "./pubSub.js";

export const DEFAULT_PING_INTERVAL_MS = 15_000;

export class KeepAliveTicker {
  private pubsub: PubSub;
  private intervalMs: number;
  private controller: AbortController | null = null;
  private task: Promise<void> | null = null;

  constructor(pubsub: PubSub, intervalMs: number = DEFAULT_PING_INTERVAL_MS) {
    if (!Number.isInteger(intervalMs) || intervalMs <= 0) {
      throw new RangeError(`ping interval must be a positive integer, got ${intervalMs}`);
    }
    this.pubsub = pubsub;
    this.intervalMs = intervalMs;
  }

  get running(): boolean {
    return this.task !== null;
  }

  start(): void {
    if (this.task) return;
    const controller = new AbortController();
    this.controller = controller;
    this.task = this.run(controller.signal);
  }

  /** Cancel the loop and wait until it has actually exited. */
  async stop(): Promise<void> {
    if (!this.task) return;
    this.controller?.abort();
    await this.task;
    this.task = null;
    this.controller = null;
  }

  private async run(signal: AbortSignal): Promise<void> {
    while (!signal.aborted) {
      try {
        await sleep(this.intervalMs, undefined, { signal });
      } catch (err) {
        if (signal.aborted) return;
        throw err;
      }

      try {
        await this.pubsub.publish(PING_FRAME);
      } catch (err) {
        logger.error("Keep-alive publish failed", err);
      }
    }
  }
}
