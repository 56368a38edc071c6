/**
 * PubSub — in-process registry fanning frames out to subscriber queues.
 *
 * Every subscriber sits in the unscoped set (publish without a channel
 * reaches everyone) and in exactly one channel bucket. Subscribers that join
 * without naming a channel get a personal channel keyed by their own id.
 *
 * Channel modes:
 *   exclusive — an explicit channel id doubles as the subscriber id, so only
 *               one live connection may hold it at a time
 *   shared    — an explicit channel id is a group; subscribers get fresh ids
 *
 * Node runs each of these methods to completion without interleaving, so the
 * maps need no locking. This is a single-process registry; multi-node fan-out
 * would need an external broker.
 */

import { randomUUID } from "node:crypto";
import { logger } from "../middleware/logging.js";
import { DuplicateSubscriptionError, ValidationError } from "./errors.js";
import { SubscriberQueue } from "./subscriberQueue.js";

export interface Subscription {
  id: string;
  channelId: string;
  queue: SubscriberQueue;
}

export type Delivery = { kind: "frame"; frame: Buffer } | { kind: "closed" };

/**
 * A subscriber id, or the subscription handle from `lookup()`. A handle only
 * matches while that exact subscription is registered, so a stale handle
 * never reaches a newer subscriber that reused the id.
 */
export type SubscriberRef = string | Subscription;

export interface PubSubOptions {
  /** Default: true */
  exclusiveChannels?: boolean;
  generateId?: () => string;
}

const CLOSED: Delivery = { kind: "closed" };

export class PubSub {
  private subscriptions = new Map<string, Subscription>();
  private channels = new Map<string, Map<string, Subscription>>();
  private readonly exclusiveChannels: boolean;
  private readonly generateId: () => string;

  constructor(options: PubSubOptions = {}) {
    this.exclusiveChannels = options.exclusiveChannels ?? true;
    this.generateId = options.generateId ?? randomUUID;
  }

  get mode(): "exclusive" | "shared" {
    return this.exclusiveChannels ? "exclusive" : "shared";
  }

  /**
   * Register a new subscriber and return its id.
   * Throws DuplicateSubscriptionError in exclusive mode when `channelId` is
   * already held by an active subscriber.
   */
  register(channelId?: string): string {
    if (channelId === "") {
      throw new ValidationError("channelId must not be empty");
    }

    let id: string;
    if (channelId !== undefined && this.exclusiveChannels) {
      if (this.subscriptions.has(channelId)) {
        throw new DuplicateSubscriptionError(channelId);
      }
      id = channelId;
    } else {
      id = this.freshId();
    }

    const subscription: Subscription = {
      id,
      channelId: channelId ?? id,
      queue: new SubscriberQueue(),
    };

    this.subscriptions.set(id, subscription);
    let bucket = this.channels.get(subscription.channelId);
    if (!bucket) {
      bucket = new Map();
      this.channels.set(subscription.channelId, bucket);
    }
    bucket.set(id, subscription);

    logger.debug("Subscriber registered", { subscriberId: id, channelId: subscription.channelId });
    return id;
  }

  /** The live subscription registered under `subscriberId`, if any. */
  lookup(subscriberId: string): Subscription | undefined {
    return this.subscriptions.get(subscriberId);
  }

  /**
   * Remove a subscriber. Returns false when it is already gone, or when
   * `channelId` is given and is not the channel it joined.
   */
  unregister(subscriber: SubscriberRef, channelId?: string): boolean {
    const subscription = this.resolve(subscriber);
    if (!subscription) return false;
    if (channelId !== undefined && channelId !== subscription.channelId) return false;

    this.remove(subscription);
    return true;
  }

  /** Enqueue a frame for a channel, or for every subscriber when no channel is given. */
  async publish(payload: Buffer | string, channelId?: string): Promise<number> {
    return this.publishNowait(payload, channelId);
  }

  publishNowait(payload: Buffer | string, channelId?: string): number {
    const frame = typeof payload === "string" ? Buffer.from(payload, "utf-8") : payload;

    let delivered = 0;
    for (const subscription of this.targets(channelId)) {
      if (subscription.queue.put(frame)) delivered++;
    }
    return delivered;
  }

  /**
   * Wait for the next item in a subscriber's queue. A close marker removes
   * the subscription; unknown subscribers read as closed.
   */
  async receive(subscriber: SubscriberRef): Promise<Delivery> {
    const subscription = this.resolve(subscriber);
    if (!subscription) return CLOSED;

    const item = await subscription.queue.get();
    if (item.kind === "closed") {
      this.remove(subscription);
      return CLOSED;
    }
    return item;
  }

  /** Acknowledge a received frame. No-op once the subscription is gone. */
  taskDone(subscriber: SubscriberRef): void {
    this.resolve(subscriber)?.queue.taskDone();
  }

  /** Frames waiting in a subscriber's queue. */
  pending(subscriberId: string): number {
    return this.subscriptions.get(subscriberId)?.queue.size ?? 0;
  }

  has(subscriberId: string): boolean {
    return this.subscriptions.has(subscriberId);
  }

  /** Queue the close marker for every current subscriber. */
  async close(): Promise<number> {
    const targets = this.targets(undefined);
    for (const subscription of targets) {
      subscription.queue.close();
    }
    logger.debug("Close signal broadcast", { subscribers: targets.length });
    return targets.length;
  }

  size(): number {
    return this.subscriptions.size;
  }

  channelCount(): number {
    return this.channels.size;
  }

  private targets(channelId: string | undefined): Subscription[] {
    if (channelId === undefined) return [...this.subscriptions.values()];
    const bucket = this.channels.get(channelId);
    return bucket ? [...bucket.values()] : [];
  }

  private resolve(subscriber: SubscriberRef): Subscription | undefined {
    if (typeof subscriber === "string") return this.subscriptions.get(subscriber);
    return this.subscriptions.get(subscriber.id) === subscriber ? subscriber : undefined;
  }

  private freshId(): string {
    let id = this.generateId();
    while (this.subscriptions.has(id) || this.channels.has(id)) {
      id = this.generateId();
    }
    return id;
  }

  private remove(subscription: Subscription): void {
    // The id may have been re-registered since this subscription was taken
    if (this.subscriptions.get(subscription.id) !== subscription) return;

    this.subscriptions.delete(subscription.id);
    const bucket = this.channels.get(subscription.channelId);
    if (bucket) {
      bucket.delete(subscription.id);
      if (bucket.size === 0) this.channels.delete(subscription.channelId);
    }

    // Wakes a consumer still parked in receive()
    subscription.queue.close();
    logger.debug("Subscriber removed", { subscriberId: subscription.id, channelId: subscription.channelId });
  }
}
