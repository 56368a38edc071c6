import { ValidationError } from "./errors.js";

export type QueueItem = { kind: "frame"; frame: Buffer } | { kind: "closed" };

const CLOSED: QueueItem = { kind: "closed" };

/**
 * Unbounded FIFO for one subscriber. Producers never wait; the single
 * consumer awaits `get()` until an item arrives.
 *
 * Once closed, the close marker is queued behind any frames already waiting
 * and later `put()` calls are dropped.
 */
export class SubscriberQueue {
  private items: QueueItem[] = [];
  private waiters: Array<(item: QueueItem) => void> = [];
  private closed = false;
  private unfinished = 0;

  get size(): number {
    return this.items.length;
  }

  get isClosed(): boolean {
    return this.closed;
  }

  /** Items handed out by `get()` and not yet acknowledged with `taskDone()`. */
  get unfinishedCount(): number {
    return this.unfinished;
  }

  put(frame: Buffer): boolean {
    if (this.closed) return false;
    this.push({ kind: "frame", frame });
    return true;
  }

  close(): void {
    if (this.closed) return;
    this.closed = true;
    this.push(CLOSED);
  }

  get(): Promise<QueueItem> {
    const next = this.items.shift();
    if (next) return Promise.resolve(this.handOut(next));
    if (this.closed) return Promise.resolve(CLOSED);

    return new Promise((resolve) => {
      this.waiters.push((item) => resolve(this.handOut(item)));
    });
  }

  taskDone(): void {
    if (this.unfinished === 0) {
      throw new ValidationError("taskDone() called more times than items were received");
    }
    this.unfinished--;
  }

  private push(item: QueueItem): void {
    const waiter = this.waiters.shift();
    if (waiter) {
      waiter(item);
    } else {
      this.items.push(item);
    }
  }

  private handOut(item: QueueItem): QueueItem {
    if (item.kind === "frame") this.unfinished++;
    return item;
  }
}
