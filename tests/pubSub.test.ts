import { describe, it, expect, beforeEach } from "vitest";
import { PubSub } from "../src/services/pubSub.js";
import { DuplicateSubscriptionError, ValidationError } from "../src/services/errors.js";

function sequentialIds() {
  let n = 0;
  return () => `sub-${++n}`;
}

describe("PubSub", () => {
  let pubsub: PubSub;

  beforeEach(() => {
    pubsub = new PubSub();
  });

  describe("register / unregister", () => {
    it("starts empty", () => {
      expect(pubsub.size()).toBe(0);
      expect(pubsub.channelCount()).toBe(0);
    });

    it("returns distinct ids for anonymous subscribers", () => {
      const first = pubsub.register();
      const second = pubsub.register();

      expect(typeof first).toBe("string");
      expect(first).not.toBe(second);
      expect(pubsub.size()).toBe(2);
    });

    it("tracks size through any sequence of register/unregister", () => {
      const a = pubsub.register();
      const b = pubsub.register("b");
      pubsub.unregister(a);
      const c = pubsub.register();

      expect(pubsub.size()).toBe(2);
      expect(pubsub.has(a)).toBe(false);
      expect(pubsub.has(b)).toBe(true);
      expect(pubsub.has(c)).toBe(true);
    });

    it("is idempotent on unregister", () => {
      const id = pubsub.register();

      expect(pubsub.unregister(id)).toBe(true);
      expect(pubsub.unregister(id)).toBe(false);
      expect(pubsub.unregister("never-registered")).toBe(false);
    });

    it("removes the channel bucket once it is empty", () => {
      const id = pubsub.register();
      expect(pubsub.channelCount()).toBe(1);

      pubsub.unregister(id);
      expect(pubsub.channelCount()).toBe(0);
    });

    it("ignores unregister with a channel the subscriber did not join", () => {
      pubsub.register("room");

      expect(pubsub.unregister("room", "other")).toBe(false);
      expect(pubsub.size()).toBe(1);
      expect(pubsub.unregister("room", "room")).toBe(true);
    });

    it("rejects an empty channel id", () => {
      expect(() => pubsub.register("")).toThrow(ValidationError);
    });
  });

  describe("exclusive channels", () => {
    it("uses the explicit channel id as the subscriber id", () => {
      expect(pubsub.register("1")).toBe("1");
      expect(pubsub.mode).toBe("exclusive");
    });

    it("refuses a second subscriber on the same id", () => {
      pubsub.register("1");

      expect(() => pubsub.register("1")).toThrow(DuplicateSubscriptionError);
      expect(pubsub.size()).toBe(1);
    });

    it("frees the id once the holder is gone", () => {
      pubsub.register("1");
      pubsub.unregister("1");

      expect(pubsub.register("1")).toBe("1");
    });

    it("ignores a stale handle once the id is held by a new subscriber", async () => {
      pubsub.register("1");
      const stale = pubsub.lookup("1");
      pubsub.unregister("1");
      pubsub.register("1");
      await pubsub.publish("y", "1");

      expect(stale).toBeDefined();
      if (!stale) return;
      expect(pubsub.lookup("1")).not.toBe(stale);
      expect(() => pubsub.taskDone(stale)).not.toThrow();
      expect(pubsub.unregister(stale, "1")).toBe(false);
      expect(await pubsub.receive(stale)).toEqual({ kind: "closed" });
      expect(pubsub.has("1")).toBe(true);
      expect(pubsub.pending("1")).toBe(1);
    });
  });

  describe("shared channels", () => {
    it("lets several subscribers join one channel", async () => {
      const shared = new PubSub({ exclusiveChannels: false, generateId: sequentialIds() });
      const a = shared.register("room");
      const b = shared.register("room");

      expect([a, b]).toEqual(["sub-1", "sub-2"]);
      expect(shared.channelCount()).toBe(1);
      expect(await shared.publish("x", "room")).toBe(2);

      shared.unregister(a, "room");
      expect(shared.channelCount()).toBe(1);
      shared.unregister(b, "room");
      expect(shared.channelCount()).toBe(0);
    });
  });

  describe("publish", () => {
    it("delivers to a channel only, and to everyone when unscoped", async () => {
      const one = pubsub.register("1");
      const two = pubsub.register("2");

      await pubsub.publish("x", "1");
      expect(pubsub.pending(one)).toBe(1);
      expect(pubsub.pending(two)).toBe(0);

      const delivery = await pubsub.receive(one);
      expect(delivery).toEqual({ kind: "frame", frame: Buffer.from("x") });
      pubsub.taskDone(one);

      await pubsub.publish("x");
      expect(pubsub.pending(one)).toBe(1);
      expect(pubsub.pending(two)).toBe(1);
    });

    it("reaches anonymous subscribers through their personal channel", async () => {
      const id = pubsub.register();
      const other = pubsub.register();

      expect(await pubsub.publish("direct", id)).toBe(1);
      expect(pubsub.pending(id)).toBe(1);
      expect(pubsub.pending(other)).toBe(0);
    });

    it("returns 0 for an unknown channel without creating it", async () => {
      pubsub.register("1");

      expect(await pubsub.publish("x", "missing")).toBe(0);
      expect(pubsub.channelCount()).toBe(1);
    });

    it("supports the non-blocking variant", () => {
      const a = pubsub.register();
      const b = pubsub.register();

      expect(pubsub.publishNowait("x")).toBe(2);
      expect(pubsub.pending(a)).toBe(1);
      expect(pubsub.pending(b)).toBe(1);
    });

    it("preserves publish order per subscriber", async () => {
      const id = pubsub.register();
      await pubsub.publish("first");
      await pubsub.publish("second", id);
      await pubsub.publish("third");

      const received: string[] = [];
      for (let i = 0; i < 3; i++) {
        const delivery = await pubsub.receive(id);
        if (delivery.kind === "frame") received.push(delivery.frame.toString());
      }
      expect(received).toEqual(["first", "second", "third"]);
    });
  });

  describe("receive", () => {
    it("waits for a frame published later", async () => {
      const id = pubsub.register();
      const pending = pubsub.receive(id);

      await pubsub.publish("later");

      expect(await pending).toEqual({ kind: "frame", frame: Buffer.from("later") });
    });

    it("reads an unknown subscriber as closed", async () => {
      expect(await pubsub.receive("ghost")).toEqual({ kind: "closed" });
    });

    it("wakes a parked receive when the subscriber is unregistered", async () => {
      const id = pubsub.register();
      const pending = pubsub.receive(id);

      pubsub.unregister(id);

      expect(await pending).toEqual({ kind: "closed" });
    });
  });

  describe("close", () => {
    it("resolves every outstanding receive as closed and removes subscribers", async () => {
      const a = pubsub.register();
      const b = pubsub.register("b");
      const pendingA = pubsub.receive(a);
      const pendingB = pubsub.receive(b);

      expect(await pubsub.close()).toBe(2);

      expect(await pendingA).toEqual({ kind: "closed" });
      expect(await pendingB).toEqual({ kind: "closed" });
      expect(pubsub.size()).toBe(0);
      expect(pubsub.channelCount()).toBe(0);
    });

    it("delivers frames queued before close, then nothing after", async () => {
      const id = pubsub.register();
      await pubsub.publish("before");
      await pubsub.close();

      expect(await pubsub.publish("after")).toBe(0);

      expect(await pubsub.receive(id)).toEqual({ kind: "frame", frame: Buffer.from("before") });
      expect(await pubsub.receive(id)).toEqual({ kind: "closed" });
      expect(pubsub.has(id)).toBe(false);
    });
  });
});
