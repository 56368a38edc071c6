import { describe, it, expect, vi, afterEach } from "vitest";
import type { Request } from "express";
import { Sse } from "../src/services/sse.js";
import { ValidationError } from "../src/services/errors.js";

describe("Sse", () => {
  let sse: Sse | null = null;

  afterEach(async () => {
    await sse?.stop();
    sse = null;
  });

  describe("send", () => {
    it("frames the event and queues it for the target channel", async () => {
      sse = new Sse();
      const id = sse.pubsub.register("alerts");
      const other = sse.pubsub.register("other");

      const delivered = await sse.send("disk\nfull", { channelId: "alerts", id: "7", event: "alert" });

      expect(delivered).toBe(1);
      expect(sse.pubsub.pending(other)).toBe(0);
      const delivery = await sse.pubsub.receive(id);
      expect(delivery.kind === "frame" && delivery.frame.toString()).toBe(
        "id: 7\r\nevent: alert\r\ndata: disk\r\ndata: full\r\n\r\n",
      );
    });

    it("broadcasts when no channel is given", () => {
      sse = new Sse();
      sse.pubsub.register("a");
      sse.pubsub.register();

      expect(sse.sendNowait("hi")).toBe(2);
    });

    it("rejects a non-integer retry before publishing", async () => {
      sse = new Sse();
      const id = sse.pubsub.register();

      await expect(sse.send("x", { retry: 2.5 })).rejects.toBeInstanceOf(ValidationError);
      expect(sse.pubsub.pending(id)).toBe(0);
    });
  });

  describe("setBeforeRequestCallback", () => {
    it("accepts a one-parameter async function", () => {
      sse = new Sse();
      expect(() => sse?.setBeforeRequestCallback(async (_req: Request) => {})).not.toThrow();
    });

    it("rejects a hook without the request parameter", () => {
      sse = new Sse();
      expect(() => sse?.setBeforeRequestCallback(async () => {})).toThrow(ValidationError);
    });

    it("rejects a value that is not a function", () => {
      const hook = JSON.parse("42");
      expect(() => new Sse({ beforeRequest: hook })).toThrow("before-request callback must be a function");
    });
  });

  describe("lifecycle", () => {
    it("starts the keep-alive and closes every stream on stop", async () => {
      const instance = new Sse({ pingIntervalMs: 60_000 });
      const id = instance.pubsub.register();
      const pending = instance.pubsub.receive(id);

      instance.start();
      expect(instance.running).toBe(true);

      await instance.stop();

      expect(instance.running).toBe(false);
      expect(await pending).toEqual({ kind: "closed" });
      expect(instance.size()).toBe(0);
    });

    it("waits for the ticker before closing the registry", async () => {
      sse = new Sse({ pingIntervalMs: 60_000 });
      const order: string[] = [];
      const close = vi.spyOn(sse.pubsub, "close").mockImplementation(async () => {
        order.push("close");
        return 0;
      });
      sse.start();

      await sse.stop();
      order.push("stopped");

      expect(close).toHaveBeenCalledTimes(1);
      expect(order).toEqual(["close", "stopped"]);
      expect(sse.running).toBe(false);
    });
  });
});
