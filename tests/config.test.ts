import { describe, it, expect, vi, beforeEach, afterEach } from "vitest";

const touched = ["NODE_ENV", "SSE_PING_INTERVAL_MS", "SSE_EXCLUSIVE_CHANNELS", "SSE_REQUIRE_AUTH", "JWT_SECRET", "ALLOWED_ORIGINS"];

async function loadConfig() {
  vi.resetModules();
  const { config } = await import("../src/config.js");
  return config;
}

describe("config", () => {
  const saved: Record<string, string | undefined> = {};

  beforeEach(() => {
    for (const key of touched) saved[key] = process.env[key];
  });

  afterEach(() => {
    for (const key of touched) {
      const value = saved[key];
      if (value === undefined) {
        delete process.env[key];
      } else {
        process.env[key] = value;
      }
    }
  });

  it("applies defaults", async () => {
    delete process.env.SSE_PING_INTERVAL_MS;
    delete process.env.SSE_EXCLUSIVE_CHANNELS;

    const config = await loadConfig();

    expect(config.pingIntervalMs).toBe(15_000);
    expect(config.exclusiveChannels).toBe(true);
    expect(config.eventsPath).toBe("/events");
    expect(config.publishToken).toBe("test-publish-token");
  });

  it("reads overrides", async () => {
    process.env.SSE_PING_INTERVAL_MS = "250";
    process.env.SSE_EXCLUSIVE_CHANNELS = "false";
    process.env.ALLOWED_ORIGINS = "https://a.example, https://b.example";

    const config = await loadConfig();

    expect(config.pingIntervalMs).toBe(250);
    expect(config.exclusiveChannels).toBe(false);
    expect(config.allowedOrigins).toEqual(["https://a.example", "https://b.example"]);
  });

  it("falls back on an invalid interval", async () => {
    process.env.SSE_PING_INTERVAL_MS = "-5";

    expect((await loadConfig()).pingIntervalMs).toBe(15_000);
  });

  it("requires JWT_SECRET in production when auth is on", async () => {
    process.env.NODE_ENV = "production";
    process.env.SSE_REQUIRE_AUTH = "true";
    process.env.JWT_SECRET = "";

    await expect(loadConfig()).rejects.toThrow("JWT_SECRET environment variable is required");
  });
});
