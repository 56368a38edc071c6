/**
 * event-relay configuration
 *
 * All settings come from the environment. dotenv must load here (not in
 * index.ts) because ESM import hoisting evaluates this module before any
 * code in index.ts runs.
 */

import { config as dotenvConfig } from "dotenv";
dotenvConfig();

const nodeEnv = process.env.NODE_ENV || "development";

function parsePositiveInt(name: string, fallback: number): number {
  const raw = process.env[name];
  if (!raw) return fallback;
  const parsed = Number.parseInt(raw, 10);
  return Number.isFinite(parsed) && parsed > 0 ? parsed : fallback;
}

function parseFlag(name: string, fallback: boolean): boolean {
  const raw = process.env[name]?.trim().toLowerCase();
  if (!raw) return fallback;
  return raw === "true" || raw === "1";
}

const requireAuth = parseFlag("SSE_REQUIRE_AUTH", false);

function resolveJwtSecret(): string {
  const configured = process.env.JWT_SECRET?.trim();
  if (configured) return configured;
  if (requireAuth && nodeEnv === "production") {
    throw new Error("JWT_SECRET environment variable is required when SSE_REQUIRE_AUTH is enabled");
  }
  return "";
}

const jwtIssuer = (process.env.JWT_ISSUER || "event-relay").trim();

export const config = {
  port: parsePositiveInt("PORT", 3004),
  nodeEnv,

  // Streaming
  eventsPath: process.env.SSE_PATH || "/events",
  pingIntervalMs: parsePositiveInt("SSE_PING_INTERVAL_MS", 15_000),
  exclusiveChannels: parseFlag("SSE_EXCLUSIVE_CHANNELS", true),

  // Subscriber auth (token query parameter, EventSource cannot set headers)
  requireAuth,
  jwtSecret: resolveJwtSecret(),
  jwtIssuer,
  jwtAudience: (process.env.JWT_AUDIENCE || `${jwtIssuer}-api`).trim(),

  // Publisher auth
  publishToken: process.env.PUBLISH_TOKEN || "",

  allowedOrigins: (process.env.ALLOWED_ORIGINS || "")
    .split(",")
    .map((s) => s.trim())
    .filter(Boolean),

  logLevel: process.env.LOG_LEVEL || "info",
} as const;

export type RelayConfig = typeof config;
