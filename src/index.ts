/**
 * event-relay
 *
 * Pushes server-sent events to long-lived HTTP connections, partitioned into
 * optional channels, with a periodic keep-alive comment.
 */

import { config } from "./config.js";
import { createApp } from "./app.js";
import { createTokenGuard, logger } from "./middleware/index.js";
import { Sse } from "./services/sse.js";

const sse = new Sse({
  pingIntervalMs: config.pingIntervalMs,
  exclusiveChannels: config.exclusiveChannels,
  beforeRequest: config.requireAuth
    ? createTokenGuard({ secret: config.jwtSecret, issuer: config.jwtIssuer, audience: config.jwtAudience })
    : undefined,
});

const app = createApp(sse, config);

const server = app.listen(config.port, () => {
  sse.start();
  logger.info("event-relay started", {
    port: config.port,
    env: config.nodeEnv,
    eventsPath: config.eventsPath,
    channelMode: sse.pubsub.mode,
  });
});

let shuttingDown = false;

async function shutdown(signal: string) {
  if (shuttingDown) return;
  shuttingDown = true;
  logger.info(`${signal} received, shutting down`);

  // Force exit if open connections keep the server from closing
  setTimeout(() => process.exit(1), 30_000).unref();

  try {
    await sse.stop();
  } catch (error) {
    logger.error("Failed to stop SSE cleanly", error);
  }
  server.close(() => process.exit(0));
}

process.on("SIGTERM", () => void shutdown("SIGTERM"));
process.on("SIGINT", () => void shutdown("SIGINT"));

export default app;
