/**
 * @vestlock/node — Entry point.
 *
 * Loads config, wires the timelock, starts the HTTP server,
 * and handles graceful shutdown.
 */

import { serve } from "@hono/node-server";
import pino from "pino";
import { loadConfig, parseApiKeys } from "./config.js";
import { createApp } from "./app.js";
import { createRuntime } from "./runtime.js";
import { attachEventLogger } from "./services/event-logger.js";

async function main(): Promise<void> {
  const config = loadConfig();
  const logger = pino({
    level: config.LOG_LEVEL,
    ...(config.NODE_ENV === "development"
      ? { transport: { target: "pino-pretty" } }
      : {}),
  });

  const parsedKeys = parseApiKeys(config.API_KEYS);
  const apiKeys = new Map(parsedKeys.map((k) => [k.key, k.address] as const));
  if (apiKeys.size === 0) {
    logger.warn("No API keys configured; every mutating request will be rejected");
  } else {
    logger.info({ apiKeyCount: apiKeys.size }, "Auth configured");
  }

  const runtime = createRuntime(config, {
    onEventHandlerError: (err, entry) => {
      logger.error(
        { err, event: entry.event.type, position: entry.position },
        "Event subscriber failed",
      );
    },
  });
  const subscription = attachEventLogger(runtime.events, logger);

  const { app, service } = createApp({
    serviceConfig: { timelock: runtime.timelock, events: runtime.events },
    apiKeys,
    logFn: (entry) => {
      logger.info(entry, `${entry.method} ${entry.path} ${entry.status}`);
    },
    onUnexpectedError: (err) => {
      logger.error({ err }, "Unhandled error");
    },
  });

  const server = serve({
    fetch: app.fetch,
    port: config.PORT,
    hostname: config.HOST,
  });

  logger.info(
    {
      port: config.PORT,
      host: config.HOST,
      adapter: runtime.adapterKind,
      vault: runtime.timelock.vault,
      controller: runtime.timelock.currentController(),
      persistent: config.REGISTRY_PATH !== undefined,
    },
    "Vestlock node started",
  );

  // Graceful shutdown
  const shutdown = async (signal: string): Promise<void> => {
    logger.info({ signal }, "Shutdown signal received");
    server.close();
    await service.drain();
    subscription.unsubscribe();
    runtime.close();
    logger.info("Shutdown complete");
    process.exit(0);
  };

  process.on("SIGTERM", () => void shutdown("SIGTERM"));
  process.on("SIGINT", () => void shutdown("SIGINT"));
}

main().catch((err: unknown) => {
  // eslint-disable-next-line no-console
  console.error("Fatal startup error:", err);
  process.exit(1);
});
