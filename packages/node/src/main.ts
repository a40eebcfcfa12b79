/**
 * @glstream/node — Entry point.
 *
 * Bootstraps the Hono app, loads config, generates the historical batch,
 * starts the live timer and the HTTP server, and handles graceful shutdown.
 */

import "dotenv/config";
import { serve } from "@hono/node-server";
import pino from "pino";
import { loadConfig } from "./config.js";
import { createApp } from "./app.js";

// =============================================================================
// Bootstrap
// =============================================================================

async function main(): Promise<void> {
  const config = loadConfig();
  const logger = pino({
    level: config.LOG_LEVEL,
    ...(config.NODE_ENV === "development"
      ? { transport: { target: "pino-pretty" } }
      : {}),
  });

  const { app, service } = createApp({
    serviceConfig: {
      serviceName: config.SERVICE_NAME,
      serviceVersion: config.SERVICE_VERSION,
      seed: config.RANDOM_SEED,
      epoch: config.FIXED_START_DATE,
      lookbackDays: config.HISTORICAL_DAYS,
      tickIntervalMs: config.STREAMING_INTERVAL_MS,
      batchLimitMax: config.BATCH_LIMIT_MAX,
    },
    logger,
    logFn: (entry) => {
      const level = entry.status >= 500 ? "error" : entry.status >= 400 ? "warn" : "info";
      logger[level](entry, `${entry.method} ${entry.path} ${entry.status}`);
    },
    onFatal: (error) => {
      logger.fatal({ err: error }, "Live generation failed");
      process.exit(1);
    },
  });

  service.start();

  const server = serve({
    fetch: app.fetch,
    port: config.PORT,
    hostname: config.HOST,
  });

  logger.info(
    {
      port: config.PORT,
      host: config.HOST,
      seed: config.RANDOM_SEED,
      epoch: config.FIXED_START_DATE,
      historical: service.health().historicalRecords,
    },
    `${config.SERVICE_NAME} started`,
  );

  // Graceful shutdown
  const shutdown = (signal: string): void => {
    logger.info({ signal }, "Shutdown signal received");
    service.stop();
    const sessions = service.closeSessions();
    logger.info({ sessions }, "Stream sessions closed");
    server.close(() => {
      logger.info("Shutdown complete");
      process.exit(0);
    });
  };

  process.on("SIGTERM", () => shutdown("SIGTERM"));
  process.on("SIGINT", () => shutdown("SIGINT"));
}

main().catch((err: unknown) => {
  // eslint-disable-next-line no-console
  console.error("Fatal startup error:", err);
  process.exit(1);
});
