/**
 * Hono application factory.
 *
 * Creates the Hono app with middleware and routes.
 * Separated from main.ts so tests can create the app
 * without starting the HTTP server or the live timer.
 */

import { Hono } from "hono";
import type { Logger } from "@glstream/generator";
import type { AppEnv } from "./types/api-contract.js";
import { createErrorEnvelope } from "./types/error.js";
import { GlService } from "./services/gl-service.js";
import type { GlServiceConfig } from "./services/gl-service.js";
import { createErrorHandler } from "./middleware/error-handler.js";
import { requestIdMiddleware } from "./middleware/request-id.js";
import { loggerMiddleware } from "./middleware/logger.js";
import type { RequestLogEntry } from "./middleware/logger.js";
import {
  metricsMiddleware,
  MetricsCollector,
} from "./middleware/metrics.js";
import { createInfoRoutes } from "./routes/info.js";
import { createHealthRoutes } from "./routes/health.js";
import { createGlRoutes } from "./routes/gl.js";
import { createBatchRoutes } from "./routes/batch.js";
import { createMetricsRoute } from "./routes/metrics.js";

// =============================================================================
// App Config
// =============================================================================

export interface CreateAppOptions {
  readonly serviceConfig: Omit<GlServiceConfig, "logger" | "metrics" | "onFatal">;
  readonly logFn?: ((entry: RequestLogEntry) => void) | undefined;
  /** Structured logger for the engine, sessions, and unhandled errors */
  readonly logger?: Logger | undefined;
  /** Called when live generation fails */
  readonly onFatal?: ((error: unknown) => void) | undefined;
  /** Enable metrics collection. Default: true */
  readonly enableMetrics?: boolean | undefined;
}

// =============================================================================
// Factory
// =============================================================================

export interface AppInstance {
  readonly app: Hono<AppEnv>;
  readonly service: GlService;
  readonly metricsCollector: MetricsCollector;
}

/**
 * Create the Hono application with all middleware and routes.
 *
 * The service is created but not started; call `service.start()`.
 */
export function createApp(options: CreateAppOptions): AppInstance {
  const enableMetrics = options.enableMetrics !== false;
  const metricsCollector = new MetricsCollector();

  const service = new GlService({
    ...options.serviceConfig,
    logger: options.logger,
    metrics: enableMetrics ? metricsCollector : undefined,
    onFatal: options.onFatal,
  });

  const app = new Hono<AppEnv>();

  // ─── Global Middleware ───────────────────────────────────────────
  app.use("*", requestIdMiddleware());

  if (options.logFn !== undefined) {
    app.use("*", loggerMiddleware(options.logFn));
  }

  if (enableMetrics) {
    app.use("*", metricsMiddleware(metricsCollector));
  }

  app.use("*", async (c, next) => {
    c.set("service", service);
    await next();
  });

  // ─── Error Handlers ─────────────────────────────────────────────
  app.onError(createErrorHandler(options.logger));
  app.notFound((c) =>
    c.json(
      createErrorEnvelope("NOT_FOUND", `No route for ${c.req.method} ${c.req.path}`),
      404,
    ),
  );

  // ─── Routes ─────────────────────────────────────────────────────
  app.route("/", createInfoRoutes());
  app.route("/", createHealthRoutes());
  app.route("/", createGlRoutes(options.logger));
  app.route("/", createBatchRoutes(options.serviceConfig.batchLimitMax));

  if (enableMetrics) {
    app.route("/", createMetricsRoute(metricsCollector));
  }

  return { app, service, metricsCollector };
}
