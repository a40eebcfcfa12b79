/**
 * Health check routes.
 *
 * GET /health — Liveness probe (always 200 while the process serves)
 * GET /ready  — Readiness probe (historical phase sealed, live timer running)
 */

import { Hono } from "hono";
import type { AppEnv } from "../types/api-contract.js";

export function createHealthRoutes(): Hono<AppEnv> {
  const routes = new Hono<AppEnv>();

  routes.get("/health", (c) => {
    const service = c.get("service");
    const health = service.health();

    return c.json({
      status: "healthy",
      service: service.config.serviceName,
      version: service.config.serviceVersion,
      historical_records: health.historicalRecords,
      total_streamed: health.totalStreamed,
      total_records: health.totalRecords,
      active_sessions: health.activeSessions,
      timestamp: new Date().toISOString(),
    });
  });

  routes.get("/ready", (c) => {
    const service = c.get("service");
    const ready = service.isReady();
    const stats = service.stats();

    return c.json(
      {
        status: ready ? "ready" : "not_ready",
        historical_sealed: service.buffer.sealed,
        live_running: service.engine.running,
        buffered: stats.total,
        timestamp: new Date().toISOString(),
      },
      ready ? 200 : 503,
    );
  });

  return routes;
}
