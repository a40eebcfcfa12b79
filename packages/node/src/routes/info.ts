/**
 * Service information route.
 *
 * GET / — name, version, endpoint legend, account-code legend
 */

import { Hono } from "hono";
import { ACCOUNT_TYPES_INFO } from "@glstream/generator";
import type { AppEnv } from "../types/api-contract.js";

export const ENDPOINTS: Readonly<Record<string, string>> = {
  "/health": "Health check endpoint",
  "/ready": "Readiness probe",
  "/get-gl": "Stream GL records (buffered records, then live records as NDJSON)",
  "/get-gl?start_date=&end_date=": "Historical records in an inclusive date range",
  "/get-gl-batch": "Ingestion pull by entry ID watermark or half-open date window",
  "/metrics": "Prometheus metrics",
};

export function createInfoRoutes(): Hono<AppEnv> {
  const routes = new Hono<AppEnv>();

  routes.get("/", (c) => {
    const { serviceName, serviceVersion } = c.get("service").config;

    return c.json({
      service: serviceName,
      version: serviceVersion,
      description: "Streams synthetic General Ledger records for oil & gas operations",
      endpoints: ENDPOINTS,
      account_types: ACCOUNT_TYPES_INFO,
    });
  });

  return routes;
}
