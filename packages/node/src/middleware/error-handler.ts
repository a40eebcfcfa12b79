/**
 * Global error handler middleware.
 *
 * Catches all errors thrown by route handlers and produces
 * a consistent error envelope response.
 *
 * Maps known domain errors (InvalidRangeError, BufferError, etc.)
 * to appropriate HTTP status codes.
 */

import type { Context, ErrorHandler } from "hono";
import type { Logger } from "@glstream/generator";
import type { AppEnv } from "../types/api-contract.js";
import { createErrorEnvelope } from "../types/error.js";

// =============================================================================
// Domain Error → HTTP Status Mapping
// =============================================================================

type ErrorStatus = 400 | 404 | 409 | 500 | 503;

const STATUS_MAP: Readonly<Record<string, ErrorStatus>> = {
  // Service errors
  INVALID_RANGE: 400,
  NOT_FOUND: 404,
  STREAMING_ERROR: 500,

  // Buffer errors
  INVALID_CURSOR: 400,
  INVALID_LIMIT: 400,
  ALREADY_SEALED: 409,
  OUT_OF_ORDER: 500,

  // Generator errors
  HISTORICAL_NOT_GENERATED: 503,
  HISTORICAL_ALREADY_GENERATED: 409,
};

function getErrorCode(error: Error): string | undefined {
  return "code" in error && typeof error.code === "string" ? error.code : undefined;
}

function getDetails(error: Error): Record<string, unknown> | undefined {
  if (!("details" in error)) return undefined;
  const details = error.details;
  if (details === null || typeof details !== "object" || Array.isArray(details)) {
    return undefined;
  }
  return details as Record<string, unknown>;
}

function getStatusCode(code: string | undefined): ErrorStatus {
  if (code !== undefined) {
    return STATUS_MAP[code] ?? 500;
  }
  return 500;
}

// =============================================================================
// Middleware
// =============================================================================

/**
 * Build the global error handler. Registered as Hono's onError handler.
 *
 * 500s are logged with the request ID and rendered without internal detail.
 */
export function createErrorHandler(logger?: Logger): ErrorHandler<AppEnv> {
  return (err, c) => handleError(err, c, logger);
}

export function handleError(err: Error, c: Context<AppEnv>, logger?: Logger): Response {
  const code = getErrorCode(err);
  const status = getStatusCode(code);

  if (status === 500) {
    logger?.error({ err, requestId: c.get("requestId"), path: c.req.path }, "Unhandled error");
    return c.json(createErrorEnvelope("INTERNAL_ERROR", "Internal server error"), 500);
  }

  return c.json(createErrorEnvelope(code ?? "INTERNAL_ERROR", err.message, getDetails(err)), status);
}
