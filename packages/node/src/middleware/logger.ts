/**
 * Request logging middleware.
 *
 * Hands one structured entry per request to a log function; main.ts
 * routes it to pino. Streaming responses are logged when their headers
 * are sent, so `durationMs` is time-to-first-byte for them.
 */

import type { MiddlewareHandler } from "hono";
import type { AppEnv } from "../types/api-contract.js";

export interface RequestLogEntry {
  readonly method: string;
  readonly path: string;
  readonly status: number;
  readonly durationMs: number;
  readonly requestId: string;
  readonly streaming: boolean;
}

export function loggerMiddleware(
  log: (entry: RequestLogEntry) => void,
): MiddlewareHandler<AppEnv> {
  return async (c, next) => {
    const start = Date.now();

    await next();

    log({
      method: c.req.method,
      path: c.req.path,
      status: c.res.status,
      durationMs: Date.now() - start,
      requestId: c.get("requestId"),
      streaming: c.res.headers.get("Content-Type")?.startsWith("application/x-ndjson") ?? false,
    });
  };
}
