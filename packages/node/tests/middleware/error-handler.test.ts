/**
 * Tests for error handler middleware.
 *
 * Verifies domain errors are mapped to correct HTTP status codes
 * and the error envelope format.
 */

import { describe, it, expect, vi } from "vitest";
import { Hono } from "hono";
import { BufferError } from "@glstream/record-buffer";
import { GeneratorError } from "@glstream/generator";
import type { Logger } from "@glstream/generator";
import type { AppEnv } from "../../src/types/api-contract.js";
import { createErrorHandler } from "../../src/middleware/error-handler.js";
import { requestIdMiddleware } from "../../src/middleware/request-id.js";
import { InvalidRangeError, StreamingError } from "../../src/types/error.js";

function appThrowing(error: Error, logger?: Logger): Hono<AppEnv> {
  const app = new Hono<AppEnv>();
  app.use("*", requestIdMiddleware());
  app.onError(createErrorHandler(logger));
  app.get("/boom", () => {
    throw error;
  });
  return app;
}

interface ErrorBody {
  error: { code: string; message: string; details?: Record<string, unknown> };
}

describe("error handler", () => {
  it("maps INVALID_RANGE to 400 with details", async () => {
    const app = appThrowing(
      new InvalidRangeError("Invalid start_date: bad", { field: "start_date", value: "x" }),
    );
    const res = await app.request("/boom");

    expect(res.status).toBe(400);
    expect(await res.json()).toEqual({
      error: {
        code: "INVALID_RANGE",
        message: "Invalid start_date: bad",
        details: { field: "start_date", value: "x" },
      },
    });
  });

  it("maps buffer cursor errors to 400 without details", async () => {
    const app = appThrowing(new BufferError("INVALID_CURSOR", "Cursor 9 is outside [0, 5]"));
    const res = await app.request("/boom");

    expect(res.status).toBe(400);
    expect(await res.json()).toEqual({
      error: { code: "INVALID_CURSOR", message: "Cursor 9 is outside [0, 5]" },
    });
  });

  it("maps a missing historical phase to 503", async () => {
    const app = appThrowing(new GeneratorError("HISTORICAL_NOT_GENERATED", "not yet"));
    const res = await app.request("/boom");

    expect(res.status).toBe(503);
  });

  it("hides internal detail of streaming errors and logs them", async () => {
    const logger: Logger = { debug: vi.fn(), info: vi.fn(), warn: vi.fn(), error: vi.fn() };
    const app = appThrowing(new StreamingError("socket gone"), logger);
    const res = await app.request("/boom");

    expect(res.status).toBe(500);
    const body = (await res.json()) as ErrorBody;
    expect(body.error).toEqual({ code: "INTERNAL_ERROR", message: "Internal server error" });
    expect(logger.error).toHaveBeenCalledTimes(1);
  });

  it("treats errors without a code as 500", async () => {
    const app = appThrowing(new Error("unexpected"));
    const res = await app.request("/boom");

    expect(res.status).toBe(500);
    const body = (await res.json()) as ErrorBody;
    expect(body.error.code).toBe("INTERNAL_ERROR");
  });
});
