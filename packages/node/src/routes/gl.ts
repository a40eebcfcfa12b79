/**
 * GL record routes.
 *
 * GET /get-gl                                 — NDJSON stream (buffered, then live)
 * GET /get-gl?start_date=YYYY-MM-DD&end_date= — historical records, inclusive range
 */

import { Hono } from "hono";
import { toWire } from "@glstream/types";
import type { Logger } from "@glstream/generator";
import type { AppEnv } from "../types/api-contract.js";
import { GlQuerySchema } from "../types/dto.js";
import type { RangeResponse } from "../types/dto.js";
import { parseQuery } from "../middleware/validate.js";
import { createNdjsonStream, STREAM_HEADERS } from "../services/ndjson.js";

export function createGlRoutes(logger?: Logger): Hono<AppEnv> {
  const routes = new Hono<AppEnv>();

  routes.get("/get-gl", (c) => {
    const service = c.get("service");
    const query = parseQuery(GlQuerySchema, c.req.query());

    if (query.start_date !== undefined && query.end_date !== undefined) {
      const records = service.range(query.start_date, query.end_date);
      const body: RangeResponse = {
        count: records.length,
        start_date: query.start_date,
        end_date: query.end_date,
        data: records.map(toWire),
      };
      return c.json(body);
    }

    const stream = createNdjsonStream({
      open: (signal) => service.stream(signal),
      signal: c.req.raw.signal,
      logger,
      requestId: c.get("requestId"),
    });

    return c.body(stream, 200, { ...STREAM_HEADERS });
  });

  return routes;
}
