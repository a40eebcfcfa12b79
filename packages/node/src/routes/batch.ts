/**
 * Ingestion pull route.
 *
 * GET /get-gl-batch?after_id=N&limit=L                        — entries with id > N
 * GET /get-gl-batch?start_date=&end_date=&after_id=N&limit=L  — entries in [start, end) with id > N
 *
 * Without after_id the pull starts from watermark 0.
 */

import { Hono } from "hono";
import { toWire } from "@glstream/types";
import type { GLRecord } from "@glstream/types";
import type { AppEnv } from "../types/api-contract.js";
import { createBatchQuerySchema } from "../types/dto.js";
import type { BatchResponse } from "../types/dto.js";
import { parseQuery } from "../middleware/validate.js";

export function createBatchRoutes(batchLimitMax: number): Hono<AppEnv> {
  const routes = new Hono<AppEnv>();
  const schema = createBatchQuerySchema(batchLimitMax);

  routes.get("/get-gl-batch", (c) => {
    const service = c.get("service");
    const {
      start_date: from,
      end_date: to,
      after_id: afterId,
      limit,
    } = parseQuery(schema, c.req.query());

    let records: readonly GLRecord[];
    let unchanged: number | null;
    if (from !== undefined && to !== undefined) {
      records = service.pullWindow(from, to, limit, afterId ?? 0);
      unchanged = afterId ?? null;
    } else {
      records = service.pullAfter(afterId ?? 0, limit);
      unchanged = afterId ?? 0;
    }

    const last = records[records.length - 1];
    const body: BatchResponse = {
      count: records.length,
      data: records.map(toWire),
      next_watermark: last?.glEntryId ?? unchanged,
    };

    return c.json(body);
  });

  return routes;
}
