/**
 * Request/Response DTOs with Zod validation schemas.
 *
 * Query schemas validate and trim raw query strings; response shapes
 * are plain interfaces over the wire record type.
 */

import { z } from "zod";
import { parseIsoDate } from "@glstream/generator";
import type { GLRecordWire } from "@glstream/types";

// =============================================================================
// Shared Schemas
// =============================================================================

export const IsoDateParamSchema = z
  .string()
  .trim()
  .refine((v) => parseIsoDate(v) !== undefined, {
    message: "must be a calendar date in YYYY-MM-DD format",
  });

export const DEFAULT_BATCH_LIMIT = 1000;

/**
 * Flag a date pair where only one side is present, or start is after end.
 */
function checkDatePair(
  query: { start_date?: string | undefined; end_date?: string | undefined },
  ctx: z.RefinementCtx,
): void {
  const { start_date, end_date } = query;

  if (start_date === undefined && end_date !== undefined) {
    ctx.addIssue({
      code: z.ZodIssueCode.custom,
      path: ["start_date"],
      message: "start_date is required when end_date is given",
      params: { field: "start_date", end_date },
    });
  } else if (start_date !== undefined && end_date === undefined) {
    ctx.addIssue({
      code: z.ZodIssueCode.custom,
      path: ["end_date"],
      message: "end_date is required when start_date is given",
      params: { field: "end_date", start_date },
    });
  } else if (start_date !== undefined && end_date !== undefined && start_date > end_date) {
    ctx.addIssue({
      code: z.ZodIssueCode.custom,
      path: ["start_date"],
      message: "start_date must be on or before end_date",
      params: { start_date, end_date },
    });
  }
}

// =============================================================================
// GET /get-gl
// =============================================================================

export const GlQuerySchema = z
  .object({
    start_date: IsoDateParamSchema.optional(),
    end_date: IsoDateParamSchema.optional(),
  })
  .superRefine(checkDatePair);

export type GlQuery = z.infer<typeof GlQuerySchema>;

export interface RangeResponse {
  readonly count: number;
  readonly start_date: string;
  readonly end_date: string;
  readonly data: readonly GLRecordWire[];
}

// =============================================================================
// GET /get-gl-batch
// =============================================================================

/**
 * Build the batch query schema for a configured limit cap.
 */
export function createBatchQuerySchema(maxLimit: number) {
  return z
    .object({
      after_id: z.coerce.number().int().min(0).optional(),
      start_date: IsoDateParamSchema.optional(),
      end_date: IsoDateParamSchema.optional(),
      limit: z.coerce
        .number()
        .int()
        .min(1)
        .max(maxLimit)
        .default(Math.min(DEFAULT_BATCH_LIMIT, maxLimit)),
    })
    .superRefine(checkDatePair);
}

export type BatchQuery = z.infer<ReturnType<typeof createBatchQuerySchema>>;

export interface BatchResponse {
  readonly count: number;
  readonly data: readonly GLRecordWire[];
  /**
   * Highest entry ID returned; pass back as after_id. When nothing is
   * returned, the after_id sent (0 in watermark mode, null in window mode
   * without one).
   */
  readonly next_watermark: number | null;
}
