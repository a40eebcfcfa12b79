/**
 * Type barrel — re-exports all public types from @glstream/node.
 */

// DTOs
export {
  IsoDateParamSchema,
  GlQuerySchema,
  createBatchQuerySchema,
  DEFAULT_BATCH_LIMIT,
} from "./dto.js";
export type { GlQuery, BatchQuery, RangeResponse, BatchResponse } from "./dto.js";

// Error
export { createErrorEnvelope, InvalidRangeError, StreamingError } from "./error.js";
export type { ApiErrorCode, ErrorDetail, ErrorEnvelope } from "./error.js";

// App env
export type { AppEnv } from "./api-contract.js";
