/**
 * Error envelope types for API responses.
 *
 * All error responses follow the shape:
 * { error: { code: string, message: string, details?: Record<string, unknown> } }
 */

// =============================================================================
// Error Codes
// =============================================================================

/**
 * Known API error codes.
 *
 * Domain errors from lower packages (BufferError, GeneratorError) keep
 * their own codes; these are the ones the service raises itself.
 */
export type ApiErrorCode =
  | "INVALID_RANGE"
  | "STREAMING_ERROR"
  | "NOT_FOUND"
  | "INTERNAL_ERROR";

// =============================================================================
// Error Response
// =============================================================================

export interface ErrorDetail {
  readonly code: ApiErrorCode | string;
  readonly message: string;
  readonly details?: Record<string, unknown>;
}

export interface ErrorEnvelope {
  readonly error: ErrorDetail;
}

// =============================================================================
// Factory
// =============================================================================

export function createErrorEnvelope(
  code: ApiErrorCode | string,
  message: string,
  details?: Record<string, unknown>,
): ErrorEnvelope {
  const error: ErrorDetail = { code, message };
  if (details !== undefined) {
    return { error: { ...error, details } };
  }
  return { error };
}

// =============================================================================
// Service Errors
// =============================================================================

/**
 * A query parameter is missing, malformed, or out of order.
 * `details` echoes the offending field and value.
 */
export class InvalidRangeError extends Error {
  readonly code = "INVALID_RANGE";

  constructor(
    message: string,
    public readonly details: Record<string, unknown> = {},
  ) {
    super(message);
    this.name = "InvalidRangeError";
  }
}

/**
 * A streaming session failed after the response started.
 */
export class StreamingError extends Error {
  readonly code = "STREAMING_ERROR";

  constructor(
    message: string,
    public readonly details: Record<string, unknown> = {},
    options?: { cause?: unknown },
  ) {
    super(message, options);
    this.name = "StreamingError";
  }
}
