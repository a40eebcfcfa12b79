/**
 * @glstream/sdk — SDK types.
 *
 * Types specific to the SDK client layer.
 * Domain types are imported from @glstream/types.
 */

import type { GLRecord, IsoDate } from "@glstream/types";

// =============================================================================
// Client Configuration
// =============================================================================

/**
 * Configuration for the GL stream client.
 */
export interface GlClientConfig {
  /** Base URL of the service (e.g., "http://localhost:8000") */
  readonly baseUrl: string;
  /** Request timeout in milliseconds, up to response headers (default: 30000) */
  readonly timeout?: number | undefined;
  /** Maximum retry attempts for 5xx and network errors (default: 3) */
  readonly retries?: number | undefined;
  /** First backoff delay; doubles per attempt up to 10s (default: 1000) */
  readonly retryDelayMs?: number | undefined;
  /** Custom fetch function (for testing or polyfills) */
  readonly fetchFn?: typeof fetch | undefined;
}

// =============================================================================
// Response Types
// =============================================================================

/**
 * Raw HTTP response as returned by HttpClient.
 */
export interface ApiResponse<T> {
  /** Parsed response body */
  readonly data: T;
  /** HTTP status code */
  readonly status: number;
  /** Response headers (selected) */
  readonly headers: Readonly<Record<string, string>>;
}

export interface HealthStatus {
  readonly status: string;
  readonly service: string;
  readonly version: string;
  readonly historicalRecords: number;
  readonly totalStreamed: number;
  readonly totalRecords: number;
  readonly timestamp: string;
}

export interface RangeResult {
  readonly startDate: IsoDate;
  readonly endDate: IsoDate;
  readonly records: readonly GLRecord[];
}

export interface BatchResult {
  readonly records: readonly GLRecord[];
  /** Pass back as the next watermark; null after an empty window pull */
  readonly nextWatermark: number | null;
}

/** Decoded frame of the /get-gl stream. */
export type StreamFrame =
  | { readonly kind: "buffered"; readonly records: readonly GLRecord[] }
  | { readonly kind: "new"; readonly record: GLRecord };

// =============================================================================
// Error Types
// =============================================================================

/**
 * Structured error from the service or the transport.
 */
export class GlClientError extends Error {
  /** Error code from the API (e.g., "INVALID_RANGE") or the client ("TIMEOUT") */
  readonly code: string;
  /** HTTP status code, 0 when no response was received */
  readonly statusCode: number;
  /** Additional error details (field, value, issues) */
  readonly details?: unknown;

  constructor(code: string, message: string, statusCode: number, details?: unknown) {
    super(message);
    this.name = "GlClientError";
    this.code = code;
    this.statusCode = statusCode;
    this.details = details;
  }
}
