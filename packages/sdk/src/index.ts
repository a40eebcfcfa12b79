/**
 * @glstream/sdk — Public API
 *
 * Typed HTTP client for the GL stream service.
 *
 * Usage:
 * ```ts
 * import { GlClient } from "@glstream/sdk";
 *
 * const client = new GlClient({ baseUrl: "http://localhost:8000" });
 *
 * let watermark = 0;
 * const batch = await client.pullAfter(watermark, 500);
 * watermark = batch.nextWatermark ?? watermark;
 *
 * for await (const frame of client.stream()) {
 *   // frame.kind === "buffered" first, then "new" per live record
 * }
 * ```
 */

// Client
export { GlClient, decodeFrame } from "./client.js";

// HTTP client (for advanced use)
export { HttpClient } from "./http-client.js";

// Types
export type {
  GlClientConfig,
  ApiResponse,
  HealthStatus,
  RangeResult,
  BatchResult,
  StreamFrame,
} from "./types.js";

export { GlClientError } from "./types.js";
