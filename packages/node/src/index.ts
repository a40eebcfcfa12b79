/**
 * @glstream/node — HTTP service for the GL record stream.
 *
 * Public API for embedding the service; `main.ts` is the executable.
 */

export { GlService } from "./services/gl-service.js";
export type { GlServiceConfig, HealthSnapshot } from "./services/gl-service.js";
export {
  RECORDS_GENERATED_METRIC,
  SESSIONS_TOTAL_METRIC,
  SESSIONS_ACTIVE_METRIC,
  BUFFER_RECORDS_METRIC,
} from "./services/gl-service.js";
export {
  createNdjsonStream,
  encodeFrame,
  toFrameWire,
  NDJSON_CONTENT_TYPE,
  STREAM_HEADERS,
} from "./services/ndjson.js";
export type { NdjsonStreamOptions } from "./services/ndjson.js";
export { loadConfig, ConfigSchema } from "./config.js";
export type { AppConfig } from "./config.js";
export { createApp } from "./app.js";
export type { CreateAppOptions, AppInstance } from "./app.js";
export * from "./middleware/index.js";
export * from "./routes/index.js";
export * from "./types/index.js";
