/**
 * @glstream/record-buffer
 *
 * Append-only shared buffer of GL records.
 *
 * Provides:
 * - RecordBuffer interface (append, seal, cursor reads, queries)
 * - InMemoryRecordBuffer implementation
 * - openSession() snapshot-then-tail reader
 */

// Core types
export type {
  ReadResult,
  BufferStats,
  RecordHandler,
  Subscription,
  RecordBuffer,
  BufferErrorCode,
} from "./types.js";

export { BufferError } from "./types.js";

// Implementation
export { InMemoryRecordBuffer } from "./in-memory-buffer.js";

// Sessions
export type {
  BufferedFrame,
  NewRecordFrame,
  SessionFrame,
  SessionOptions,
} from "./session.js";

export { openSession, sleep } from "./session.js";
