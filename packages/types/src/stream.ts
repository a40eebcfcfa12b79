/**
 * NDJSON stream frames.
 *
 * A stream opens with exactly one `buffered_records` frame, followed by one
 * `new_record` frame per live record. Each frame is one JSON line.
 */

import type { GLRecordWire } from "./record.js";
import { isGLRecordWire } from "./guards.js";

export interface BufferedRecordsFrameWire {
  readonly type: "buffered_records";
  readonly count: number;
  readonly data: readonly GLRecordWire[];
}

export interface NewRecordFrameWire {
  readonly type: "new_record";
  readonly data: GLRecordWire;
}

export type StreamFrameWire = BufferedRecordsFrameWire | NewRecordFrameWire;

export function isStreamFrameWire(value: unknown): value is StreamFrameWire {
  if (value === null || typeof value !== "object") return false;
  const v = value as Record<string, unknown>;

  if (v.type === "new_record") {
    return isGLRecordWire(v.data);
  }

  return (
    v.type === "buffered_records" &&
    typeof v.count === "number" &&
    Array.isArray(v.data) &&
    v.data.length === v.count &&
    v.data.every(isGLRecordWire)
  );
}
