/**
 * @glstream/record-buffer — Streaming session.
 *
 * One session per connected client. A session owns nothing but its cursor:
 * it replays the buffer once, then polls for records appended since.
 */

import type { GLRecord } from "@glstream/types";
import type { RecordBuffer } from "./types.js";

/** Longest delay setTimeout honours. */
const MAX_SLEEP_MS = 2_147_483_647;

// =============================================================================
// Frames
// =============================================================================

/** Everything already buffered when the session opened. */
export interface BufferedFrame {
  readonly kind: "buffered";
  readonly records: readonly GLRecord[];
}

/** One record appended after the session opened. */
export interface NewRecordFrame {
  readonly kind: "new";
  readonly record: GLRecord;
}

export type SessionFrame = BufferedFrame | NewRecordFrame;

export interface SessionOptions {
  /** Delay between polls of the buffer */
  readonly tickIntervalMs: number;

  /** Ends the session when aborted */
  readonly signal?: AbortSignal | undefined;
}

// =============================================================================
// Session
// =============================================================================

/**
 * Open a session over a shared buffer.
 *
 * Emits one buffered frame, then one new-record frame per appended record,
 * forever. Ends when `signal` aborts or the consumer calls return().
 * Records appended between the snapshot and the first poll are picked up
 * by the first poll, so none are missed or repeated.
 */
export async function* openSession(
  buffer: RecordBuffer,
  options: SessionOptions,
): AsyncGenerator<SessionFrame, void, undefined> {
  const { tickIntervalMs, signal } = options;
  if (!Number.isFinite(tickIntervalMs) || tickIntervalMs <= 0 || tickIntervalMs > MAX_SLEEP_MS) {
    throw new RangeError(`tickIntervalMs must be in (0, ${MAX_SLEEP_MS}], got ${tickIntervalMs}`);
  }

  if (signal?.aborted) {
    return;
  }

  const snapshot = buffer.snapshotAndTail();
  let cursor = snapshot.cursor;
  yield { kind: "buffered", records: snapshot.records };

  while (!signal?.aborted) {
    await sleep(tickIntervalMs, signal);
    if (signal?.aborted) {
      return;
    }

    const next = buffer.readFrom(cursor);
    cursor = next.cursor;
    for (const record of next.records) {
      yield { kind: "new", record };
    }
  }
}

/**
 * Resolve after `ms`, or as soon as `signal` aborts.
 */
export function sleep(ms: number, signal?: AbortSignal): Promise<void> {
  return new Promise((resolve) => {
    if (signal?.aborted) {
      resolve();
      return;
    }

    const onAbort = (): void => {
      clearTimeout(timer);
      resolve();
    };

    const timer = setTimeout(() => {
      signal?.removeEventListener("abort", onAbort);
      resolve();
    }, ms);

    signal?.addEventListener("abort", onAbort, { once: true });
  });
}
