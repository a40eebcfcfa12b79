/**
 * Tests for the NDJSON session body.
 *
 * Verifies:
 * - Frame wire shapes
 * - Encoding failures error only the affected stream and are logged
 * - Client abort ends the session
 */

import { describe, it, expect, vi } from "vitest";
import { generateHistoricalBatch } from "@glstream/generator";
import type { Logger } from "@glstream/generator";
import type { SessionFrame } from "@glstream/record-buffer";
import { createNdjsonStream, encodeFrame, toFrameWire } from "../src/services/ndjson.js";
import { StreamingError } from "../src/types/error.js";

function silentLogger(): Logger {
  return { debug: vi.fn(), info: vi.fn(), warn: vi.fn(), error: vi.fn() };
}

const RECORDS = generateHistoricalBatch({ epoch: "2025-11-10", lookbackDays: 2 });

describe("toFrameWire", () => {
  it("wraps buffered records with their count", () => {
    const wire = toFrameWire({ kind: "buffered", records: RECORDS });
    expect(wire.type).toBe("buffered_records");
    if (wire.type !== "buffered_records") return;
    expect(wire.count).toBe(2);
    expect(wire.data.map((r) => r.gl_entry_id)).toEqual([1, 2]);
  });

  it("wraps a single live record", () => {
    const record = RECORDS[1];
    if (record === undefined) throw new Error("fixture");
    const wire = toFrameWire({ kind: "new", record });
    expect(wire.type).toBe("new_record");
    if (wire.type !== "new_record") return;
    expect(wire.data.gl_entry_id).toBe(2);
  });
});

describe("encodeFrame", () => {
  it("writes one line per frame", () => {
    const line = encodeFrame({ kind: "buffered", records: [] });
    expect(line).toBe('{"type":"buffered_records","count":0,"data":[]}\n');
  });
});

describe("createNdjsonStream", () => {
  it("errors the stream with StreamingError when encoding fails", async () => {
    const logger = silentLogger();
    const cleanup = vi.fn();

    async function* frames(): AsyncGenerator<SessionFrame, void, undefined> {
      try {
        yield { kind: "buffered", records: [] };
      } finally {
        cleanup();
      }
    }

    const stream = createNdjsonStream({
      open: () => frames(),
      logger,
      requestId: "req-1",
      encode: () => {
        throw new Error("boom");
      },
    });

    const reader = stream.getReader();
    await expect(reader.read()).rejects.toBeInstanceOf(StreamingError);
    expect(cleanup).toHaveBeenCalledTimes(1);
    expect(logger.error).toHaveBeenCalledWith(
      expect.objectContaining({ requestId: "req-1" }),
      "Streaming session failed",
    );
  });

  it("ends the session when the client signal aborts", async () => {
    const client = new AbortController();
    let sessionSignal: AbortSignal | undefined;

    async function* frames(signal: AbortSignal): AsyncGenerator<SessionFrame, void, undefined> {
      sessionSignal = signal;
      yield { kind: "buffered", records: [] };
      if (!signal.aborted) {
        await new Promise<void>((resolve) => signal.addEventListener("abort", () => resolve()));
      }
    }

    const stream = createNdjsonStream({ open: frames, signal: client.signal });
    const reader = stream.getReader();

    const first = await reader.read();
    expect(new TextDecoder().decode(first.value)).toBe(
      '{"type":"buffered_records","count":0,"data":[]}\n',
    );

    client.abort();

    expect(sessionSignal?.aborted).toBe(true);
    expect((await reader.read()).done).toBe(true);
  });
});
