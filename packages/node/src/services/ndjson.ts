/**
 * NDJSON response body for a streaming session.
 *
 * Pull-driven: the session is advanced only when the HTTP layer asks for
 * more bytes, and cancelling the body ends the session.
 */

import type { Logger } from "@glstream/generator";
import type { SessionFrame } from "@glstream/record-buffer";
import { toWire } from "@glstream/types";
import type { StreamFrameWire } from "@glstream/types";
import { StreamingError } from "../types/error.js";

export const NDJSON_CONTENT_TYPE = "application/x-ndjson";

export const STREAM_HEADERS: Readonly<Record<string, string>> = {
  "Content-Type": NDJSON_CONTENT_TYPE,
  "Cache-Control": "no-cache",
  "X-Accel-Buffering": "no",
};

/** Wire shape of one session frame. */
export function toFrameWire(frame: SessionFrame): StreamFrameWire {
  if (frame.kind === "buffered") {
    return {
      type: "buffered_records",
      count: frame.records.length,
      data: frame.records.map(toWire),
    };
  }
  return { type: "new_record", data: toWire(frame.record) };
}

/**
 * Encode one frame as a JSON line.
 *
 * @throws StreamingError if the frame cannot be serialized
 */
export function encodeFrame(frame: SessionFrame): string {
  try {
    return JSON.stringify(toFrameWire(frame)) + "\n";
  } catch (error) {
    throw new StreamingError("Failed to encode stream frame", { kind: frame.kind }, { cause: error });
  }
}

export interface NdjsonStreamOptions {
  /** Opens the session; receives a signal that aborts when the body is cancelled */
  readonly open: (signal: AbortSignal) => AsyncGenerator<SessionFrame, void, undefined>;
  /** Client-side abort (the incoming request's signal) */
  readonly signal?: AbortSignal | undefined;
  readonly logger?: Logger | undefined;
  readonly requestId?: string | undefined;
  /** Frame encoder; defaults to encodeFrame */
  readonly encode?: ((frame: SessionFrame) => string) | undefined;
}

/**
 * Build a byte stream of JSON lines from a session.
 *
 * A failure inside the session is logged and errors this stream only;
 * other sessions and the shared buffer are untouched.
 */
export function createNdjsonStream(options: NdjsonStreamOptions): ReadableStream<Uint8Array> {
  const encoder = new TextEncoder();
  const encode = options.encode ?? encodeFrame;
  const { logger, requestId } = options;

  const controller = new AbortController();
  const onClientAbort = (): void => controller.abort();
  options.signal?.addEventListener("abort", onClientAbort, { once: true });

  const frames = options.open(controller.signal);
  let closed = false;

  const finish = async (): Promise<void> => {
    if (closed) return;
    closed = true;
    options.signal?.removeEventListener("abort", onClientAbort);
    controller.abort();
    await frames.return();
  };

  return new ReadableStream<Uint8Array>({
    async pull(stream) {
      try {
        const result = await frames.next();
        if (closed) return;
        if (result.done === true) {
          await finish();
          stream.close();
          return;
        }
        stream.enqueue(encoder.encode(encode(result.value)));
      } catch (error) {
        const streamingError =
          error instanceof StreamingError
            ? error
            : new StreamingError("Streaming session failed", {}, { cause: error });
        logger?.error({ err: error, requestId }, streamingError.message);
        await finish();
        stream.error(streamingError);
      }
    },

    async cancel() {
      logger?.debug({ requestId }, "Stream cancelled by client");
      await finish();
    },
  });
}
