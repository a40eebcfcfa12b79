/**
 * @glstream/sdk — GL stream client.
 *
 * Main entry point for the SDK, used by ingestion jobs.
 *
 * Provides typed methods for:
 * - Health
 * - Historical range reads
 * - Batch pulls by watermark or date window
 * - The live NDJSON stream
 *
 * Design:
 * - Delegates to HttpClient for transport
 * - Every body is validated before use and decoded with fromWire
 */

import { fromWire, isGLRecordWire, isStreamFrameWire } from "@glstream/types";
import type { GLRecord, GLRecordWire, IsoDate } from "@glstream/types";
import type {
  BatchResult,
  GlClientConfig,
  HealthStatus,
  RangeResult,
  StreamFrame,
} from "./types.js";
import { GlClientError } from "./types.js";
import { HttpClient } from "./http-client.js";

// =============================================================================
// Body Validation
// =============================================================================

function invalid(what: string, status: number): GlClientError {
  return new GlClientError("INVALID_RESPONSE", `Malformed ${what} response`, status);
}

function asObject(value: unknown): Record<string, unknown> | undefined {
  if (value === null || typeof value !== "object" || Array.isArray(value)) return undefined;
  return value as Record<string, unknown>;
}

function decodeRecords(value: unknown): GLRecord[] | undefined {
  if (!Array.isArray(value)) return undefined;
  const records: GLRecord[] = [];
  for (const item of value) {
    if (!isGLRecordWire(item)) return undefined;
    records.push(fromWire(item));
  }
  return records;
}

// =============================================================================
// Client
// =============================================================================

export class GlClient {
  private readonly http: HttpClient;

  constructor(config: GlClientConfig) {
    this.http = new HttpClient(config);
  }

  /**
   * GET /health
   */
  async health(): Promise<HealthStatus> {
    const { data, status } = await this.http.get("/health");
    const body = asObject(data);
    if (
      body === undefined ||
      typeof body.status !== "string" ||
      typeof body.service !== "string" ||
      typeof body.version !== "string" ||
      typeof body.historical_records !== "number" ||
      typeof body.total_streamed !== "number" ||
      typeof body.total_records !== "number" ||
      typeof body.timestamp !== "string"
    ) {
      throw invalid("health", status);
    }

    return {
      status: body.status,
      service: body.service,
      version: body.version,
      historicalRecords: body.historical_records,
      totalStreamed: body.total_streamed,
      totalRecords: body.total_records,
      timestamp: body.timestamp,
    };
  }

  /**
   * Historical records with startDate <= transaction date <= endDate.
   */
  async range(startDate: IsoDate, endDate: IsoDate): Promise<RangeResult> {
    const query = new URLSearchParams({ start_date: startDate, end_date: endDate });
    const { data, status } = await this.http.get(`/get-gl?${query.toString()}`);
    const body = asObject(data);
    const records = decodeRecords(body?.data);
    if (
      body === undefined ||
      records === undefined ||
      typeof body.start_date !== "string" ||
      typeof body.end_date !== "string" ||
      body.count !== records.length
    ) {
      throw invalid("range", status);
    }

    return { startDate: body.start_date, endDate: body.end_date, records };
  }

  /**
   * Records with an entry ID above `watermark`, oldest first.
   */
  async pullAfter(watermark: number, limit?: number): Promise<BatchResult> {
    const query = new URLSearchParams({ after_id: String(watermark) });
    if (limit !== undefined) query.set("limit", String(limit));
    return this.pull(query);
  }

  /**
   * Records dated in the half-open window [from, to). Pass the previous
   * `nextWatermark` as `watermark` to fetch the rest of a window that
   * exceeded `limit`.
   */
  async pullWindow(
    from: IsoDate,
    to: IsoDate,
    limit?: number,
    watermark?: number,
  ): Promise<BatchResult> {
    const query = new URLSearchParams({ start_date: from, end_date: to });
    if (limit !== undefined) query.set("limit", String(limit));
    if (watermark !== undefined) query.set("after_id", String(watermark));
    return this.pull(query);
  }

  /**
   * Follow the live stream: one buffered frame, then one frame per record.
   * Ends when `signal` aborts or the consumer stops iterating.
   */
  async *stream(signal?: AbortSignal): AsyncGenerator<StreamFrame, void, undefined> {
    const body = await this.http.openStream("/get-gl", signal);
    const reader = body.getReader();
    const decoder = new TextDecoder();
    let pending = "";
    let settled = false;

    const read = async () => {
      try {
        return await reader.read();
      } catch (error) {
        settled = true;
        throw new GlClientError(
          "STREAM_ERROR",
          error instanceof Error ? error.message : "Stream failed",
          0,
        );
      }
    };

    try {
      for (;;) {
        const { done, value } = await read();
        if (done) {
          settled = true;
          return;
        }

        pending += decoder.decode(value, { stream: true });
        let newline = pending.indexOf("\n");
        while (newline !== -1) {
          const line = pending.slice(0, newline);
          pending = pending.slice(newline + 1);
          if (line.trim().length > 0) {
            yield decodeFrame(line);
          }
          newline = pending.indexOf("\n");
        }
      }
    } finally {
      if (!settled) {
        await reader.cancel();
      }
    }
  }

  // ─── Internal ───────────────────────────────────────────────────────

  private async pull(query: URLSearchParams): Promise<BatchResult> {
    const { data, status } = await this.http.get(`/get-gl-batch?${query.toString()}`);
    const body = asObject(data);
    const records = decodeRecords(body?.data);
    const next = body?.next_watermark;
    if (
      body === undefined ||
      records === undefined ||
      body.count !== records.length ||
      (next !== null && typeof next !== "number")
    ) {
      throw invalid("batch", status);
    }

    return { records, nextWatermark: next };
  }
}

/**
 * Decode one NDJSON line into a typed frame.
 *
 * @throws GlClientError("INVALID_FRAME") for a malformed line
 */
export function decodeFrame(line: string): StreamFrame {
  let parsed: unknown;
  try {
    parsed = JSON.parse(line);
  } catch {
    throw new GlClientError("INVALID_FRAME", "Stream line is not valid JSON", 200, { line });
  }

  if (!isStreamFrameWire(parsed)) {
    throw new GlClientError("INVALID_FRAME", "Unrecognized stream frame", 200, { line });
  }

  if (parsed.type === "buffered_records") {
    return { kind: "buffered", records: parsed.data.map((wire: GLRecordWire) => fromWire(wire)) };
  }
  return { kind: "new", record: fromWire(parsed.data) };
}
