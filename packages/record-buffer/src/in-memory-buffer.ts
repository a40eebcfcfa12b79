/**
 * @glstream/record-buffer — In-memory RecordBuffer implementation.
 *
 * Stores records in one plain array. All state is lost on process exit;
 * a restart regenerates the same records from the seed.
 *
 * Properties:
 * - O(1) append (amortized)
 * - O(n) snapshot / readFrom (n = records returned)
 * - O(log n) watermark lookup
 * - Synchronous subscription dispatch
 * - No eviction
 */

import type { GLRecord, IsoDate } from "@glstream/types";
import type {
  BufferStats,
  ReadResult,
  RecordBuffer,
  RecordHandler,
  Subscription,
} from "./types.js";
import { BufferError } from "./types.js";

export class InMemoryRecordBuffer implements RecordBuffer {
  /** All records, in append (= glEntryId) order */
  private readonly _records: GLRecord[] = [];

  /** Historical boundary, set once by sealHistorical() */
  private _historicalLength: number | undefined;

  private readonly _subscribers = new Set<RecordHandler>();

  // ─── Write ──────────────────────────────────────────────────────────

  append(record: GLRecord): void {
    const last = this._records[this._records.length - 1];
    if (last !== undefined && record.glEntryId <= last.glEntryId) {
      throw new BufferError(
        "OUT_OF_ORDER",
        `Entry ${record.glEntryId} does not follow entry ${last.glEntryId}`,
      );
    }

    this._records.push(record);

    for (const handler of this._subscribers) {
      handler(record);
    }
  }

  sealHistorical(): number {
    if (this._historicalLength !== undefined) {
      throw new BufferError(
        "ALREADY_SEALED",
        `Historical portion already sealed at ${this._historicalLength} records`,
      );
    }
    this._historicalLength = this._records.length;
    return this._historicalLength;
  }

  // ─── Cursor Reads ───────────────────────────────────────────────────

  snapshotAndTail(): ReadResult {
    return {
      records: this._records.slice(),
      cursor: this._records.length,
    };
  }

  readFrom(cursor: number): ReadResult {
    if (!Number.isInteger(cursor) || cursor < 0 || cursor > this._records.length) {
      throw new BufferError(
        "INVALID_CURSOR",
        `Cursor ${cursor} is outside [0, ${this._records.length}]`,
      );
    }

    return {
      records: this._records.slice(cursor),
      cursor: this._records.length,
    };
  }

  // ─── Queries ────────────────────────────────────────────────────────

  range(startDate: IsoDate, endDate: IsoDate): readonly GLRecord[] {
    return this._records
      .slice(0, this._historicalBoundary())
      .filter(
        (record) => startDate <= record.transactionDate && record.transactionDate <= endDate,
      );
  }

  afterEntryId(watermark: number, limit?: number): readonly GLRecord[] {
    const max = this._validateLimit(limit);
    const start = this._indexAfter(watermark);
    return this._records.slice(start, start + max);
  }

  window(from: IsoDate, to: IsoDate, limit?: number, watermark = 0): readonly GLRecord[] {
    const max = this._validateLimit(limit);
    const result: GLRecord[] = [];
    for (let i = this._indexAfter(watermark); i < this._records.length; i++) {
      if (result.length >= max) {
        break;
      }
      const record = this._records[i];
      if (record !== undefined && from <= record.transactionDate && record.transactionDate < to) {
        result.push(record);
      }
    }

    return result;
  }

  // ─── Subscriptions ──────────────────────────────────────────────────

  subscribe(handler: RecordHandler): Subscription {
    this._subscribers.add(handler);

    return {
      unsubscribe: () => {
        this._subscribers.delete(handler);
      },
    };
  }

  // ─── Stats ──────────────────────────────────────────────────────────

  get length(): number {
    return this._records.length;
  }

  get sealed(): boolean {
    return this._historicalLength !== undefined;
  }

  stats(): BufferStats {
    const historical = this._historicalBoundary();
    return {
      historical,
      live: this._records.length - historical,
      total: this._records.length,
    };
  }

  // ─── Internal ───────────────────────────────────────────────────────

  /** Until sealed, everything appended so far is historical. */
  private _historicalBoundary(): number {
    return this._historicalLength ?? this._records.length;
  }

  /** First index whose glEntryId > watermark. */
  private _indexAfter(watermark: number): number {
    let lo = 0;
    let hi = this._records.length;
    while (lo < hi) {
      const mid = (lo + hi) >>> 1;
      const record = this._records[mid];
      if (record !== undefined && record.glEntryId <= watermark) {
        lo = mid + 1;
      } else {
        hi = mid;
      }
    }
    return lo;
  }

  private _validateLimit(limit: number | undefined): number {
    if (limit === undefined) {
      return Number.POSITIVE_INFINITY;
    }
    if (!Number.isInteger(limit) || limit < 1) {
      throw new BufferError("INVALID_LIMIT", `limit must be a positive integer, got ${limit}`);
    }
    return limit;
  }
}
