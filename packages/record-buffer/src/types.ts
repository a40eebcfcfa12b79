/**
 * @glstream/record-buffer — Core types.
 *
 * Defines the interfaces for the shared, append-only record buffer.
 *
 * Design principles:
 * - Records are immutable after append
 * - The buffer is append-only (no UPDATE, no DELETE, no eviction)
 * - One writer; any number of independent readers, each with its own cursor
 * - Every operation is synchronous, so no reader can observe a half-applied
 *   append and no lock is ever held across an await
 */

import type { GLRecord, IsoDate } from "@glstream/types";

// =============================================================================
// Read Results
// =============================================================================

/**
 * A slice of the buffer plus the cursor to resume from.
 */
export interface ReadResult {
  /** Records in append order (may be empty) */
  readonly records: readonly GLRecord[];

  /** Buffer length at the time of the read; pass back to readFrom() */
  readonly cursor: number;
}

/**
 * Buffer size breakdown.
 */
export interface BufferStats {
  /** Records in the sealed historical portion */
  readonly historical: number;

  /** Records appended after the historical portion was sealed */
  readonly live: number;

  /** All records */
  readonly total: number;
}

// =============================================================================
// Subscription
// =============================================================================

/**
 * Callback for append notifications.
 */
export type RecordHandler = (record: GLRecord) => void;

/**
 * A subscription that can be unsubscribed.
 */
export interface Subscription {
  unsubscribe(): void;
}

// =============================================================================
// Buffer Interface
// =============================================================================

/**
 * Append-only shared buffer of GL records.
 *
 * Invariants:
 * - Records are stored strictly in increasing glEntryId order
 * - A cursor is a buffer length; readFrom(n) returns records n, n+1, ...
 * - The historical portion never changes once sealed
 */
export interface RecordBuffer {
  /**
   * Append one record. Sole-writer operation.
   *
   * @throws BufferError("OUT_OF_ORDER") if glEntryId does not increase
   */
  append(record: GLRecord): void;

  /**
   * Freeze the current length as the historical boundary.
   *
   * @returns The number of historical records
   * @throws BufferError("ALREADY_SEALED") on a second call
   */
  sealHistorical(): number;

  /**
   * Copy every buffered record and return the cursor just past them.
   */
  snapshotAndTail(): ReadResult;

  /**
   * Every record appended since `cursor`. Empty when nothing is new.
   *
   * @throws BufferError("INVALID_CURSOR") if cursor is negative, fractional or past the end
   */
  readFrom(cursor: number): ReadResult;

  /**
   * Historical records with startDate <= transactionDate <= endDate.
   */
  range(startDate: IsoDate, endDate: IsoDate): readonly GLRecord[];

  /**
   * All records with glEntryId > watermark, in order, capped at `limit`.
   */
  afterEntryId(watermark: number, limit?: number): readonly GLRecord[];

  /**
   * Records with from <= transactionDate < to and glEntryId > watermark,
   * in order, capped at `limit`. Pass the last ID received as `watermark`
   * to page through a window.
   */
  window(from: IsoDate, to: IsoDate, limit?: number, watermark?: number): readonly GLRecord[];

  /**
   * Subscribe to appends. Handlers run synchronously inside append().
   */
  subscribe(handler: RecordHandler): Subscription;

  stats(): BufferStats;

  readonly length: number;
  readonly sealed: boolean;
}

// =============================================================================
// Errors
// =============================================================================

/**
 * Error codes for RecordBuffer operations.
 */
export type BufferErrorCode =
  | "OUT_OF_ORDER"
  | "ALREADY_SEALED"
  | "INVALID_CURSOR"
  | "INVALID_LIMIT";

/**
 * Error thrown by RecordBuffer operations.
 */
export class BufferError extends Error {
  constructor(
    public readonly code: BufferErrorCode,
    message: string,
  ) {
    super(message);
    this.name = "BufferError";
  }
}
