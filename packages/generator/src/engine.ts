/**
 * @glstream/generator — Generation engine.
 *
 * Owns the one seeded random source and the entry/batch counters, and
 * drives two phases against them:
 *
 * 1. Historical: one record per calendar day for `lookbackDays` days,
 *    ending the day before `epoch`, each stamped at midnight UTC.
 * 2. Live: one record per wall-clock tick. The simulated timestamp starts
 *    at `epoch` midnight and advances one second per record, independent
 *    of the tick interval.
 *
 * Records reach the sink only once fully synthesized, strictly in entry-ID
 * order. The random source is never handed out.
 */

import type { GLRecord, IsoDate, IsoTimestamp } from "@glstream/types";
import { SeededRandom } from "./random.js";
import { AccountCatalog } from "./accounts.js";
import type { Vocabulary } from "./data.js";
import { loadVocabulary } from "./data.js";
import { addDays, formatIsoDate, midnightOf, requireIsoDate } from "./calendar.js";
import { RecordSynthesizer, batchIdFor } from "./synthesizer.js";
import type { Logger, RecordSink } from "./types.js";
import { GeneratorError } from "./types.js";

export const DEFAULT_SEED = 42;
export const DEFAULT_EPOCH: IsoDate = "2025-11-10";
export const DEFAULT_LOOKBACK_DAYS = 365;
export const DEFAULT_TICK_INTERVAL_MS = 30_000;

/** Longest delay a Node timer accepts; larger values fire after 1 ms. */
export const MAX_TICK_INTERVAL_MS = 2_147_483_647;

/** Simulated time between consecutive live records. */
export const LIVE_STEP_MS = 1_000;

export interface GenerationEngineOptions {
  readonly sink: RecordSink;
  readonly seed?: number | undefined;
  readonly epoch?: IsoDate | undefined;
  readonly lookbackDays?: number | undefined;
  readonly tickIntervalMs?: number | undefined;
  readonly catalog?: AccountCatalog | undefined;
  readonly vocabulary?: Vocabulary | undefined;
  readonly logger?: Logger | undefined;
  /** Called when a live tick fails. The live timer is already stopped. */
  readonly onFatal?: ((error: unknown) => void) | undefined;
}

export class GenerationEngine {
  readonly seed: number;
  readonly epoch: IsoDate;
  readonly lookbackDays: number;
  readonly tickIntervalMs: number;

  private readonly _random: SeededRandom;
  private readonly _synthesizer: RecordSynthesizer;
  private readonly _sink: RecordSink;
  private readonly _logger: Logger | undefined;
  private readonly _onFatal: GenerationEngineOptions["onFatal"];

  private _lastEntryId = 0;
  private _historicalCount = 0;
  private _liveCount = 0;
  private _historicalDone = false;
  private _nextLiveMs: number;
  private _timer: ReturnType<typeof setInterval> | undefined;

  constructor(options: GenerationEngineOptions) {
    this.seed = options.seed ?? DEFAULT_SEED;
    this.epoch = options.epoch ?? DEFAULT_EPOCH;
    this.lookbackDays = options.lookbackDays ?? DEFAULT_LOOKBACK_DAYS;
    this.tickIntervalMs = options.tickIntervalMs ?? DEFAULT_TICK_INTERVAL_MS;

    if (!Number.isInteger(this.lookbackDays) || this.lookbackDays < 0) {
      throw new GeneratorError(
        "INVALID_CONFIG",
        `lookbackDays must be a non-negative integer, got ${this.lookbackDays}`,
      );
    }
    if (!(this.tickIntervalMs > 0) || this.tickIntervalMs > MAX_TICK_INTERVAL_MS) {
      throw new GeneratorError(
        "INVALID_CONFIG",
        `tickIntervalMs must be in (0, ${MAX_TICK_INTERVAL_MS}], got ${this.tickIntervalMs}`,
      );
    }

    this._nextLiveMs = requireIsoDate(this.epoch);
    this._random = new SeededRandom(this.seed);
    this._synthesizer = new RecordSynthesizer({
      catalog: options.catalog ?? new AccountCatalog(),
      vocabulary: options.vocabulary ?? loadVocabulary(),
      defaultTimestamp: midnightOf(this.epoch),
    });
    this._sink = options.sink;
    this._logger = options.logger;
    this._onFatal = options.onFatal;
  }

  // ─── Counters ──────────────────────────────────────────────────────

  get lastEntryId(): number {
    return this._lastEntryId;
  }

  get historicalCount(): number {
    return this._historicalCount;
  }

  get liveCount(): number {
    return this._liveCount;
  }

  get historicalGenerated(): boolean {
    return this._historicalDone;
  }

  get running(): boolean {
    return this._timer !== undefined;
  }

  // ─── Historical Phase ──────────────────────────────────────────────

  /**
   * Generate the historical batch. Runs once, synchronously.
   */
  generateHistorical(): readonly GLRecord[] {
    if (this._historicalDone) {
      throw new GeneratorError(
        "HISTORICAL_ALREADY_GENERATED",
        "Historical phase has already run",
      );
    }

    const records: GLRecord[] = [];
    let day = addDays(this.epoch, -this.lookbackDays);

    for (let i = 0; i < this.lookbackDays; i++) {
      records.push(this._emit(day, midnightOf(day)));
      day = addDays(day, 1);
    }

    this._historicalCount = records.length;
    this._historicalDone = true;

    this._logger?.info(
      {
        records: records.length,
        firstDate: records[0]?.transactionDate,
        lastDate: records[records.length - 1]?.transactionDate,
        lastEntryId: this._lastEntryId,
      },
      "Historical batch generated",
    );

    return records;
  }

  // ─── Live Phase ────────────────────────────────────────────────────

  /**
   * Generate exactly one live record.
   */
  tick(): GLRecord {
    this._assertHistorical();

    const timestamp: IsoTimestamp = new Date(this._nextLiveMs).toISOString();
    const record = this._emit(formatIsoDate(this._nextLiveMs), timestamp);

    this._nextLiveMs += LIVE_STEP_MS;
    this._liveCount++;

    this._logger?.debug({ glEntryId: record.glEntryId, timestamp }, "Live record generated");
    return record;
  }

  /**
   * Start the live timer. No-op when already running.
   */
  start(): void {
    this._assertHistorical();
    if (this._timer !== undefined) {
      return;
    }

    this._timer = setInterval(() => {
      try {
        this.tick();
      } catch (error) {
        this.stop();
        this._logger?.error(
          { err: error, lastEntryId: this._lastEntryId },
          "Live generation failed",
        );
        if (this._onFatal !== undefined) {
          this._onFatal(error);
        } else {
          throw error;
        }
      }
    }, this.tickIntervalMs);

    this._logger?.info(
      { tickIntervalMs: this.tickIntervalMs, nextTimestamp: new Date(this._nextLiveMs).toISOString() },
      "Live generation started",
    );
  }

  stop(): void {
    if (this._timer === undefined) {
      return;
    }
    clearInterval(this._timer);
    this._timer = undefined;
    this._logger?.info({ liveCount: this._liveCount }, "Live generation stopped");
  }

  // ─── Internal ──────────────────────────────────────────────────────

  private _assertHistorical(): void {
    if (!this._historicalDone) {
      throw new GeneratorError(
        "HISTORICAL_NOT_GENERATED",
        "Historical phase must run before live generation",
      );
    }
  }

  private _emit(
    transactionDate: IsoDate,
    transactionDateTime: IsoTimestamp,
  ): GLRecord {
    const entryId = this._lastEntryId + 1;
    const record = this._synthesizer.synthesize(this._random, {
      entryId,
      batchId: batchIdFor(entryId),
      transactionDate,
      transactionDateTime,
    });

    this._sink.append(record);
    this._lastEntryId = entryId;
    return record;
  }
}

export interface HistoricalBatchOptions {
  readonly seed?: number | undefined;
  readonly epoch?: IsoDate | undefined;
  readonly lookbackDays?: number | undefined;
}

/**
 * Build a historical batch with a fresh engine and return it.
 */
export function generateHistoricalBatch(options: HistoricalBatchOptions = {}): readonly GLRecord[] {
  const engine = new GenerationEngine({
    ...options,
    sink: { append: () => undefined },
  });
  return engine.generateHistorical();
}
