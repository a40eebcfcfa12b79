/**
 * GlService — Composition root for the generator and the shared buffer.
 *
 * Route handlers delegate to this service; they never touch the engine
 * or the buffer directly. One instance serves every client.
 */

import { AccountCatalog, GenerationEngine } from "@glstream/generator";
import type { Logger } from "@glstream/generator";
import { InMemoryRecordBuffer, openSession } from "@glstream/record-buffer";
import type { BufferStats, SessionFrame } from "@glstream/record-buffer";
import type { GLRecord, IsoDate } from "@glstream/types";
import type { MetricsCollector } from "../middleware/metrics.js";

// =============================================================================
// Configuration
// =============================================================================

export interface GlServiceConfig {
  readonly serviceName: string;
  readonly serviceVersion: string;
  readonly seed: number;
  readonly epoch: IsoDate;
  readonly lookbackDays: number;
  readonly tickIntervalMs: number;
  readonly batchLimitMax: number;
  readonly logger?: Logger | undefined;
  /** Receives domain metrics when provided */
  readonly metrics?: MetricsCollector | undefined;
  /** Called when live generation fails; the timer is already stopped */
  readonly onFatal?: ((error: unknown) => void) | undefined;
}

export interface HealthSnapshot {
  readonly historicalRecords: number;
  /** Records produced by the engine, historical batch included */
  readonly totalStreamed: number;
  readonly totalRecords: number;
  readonly activeSessions: number;
}

export const RECORDS_GENERATED_METRIC = "glstream_records_generated_total";
export const SESSIONS_TOTAL_METRIC = "glstream_stream_sessions_total";
export const SESSIONS_ACTIVE_METRIC = "glstream_stream_sessions_active";
export const BUFFER_RECORDS_METRIC = "glstream_buffer_records";

// =============================================================================
// Service
// =============================================================================

export class GlService {
  readonly config: GlServiceConfig;
  readonly catalog: AccountCatalog;
  readonly buffer: InMemoryRecordBuffer;
  readonly engine: GenerationEngine;

  private readonly _logger: Logger | undefined;
  private readonly _metrics: MetricsCollector | undefined;
  private _activeSessions = 0;
  private readonly _sessionAborts = new Set<() => void>();

  constructor(config: GlServiceConfig) {
    this.config = config;
    this._logger = config.logger;
    this._metrics = config.metrics;

    this.catalog = new AccountCatalog();
    this.buffer = new InMemoryRecordBuffer();
    this.engine = new GenerationEngine({
      sink: this.buffer,
      seed: config.seed,
      epoch: config.epoch,
      lookbackDays: config.lookbackDays,
      tickIntervalMs: config.tickIntervalMs,
      catalog: this.catalog,
      logger: config.logger,
      onFatal: config.onFatal,
    });

    this._metrics?.describe(RECORDS_GENERATED_METRIC, "GL records appended to the buffer, by phase");
    this._metrics?.describe(SESSIONS_TOTAL_METRIC, "Streaming sessions opened");

    // Appends before the seal belong to the historical batch
    this.buffer.subscribe(() => {
      this._metrics?.incrementCounter(RECORDS_GENERATED_METRIC, {
        phase: this.buffer.sealed ? "live" : "historical",
      });
    });

    this._metrics?.registerGauge(
      SESSIONS_ACTIVE_METRIC,
      "Open streaming sessions",
      () => this._activeSessions,
    );
    this._metrics?.registerGauge(
      BUFFER_RECORDS_METRIC,
      "Records held in the shared buffer",
      () => this.buffer.length,
    );
  }

  // ─── Lifecycle ────────────────────────────────────────────────────

  /**
   * Generate the historical batch, seal it, and start the live timer.
   * Calling again after a stop() restarts only the timer.
   */
  start(): void {
    if (!this.buffer.sealed) {
      this.engine.generateHistorical();
      const historical = this.buffer.sealHistorical();
      this._logger?.info({ historical }, "Historical buffer sealed");
    }
    this.engine.start();
  }

  stop(): void {
    this.engine.stop();
  }

  isReady(): boolean {
    return this.buffer.sealed && this.engine.running;
  }

  // ─── Queries ──────────────────────────────────────────────────────

  range(startDate: IsoDate, endDate: IsoDate): readonly GLRecord[] {
    return this.buffer.range(startDate, endDate);
  }

  pullAfter(watermark: number, limit: number): readonly GLRecord[] {
    return this.buffer.afterEntryId(watermark, limit);
  }

  pullWindow(from: IsoDate, to: IsoDate, limit: number, watermark = 0): readonly GLRecord[] {
    return this.buffer.window(from, to, limit, watermark);
  }

  stats(): BufferStats {
    return this.buffer.stats();
  }

  health(): HealthSnapshot {
    const historicalRecords = this.buffer.stats().historical;
    const totalStreamed = this.engine.historicalCount + this.engine.liveCount;
    return {
      historicalRecords,
      totalStreamed,
      totalRecords: historicalRecords + totalStreamed,
      activeSessions: this._activeSessions,
    };
  }

  get activeSessions(): number {
    return this._activeSessions;
  }

  // ─── Streaming ────────────────────────────────────────────────────

  /**
   * Open a counted streaming session over the shared buffer.
   * It ends when `signal` aborts or closeSessions() is called.
   */
  async *stream(signal?: AbortSignal): AsyncGenerator<SessionFrame, void, undefined> {
    const controller = new AbortController();
    const abort = (): void => controller.abort();
    signal?.addEventListener("abort", abort, { once: true });
    if (signal?.aborted) abort();

    this._sessionAborts.add(abort);
    this._activeSessions++;
    this._metrics?.incrementCounter(SESSIONS_TOTAL_METRIC);
    this._logger?.debug({ activeSessions: this._activeSessions }, "Stream session opened");

    try {
      yield* openSession(this.buffer, {
        tickIntervalMs: this.config.tickIntervalMs,
        signal: controller.signal,
      });
    } finally {
      signal?.removeEventListener("abort", abort);
      this._sessionAborts.delete(abort);
      this._activeSessions--;
      this._logger?.debug({ activeSessions: this._activeSessions }, "Stream session closed");
    }
  }

  /**
   * End every open session. Returns how many were signalled.
   */
  closeSessions(): number {
    const count = this._sessionAborts.size;
    for (const abort of this._sessionAborts) {
      abort();
    }
    return count;
  }
}
