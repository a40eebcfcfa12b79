/**
 * @glstream/generator — Deterministic GL record generation.
 *
 * Provides:
 * - RandomSource interface and the seeded Mulberry32 implementation
 * - AccountCatalog (static chart of accounts)
 * - Field generators (amounts, dates, journal metadata, oil & gas identifiers)
 * - RecordSynthesizer (fixed draw order)
 * - GenerationEngine (historical batch + live ticks)
 *
 * @packageDocumentation
 */

// Core types
export type { Logger, RecordSink, GeneratorErrorCode } from "./types.js";
export { GeneratorError } from "./types.js";

// Random source
export type { RandomSource } from "./random.js";
export { SeededRandom } from "./random.js";

// Calendar
export {
  parseIsoDate,
  requireIsoDate,
  formatIsoDate,
  addDays,
  midnightOf,
  fiscalPeriodOf,
  compactYearMonth,
} from "./calendar.js";

// Static data
export type { Vocabulary, AccountTable } from "./data.js";
export { loadVocabulary, loadAccountTable, parseVocabulary, parseAccountTable } from "./data.js";

// Catalog
export { AccountCatalog, ACCOUNT_TYPES_INFO } from "./accounts.js";

// Field generators
export * from "./fields/index.js";

// Synthesizer
export type { SynthesizeInput, SynthesizerOptions } from "./synthesizer.js";
export {
  RecordSynthesizer,
  selectAccount,
  kindForRoll,
  batchIdFor,
  formatJournalBatch,
  formatJournalEntry,
  ENTRIES_PER_BATCH,
  JIB_PROBABILITY,
  ACCOUNT_KIND_THRESHOLDS,
} from "./synthesizer.js";

// Engine
export type {
  GenerationEngineOptions,
  HistoricalBatchOptions,
} from "./engine.js";
export {
  GenerationEngine,
  generateHistoricalBatch,
  DEFAULT_SEED,
  DEFAULT_EPOCH,
  DEFAULT_LOOKBACK_DAYS,
  DEFAULT_TICK_INTERVAL_MS,
  LIVE_STEP_MS,
  MAX_TICK_INTERVAL_MS,
} from "./engine.js";
