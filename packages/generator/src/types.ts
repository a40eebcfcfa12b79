/**
 * @glstream/generator — Core types.
 */

import type { GLRecord } from "@glstream/types";

// ─── Logging ─────────────────────────────────────────────────────────────

/**
 * Minimal structured logger accepted by the engine.
 * A pino logger satisfies this interface.
 */
export interface Logger {
  debug(obj: Record<string, unknown>, msg: string): void;
  info(obj: Record<string, unknown>, msg: string): void;
  warn(obj: Record<string, unknown>, msg: string): void;
  error(obj: Record<string, unknown>, msg: string): void;
}

// ─── Sink ────────────────────────────────────────────────────────────────

/**
 * Destination for fully-synthesized records.
 * The engine is the only caller; records arrive in entry-ID order.
 */
export interface RecordSink {
  append(record: GLRecord): void;
}

// ─── Error Types ─────────────────────────────────────────────────────────

/** Error codes for generator operations. */
export type GeneratorErrorCode =
  | "EMPTY_CHOICE"
  | "INVALID_RANGE"
  | "INVALID_DATE"
  | "INVALID_DATA"
  | "INVALID_CONFIG"
  | "HISTORICAL_ALREADY_GENERATED"
  | "HISTORICAL_NOT_GENERATED";

/**
 * Structured error from the generator.
 * Only reachable through misconfiguration or misuse of the engine lifecycle.
 */
export class GeneratorError extends Error {
  public readonly code: GeneratorErrorCode;

  constructor(code: GeneratorErrorCode, message: string) {
    super(message);
    this.name = "GeneratorError";
    this.code = code;
  }
}
