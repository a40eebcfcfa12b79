/**
 * @glstream/types — Shared domain types for the GL stream stack.
 *
 * These types are used across all packages:
 * - Accounts and their classification
 * - The GL record and its JSON wire shape
 * - NDJSON stream frames
 * - Runtime guards for decoded data
 *
 * Design rules:
 * - All types are immutable (readonly)
 * - No runtime dependencies
 * - Wire mapping is explicit, field by field
 */

// Account types
export type { Account, AccountType, AccountKind } from "./account.js";
export { ACCOUNT_KINDS, isRevenue, isCapex } from "./account.js";

// Record types
export type { GLRecord, GLRecordWire, IsoDate, IsoTimestamp } from "./record.js";

// Wire mapping
export { toWire, fromWire } from "./wire.js";

// Stream frames
export type {
  BufferedRecordsFrameWire,
  NewRecordFrameWire,
  StreamFrameWire,
} from "./stream.js";
export { isStreamFrameWire } from "./stream.js";

// Runtime type guards
export { isIsoDate, isAccount, isGLRecordWire } from "./guards.js";
