/**
 * Runtime Type Guards
 *
 * Narrowing functions for GL domain types.
 * Used at system boundaries (decoded stream frames, batch responses).
 */

import type { Account } from "./account.js";
import type { GLRecordWire } from "./record.js";

const ACCOUNT_TYPES = new Set<string>(["REVENUE", "EXPENSE"]);
const ISO_DATE = /^\d{4}-\d{2}-\d{2}$/;

const STRING_FIELDS = [
  "journal_batch",
  "journal_entry",
  "account_code",
  "account_name",
  "well_id",
  "lease_name",
  "property_id",
  "cost_center",
  "journal_source",
  "transaction_type",
  "description",
  "fiscal_period",
  "state",
  "county",
  "basin",
  "created_timestamp",
  "created_by",
  "last_modified",
] as const;

const NUMBER_FIELDS = [
  "gl_entry_id",
  "debit_amount",
  "credit_amount",
  "net_amount",
  "fiscal_year",
  "fiscal_month",
] as const;

export function isIsoDate(value: unknown): value is string {
  return typeof value === "string" && ISO_DATE.test(value);
}

export function isAccount(value: unknown): value is Account {
  if (value === null || typeof value !== "object") return false;
  const v = value as Record<string, unknown>;
  return (
    typeof v.code === "string" &&
    v.code.length > 0 &&
    typeof v.name === "string" &&
    typeof v.type === "string" &&
    ACCOUNT_TYPES.has(v.type)
  );
}

function isNullableString(value: unknown): boolean {
  return value === null || typeof value === "string";
}

export function isGLRecordWire(value: unknown): value is GLRecordWire {
  if (value === null || typeof value !== "object") return false;
  const v = value as Record<string, unknown>;

  for (const field of STRING_FIELDS) {
    if (typeof v[field] !== "string") return false;
  }
  for (const field of NUMBER_FIELDS) {
    if (typeof v[field] !== "number") return false;
  }

  return (
    isIsoDate(v.transaction_date) &&
    isIsoDate(v.posting_date) &&
    typeof v.account_type === "string" &&
    ACCOUNT_TYPES.has(v.account_type) &&
    isNullableString(v.afe_number) &&
    isNullableString(v.jib_number)
  );
}
