/**
 * @glstream/generator — Calendar helpers.
 *
 * Dates are `YYYY-MM-DD` strings interpreted in UTC. All arithmetic goes
 * through Date.UTC so results never depend on the host time zone.
 */

import type { IsoDate, IsoTimestamp } from "@glstream/types";
import { GeneratorError } from "./types.js";

const ISO_DATE = /^(\d{4})-(\d{2})-(\d{2})$/;
const MS_PER_DAY = 86_400_000;

/**
 * Parse a `YYYY-MM-DD` string into a UTC-midnight epoch.
 * Returns undefined for malformed or non-existent dates ("2025-02-30").
 */
export function parseIsoDate(value: string): number | undefined {
  const match = ISO_DATE.exec(value);
  if (match === null) {
    return undefined;
  }
  const [, y, m, d] = match;
  const year = Number(y);
  const month = Number(m);
  const day = Number(d);
  const ms = Date.UTC(year, month - 1, day);
  const check = new Date(ms);
  if (
    check.getUTCFullYear() !== year ||
    check.getUTCMonth() !== month - 1 ||
    check.getUTCDate() !== day
  ) {
    return undefined;
  }
  return ms;
}

/** Like parseIsoDate, but throws GeneratorError("INVALID_DATE"). */
export function requireIsoDate(value: string): number {
  const ms = parseIsoDate(value);
  if (ms === undefined) {
    throw new GeneratorError("INVALID_DATE", `Invalid date "${value}", expected YYYY-MM-DD`);
  }
  return ms;
}

export function formatIsoDate(epochMs: number): IsoDate {
  return new Date(epochMs).toISOString().slice(0, 10);
}

export function addDays(date: IsoDate, days: number): IsoDate {
  return formatIsoDate(requireIsoDate(date) + days * MS_PER_DAY);
}

/** Midnight UTC of the given date as an ISO timestamp. */
export function midnightOf(date: IsoDate): IsoTimestamp {
  return new Date(requireIsoDate(date)).toISOString();
}

/** `YYYY-MM` of a date. */
export function fiscalPeriodOf(date: IsoDate): string {
  return date.slice(0, 7);
}

/** `YYYYMM` of a date, as used in JIB numbers. */
export function compactYearMonth(date: IsoDate): string {
  return date.slice(0, 4) + date.slice(5, 7);
}
