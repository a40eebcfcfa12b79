/**
 * Transaction dates relative to an injected "now".
 */

import type { IsoDate } from "@glstream/types";
import type { RandomSource } from "../random.js";
import { addDays, formatIsoDate } from "../calendar.js";

export const DEFAULT_HISTORICAL_PROBABILITY = 0.8;
export const MAX_DAYS_AGO = 30;

/**
 * With `historicalProbability`, a date 0–30 days before `now`; otherwise `now`.
 * Consumes one roll, plus one more when the historical branch is taken.
 */
export function generateTransactionDate(
  source: RandomSource,
  now: Date,
  historicalProbability: number = DEFAULT_HISTORICAL_PROBABILITY,
): IsoDate {
  const today = formatIsoDate(now.getTime());
  if (source.next() < historicalProbability) {
    const daysAgo = source.integer(0, MAX_DAYS_AGO);
    return addDays(today, -daysAgo);
  }
  return today;
}
