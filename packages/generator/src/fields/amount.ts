/**
 * Transaction amounts, conditioned on account classification.
 *
 * Revenue posts to credit; capex, operating and admin post to debit.
 */

import type { Account } from "@glstream/types";
import { isCapex, isRevenue } from "@glstream/types";
import type { RandomSource } from "../random.js";

export interface AmountRange {
  readonly min: number;
  readonly max: number;
}

export const REVENUE_RANGE: AmountRange = { min: 5000, max: 50000 };
export const CAPEX_RANGE: AmountRange = { min: 10000, max: 200000 };
export const OPEX_RANGE: AmountRange = { min: 500, max: 15000 };

export interface AmountPair {
  readonly debit: number;
  readonly credit: number;
}

/** Round half away from zero to 2 decimal places. */
export function roundCents(value: number): number {
  const sign = value < 0 ? -1 : 1;
  return (sign * Math.round(Math.abs(value) * 100)) / 100;
}

export function generateAmounts(source: RandomSource, account: Account): AmountPair {
  if (isRevenue(account)) {
    const amount = source.uniform(REVENUE_RANGE.min, REVENUE_RANGE.max);
    return { debit: 0, credit: roundCents(amount) };
  }
  if (isCapex(account)) {
    const amount = source.uniform(CAPEX_RANGE.min, CAPEX_RANGE.max);
    return { debit: roundCents(amount), credit: 0 };
  }
  const amount = source.uniform(OPEX_RANGE.min, OPEX_RANGE.max);
  return { debit: roundCents(amount), credit: 0 };
}
