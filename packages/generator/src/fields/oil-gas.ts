/**
 * Oil & gas identifiers.
 *
 * All table-driven; each function documents the draws it consumes since
 * the count matters to every record generated after it.
 */

import type { IsoDate } from "@glstream/types";
import type { RandomSource } from "../random.js";
import type { Vocabulary } from "../data.js";
import { compactYearMonth } from "../calendar.js";

/** `PERM-1234`: basin choice, number. */
export function generateWellId(source: RandomSource, vocabulary: Vocabulary): string {
  const basin = source.choice(vocabulary.basins);
  const wellNumber = source.integer(1000, 9999);
  return `${basin.toUpperCase().slice(0, 4)}-${wellNumber}`;
}

/** `AFE-2023-4321`: year, number. */
export function generateAfeNumber(source: RandomSource): string {
  const year = source.integer(2020, 2024);
  const number = source.integer(1000, 9999);
  return `AFE-${year}-${number}`;
}

/** `Smith Ranch`: surname, suffix. */
export function generateLeaseName(source: RandomSource, vocabulary: Vocabulary): string {
  const prefix = source.choice(vocabulary.leasePrefixes);
  const suffix = source.choice(vocabulary.leaseSuffixes);
  return `${prefix} ${suffix}`;
}

/** `PROP-TX-12345`: state, number. */
export function generatePropertyId(source: RandomSource, vocabulary: Vocabulary): string {
  const state = source.choice(vocabulary.states);
  const number = source.integer(10000, 99999);
  return `PROP-${state}-${number}`;
}

/** `JIB-TX-1234-202511`: state, number; the suffix is the transaction's year-month. */
export function generateJibNumber(
  source: RandomSource,
  vocabulary: Vocabulary,
  transactionDate: IsoDate,
): string {
  const state = source.choice(vocabulary.states);
  const number = source.integer(1000, 9999);
  return `JIB-${state}-${number}-${compactYearMonth(transactionDate)}`;
}

/** `CC-NORTH-3`: region, number. */
export function generateCostCenter(source: RandomSource, vocabulary: Vocabulary): string {
  const region = source.choice(vocabulary.costCenterRegions);
  const number = source.integer(1, 9);
  return `CC-${region}-${number}`;
}

export function generateState(source: RandomSource, vocabulary: Vocabulary): string {
  return source.choice(vocabulary.states);
}

export function generateCounty(source: RandomSource, vocabulary: Vocabulary): string {
  return source.choice(vocabulary.counties);
}

export function generateBasin(source: RandomSource, vocabulary: Vocabulary): string {
  return source.choice(vocabulary.basins);
}
