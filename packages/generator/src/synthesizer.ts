/**
 * @glstream/generator — Record synthesizer.
 *
 * Assembles one GLRecord from an account draw and the field generators.
 * The only side effect is consuming draws from the supplied source, in
 * this order:
 *
 *   1. account-type roll, account choice
 *   2. transaction date (only when not supplied)
 *   3. well ID
 *   4. AFE number (capex only)
 *   5. lease name
 *   6. property ID
 *   7. JIB roll (always), JIB number (when the roll is < 0.4)
 *   8. cost center
 *   9. journal source
 *  10. transaction type
 *  11. amount pair
 *  12. state, county, basin
 *  13. creator-user suffix
 *
 * Reordering any step changes every record generated after it.
 */

import type { Account, AccountKind, GLRecord, IsoDate, IsoTimestamp } from "@glstream/types";
import { isCapex } from "@glstream/types";
import type { RandomSource } from "./random.js";
import type { AccountCatalog } from "./accounts.js";
import type { Vocabulary } from "./data.js";
import { fiscalPeriodOf, requireIsoDate } from "./calendar.js";
import {
  describeTransaction,
  generateAfeNumber,
  generateAmounts,
  generateBasin,
  generateCostCenter,
  generateCounty,
  generateJibNumber,
  generateJournalSource,
  generateLeaseName,
  generatePropertyId,
  generateState,
  generateTransactionDate,
  generateTransactionType,
  generateWellId,
  roundCents,
} from "./fields/index.js";

/** Journal batches group this many consecutive entries. */
export const ENTRIES_PER_BATCH = 50;

export const JIB_PROBABILITY = 0.4;

/**
 * Cumulative thresholds for the account-type roll:
 * 30% revenue, 40% operating expense, 20% capex, 10% admin.
 */
export const ACCOUNT_KIND_THRESHOLDS: readonly (readonly [number, AccountKind])[] = [
  [0.3, "revenue"],
  [0.7, "operating_expense"],
  [0.9, "capex"],
  [1.0, "admin"],
];

/** Batch number for a 1-based entry ID. */
export function batchIdFor(entryId: number): number {
  return Math.ceil(entryId / ENTRIES_PER_BATCH);
}

export function formatJournalBatch(batchId: number): string {
  return `BATCH-${String(batchId).padStart(6, "0")}`;
}

export function formatJournalEntry(entryId: number): string {
  return `JE-${String(entryId).padStart(8, "0")}`;
}

export function kindForRoll(roll: number): AccountKind {
  for (const [threshold, kind] of ACCOUNT_KIND_THRESHOLDS) {
    if (roll < threshold) {
      return kind;
    }
  }
  return "admin";
}

/**
 * Weighted account draw: one roll for the kind, one choice within it.
 */
export function selectAccount(source: RandomSource, catalog: AccountCatalog): Account {
  const kind = kindForRoll(source.next());
  return source.choice(catalog.listByType(kind));
}

export interface SynthesizeInput {
  readonly entryId: number;
  readonly batchId: number;
  /** When omitted, drawn relative to `now`. */
  readonly transactionDate?: IsoDate | undefined;
  /** Creation/modification timestamp. Defaults to the synthesizer's epoch timestamp. */
  readonly transactionDateTime?: IsoTimestamp | undefined;
  /** Reference clock for drawn dates. Only read when transactionDate is omitted. */
  readonly now?: Date | undefined;
}

export interface SynthesizerOptions {
  readonly catalog: AccountCatalog;
  readonly vocabulary: Vocabulary;
  /** Timestamp used when an input carries no transactionDateTime. */
  readonly defaultTimestamp: IsoTimestamp;
}

export class RecordSynthesizer {
  private readonly _catalog: AccountCatalog;
  private readonly _vocabulary: Vocabulary;
  private readonly _defaultTimestamp: IsoTimestamp;

  constructor(options: SynthesizerOptions) {
    this._catalog = options.catalog;
    this._vocabulary = options.vocabulary;
    this._defaultTimestamp = options.defaultTimestamp;
  }

  synthesize(source: RandomSource, input: SynthesizeInput): GLRecord {
    const vocabulary = this._vocabulary;

    const account = selectAccount(source, this._catalog);

    const transactionDate =
      input.transactionDate ?? generateTransactionDate(source, input.now ?? new Date());
    requireIsoDate(transactionDate);

    const wellId = generateWellId(source, vocabulary);
    const afeNumber = isCapex(account) ? generateAfeNumber(source) : null;
    const leaseName = generateLeaseName(source, vocabulary);
    const propertyId = generatePropertyId(source, vocabulary);
    const jibNumber =
      source.next() < JIB_PROBABILITY
        ? generateJibNumber(source, vocabulary, transactionDate)
        : null;
    const costCenter = generateCostCenter(source, vocabulary);
    const journalSource = generateJournalSource(source, vocabulary);
    const transactionType = generateTransactionType(source, vocabulary);
    const { debit, credit } = generateAmounts(source, account);
    const state = generateState(source, vocabulary);
    const county = generateCounty(source, vocabulary);
    const basin = generateBasin(source, vocabulary);
    const createdBy = `USER-${source.integer(100, 999)}`;

    const timestamp = input.transactionDateTime ?? this._defaultTimestamp;

    return {
      glEntryId: input.entryId,
      journalBatch: formatJournalBatch(input.batchId),
      journalEntry: formatJournalEntry(input.entryId),
      transactionDate,
      postingDate: transactionDate,
      accountCode: account.code,
      accountName: account.name,
      accountType: account.type,
      debitAmount: debit,
      creditAmount: credit,
      netAmount: roundCents(credit - debit),
      wellId,
      leaseName,
      propertyId,
      afeNumber,
      jibNumber,
      costCenter,
      state,
      county,
      basin,
      journalSource,
      transactionType,
      description: describeTransaction(transactionType, account.name, wellId),
      fiscalPeriod: fiscalPeriodOf(transactionDate),
      fiscalYear: Number(transactionDate.slice(0, 4)),
      fiscalMonth: Number(transactionDate.slice(5, 7)),
      createdTimestamp: timestamp,
      createdBy,
      lastModified: timestamp,
    };
  }
}
