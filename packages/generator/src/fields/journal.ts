/**
 * Journal metadata: where a transaction originated and what it is.
 */

import type { RandomSource } from "../random.js";
import type { Vocabulary } from "../data.js";

export function generateJournalSource(source: RandomSource, vocabulary: Vocabulary): string {
  return source.choice(vocabulary.journalSources);
}

export function generateTransactionType(source: RandomSource, vocabulary: Vocabulary): string {
  return source.choice(vocabulary.transactionTypes);
}

export function describeTransaction(
  transactionType: string,
  accountName: string,
  wellId: string,
): string {
  return `${transactionType} - ${accountName} for ${wellId}`;
}
