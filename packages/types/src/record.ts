/**
 * GL Record Types
 *
 * The unit of output of the generator: one fully-populated General Ledger
 * entry with oil & gas attributes.
 *
 * Rules:
 * - Records are immutable once synthesized
 * - Exactly one of debitAmount / creditAmount is nonzero
 * - netAmount = round(creditAmount - debitAmount, 2)
 * - afeNumber is non-null iff the account is a capex account
 */

import type { AccountType } from "./account.js";

/** Calendar date, `YYYY-MM-DD`. Lexicographic order equals date order. */
export type IsoDate = string;

/** ISO 8601 timestamp (e.g., "2025-11-10T00:00:01.000Z"). */
export type IsoTimestamp = string;

export interface GLRecord {
  /** 1-based, unique, strictly increasing in generation order */
  readonly glEntryId: number;

  /** `BATCH-000001`; advances once every 50 entries */
  readonly journalBatch: string;

  /** `JE-00000001` */
  readonly journalEntry: string;

  readonly transactionDate: IsoDate;
  readonly postingDate: IsoDate;

  readonly accountCode: string;
  readonly accountName: string;
  readonly accountType: AccountType;

  readonly debitAmount: number;
  readonly creditAmount: number;
  readonly netAmount: number;

  // Oil & gas attributes
  readonly wellId: string;
  readonly leaseName: string;
  readonly propertyId: string;
  readonly afeNumber: string | null;
  readonly jibNumber: string | null;
  readonly costCenter: string;
  readonly state: string;
  readonly county: string;
  readonly basin: string;

  // Journal metadata
  readonly journalSource: string;
  readonly transactionType: string;
  readonly description: string;

  // Fiscal calendar (derived from transactionDate)
  readonly fiscalPeriod: string;
  readonly fiscalYear: number;
  readonly fiscalMonth: number;

  readonly createdTimestamp: IsoTimestamp;
  readonly createdBy: string;
  readonly lastModified: IsoTimestamp;
}

/**
 * JSON wire shape of a GL record.
 *
 * Field names and order are part of the public stream format.
 */
export interface GLRecordWire {
  readonly gl_entry_id: number;
  readonly journal_batch: string;
  readonly journal_entry: string;
  readonly transaction_date: IsoDate;
  readonly posting_date: IsoDate;
  readonly account_code: string;
  readonly account_name: string;
  readonly account_type: AccountType;
  readonly debit_amount: number;
  readonly credit_amount: number;
  readonly net_amount: number;
  readonly well_id: string;
  readonly lease_name: string;
  readonly property_id: string;
  readonly afe_number: string | null;
  readonly jib_number: string | null;
  readonly cost_center: string;
  readonly journal_source: string;
  readonly transaction_type: string;
  readonly description: string;
  readonly fiscal_period: string;
  readonly fiscal_year: number;
  readonly fiscal_month: number;
  readonly state: string;
  readonly county: string;
  readonly basin: string;
  readonly created_timestamp: IsoTimestamp;
  readonly created_by: string;
  readonly last_modified: IsoTimestamp;
}
