/**
 * Explicit mapping between GLRecord and its JSON wire shape.
 */

import type { GLRecord, GLRecordWire } from "./record.js";

export function toWire(record: GLRecord): GLRecordWire {
  return {
    gl_entry_id: record.glEntryId,
    journal_batch: record.journalBatch,
    journal_entry: record.journalEntry,
    transaction_date: record.transactionDate,
    posting_date: record.postingDate,
    account_code: record.accountCode,
    account_name: record.accountName,
    account_type: record.accountType,
    debit_amount: record.debitAmount,
    credit_amount: record.creditAmount,
    net_amount: record.netAmount,
    well_id: record.wellId,
    lease_name: record.leaseName,
    property_id: record.propertyId,
    afe_number: record.afeNumber,
    jib_number: record.jibNumber,
    cost_center: record.costCenter,
    journal_source: record.journalSource,
    transaction_type: record.transactionType,
    description: record.description,
    fiscal_period: record.fiscalPeriod,
    fiscal_year: record.fiscalYear,
    fiscal_month: record.fiscalMonth,
    state: record.state,
    county: record.county,
    basin: record.basin,
    created_timestamp: record.createdTimestamp,
    created_by: record.createdBy,
    last_modified: record.lastModified,
  };
}

export function fromWire(wire: GLRecordWire): GLRecord {
  return {
    glEntryId: wire.gl_entry_id,
    journalBatch: wire.journal_batch,
    journalEntry: wire.journal_entry,
    transactionDate: wire.transaction_date,
    postingDate: wire.posting_date,
    accountCode: wire.account_code,
    accountName: wire.account_name,
    accountType: wire.account_type,
    debitAmount: wire.debit_amount,
    creditAmount: wire.credit_amount,
    netAmount: wire.net_amount,
    wellId: wire.well_id,
    leaseName: wire.lease_name,
    propertyId: wire.property_id,
    afeNumber: wire.afe_number,
    jibNumber: wire.jib_number,
    costCenter: wire.cost_center,
    journalSource: wire.journal_source,
    transactionType: wire.transaction_type,
    description: wire.description,
    fiscalPeriod: wire.fiscal_period,
    fiscalYear: wire.fiscal_year,
    fiscalMonth: wire.fiscal_month,
    state: wire.state,
    county: wire.county,
    basin: wire.basin,
    createdTimestamp: wire.created_timestamp,
    createdBy: wire.created_by,
    lastModified: wire.last_modified,
  };
}
