/**
 * Shared wire-record fixture.
 */

import type { GLRecordWire } from "../src/record.js";

export function wireRecord(overrides: Partial<Record<keyof GLRecordWire, unknown>> = {}): Record<string, unknown> {
  return {
    gl_entry_id: 1,
    journal_batch: "BATCH-000001",
    journal_entry: "JE-00000001",
    transaction_date: "2025-11-05",
    posting_date: "2025-11-05",
    account_code: "6100",
    account_name: "Drilling Costs",
    account_type: "EXPENSE",
    debit_amount: 12500.5,
    credit_amount: 0,
    net_amount: -12500.5,
    well_id: "PERM-1234",
    lease_name: "Smith Ranch",
    property_id: "PROP-TX-12345",
    afe_number: "AFE-2023-4321",
    jib_number: null,
    cost_center: "CC-NORTH-3",
    journal_source: "AP",
    transaction_type: "INV",
    description: "INV - Drilling Costs for PERM-1234",
    fiscal_period: "2025-11",
    fiscal_year: 2025,
    fiscal_month: 11,
    state: "TX",
    county: "Midland",
    basin: "Permian",
    created_timestamp: "2025-11-05T00:00:00.000Z",
    created_by: "USER-101",
    last_modified: "2025-11-05T00:00:00.000Z",
    ...overrides,
  };
}
