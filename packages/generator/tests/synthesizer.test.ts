import { describe, it, expect } from "vitest";
import fc from "fast-check";
import { isCapex } from "@glstream/types";
import { AccountCatalog } from "../src/accounts.js";
import { loadVocabulary } from "../src/data.js";
import { SeededRandom } from "../src/random.js";
import {
  RecordSynthesizer,
  batchIdFor,
  formatJournalBatch,
  formatJournalEntry,
  kindForRoll,
  selectAccount,
} from "../src/synthesizer.js";
import { ScriptedRandom } from "./helpers.js";

const catalog = new AccountCatalog();
const synthesizer = new RecordSynthesizer({
  catalog,
  vocabulary: loadVocabulary(),
  defaultTimestamp: "2025-11-10T00:00:00.000Z",
});

// =============================================================================
// Account selection
// =============================================================================

describe("kindForRoll", () => {
  it("maps cumulative thresholds to kinds", () => {
    expect(kindForRoll(0)).toBe("revenue");
    expect(kindForRoll(0.2999)).toBe("revenue");
    expect(kindForRoll(0.3)).toBe("operating_expense");
    expect(kindForRoll(0.6999)).toBe("operating_expense");
    expect(kindForRoll(0.7)).toBe("capex");
    expect(kindForRoll(0.8999)).toBe("capex");
    expect(kindForRoll(0.9)).toBe("admin");
    expect(kindForRoll(0.9999)).toBe("admin");
  });
});

describe("selectAccount", () => {
  it("draws the kind, then the account within it", () => {
    const source = new ScriptedRandom([0.95, 0.5]);
    // admin accounts: 7100, 7200, 7300, 7400 → index 2
    expect(selectAccount(source, catalog).code).toBe("7300");
    expect(source.calls).toEqual(["next", "choice"]);
  });

  it("approximates the 30/40/20/10 mix over many draws", () => {
    const rng = new SeededRandom(42);
    const counts = { revenue: 0, operating_expense: 0, capex: 0, admin: 0 };
    const n = 20000;
    for (let i = 0; i < n; i++) {
      const account = selectAccount(rng, catalog);
      const kind = catalog.kindOf(account.code);
      if (kind !== undefined) counts[kind]++;
    }
    expect(counts.revenue / n).toBeCloseTo(0.3, 1);
    expect(counts.operating_expense / n).toBeCloseTo(0.4, 1);
    expect(counts.capex / n).toBeCloseTo(0.2, 1);
    expect(counts.admin / n).toBeCloseTo(0.1, 1);
  });
});

// =============================================================================
// Batch / entry formatting
// =============================================================================

describe("journal numbering", () => {
  it("advances the batch every 50 entries", () => {
    expect(batchIdFor(1)).toBe(1);
    expect(batchIdFor(50)).toBe(1);
    expect(batchIdFor(51)).toBe(2);
    expect(batchIdFor(100)).toBe(2);
    expect(batchIdFor(101)).toBe(3);
  });

  it("zero-pads batch and entry codes", () => {
    expect(formatJournalBatch(2)).toBe("BATCH-000002");
    expect(formatJournalEntry(51)).toBe("JE-00000051");
  });
});

// =============================================================================
// Draw order
// =============================================================================

describe("RecordSynthesizer draw order", () => {
  it("assembles a capex record with AFE and JIB from scripted draws", () => {
    const source = new ScriptedRandom([
      0.75, 0, //           account: capex, 6100
      0, 0.5, //            well: Permian, 5500
      0.5, 0, //            AFE: 2022, 1000
      0.25, 0.5, //         lease: Williams Lease
      0.125, 0, //          property: ND, 10000
      0.1, 0, 0.9995, //    JIB roll fires; TX, 8995
      0.2, 0.5, //          cost center: SOUTH, 5
      0, //                 journal source: AP
      0, //                 transaction type: INV
      0.5, //               amount: 105000
      0.5, 0.5, 0.5, //     state OK, county Karnes, basin Haynesville
      0, //                 USER-100
    ]);

    const record = synthesizer.synthesize(source, {
      entryId: 51,
      batchId: 2,
      transactionDate: "2025-11-05",
      transactionDateTime: "2025-11-05T00:00:00.000Z",
    });

    expect(source.remaining).toBe(0);
    expect(source.calls).toEqual([
      "next", "choice",
      "choice", "integer",
      "integer", "integer",
      "choice", "choice",
      "choice", "integer",
      "next", "choice", "integer",
      "choice", "integer",
      "choice",
      "choice",
      "uniform",
      "choice", "choice", "choice",
      "integer",
    ]);

    expect(record).toEqual({
      glEntryId: 51,
      journalBatch: "BATCH-000002",
      journalEntry: "JE-00000051",
      transactionDate: "2025-11-05",
      postingDate: "2025-11-05",
      accountCode: "6100",
      accountName: "Drilling Costs",
      accountType: "EXPENSE",
      debitAmount: 105000,
      creditAmount: 0,
      netAmount: -105000,
      wellId: "PERM-5500",
      leaseName: "Williams Lease",
      propertyId: "PROP-ND-10000",
      afeNumber: "AFE-2022-1000",
      jibNumber: "JIB-TX-8995-202511",
      costCenter: "CC-SOUTH-5",
      state: "OK",
      county: "Karnes",
      basin: "Haynesville",
      journalSource: "AP",
      transactionType: "INV",
      description: "INV - Drilling Costs for PERM-5500",
      fiscalPeriod: "2025-11",
      fiscalYear: 2025,
      fiscalMonth: 11,
      createdTimestamp: "2025-11-05T00:00:00.000Z",
      createdBy: "USER-100",
      lastModified: "2025-11-05T00:00:00.000Z",
    });
  });

  it("skips AFE for non-capex and consumes exactly one JIB roll when it misses", () => {
    const source = new ScriptedRandom([
      0, 0, //              account: revenue, 4100
      0, 0, //              well
      0, 0, //              lease
      0, 0, //              property
      0.4, //               JIB roll misses
      0, 0, //              cost center
      0, 0, //              journal source, transaction type
      0, //                 amount: 5000 credit
      0, 0, 0, //           state, county, basin
      0, //                 creator
    ]);

    const record = synthesizer.synthesize(source, { entryId: 1, batchId: 1, transactionDate: "2025-01-15" });

    expect(source.remaining).toBe(0);
    expect(record.afeNumber).toBeNull();
    expect(record.jibNumber).toBeNull();
    expect(record.creditAmount).toBe(5000);
    expect(record.debitAmount).toBe(0);
    expect(record.netAmount).toBe(5000);
    expect(record.accountType).toBe("REVENUE");
  });

  it("falls back to the default timestamp when none is supplied", () => {
    const record = synthesizer.synthesize(new SeededRandom(1), {
      entryId: 1,
      batchId: 1,
      transactionDate: "2025-06-01",
    });
    expect(record.createdTimestamp).toBe("2025-11-10T00:00:00.000Z");
    expect(record.lastModified).toBe(record.createdTimestamp);
  });

  it("draws the transaction date right after the account when none is supplied", () => {
    const source = new ScriptedRandom([
      0, 0, //              account
      0.9, //               date roll: today
      0, 0, 0, 0, 0, 0, //  well, lease, property
      0.9, //               JIB miss
      0, 0, 0, 0, 0, //     cost center, source, type, amount
      0, 0, 0, 0, //        state, county, basin, creator
    ]);
    const record = synthesizer.synthesize(source, {
      entryId: 1,
      batchId: 1,
      now: new Date(Date.UTC(2026, 0, 31, 12)),
    });
    expect(source.calls.slice(0, 3)).toEqual(["next", "choice", "next"]);
    expect(record.transactionDate).toBe("2026-01-31");
    expect(record.fiscalMonth).toBe(1);
    expect(source.remaining).toBe(0);
  });
});

// =============================================================================
// Properties
// =============================================================================

describe("RecordSynthesizer invariants", () => {
  it("holds the record invariants for any seed", () => {
    fc.assert(
      fc.property(fc.integer({ min: 0, max: 2 ** 31 - 1 }), (seed) => {
        const rng = new SeededRandom(seed);
        for (let id = 1; id <= 60; id++) {
          const r = synthesizer.synthesize(rng, {
            entryId: id,
            batchId: batchIdFor(id),
            transactionDate: "2025-04-30",
          });
          const nonzero = (r.debitAmount !== 0 ? 1 : 0) + (r.creditAmount !== 0 ? 1 : 0);
          if (nonzero !== 1) return false;
          if (r.netAmount !== Math.round((r.creditAmount - r.debitAmount) * 100) / 100) return false;
          const account = catalog.get(r.accountCode);
          if (account === undefined) return false;
          if ((r.afeNumber !== null) !== isCapex(account)) return false;
          if ((r.accountType === "REVENUE") !== (r.creditAmount > 0)) return false;
        }
        return true;
      }),
      { numRuns: 30 },
    );
  });
});
