import { describe, it, expect } from "vitest";
import {
  addDays,
  compactYearMonth,
  fiscalPeriodOf,
  formatIsoDate,
  midnightOf,
  parseIsoDate,
  requireIsoDate,
} from "../src/calendar.js";

describe("parseIsoDate", () => {
  it("parses a valid date to UTC midnight", () => {
    expect(parseIsoDate("2025-11-10")).toBe(Date.UTC(2025, 10, 10));
  });

  it("rejects dates that do not exist", () => {
    expect(parseIsoDate("2025-02-30")).toBeUndefined();
    expect(parseIsoDate("2025-13-01")).toBeUndefined();
  });

  it("accepts Feb 29 only in leap years", () => {
    expect(parseIsoDate("2024-02-29")).toBeDefined();
    expect(parseIsoDate("2025-02-29")).toBeUndefined();
  });

  it("rejects other shapes", () => {
    expect(parseIsoDate("2025-1-10")).toBeUndefined();
    expect(parseIsoDate("not-a-date")).toBeUndefined();
    expect(parseIsoDate("2025-11-10T00:00:00Z")).toBeUndefined();
  });
});

describe("requireIsoDate", () => {
  it("throws INVALID_DATE with the offending value", () => {
    expect(() => requireIsoDate("2025-02-30")).toThrow('Invalid date "2025-02-30"');
  });
});

describe("addDays", () => {
  it("walks across month and year boundaries", () => {
    expect(addDays("2025-01-31", 1)).toBe("2025-02-01");
    expect(addDays("2025-01-01", -1)).toBe("2024-12-31");
  });

  it("goes back a full lookback window", () => {
    expect(addDays("2025-11-10", -365)).toBe("2024-11-10");
    expect(addDays("2025-11-10", -5)).toBe("2025-11-05");
  });
});

describe("formatting", () => {
  it("formats epoch milliseconds as YYYY-MM-DD", () => {
    expect(formatIsoDate(Date.UTC(2025, 10, 10, 23, 59, 59))).toBe("2025-11-10");
  });

  it("renders midnight timestamps in UTC", () => {
    expect(midnightOf("2025-11-05")).toBe("2025-11-05T00:00:00.000Z");
  });

  it("derives fiscal period and compact year-month", () => {
    expect(fiscalPeriodOf("2025-03-14")).toBe("2025-03");
    expect(compactYearMonth("2025-03-14")).toBe("202503");
  });
});
