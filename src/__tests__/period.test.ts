import { describe, expect, it } from "vitest";
import {
  comparePeriods,
  formatPeriod,
  isPeriod,
  nextPeriod,
  parsePeriod,
  previousPeriod,
  samePeriodPreviousYear,
} from "../period.js";

describe("parsePeriod", () => {
  it("parses gregorian years, months and quarters", () => {
    expect(parsePeriod("2024")).toEqual({ year: 2024, frequency: "year", index: 0 });
    expect(parsePeriod(2024)).toEqual({ year: 2024, frequency: "year", index: 0 });
    expect(parsePeriod("2024年")).toEqual({ year: 2024, frequency: "year", index: 0 });
    expect(parsePeriod("2024-08")).toEqual({ year: 2024, frequency: "month", index: 8 });
    expect(parsePeriod("2024/8")).toEqual({ year: 2024, frequency: "month", index: 8 });
    expect(parsePeriod("2024M08")).toEqual({ year: 2024, frequency: "month", index: 8 });
    expect(parsePeriod("2024年8月")).toEqual({ year: 2024, frequency: "month", index: 8 });
    expect(parsePeriod("2024-Q1")).toEqual({ year: 2024, frequency: "quarter", index: 1 });
    expect(parsePeriod("Q3 2024")).toEqual({ year: 2024, frequency: "quarter", index: 3 });
    expect(parsePeriod("2024年第2季")).toEqual({ year: 2024, frequency: "quarter", index: 2 });
  });

  it("folds full-width digits", () => {
    expect(parsePeriod("２０２４")).toEqual({ year: 2024, frequency: "year", index: 0 });
  });

  it("offsets ROC years by 1911", () => {
    expect(parsePeriod("104年", "roc")).toEqual({ year: 2015, frequency: "year", index: 0 });
    expect(parsePeriod("114年8月", "roc")).toEqual({ year: 2025, frequency: "month", index: 8 });
    expect(parsePeriod(113, "roc")).toEqual({ year: 2024, frequency: "year", index: 0 });
  });

  it("rejects anything outside the accepted shapes", () => {
    expect(parsePeriod("2024-13")).toBeNull();
    expect(parsePeriod("8月")).toBeNull();
    expect(parsePeriod("total")).toBeNull();
    expect(parsePeriod(2024.5)).toBeNull();
    expect(parsePeriod("2024", "roc")).toBeNull();
    expect(parsePeriod(null)).toBeNull();
    expect(parsePeriod(true)).toBeNull();
  });
});

describe("period arithmetic", () => {
  it("formats canonical text", () => {
    expect(formatPeriod({ year: 2024, frequency: "year", index: 0 })).toBe("2024");
    expect(formatPeriod({ year: 2024, frequency: "quarter", index: 1 })).toBe("2024-Q1");
    expect(formatPeriod({ year: 2024, frequency: "month", index: 8 })).toBe("2024-08");
  });

  it("orders by start month, coarser first on ties", () => {
    const year = { year: 2024, frequency: "year" as const, index: 0 };
    const q1 = { year: 2024, frequency: "quarter" as const, index: 1 };
    const dec = { year: 2023, frequency: "month" as const, index: 12 };
    expect([q1, year, dec].sort(comparePeriods)).toEqual([dec, year, q1]);
  });

  it("steps across year boundaries", () => {
    expect(nextPeriod({ year: 2024, frequency: "month", index: 12 })).toEqual({ year: 2025, frequency: "month", index: 1 });
    expect(previousPeriod({ year: 2024, frequency: "quarter", index: 1 })).toEqual({ year: 2023, frequency: "quarter", index: 4 });
    expect(previousPeriod({ year: 2024, frequency: "year", index: 0 })).toEqual({ year: 2023, frequency: "year", index: 0 });
    expect(samePeriodPreviousYear({ year: 2024, frequency: "month", index: 8 })).toEqual({ year: 2023, frequency: "month", index: 8 });
  });

  it("recognizes period values", () => {
    expect(isPeriod({ year: 2024, frequency: "month", index: 8 })).toBe(true);
    expect(isPeriod({ year: 2024, frequency: "week", index: 8 })).toBe(false);
    expect(isPeriod("2024")).toBe(false);
  });
});
