import { describe, expect, it } from "vitest";
import { balance, deriveMetrics, growthRate, rollupByQuarter, shareOfTotal } from "../derive.js";
import type { DerivedSpec } from "../schema.js";
import type { CanonicalRecord, FieldValue, Period } from "../types.js";

const year = (y: number): Period => ({ year: y, frequency: "year", index: 0 });
const month = (y: number, m: number): Period => ({ year: y, frequency: "month", index: m });
const rec = (sourceRow: number, values: Record<string, FieldValue>): CanonicalRecord => ({ sourceRow, values });
const column = (records: CanonicalRecord[], field: string) => records.map((r) => r.values[field]);

describe("formula primitives", () => {
  it("never divides by zero or a missing value", () => {
    expect(growthRate(5, 0)).toBeNull();
    expect(growthRate(5, null)).toBeNull();
    expect(growthRate(null, 5)).toBeNull();
    expect(shareOfTotal(5, 0)).toBeNull();
    expect(shareOfTotal(null, 10)).toBeNull();
    expect(shareOfTotal(5, 10)).toBe(0.5);
    expect(balance(100, null)).toBeNull();
    expect(balance(100, 80)).toBe(20);
  });
});

describe("deriveMetrics", () => {
  const trade = {
    periodField: "period",
    derived: [
      { id: "trade_balance", formula: "balance", a: "export_value", b: "import_value" },
      { id: "export_growth", formula: "growth_rate", of: "export_value", lag: "previous" },
    ] satisfies DerivedSpec[],
  };

  it("computes balance and growth in period order", () => {
    const out = deriveMetrics(
      [
        rec(3, { period: year(2024), export_value: 120, import_value: 80 }),
        rec(2, { period: year(2023), export_value: 100, import_value: 80 }),
      ],
      trade,
    );
    expect(out.map((r) => r.sourceRow)).toEqual([2, 3]);
    expect(column(out, "trade_balance")).toEqual([20, 40]);
    expect(out[0].values.export_growth).toBeNull();
    expect(out[1].values.export_growth).toBeCloseTo(0.2, 10);
    expect(Object.keys(out[1].values)).toEqual(["period", "export_value", "import_value", "trade_balance", "export_growth"]);
    expect(Object.isFrozen(out[1].values)).toBe(true);
  });

  it("leaves growth missing across a gap, a zero base or a missing input", () => {
    const out = deriveMetrics(
      [
        rec(2, { period: year(2020), export_value: 0, import_value: 1 }),
        rec(3, { period: year(2021), export_value: 50, import_value: 1 }),
        rec(4, { period: year(2023), export_value: 60, import_value: null }),
        rec(5, { period: year(2024), export_value: 70, import_value: 1 }),
      ],
      trade,
    );
    expect(column(out, "export_growth")[0]).toBeNull();
    expect(column(out, "export_growth")[1]).toBeNull();
    expect(column(out, "export_growth")[2]).toBeNull();
    expect(column(out, "export_growth")[3]).toBeCloseTo(70 / 60 - 1, 10);
    expect(column(out, "trade_balance")[2]).toBeNull();
  });

  it("compares with the same month one year earlier", () => {
    const out = deriveMetrics(
      [
        rec(2, { period: month(2023, 8), v: 100 }),
        rec(3, { period: month(2024, 7), v: 90 }),
        rec(4, { period: month(2024, 8), v: 110 }),
      ],
      { periodField: "period", derived: [{ id: "yoy", formula: "growth_rate", of: "v", lag: "year_over_year" }] },
    );
    expect(column(out, "yoy")[0]).toBeNull();
    expect(column(out, "yoy")[1]).toBeNull();
    expect(column(out, "yoy")[2]).toBeCloseTo(0.1, 10);
  });

  it("accumulates with a yearly reset and absorbs missing values", () => {
    const out = deriveMetrics(
      [
        rec(2, { period: month(2023, 11), v: 10 }),
        rec(3, { period: month(2023, 12), v: 20 }),
        rec(4, { period: month(2024, 1), v: 5 }),
        rec(5, { period: month(2024, 2), v: null }),
        rec(6, { period: month(2024, 3), v: 7 }),
      ],
      { periodField: "period", derived: [{ id: "ytd", formula: "cumulative", of: "v", resetEvery: "year" }] },
    );
    expect(column(out, "ytd")).toEqual([10, 30, 5, null, null]);
  });

  it("scales units and chains derived fields", () => {
    const out = deriveMetrics([rec(2, { period: year(2024), v: 1500, total: 3000 })], {
      periodField: "period",
      derived: [
        { id: "v_billion", formula: "scale", of: "v", factor: 0.001 },
        { id: "share", formula: "share_of_total", value: "v", total: "total" },
        { id: "share_pct", formula: "scale", of: "share", factor: 100 },
      ],
    });
    expect(out[0].values).toEqual({ period: year(2024), v: 1500, total: 3000, v_billion: 1.5, share: 0.5, share_pct: 50 });
  });
});

describe("rollupByQuarter", () => {
  it("sums complete quarters and leaves partial or gapped ones missing", () => {
    const out = rollupByQuarter(
      [
        rec(2, { period: month(2024, 1), v: 1 }),
        rec(3, { period: month(2024, 2), v: 2 }),
        rec(4, { period: month(2024, 3), v: 3 }),
        rec(5, { period: month(2024, 4), v: 4 }),
        rec(6, { period: month(2024, 5), v: 5 }),
        rec(7, { period: month(2024, 7), v: 7 }),
        rec(8, { period: month(2024, 8), v: null }),
        rec(9, { period: month(2024, 9), v: 9 }),
        rec(10, { period: year(2024), v: 100 }),
      ],
      "period",
      ["v"],
    );
    expect(out).toEqual([
      { sourceRow: 2, values: { period: { year: 2024, frequency: "quarter", index: 1 }, v: 6 } },
      { sourceRow: 5, values: { period: { year: 2024, frequency: "quarter", index: 2 }, v: null } },
      { sourceRow: 7, values: { period: { year: 2024, frequency: "quarter", index: 3 }, v: null } },
    ]);
  });
});
