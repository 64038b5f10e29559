import { describe, expect, it } from "vitest";
import { runTable } from "../runTable.js";
import { sheetOf, tableFrom, TRADE_SHEET, TRADE_TABLE } from "./helpers.js";

const percentage = (id: string, label: string) => ({ id, type: "percentage" as const, labels: [label] });
const numeric = (id: string, label: string) => ({ id, type: "numeric" as const, labels: [label] });

const REGIONS = tableFrom({
  fields: [
    { id: "period", type: "period", required: true, labels: ["Year"] },
    { ...numeric("total", "Total"), required: true },
    numeric("a", "A"),
    percentage("a_share", "A share"),
    numeric("b", "B"),
    percentage("b_share", "B share"),
    numeric("c", "C"),
    percentage("c_share", "C share"),
  ],
  rules: [{ kind: "share_sum", shares: ["a_share", "b_share", "c_share"], values: ["a", "b", "c"], total: "total" }],
});

const REGION_HEADER = ["Year", "Total", "A", "A share", "B", "B share", "C", "C share"];

describe("runTable", () => {
  it("derives balance and growth for a two-year trade table", async () => {
    const report = await runTable(sheetOf(TRADE_SHEET), tableFrom(TRADE_TABLE), { tableId: "trade" });
    expect(report.status).toBe("passed");
    expect(report.findings).toEqual([]);
    expect(report.records?.map((r) => r.values.trade_balance)).toEqual([20, 40]);
    expect(report.records?.[0].values.export_growth).toBeNull();
    expect(report.records?.[1].values.export_growth).toBeCloseTo(0.2, 10);
    expect(report.fields.map((f) => [f.id, f.type, f.derived])).toEqual([
      ["period", "period", false],
      ["export_value", "numeric", false],
      ["import_value", "numeric", false],
      ["trade_balance", "numeric", true],
      ["export_growth", "percentage", true],
    ]);
    expect(report.meta).toMatchObject({ headerRows: [1, 1], dataRows: [2, 3], totalRows: 2, parsedRows: 2, sheetName: "Sheet1" });
  });

  it("treats a '-' share as missing and validates the rest against the corrected total", async () => {
    const report = await runTable(sheetOf([REGION_HEADER, [2024, 200, 100, "50%", 60, "30%", 40, "-"]]), REGIONS, { tableId: "regions" });
    expect(report.status).toBe("passed");
    expect(report.records?.[0].values.c_share).toBeNull();
    expect(report.records?.[0].values.a_share).toBe(0.5);
  });

  it("warns when a complete breakdown sums to 0.85", async () => {
    const report = await runTable(sheetOf([REGION_HEADER, [2024, 200, 100, "50%", 60, "30%", 10, "5%"]]), REGIONS, { tableId: "regions" });
    expect(report.status).toBe("passed-with-warnings");
    expect(report.findings.map((f) => [f.rule, f.severity])).toEqual([["share_sum", "warning"]]);
    expect(report.records).toHaveLength(1);
  });

  it("fails an unrecognizable layout and withholds records", async () => {
    const report = await runTable(
      sheetOf([
        [1, 2, 3],
        [4, 5, 6],
      ]),
      tableFrom(TRADE_TABLE),
      { tableId: "trade" },
    );
    expect(report.status).toBe("failed");
    expect(report.records).toBeNull();
    expect(report.findings.map((f) => [f.rule, f.step, f.severity])).toEqual([["layout_not_recognized", "locate", "error"]]);
  });

  it("fails on a missing required column with the field named", async () => {
    const report = await runTable(
      sheetOf([
        ["Year", "Exports"],
        [2024, 120],
      ]),
      tableFrom(TRADE_TABLE),
      { tableId: "trade" },
    );
    expect(report.status).toBe("failed");
    expect(report.findings[0]).toMatchObject({ rule: "schema_mismatch", step: "map", fields: ["import_value"] });
  });

  it("stops at the next step boundary when asked", async () => {
    const report = await runTable(sheetOf(TRADE_SHEET), tableFrom(TRADE_TABLE), { tableId: "trade", shouldStop: () => true });
    expect(report.status).toBe("cancelled");
    expect(report.records).toBeNull();
  });

  it("reports cancelled at the boundary where the stop is first seen", async () => {
    const polled: number[] = [];
    const report = await runTable(sheetOf(TRADE_SHEET), tableFrom(TRADE_TABLE), {
      tableId: "trade",
      shouldStop: () => polled.push(polled.length) > 2,
    });
    expect(report.status).toBe("cancelled");
    expect(polled).toHaveLength(3);
    expect(report.meta.columnMap).toBeDefined();
    expect(report.meta.parsedRows).toBe(0);
  });

  it("records excluded rows and sheet metadata", async () => {
    const report = await runTable(
      sheetOf([
        ["Trade summary", null, null],
        ["Unit: USD million", null, null],
        ["Year", "Exports", "Imports"],
        [2023, 100, 80],
        ["Note: 2024 is preliminary", null, null],
        [2024, 120, 80],
      ]),
      tableFrom(TRADE_TABLE),
      { tableId: "trade" },
    );
    expect(report.status).toBe("passed");
    expect(report.meta.title).toBe("Trade summary");
    expect(report.meta.unit).toBe("Unit: USD million");
    expect(report.meta.excludedRows).toEqual([{ row: 5, reason: "footnote", label: "Note: 2024 is preliminary" }]);
  });

  it("is deterministic for identical input", async () => {
    const a = await runTable(sheetOf(TRADE_SHEET), tableFrom(TRADE_TABLE), { tableId: "trade" });
    const b = await runTable(sheetOf(TRADE_SHEET), tableFrom(TRADE_TABLE), { tableId: "trade" });
    expect(JSON.stringify(a.records)).toBe(JSON.stringify(b.records));
    expect(JSON.stringify(a.findings)).toBe(JSON.stringify(b.findings));
  });
});
