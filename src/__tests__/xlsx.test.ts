import * as XLSX from "xlsx";
import { describe, expect, it } from "vitest";
import { SourceReadError } from "../errors.js";
import { readWorkbookSheet } from "../xlsx.js";

function workbookBytes(build: (wb: XLSX.WorkBook) => void): ArrayBuffer {
  const wb = XLSX.utils.book_new();
  build(wb);
  return XLSX.write(wb, { type: "array", bookType: "xlsx" });
}

describe("readWorkbookSheet", () => {
  it("expands merged header cells across their range", () => {
    const bytes = workbookBytes((wb) => {
      const ws = XLSX.utils.aoa_to_sheet([
        ["Year", "Exports", null],
        [null, "Value", "Growth"],
        [2024, 120, 20],
      ]);
      ws["!merges"] = [
        { s: { r: 0, c: 1 }, e: { r: 0, c: 2 } },
        { s: { r: 0, c: 0 }, e: { r: 1, c: 0 } },
      ];
      XLSX.utils.book_append_sheet(wb, ws, "Trade");
    });
    const sheet = readWorkbookSheet(bytes, { sourceId: "trade.xlsx" });
    expect(sheet.sheetName).toBe("Trade");
    expect(sheet.cells[0]).toEqual(["Year", "Exports", "Exports"]);
    expect(sheet.cells[1]).toEqual(["Year", "Value", "Growth"]);
    expect(sheet.cells[2]).toEqual([2024, 120, 20]);
  });

  it("keeps worksheet coordinates when the used range starts below A1", () => {
    const bytes = workbookBytes((wb) => {
      const opts: XLSX.SheetAOAOpts = { origin: "B3" };
      const ws = XLSX.utils.aoa_to_sheet([["Year", "Exports"]], opts);
      XLSX.utils.book_append_sheet(wb, ws, "Offset");
    });
    const sheet = readWorkbookSheet(bytes, { sourceId: "offset.xlsx" });
    expect(sheet.cells).toHaveLength(3);
    expect(sheet.cells[0]).toEqual([]);
    expect(sheet.cells[2]).toEqual([null, "Year", "Exports"]);
  });

  it("keeps the display text of percent-formatted numbers", () => {
    const bytes = workbookBytes((wb) => {
      const ws = XLSX.utils.aoa_to_sheet([
        ["Region", "Share"],
        ["Asia", 0],
      ]);
      const cell: XLSX.CellObject = { t: "n", v: 0.125, z: "0.00%" };
      ws["B2"] = cell;
      XLSX.utils.book_append_sheet(wb, ws, "Shares");
    });
    const sheet = readWorkbookSheet(bytes, { sourceId: "shares.xlsx" });
    expect(sheet.cells[1]).toEqual(["Asia", "12.50%"]);
  });

  it("selects sheets by name or index and rejects unknown ones", () => {
    const bytes = workbookBytes((wb) => {
      XLSX.utils.book_append_sheet(wb, XLSX.utils.aoa_to_sheet([["first"]]), "One");
      XLSX.utils.book_append_sheet(wb, XLSX.utils.aoa_to_sheet([["second"]]), "Two");
    });
    expect(readWorkbookSheet(bytes, { sourceId: "b.xlsx", sheet: "Two" }).cells).toEqual([["second"]]);
    expect(readWorkbookSheet(bytes, { sourceId: "b.xlsx", sheet: 0 }).cells).toEqual([["first"]]);
    expect(() => readWorkbookSheet(bytes, { sourceId: "b.xlsx", sheet: "Three" })).toThrow(SourceReadError);
  });
});
