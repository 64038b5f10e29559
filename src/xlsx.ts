import * as XLSX from "xlsx";
import { SourceReadError } from "./errors.js";
import type { CellValue, RawSheet } from "./types.js";

export interface WorkbookSheetOptions {
  sourceId: string;
  sheet?: string | number; // name or 0-based index, default first sheet
}

const isCellObject = (v: unknown): v is XLSX.CellObject => typeof v === "object" && v !== null && "t" in v;

/**
 * Narrow an xlsx cell to a raw value. Percent-formatted numbers keep their display
 * text (`"12.50%"`) so the cleaner sees the percent sign; dates keep their display text.
 */
function toCellValue(cell: XLSX.CellObject): CellValue {
  switch (cell.t) {
    case "n":
      if (typeof cell.z === "string" && cell.z.includes("%") && cell.w) return cell.w;
      return typeof cell.v === "number" ? cell.v : Number(cell.v);
    case "s":
      return cell.v === undefined ? null : String(cell.v);
    case "b":
      return cell.v === true;
    case "d":
      if (cell.w) return cell.w;
      return cell.v instanceof Date ? cell.v.toISOString().slice(0, 10) : null;
    default:
      return null;
  }
}

function chooseSheet(sheetNames: string[], wanted: string | number | undefined, sourceId: string): string {
  if (wanted === undefined) {
    if (!sheetNames.length) throw new SourceReadError(`${sourceId}: workbook has no sheets`);
    return sheetNames[0];
  }
  const name = typeof wanted === "number" ? sheetNames[wanted] : sheetNames.find((n) => n === wanted);
  if (name === undefined) {
    throw new SourceReadError(`${sourceId}: sheet ${JSON.stringify(wanted)} not found (have ${sheetNames.join(", ")})`);
  }
  return name;
}

/**
 * Read one sheet of an Excel workbook into a raw cell grid.
 * - Grid row/column indices match worksheet coordinates (A1 is [0][0]) even when the
 *   used range starts further down.
 * - Every cell of a merged range carries the merge's top-left value, so composite
 *   headers concatenate per column.
 */
export function readWorkbookSheet(fileBytes: ArrayBuffer | Uint8Array, options: WorkbookSheetOptions): RawSheet {
  const data = fileBytes instanceof Uint8Array ? fileBytes : new Uint8Array(fileBytes);
  let workbook: XLSX.WorkBook;
  try {
    workbook = XLSX.read(data, { type: "array", cellDates: true, cellNF: true });
  } catch (err) {
    throw new SourceReadError(`${options.sourceId}: not a readable workbook (${err instanceof Error ? err.message : String(err)})`);
  }

  const sheetName = chooseSheet(workbook.SheetNames, options.sheet, options.sourceId);
  const sheet = workbook.Sheets[sheetName];
  const ref = sheet?.["!ref"];
  if (!sheet || !ref) return Object.freeze({ sourceId: options.sourceId, sheetName, cells: Object.freeze([]) });

  const range = XLSX.utils.decode_range(ref);
  const cells: CellValue[][] = [];
  for (let r = 0; r <= range.e.r; r++) {
    const row: CellValue[] = [];
    if (r >= range.s.r) {
      for (let c = 0; c <= range.e.c; c++) {
        const cell: unknown = sheet[XLSX.utils.encode_cell({ r, c })];
        row.push(c >= range.s.c && isCellObject(cell) ? toCellValue(cell) : null);
      }
    }
    cells.push(row);
  }

  for (const merge of sheet["!merges"] ?? []) {
    const value = cells[merge.s.r]?.[merge.s.c] ?? null;
    for (let r = merge.s.r; r <= merge.e.r && r < cells.length; r++) {
      for (let c = merge.s.c; c <= merge.e.c; c++) cells[r][c] = value;
    }
  }

  return Object.freeze({
    sourceId: options.sourceId,
    sheetName,
    cells: Object.freeze(cells.map((r) => Object.freeze(r))),
  });
}
