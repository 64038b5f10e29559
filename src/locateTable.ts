import { LayoutNotRecognizedError } from "./errors.js";
import type { LayoutSpec, TableDefinition } from "./schema.js";
import { cellText, foldText } from "./semantics.js";
import type { CellValue, ExclusionReason, RawSheet, SheetMetadata, TableRegion, TaggedRow } from "./types.js";

/**
 * Module: Table Locator
 * Purpose: Find the header block and data block inside a loosely structured sheet,
 * tagging sub-header, comparison and footnote rows instead of deleting them.
 * Design:
 * - Header start: first row within `scanWindow` holding at least `minHeaderCells`
 *   non-numeric cells. Following text-only rows of equal or lower textual density
 *   (up to `maxHeaderRows`) join the block to form composite labels.
 * - Data start: first later row with a numeric cell under a column whose label
 *   expects numbers.
 * - Data end: first blank row, or a footnote/comparison row not immediately followed
 *   by another data row. A footnote that is followed by data is excluded in place.
 * - Pure: reads the sheet and options only.
 */
export interface LocatorOptions extends Omit<LayoutSpec, "minHeaderCells" | "comparisonPatterns"> {
  minHeaderCells: number;
  comparisonPatterns: RegExp[];
  expectsNumeric?: (label: string) => boolean;
}

const NUMERIC_TEXT_RE = /^[(+\-−]?\s*(?:US\$|NT\$|[$€£¥])?\s*\d[\d,.\s]*%?\s*\)?$/i;
// Cells made only of dashes/dots/"x" are missing-value placeholders, not text.
const PLACEHOLDER_RE = /^[-–—－…．.xX]+$/;

const isNumericCell = (v: CellValue | undefined): boolean => {
  if (typeof v === "number") return Number.isFinite(v);
  const s = cellText(v);
  return s !== "" && NUMERIC_TEXT_RE.test(s.normalize("NFKC"));
};

const isPlaceholderCell = (v: CellValue | undefined): boolean => PLACEHOLDER_RE.test(cellText(v));

const isTextCell = (v: CellValue | undefined): boolean => {
  const s = cellText(v);
  return s !== "" && !isNumericCell(v) && !isPlaceholderCell(v);
};

const rowOf = (sheet: RawSheet, r: number): ReadonlyArray<CellValue> => sheet.cells[r] ?? [];
const isBlankRow = (row: ReadonlyArray<CellValue>): boolean => row.every((v) => cellText(v) === "");
const textualCount = (row: ReadonlyArray<CellValue>): number => row.filter(isTextCell).length;
const leadText = (row: ReadonlyArray<CellValue>): string => cellText(row.find((v) => cellText(v) !== ""));

const startsWithAny = (row: ReadonlyArray<CellValue>, prefixes: string[]): boolean => {
  const lead = foldText(leadText(row));
  return lead !== "" && prefixes.some((p) => lead.startsWith(foldText(p)));
};

/**
 * Default `minHeaderCells` derived from the table's expected column count: half the
 * declared fields (composite headers often leave merged cells empty), at least two.
 */
export function defaultMinHeaderCells(table: Pick<TableDefinition, "fields">): number {
  const n = table.fields.length;
  return Math.min(n, Math.max(2, Math.ceil(n / 2)));
}

export function locatorOptionsFor(
  table: Pick<TableDefinition, "fields" | "layout">,
  expectsNumeric?: (label: string) => boolean,
): LocatorOptions {
  const { minHeaderCells, comparisonPatterns, ...layout } = table.layout;
  return {
    ...layout,
    minHeaderCells: minHeaderCells ?? defaultMinHeaderCells(table),
    comparisonPatterns: comparisonPatterns.map((p) => new RegExp(p, "u")),
    expectsNumeric,
  };
}

function compositeLabels(sheet: RawSheet, start: number, end: number, columnCount: number): string[] {
  const labels: string[] = [];
  for (let c = 0; c < columnCount; c++) {
    const parts: string[] = [];
    for (let r = start; r <= end; r++) {
      const t = cellText(rowOf(sheet, r)[c]);
      // vertically merged cells repeat the same text on each header row
      if (t && parts[parts.length - 1] !== t) parts.push(t);
    }
    labels.push(parts.join(" "));
  }
  return labels;
}

function exclusionReason(row: ReadonlyArray<CellValue>, opts: LocatorOptions): ExclusionReason | undefined {
  if (startsWithAny(row, opts.comparisonPrefixes)) return "comparison";
  if (opts.comparisonPatterns.length) {
    const lead = foldText(leadText(row));
    if (lead && opts.comparisonPatterns.some((re) => re.test(lead))) return "comparison";
  }
  if (startsWithAny(row, opts.footnotePrefixes)) return "footnote";
  if (startsWithAny(row, opts.subHeaderPrefixes)) return "sub_header";
  return undefined;
}

function readMetadata(sheet: RawSheet, headerStart: number, preamble: TaggedRow[], opts: LocatorOptions): SheetMetadata {
  const meta: SheetMetadata = {};
  for (let r = 0; r < headerStart; r++) {
    const lead = leadText(rowOf(sheet, r));
    if (lead) {
      meta.title = lead;
      break;
    }
  }
  const candidates = [...Array.from({ length: headerStart }, (_, r) => r), ...preamble.map((p) => p.index)];
  const markers = opts.unitMarkers.map(foldText);
  for (const r of candidates) {
    for (const v of rowOf(sheet, r)) {
      const t = cellText(v);
      if (t && markers.some((m) => foldText(t).includes(m))) {
        meta.unit = t;
        return meta;
      }
    }
  }
  return meta;
}

/**
 * Locate the header and data blocks of a raw sheet.
 * Throws `LayoutNotRecognizedError` instead of guessing when either block cannot be found.
 */
export function locateTable(sheet: RawSheet, opts: LocatorOptions): TableRegion {
  const rowCount = sheet.cells.length;
  const columnCount = sheet.cells.reduce((max, row) => Math.max(max, row.length), 0);

  let headerStart = -1;
  const window = Math.min(opts.scanWindow, rowCount);
  for (let r = 0; r < window; r++) {
    const row = rowOf(sheet, r);
    if (exclusionReason(row, opts)) continue;
    if (textualCount(row) >= opts.minHeaderCells) {
      headerStart = r;
      break;
    }
  }
  if (headerStart < 0) {
    throw new LayoutNotRecognizedError(
      `no header row with at least ${opts.minHeaderCells} text cells in the first ${window} rows of "${sheet.sheetName}"`,
    );
  }

  const density = textualCount(rowOf(sheet, headerStart));
  let headerEnd = headerStart;
  for (let r = headerStart + 1; r < rowCount && r < headerStart + opts.maxHeaderRows; r++) {
    const row = rowOf(sheet, r);
    if (isBlankRow(row) || exclusionReason(row, opts)) break;
    if (row.some(isNumericCell) || row.some(isPlaceholderCell)) break;
    const tc = textualCount(row);
    if (tc === 0 || tc > density) break;
    headerEnd = r;
  }

  const headerLabels = compositeLabels(sheet, headerStart, headerEnd, columnCount);
  const labelled = headerLabels.map((l, c) => (l ? c : -1)).filter((c) => c >= 0);
  const probed = opts.expectsNumeric ? labelled.filter((c) => opts.expectsNumeric?.(headerLabels[c])) : [];
  const numericColumns = probed.length ? probed : labelled;

  const hasNumbers = (row: ReadonlyArray<CellValue>): boolean => numericColumns.some((c) => isNumericCell(row[c]));
  // A row whose value columns hold only placeholders is still a data row (every value missing).
  const isAllPlaceholders = (row: ReadonlyArray<CellValue>): boolean => {
    const cells = numericColumns.map((c) => row[c]);
    return cells.some(isPlaceholderCell) && cells.every((v) => cellText(v) === "" || isPlaceholderCell(v));
  };
  const isDataRow = (row: ReadonlyArray<CellValue>): boolean =>
    !exclusionReason(row, opts) && (hasNumbers(row) || (leadText(row) !== "" && isAllPlaceholders(row)));

  const preamble: TaggedRow[] = [];
  let dataStart = -1;
  for (let r = headerEnd + 1; r < rowCount && r <= headerEnd + opts.scanWindow; r++) {
    const row = rowOf(sheet, r);
    if (isBlankRow(row)) continue;
    if (isDataRow(row)) {
      dataStart = r;
      break;
    }
    preamble.push({ index: r, tag: { kind: "excluded", reason: exclusionReason(row, opts) ?? "sub_header", label: leadText(row) } });
  }
  if (dataStart < 0) {
    throw new LayoutNotRecognizedError(
      `header found at row ${headerStart + 1} of "${sheet.sheetName}" but no data row follows within ${opts.scanWindow} rows`,
    );
  }

  const rows: TaggedRow[] = [];
  let dataEnd = dataStart;
  for (let r = dataStart; r < rowCount; r++) {
    const row = rowOf(sheet, r);
    if (isBlankRow(row)) break;
    const reason = exclusionReason(row, opts);
    if (reason === "comparison" || reason === "footnote") {
      const next = rowOf(sheet, r + 1);
      if (r + 1 < rowCount && isDataRow(next)) {
        rows.push({ index: r, tag: { kind: "excluded", reason, label: leadText(row) } });
        dataEnd = r;
        continue;
      }
      break;
    }
    if (reason === "sub_header" || !isDataRow(row)) {
      rows.push({ index: r, tag: { kind: "excluded", reason: "sub_header", label: leadText(row) } });
    } else {
      rows.push({ index: r, tag: { kind: "included" } });
    }
    dataEnd = r;
  }

  return {
    headerStart,
    headerEnd,
    dataStart,
    dataEnd,
    columnCount,
    headerLabels,
    rows,
    preamble,
    metadata: readMetadata(sheet, headerStart, preamble, opts),
  };
}
