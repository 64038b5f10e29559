/**
 * Module: Public Types & Engine Version
 * Purpose: Define the raw sheet grid, located table region, canonical record and
 * report contracts shared by every pipeline step, plus the engine version banner
 * exposed in report `meta` for diagnostics.
 */

// A raw cell as decoded from a workbook or CSV file. Empty cells are `null`.
export type CellValue = string | number | boolean | null;

export interface RawSheet {
  sourceId: string; // file identifier, e.g. "Table8_ExportValue.xlsx"
  sheetName: string;
  cells: ReadonlyArray<ReadonlyArray<CellValue>>;
}

export type SemanticType = "numeric" | "percentage" | "categorical" | "period";

export type PeriodFrequency = "year" | "quarter" | "month";

export interface Period {
  year: number;
  frequency: PeriodFrequency;
  index: number; // 0 for years, 1-4 for quarters, 1-12 for months
}

// `null` is the explicit missing marker: the key is always present on a record.
export type FieldValue = number | string | Period | null;

export interface CanonicalRecord {
  sourceRow: number; // 1-based worksheet row
  values: Readonly<Record<string, FieldValue>>;
}

export type ExclusionReason = "footnote" | "comparison" | "sub_header";

export type RowTag =
  | { kind: "included" }
  | { kind: "excluded"; reason: ExclusionReason; label: string };

export interface TaggedRow {
  index: number; // 0-based grid row
  tag: RowTag;
}

export interface SheetMetadata {
  title?: string;
  unit?: string;
}

export interface TableRegion {
  headerStart: number;
  headerEnd: number; // inclusive
  dataStart: number;
  dataEnd: number; // inclusive
  columnCount: number;
  headerLabels: string[]; // composite label per column, header rows joined top-down
  rows: TaggedRow[]; // every row from dataStart to dataEnd
  preamble: TaggedRow[]; // rows between headerEnd and dataStart
  metadata: SheetMetadata;
}

export type FindingSeverity = "error" | "warning";

export type PipelineStep = "read" | "locate" | "map" | "clean" | "derive" | "validate" | "export";

export interface ValidationFinding {
  readonly severity: FindingSeverity;
  readonly rule: string; // rule identifier, e.g. "range:us_share" or "coercion_error"
  readonly step: PipelineStep;
  readonly message: string;
  readonly rows: readonly number[]; // affected source rows (1-based)
  readonly fields: readonly string[];
  readonly fatal: boolean; // blocks publication
}

export type TableStatus = "passed" | "passed-with-warnings" | "failed" | "cancelled";

export interface FieldDescriptor {
  id: string;
  type: SemanticType;
  required: boolean;
  derived: boolean;
}

export interface ExcludedRow {
  row: number; // 1-based
  reason: ExclusionReason;
  label: string;
}

export interface TableReport {
  tableId: string;
  status: TableStatus;
  records: CanonicalRecord[] | null; // null unless publishable
  fields: FieldDescriptor[];
  findings: ValidationFinding[];
  meta: {
    sourceId?: string;
    sheetName?: string;
    title?: string;
    unit?: string;
    headerRows?: [number, number];
    dataRows?: [number, number];
    columnMap?: Array<{ column: number; label: string; field: string | null }>;
    excludedRows: ExcludedRow[];
    totalRows: number; // data-block rows, excluded ones included
    parsedRows: number; // records that survived cleaning
    engineVersion: string;
  };
}

export interface RunCounts {
  attempted: number;
  passed: number;
  warned: number;
  failed: number;
  cancelled: number;
}

export interface ExportFailure {
  tableId: string;
  exporter: string;
  message: string;
}

export interface RunReport {
  startedAt: string;
  finishedAt: string;
  validateOnly: boolean;
  counts: RunCounts;
  tables: TableReport[];
  findings: Array<ValidationFinding & { tableId: string }>;
  exportFailures: ExportFailure[];
}

export const ENGINE_VERSION = "0.1.0";
