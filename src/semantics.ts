import { createFinding, SchemaMismatchError } from "./errors.js";
import type { TableDefinition } from "./schema.js";
import type { CellValue, RawSheet, TableRegion, ValidationFinding } from "./types.js";

/**
 * Module: Header Semantics & Mapping
 * Purpose: Normalize raw (possibly composite, locale-specific) header labels and map
 * each data column to exactly one canonical field. Matching is exact on normalized
 * text; there is no fuzzy scoring.
 */

export const cellText = (v: CellValue | undefined): string => {
  if (v === null || v === undefined) return "";
  return String(v).replace(/\u00A0/g, " ").trim();
};

// Width/case folding used for prefix checks: NFKC folds full-width forms, "…" and "－".
export const foldText = (s: string): string =>
  s.normalize("NFKC").toLowerCase().replace(/\s+/g, " ").trim();

/**
 * Canonical key for a header label: folded, punctuation and symbols stripped
 * (ASCII and CJK alike), whitespace removed. `"年(月)別"` and `"年 月 別"` share a key.
 */
export const normalizeHeaderLabel = (label: string): string =>
  foldText(label)
    .replace(/[\p{P}\p{S}]/gu, "")
    .replace(/\s+/g, "");

/**
 * Predicate used by the locator to decide which header columns expect numeric data.
 */
export function numericLabelProbe(table: Pick<TableDefinition, "fields">): (label: string) => boolean {
  const keys = new Set<string>();
  for (const f of table.fields) {
    if (f.type !== "numeric" && f.type !== "percentage") continue;
    for (const label of f.labels) keys.add(normalizeHeaderLabel(label));
  }
  return (label) => keys.has(normalizeHeaderLabel(label));
}

export interface ColumnAssignment {
  column: number;
  label: string;
  field: string | null;
}

export interface ColumnMapResult {
  columns: ColumnAssignment[];
  fieldColumns: Record<string, number>;
  absentFields: string[]; // declared fields with no column; their values are always missing
  findings: ValidationFinding[];
}

const columnHasData = (sheet: RawSheet, region: TableRegion, column: number): boolean =>
  region.rows.some((r) => r.tag.kind === "included" && cellText(sheet.cells[r.index]?.[column]) !== "");

/**
 * Map every column of the located region to a canonical field id.
 *
 * Behavior:
 * - Composite labels (`region.headerLabels`) are normalized then looked up exactly.
 * - A second column matching an already-assigned field is dropped with a `duplicate_column` warning.
 * - Columns that match nothing are dropped with an `unmapped_column` warning when they carry a
 *   header label or data; blank columns without data are dropped silently.
 * - Absent required fields beyond `unmappedRequiredTolerance` throw `SchemaMismatchError`;
 *   tolerated or optional absences become warnings and the field stays declared (always missing).
 */
export function mapColumns(sheet: RawSheet, region: TableRegion, table: Readonly<TableDefinition>): ColumnMapResult {
  const lookup = new Map<string, string>();
  for (const f of table.fields) {
    for (const label of f.labels) lookup.set(normalizeHeaderLabel(label), f.id);
  }

  const columns: ColumnAssignment[] = [];
  const fieldColumns: Record<string, number> = {};
  const findings: ValidationFinding[] = [];

  for (let column = 0; column < region.columnCount; column++) {
    const label = region.headerLabels[column] ?? "";
    const key = normalizeHeaderLabel(label);
    const field = key ? lookup.get(key) : undefined;
    if (field !== undefined && fieldColumns[field] === undefined) {
      fieldColumns[field] = column;
      columns.push({ column, label, field });
      continue;
    }
    columns.push({ column, label, field: null });
    if (field !== undefined) {
      findings.push(
        createFinding({
          severity: "warning",
          rule: "duplicate_column",
          step: "map",
          message: `column ${column + 1} "${label}" repeats field "${field}" (already column ${fieldColumns[field] + 1}); dropped`,
          fields: [field],
        }),
      );
    } else if (key || columnHasData(sheet, region, column)) {
      findings.push(
        createFinding({
          severity: "warning",
          rule: "unmapped_column",
          step: "map",
          message: `column ${column + 1} "${label}" matches no canonical field; dropped`,
        }),
      );
    }
  }

  const absentFields = table.fields.filter((f) => fieldColumns[f.id] === undefined);
  const absentRequired = absentFields.filter((f) => f.required).map((f) => f.id);
  if (absentRequired.length > table.unmappedRequiredTolerance) {
    throw new SchemaMismatchError(absentRequired, table.unmappedRequiredTolerance);
  }
  for (const f of absentFields) {
    findings.push(
      createFinding({
        severity: "warning",
        rule: f.required ? "required_field_absent" : "optional_field_absent",
        step: "map",
        message: `no column found for ${f.required ? "required" : "optional"} field "${f.id}"; treated as missing`,
        fields: [f.id],
      }),
    );
  }

  return { columns, fieldColumns, absentFields: absentFields.map((f) => f.id), findings };
}
