import { createFinding } from "./errors.js";
import { parsePeriod, type Calendar } from "./period.js";
import type { FieldSpec, TableDefinition } from "./schema.js";
import { cellText, foldText, type ColumnMapResult } from "./semantics.js";
import type { CanonicalRecord, CellValue, FieldValue, Period, RawSheet, TableRegion, ValidationFinding } from "./types.js";

/**
 * Module: Value Cleaner
 * Purpose: Turn the included rows of a located region into canonical records.
 * Per cell, in order:
 * 1. Sentinel check (registry-wide plus per-field tokens) marks the value missing.
 * 2. Formatting artifacts are stripped per semantic type (thousands separators,
 *    percent signs, currency prefixes, parentheses meaning negative).
 * 3. Coercion to the declared type. Percentages are stored as fractions.
 * Coercion failure on a required field drops the record with an error finding;
 * on an optional field the value degrades to missing with a warning.
 */

export type CellOutcome<T> = { kind: "value"; value: T } | { kind: "missing" } | { kind: "invalid"; reason: string };

export interface NumberFormat {
  decimalSeparator: "." | ",";
}

const CURRENCY_PREFIX_RE = /^(?:US\$|NT\$|HK\$|RMB|[$€£¥])/i;
const STRICT_NUMBER_RE = /^[-+]?(?:\d+\.?\d*|\.\d+)(?:e[-+]?\d+)?$/i;

/**
 * Build the folded sentinel set for a field. Empty text is always missing.
 */
export function sentinelSet(registrySentinels: readonly string[], field: Pick<FieldSpec, "sentinels">): Set<string> {
  const set = new Set<string>([""]);
  for (const s of [...registrySentinels, ...field.sentinels]) set.add(foldText(s));
  return set;
}

export const isSentinel = (raw: CellValue | undefined, sentinels: ReadonlySet<string>): boolean => {
  if (raw === null || raw === undefined) return true;
  if (typeof raw !== "string") return false;
  return sentinels.has(foldText(cellText(raw)));
};

// Grouping separators are only accepted in well-formed groups of three.
const GROUPED_RE: Record<NumberFormat["decimalSeparator"], RegExp> = {
  ".": /^\d{1,3}(?:,\d{3})+(?:\.\d*)?$/,
  ",": /^\d{1,3}(?:\.\d{3})+(?:,\d*)?$/,
};

/**
 * Strip display artifacts from numeric text.
 * Returns the plain decimal string plus whether a percent sign was present, or `null`
 * when the grouping separator does not fit the declared decimal separator ("12,5" with
 * a "." decimal separator).
 */
export function stripNumericArtifacts(text: string, fmt: NumberFormat): { text: string; percent: boolean } | null {
  let s = text.normalize("NFKC").replace(/\s+/g, "").replace(/[−–]/g, "-");
  let negative = false;
  const paren = /^\((.*)\)$/.exec(s);
  if (paren) {
    negative = true;
    s = paren[1];
  }
  if (s.startsWith("-") || s.startsWith("+")) {
    negative = negative !== s.startsWith("-");
    s = s.slice(1);
  }
  s = s.replace(CURRENCY_PREFIX_RE, "");
  const percent = s.endsWith("%");
  if (percent) s = s.slice(0, -1);
  const group = fmt.decimalSeparator === "," ? "." : ",";
  if (s.includes(group)) {
    if (!GROUPED_RE[fmt.decimalSeparator].test(s)) return null;
    s = s.split(group).join("");
  }
  if (fmt.decimalSeparator === ",") s = s.replace(",", ".");
  return { text: negative ? `-${s}` : s, percent };
}

export function sanitizeNumeric(raw: CellValue, fmt: NumberFormat): CellOutcome<number> {
  if (typeof raw === "number") {
    return Number.isFinite(raw) ? { kind: "value", value: raw } : { kind: "invalid", reason: "not a finite number" };
  }
  if (typeof raw === "boolean") return { kind: "invalid", reason: `boolean "${raw}" is not numeric` };
  const stripped = stripNumericArtifacts(cellText(raw), fmt);
  if (!stripped || !STRICT_NUMBER_RE.test(stripped.text)) return { kind: "invalid", reason: `"${cellText(raw)}" is not a number` };
  return { kind: "value", value: Number(stripped.text) };
}

/**
 * Percentages are divided by 100 unless the field declares `percentScale: "fraction"`
 * and the cell carries no percent sign.
 */
export function sanitizePercentage(raw: CellValue, fmt: NumberFormat, scale: FieldSpec["percentScale"]): CellOutcome<number> {
  if (typeof raw === "number") {
    if (!Number.isFinite(raw)) return { kind: "invalid", reason: "not a finite number" };
    return { kind: "value", value: scale === "fraction" ? raw : raw / 100 };
  }
  if (typeof raw === "boolean") return { kind: "invalid", reason: `boolean "${raw}" is not a percentage` };
  const stripped = stripNumericArtifacts(cellText(raw), fmt);
  if (!stripped || !STRICT_NUMBER_RE.test(stripped.text)) {
    return { kind: "invalid", reason: `"${cellText(raw)}" is not a percentage` };
  }
  const n = Number(stripped.text);
  return { kind: "value", value: scale === "fraction" && !stripped.percent ? n : n / 100 };
}

export function sanitizeCategorical(raw: CellValue): CellOutcome<string> {
  const s = cellText(raw).replace(/\s+/g, " ");
  return s ? { kind: "value", value: s } : { kind: "missing" };
}

export function sanitizePeriod(raw: CellValue, calendar: Calendar): CellOutcome<Period> {
  const p = parsePeriod(typeof raw === "string" ? cellText(raw) : raw, calendar);
  return p ? { kind: "value", value: p } : { kind: "invalid", reason: `"${cellText(raw)}" is not a ${calendar} period` };
}

/**
 * Clean one cell for one field. Pure: the same raw value always yields the same outcome.
 */
export function sanitizeCell(
  raw: CellValue | undefined,
  field: FieldSpec,
  sentinels: ReadonlySet<string>,
  fmt: NumberFormat,
): CellOutcome<FieldValue> {
  if (raw === undefined || isSentinel(raw, sentinels)) return { kind: "missing" };
  switch (field.type) {
    case "numeric":
      return sanitizeNumeric(raw, fmt);
    case "percentage":
      return sanitizePercentage(raw, fmt, field.percentScale);
    case "categorical":
      return sanitizeCategorical(raw);
    case "period":
      return sanitizePeriod(raw, field.calendar);
  }
}

export interface CleanResult {
  records: CanonicalRecord[];
  findings: ValidationFinding[];
  droppedRows: number[]; // 1-based source rows
}

/**
 * Produce canonical records for every included row of the region.
 * Excluded rows are skipped without a finding. Every record carries every declared
 * base field in declaration order; fields without a column are always missing.
 */
export function cleanRecords(
  sheet: RawSheet,
  region: TableRegion,
  mapping: Pick<ColumnMapResult, "fieldColumns">,
  table: Readonly<TableDefinition>,
): CleanResult {
  const fmt: NumberFormat = { decimalSeparator: table.decimalSeparator };
  const prepared = table.fields.map((field) => ({
    field,
    column: mapping.fieldColumns[field.id],
    sentinels: sentinelSet(table.sentinels, field),
  }));

  const records: CanonicalRecord[] = [];
  const findings: ValidationFinding[] = [];
  const droppedRows: number[] = [];
  // sentinel hits on required fields are reported once per field
  const requiredMissing = new Map<string, number[]>();

  for (const tagged of region.rows) {
    if (tagged.tag.kind !== "included") continue;
    const sourceRow = tagged.index + 1;
    const row = sheet.cells[tagged.index] ?? [];
    const values: Record<string, FieldValue> = {};
    let dropped = false;

    for (const { field, column, sentinels } of prepared) {
      const outcome: CellOutcome<FieldValue> =
        column === undefined ? { kind: "missing" } : sanitizeCell(row[column], field, sentinels, fmt);

      if (outcome.kind === "value") {
        values[field.id] = outcome.value;
        continue;
      }
      values[field.id] = null;
      if (outcome.kind === "missing") {
        if (!field.required || column === undefined) continue;
        if (field.type === "period") {
          dropped = true;
          findings.push(
            createFinding({
              severity: "error",
              rule: "period_missing",
              step: "clean",
              message: `row ${sourceRow}: required period "${field.id}" is missing; record dropped`,
              rows: [sourceRow],
              fields: [field.id],
            }),
          );
        } else {
          requiredMissing.set(field.id, [...(requiredMissing.get(field.id) ?? []), sourceRow]);
        }
        continue;
      }
      if (field.required) dropped = true;
      findings.push(
        createFinding({
          severity: field.required ? "error" : "warning",
          rule: "coercion_error",
          step: "clean",
          message: `row ${sourceRow}, field "${field.id}": ${outcome.reason}; ${field.required ? "record dropped" : "treated as missing"}`,
          rows: [sourceRow],
          fields: [field.id],
        }),
      );
    }

    if (dropped) droppedRows.push(sourceRow);
    else records.push({ sourceRow, values: Object.freeze(values) });
  }

  for (const [fieldId, rows] of requiredMissing) {
    findings.push(
      createFinding({
        severity: "warning",
        rule: "required_missing",
        step: "clean",
        message: `required field "${fieldId}" is missing in ${rows.length} row(s)`,
        rows,
        fields: [fieldId],
      }),
    );
  }
  return { records, findings, droppedRows };
}
