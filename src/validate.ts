import { createFinding } from "./errors.js";
import { comparePeriods, formatPeriod, isPeriod, nextPeriod } from "./period.js";
import type { RuleSpec, TableDefinition } from "./schema.js";
import type { CanonicalRecord, FieldValue, Period, PeriodFrequency, TableStatus, ValidationFinding } from "./types.js";

/**
 * Module: Consistency Validator
 * Purpose: Run every declared rule plus the built-in duplicate-period and
 * schema-closure checks over fully derived records. Rules never short-circuit each
 * other; the result is the complete finding list for the table.
 */

const num = (v: FieldValue | undefined): number | null => (typeof v === "number" && Number.isFinite(v) ? v : null);
const fmtNum = (n: number): string => String(Number(n.toPrecision(10)));

type RuleOf<K extends RuleSpec["kind"]> = Extract<RuleSpec, { kind: K }>;

function checkRange(rule: RuleOf<"range">, records: readonly CanonicalRecord[]): ValidationFinding[] {
  const id = rule.id ?? `range:${rule.field}`;
  const out: ValidationFinding[] = [];
  for (const r of records) {
    const v = num(r.values[rule.field]);
    if (v === null) continue;
    const low = rule.min !== undefined && v < rule.min;
    const high = rule.max !== undefined && v > rule.max;
    if (!low && !high) continue;
    out.push(
      createFinding({
        severity: rule.fatal ? "error" : "warning",
        rule: id,
        step: "validate",
        message: `row ${r.sourceRow}: ${rule.field}=${fmtNum(v)} is ${low ? `below min ${rule.min}` : `above max ${rule.max}`}`,
        rows: [r.sourceRow],
        fields: [rule.field],
      }),
    );
  }
  return out;
}

function arithmeticExpected(op: RuleOf<"arithmetic">["op"], operands: number[]): number | null {
  switch (op) {
    case "sum":
      return operands.reduce((a, b) => a + b, 0);
    case "difference":
      return operands[0] - operands[1];
    case "ratio":
      return operands[1] === 0 ? null : operands[0] / operands[1];
  }
}

function checkArithmetic(rule: RuleOf<"arithmetic">, records: readonly CanonicalRecord[]): ValidationFinding[] {
  const id = rule.id ?? `arithmetic:${rule.field}`;
  const out: ValidationFinding[] = [];
  for (const r of records) {
    const actual = num(r.values[rule.field]);
    const operands = rule.operands.map((f) => num(r.values[f]));
    if (actual === null || operands.some((o) => o === null)) continue;
    const expected = arithmeticExpected(
      rule.op,
      operands.filter((o): o is number => o !== null),
    );
    if (expected === null || Math.abs(actual - expected) <= rule.tolerance) continue;
    out.push(
      createFinding({
        severity: "error",
        rule: id,
        step: "validate",
        message: `row ${r.sourceRow}: ${rule.field}=${fmtNum(actual)} but ${rule.op}(${rule.operands.join(", ")})=${fmtNum(expected)}`,
        rows: [r.sourceRow],
        fields: [rule.field, ...rule.operands],
      }),
    );
  }
  return out;
}

const groupKey = (v: FieldValue | undefined): string | null => {
  if (v === undefined || v === null) return null;
  return isPeriod(v) ? formatPeriod(v) : String(v);
};

/**
 * Category-per-row breakdowns: the single share field is summed across all records
 * sharing a `groupBy` value. Any missing share leaves the group unchecked with a warning.
 */
function checkGroupedShareSum(rule: RuleOf<"share_sum">, groupBy: string, records: readonly CanonicalRecord[]): ValidationFinding[] {
  const id = rule.id ?? "share_sum";
  const field = rule.shares[0];
  const groups = new Map<string, CanonicalRecord[]>();
  for (const r of records) {
    const key = groupKey(r.values[groupBy]);
    if (key !== null) groups.set(key, [...(groups.get(key) ?? []), r]);
  }
  const out: ValidationFinding[] = [];
  for (const [key, members] of groups) {
    const rows = members.map((r) => r.sourceRow);
    const shares = members.map((r) => num(r.values[field]));
    const missingRows = rows.filter((_, i) => shares[i] === null);
    if (missingRows.length === members.length) continue;
    if (missingRows.length) {
      out.push(
        createFinding({
          severity: "warning",
          rule: id,
          step: "validate",
          message: `${groupBy} ${key}: breakdown incomplete, ${field} missing in row(s) ${missingRows.join(", ")}; sum not checked`,
          rows: missingRows,
          fields: [field],
        }),
      );
      continue;
    }
    const sum = shares.reduce<number>((acc, v) => acc + (v ?? 0), 0);
    if (Math.abs(sum - rule.expected) <= rule.tolerance) continue;
    out.push(
      createFinding({
        severity: "warning",
        rule: id,
        step: "validate",
        message: `${groupBy} ${key}: shares sum to ${fmtNum(sum)}, expected ${fmtNum(rule.expected)} ± ${rule.tolerance}`,
        rows,
        fields: [field],
      }),
    );
  }
  return out;
}

/**
 * Shares of a breakdown must sum to `expected`.
 *
 * By default a breakdown is column-wise: each record carries every share of its period.
 * When some shares are missing and the rule declares the underlying `values` and
 * `total`, the expected sum is corrected to the present categories' part of the total.
 * With `groupBy` the breakdown runs across rows instead (see `checkGroupedShareSum`).
 */
function checkShareSum(rule: RuleOf<"share_sum">, records: readonly CanonicalRecord[]): ValidationFinding[] {
  if (rule.groupBy) return checkGroupedShareSum(rule, rule.groupBy, records);
  const id = rule.id ?? "share_sum";
  const out: ValidationFinding[] = [];
  for (const r of records) {
    const shares = rule.shares.map((f) => num(r.values[f]));
    const present = shares.map((s, i) => (s === null ? -1 : i)).filter((i) => i >= 0);
    if (present.length === 0) continue;
    const sum = present.reduce((acc, i) => acc + (shares[i] ?? 0), 0);
    let expected = rule.expected;

    if (present.length < shares.length) {
      const missing = rule.shares.filter((_, i) => shares[i] === null);
      const total = rule.total ? num(r.values[rule.total]) : null;
      const values = rule.values ? present.map((i) => num(r.values[rule.values?.[i] ?? ""])) : [];
      if (total === null || total === 0 || values.length === 0 || values.some((v) => v === null)) {
        out.push(
          createFinding({
            severity: "warning",
            rule: id,
            step: "validate",
            message: `row ${r.sourceRow}: breakdown incomplete, missing ${missing.join(", ")}; sum not checked`,
            rows: [r.sourceRow],
            fields: missing,
          }),
        );
        continue;
      }
      expected = (rule.expected * values.reduce<number>((acc, v) => acc + (v ?? 0), 0)) / total;
    }

    if (Math.abs(sum - expected) > rule.tolerance) {
      out.push(
        createFinding({
          severity: "warning",
          rule: id,
          step: "validate",
          message: `row ${r.sourceRow}: shares sum to ${fmtNum(sum)}, expected ${fmtNum(expected)} ± ${rule.tolerance}`,
          rows: [r.sourceRow],
          fields: present.map((i) => rule.shares[i]),
        }),
      );
    }
  }
  return out;
}

const periodsOf = (records: readonly CanonicalRecord[], field: string): Array<{ period: Period; row: number }> =>
  records.flatMap((r) => {
    const v = r.values[field];
    return isPeriod(v) ? [{ period: v, row: r.sourceRow }] : [];
  });

function checkPeriodSequence(rule: RuleOf<"period_sequence">, records: readonly CanonicalRecord[], periodField: string): ValidationFinding[] {
  const field = rule.field ?? periodField;
  const id = rule.id ?? "period_sequence";
  const byFrequency = new Map<PeriodFrequency, Map<string, Period>>();
  for (const { period } of periodsOf(records, field)) {
    const seen = byFrequency.get(period.frequency) ?? new Map<string, Period>();
    seen.set(formatPeriod(period), period);
    byFrequency.set(period.frequency, seen);
  }
  const out: ValidationFinding[] = [];
  for (const seen of byFrequency.values()) {
    const sorted = [...seen.values()].sort(comparePeriods);
    const last = sorted[sorted.length - 1];
    for (let p = sorted[0]; comparePeriods(p, last) < 0; p = nextPeriod(p)) {
      if (seen.has(formatPeriod(p))) continue;
      out.push(
        createFinding({
          severity: "warning",
          rule: id,
          step: "validate",
          message: `period ${formatPeriod(p)} is missing from the sequence`,
          fields: [field],
        }),
      );
    }
  }
  return out;
}

function checkDuplicatePeriods(records: readonly CanonicalRecord[], periodField: string): ValidationFinding[] {
  const rows = new Map<string, number[]>();
  for (const { period, row } of periodsOf(records, periodField)) {
    const key = formatPeriod(period);
    rows.set(key, [...(rows.get(key) ?? []), row]);
  }
  return [...rows.entries()]
    .filter(([, r]) => r.length > 1)
    .map(([key, r]) =>
      createFinding({
        severity: "error",
        rule: "duplicate_period",
        step: "validate",
        message: `period ${key} appears in ${r.length} rows (${r.join(", ")})`,
        rows: r,
        fields: [periodField],
      }),
    );
}

/**
 * Every record must carry exactly the declared base and derived field ids.
 */
export function checkSchemaClosure(records: readonly CanonicalRecord[], fieldIds: readonly string[]): ValidationFinding[] {
  const expected = [...fieldIds].sort().join("\u0000");
  const bad = records.filter((r) => Object.keys(r.values).sort().join("\u0000") !== expected).map((r) => r.sourceRow);
  if (!bad.length) return [];
  return [
    createFinding({
      severity: "error",
      rule: "schema_closure",
      step: "validate",
      message: `${bad.length} record(s) do not carry the declared field set`,
      rows: bad,
    }),
  ];
}

export const declaredFieldIds = (table: Pick<TableDefinition, "fields" | "derived">): string[] => [
  ...table.fields.map((f) => f.id),
  ...table.derived.map((d) => d.id),
];

export function validateRecords(
  records: readonly CanonicalRecord[],
  table: Pick<TableDefinition, "fields" | "derived" | "rules" | "periodField">,
): ValidationFinding[] {
  const findings: ValidationFinding[] = [...checkSchemaClosure(records, declaredFieldIds(table))];
  if (table.periodField) findings.push(...checkDuplicatePeriods(records, table.periodField));
  for (const rule of table.rules) {
    switch (rule.kind) {
      case "range":
        findings.push(...checkRange(rule, records));
        break;
      case "arithmetic":
        findings.push(...checkArithmetic(rule, records));
        break;
      case "share_sum":
        findings.push(...checkShareSum(rule, records));
        break;
      case "period_sequence":
        if (table.periodField) findings.push(...checkPeriodSequence(rule, records, table.periodField));
        break;
    }
  }
  return findings;
}

export function tableStatus(findings: readonly ValidationFinding[]): Exclude<TableStatus, "cancelled"> {
  if (findings.some((f) => f.fatal)) return "failed";
  return findings.length ? "passed-with-warnings" : "passed";
}
