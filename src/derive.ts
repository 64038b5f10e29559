import { comparePeriods, formatPeriod, isPeriod, previousPeriod, samePeriodPreviousYear } from "./period.js";
import type { DerivedSpec, TableDefinition } from "./schema.js";
import type { CanonicalRecord, FieldValue, Period } from "./types.js";

/**
 * Module: Metric Deriver
 * Purpose: Append declared derived fields to cleaned records.
 * Design:
 * - Missing is absorbing: any missing input yields a missing output, never zero.
 * - Division by a zero or missing denominator yields missing.
 * - Records are ordered by the period field (stable; missing periods last) before
 *   growth and cumulative formulas run. Duplicate periods are left for the validator.
 * - Derived fields may reference earlier derived fields.
 */

const num = (v: FieldValue | undefined): number | null => (typeof v === "number" && Number.isFinite(v) ? v : null);
const periodOf = (r: CanonicalRecord, field: string | undefined): Period | null => {
  if (!field) return null;
  const v = r.values[field];
  return isPeriod(v) ? v : null;
};

export function growthRate(current: number | null, previous: number | null): number | null {
  if (current === null || previous === null || previous === 0) return null;
  return current / previous - 1;
}

export function shareOfTotal(value: number | null, total: number | null): number | null {
  if (value === null || total === null || total === 0) return null;
  return value / total;
}

export function balance(a: number | null, b: number | null): number | null {
  return a === null || b === null ? null : a - b;
}

/**
 * Stable ascending order by period; records without a period keep their relative order at the end.
 */
export function sortByPeriod(records: readonly CanonicalRecord[], periodField: string | undefined): CanonicalRecord[] {
  if (!periodField) return [...records];
  return [...records].sort((x, y) => {
    const a = periodOf(x, periodField);
    const b = periodOf(y, periodField);
    if (a && b) return comparePeriods(a, b);
    if (a) return -1;
    if (b) return 1;
    return 0;
  });
}

function computeColumn(
  spec: DerivedSpec,
  rows: ReadonlyArray<Record<string, FieldValue>>,
  periods: ReadonlyArray<Period | null>,
): FieldValue[] {
  switch (spec.formula) {
    case "share_of_total":
      return rows.map((v) => shareOfTotal(num(v[spec.value]), num(v[spec.total])));
    case "balance":
      return rows.map((v) => balance(num(v[spec.a]), num(v[spec.b])));
    case "scale":
      return rows.map((v) => {
        const x = num(v[spec.of]);
        return x === null ? null : x * spec.factor;
      });
    case "growth_rate": {
      // first record wins for a period key; duplicates are reported by the validator
      const byPeriod = new Map<string, number>();
      periods.forEach((p, i) => {
        if (p && !byPeriod.has(formatPeriod(p))) byPeriod.set(formatPeriod(p), i);
      });
      return rows.map((v, i) => {
        const p = periods[i];
        if (!p) return null;
        const target = spec.lag === "year_over_year" ? samePeriodPreviousYear(p) : previousPeriod(p);
        const j = byPeriod.get(formatPeriod(target));
        return j === undefined ? null : growthRate(num(v[spec.of]), num(rows[j][spec.of]));
      });
    }
    case "cumulative": {
      const state = new Map<string, { year: number; sum: number | null }>();
      return rows.map((v, i) => {
        const p = periods[i];
        if (!p) return null;
        let s = state.get(p.frequency);
        if (!s || (spec.resetEvery === "year" && s.year !== p.year)) {
          s = { year: p.year, sum: 0 };
          state.set(p.frequency, s);
        }
        const x = num(v[spec.of]);
        s.sum = s.sum === null || x === null ? null : s.sum + x;
        return s.sum;
      });
    }
  }
}

/**
 * Compute every derived field declared for the table and return new, frozen records
 * carrying base fields followed by derived fields in declaration order.
 */
export function deriveMetrics(records: readonly CanonicalRecord[], table: Pick<TableDefinition, "derived" | "periodField">): CanonicalRecord[] {
  const ordered = sortByPeriod(records, table.periodField);
  const rows = ordered.map((r) => ({ ...r.values }));
  const periods = ordered.map((r) => periodOf(r, table.periodField));
  for (const spec of table.derived) {
    const column = computeColumn(spec, rows, periods);
    rows.forEach((v, i) => {
      v[spec.id] = column[i];
    });
  }
  return ordered.map((r, i) => ({ sourceRow: r.sourceRow, values: Object.freeze(rows[i]) }));
}

/**
 * Sum monthly records into quarter records. A quarter with fewer than three distinct
 * months, or any missing month value, is missing for that field. Non-monthly records
 * are ignored. The output carries the period field followed by `fields`.
 */
export function rollupByQuarter(records: readonly CanonicalRecord[], periodField: string, fields: readonly string[]): CanonicalRecord[] {
  const groups = new Map<string, { period: Period; sourceRow: number; months: Map<number, CanonicalRecord> }>();
  for (const r of sortByPeriod(records, periodField)) {
    const p = periodOf(r, periodField);
    if (!p || p.frequency !== "month") continue;
    const period: Period = { year: p.year, frequency: "quarter", index: Math.ceil(p.index / 3) };
    const key = formatPeriod(period);
    let g = groups.get(key);
    if (!g) {
      g = { period, sourceRow: r.sourceRow, months: new Map() };
      groups.set(key, g);
    }
    if (!g.months.has(p.index)) g.months.set(p.index, r);
  }
  return [...groups.values()].map((g) => {
    const values: Record<string, FieldValue> = { [periodField]: g.period };
    for (const f of fields) {
      if (g.months.size < 3) {
        values[f] = null;
        continue;
      }
      let sum: number | null = 0;
      for (const m of g.months.values()) {
        const x = num(m.values[f]);
        sum = sum === null || x === null ? null : sum + x;
      }
      values[f] = sum;
    }
    return { sourceRow: g.sourceRow, values: Object.freeze(values) };
  });
}
