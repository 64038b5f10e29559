import type { CellValue, Period, PeriodFrequency } from "./types.js";

/**
 * Module: Reporting Periods
 * Purpose: Strict parsing of year / quarter / month labels (Gregorian or ROC/Minguo
 * calendar) into the canonical `Period` shape, plus ordering and stepping helpers
 * used by the deriver and the temporal completeness checks.
 */
export type Calendar = "gregorian" | "roc";

const ROC_OFFSET = 1911;
const FREQUENCY_RANK: Record<PeriodFrequency, number> = { year: 0, quarter: 1, month: 2 };

const yearPattern = (calendar: Calendar): string => (calendar === "roc" ? "(\\d{1,3})" : "(\\d{4})");

const toYear = (digits: string, calendar: Calendar): number | null => {
  const n = Number(digits);
  if (!Number.isInteger(n)) return null;
  if (calendar === "roc") return n >= 1 ? n + ROC_OFFSET : null;
  return n >= 1000 ? n : null;
};

/**
 * Parse a raw cell into a `Period`, or `null` when it does not match any accepted shape.
 *
 * Accepted (whole string, whitespace ignored, full-width digits folded):
 * `2024`, `2024年`, `2024-08`, `2024/8`, `2024.08`, `2024M08`, `2024年8月`,
 * `2024Q1`, `2024-Q1`, `2024年第1季`, `Q1 2024`. Integer numeric cells are years.
 * Under the `roc` calendar the year part is 1-3 digits and offset by 1911.
 */
export function parsePeriod(raw: CellValue, calendar: Calendar = "gregorian"): Period | null {
  if (raw === null || typeof raw === "boolean") return null;
  if (typeof raw === "number") {
    if (!Number.isInteger(raw)) return null;
    const digits = String(raw);
    if (!new RegExp(`^${yearPattern(calendar)}$`).test(digits)) return null;
    const year = toYear(digits, calendar);
    return year === null ? null : { year, frequency: "year", index: 0 };
  }
  const s = raw.normalize("NFKC").replace(/\s+/g, "");
  if (!s) return null;
  const Y = yearPattern(calendar);

  let m = s.match(new RegExp(`^${Y}年?$`));
  if (m) {
    const year = toYear(m[1], calendar);
    return year === null ? null : { year, frequency: "year", index: 0 };
  }
  m = s.match(new RegExp(`^${Y}(?:年|[-/.]|M)(\\d{1,2})月?$`, "i"));
  if (m) {
    const year = toYear(m[1], calendar);
    const month = Number(m[2]);
    if (year === null || month < 1 || month > 12) return null;
    return { year, frequency: "month", index: month };
  }
  m = s.match(new RegExp(`^${Y}(?:[-/]?Q|年第)([1-4])季?$`, "i"));
  if (m) {
    const year = toYear(m[1], calendar);
    return year === null ? null : { year, frequency: "quarter", index: Number(m[2]) };
  }
  m = s.match(new RegExp(`^Q([1-4])[-/]?${Y}$`, "i"));
  if (m) {
    const year = toYear(m[2], calendar);
    return year === null ? null : { year, frequency: "quarter", index: Number(m[1]) };
  }
  return null;
}

export function formatPeriod(p: Period): string {
  switch (p.frequency) {
    case "year":
      return String(p.year);
    case "quarter":
      return `${p.year}-Q${p.index}`;
    case "month":
      return `${p.year}-${String(p.index).padStart(2, "0")}`;
  }
}

const startMonth = (p: Period): number => {
  if (p.frequency === "year") return p.year * 12;
  if (p.frequency === "quarter") return p.year * 12 + (p.index - 1) * 3;
  return p.year * 12 + (p.index - 1);
};

// Ascending by start date; a coarser period sorts before a finer one starting the same month.
export function comparePeriods(a: Period, b: Period): number {
  const d = startMonth(a) - startMonth(b);
  if (d !== 0) return d;
  return FREQUENCY_RANK[a.frequency] - FREQUENCY_RANK[b.frequency];
}

export const samePeriod = (a: Period, b: Period): boolean =>
  a.year === b.year && a.frequency === b.frequency && a.index === b.index;

const periodsPerYear = (f: PeriodFrequency): number => (f === "month" ? 12 : f === "quarter" ? 4 : 1);

function shiftPeriod(p: Period, steps: number): Period {
  if (p.frequency === "year") return { ...p, year: p.year + steps };
  const n = periodsPerYear(p.frequency);
  const ordinal = p.year * n + (p.index - 1) + steps;
  return { year: Math.floor(ordinal / n), frequency: p.frequency, index: (ordinal % n) + 1 };
}

export const nextPeriod = (p: Period): Period => shiftPeriod(p, 1);
export const previousPeriod = (p: Period): Period => shiftPeriod(p, -1);
export const samePeriodPreviousYear = (p: Period): Period => ({ ...p, year: p.year - 1 });

export function isPeriod(v: unknown): v is Period {
  return (
    typeof v === "object" &&
    v !== null &&
    "year" in v &&
    "frequency" in v &&
    "index" in v &&
    typeof v.year === "number" &&
    typeof v.index === "number" &&
    (v.frequency === "year" || v.frequency === "quarter" || v.frequency === "month")
  );
}
