import { mkdir, writeFile } from "node:fs/promises";
import { join } from "node:path";
import { formatPeriod, isPeriod } from "./period.js";
import type { CanonicalRecord, FieldValue, TableReport } from "./types.js";

/**
 * Module: Exporters
 * Purpose: Hand validated table reports to output sinks. The orchestrator only passes
 * publishable tables unless a run asks for failed ones too.
 */
export interface Exporter {
  name: string;
  export(report: TableReport): Promise<void>;
}

// Periods are written as canonical text ("2024", "2024-Q1", "2024-08").
const plainValue = (v: FieldValue): number | string | null => (isPeriod(v) ? formatPeriod(v) : v);

export const plainRecord = (r: CanonicalRecord): Record<string, number | string | null> =>
  Object.fromEntries(Object.entries(r.values).map(([k, v]) => [k, plainValue(v)]));

export function serializeReport(report: TableReport): string {
  return `${JSON.stringify(
    {
      tableId: report.tableId,
      status: report.status,
      fields: report.fields,
      records: report.records?.map(plainRecord) ?? null,
      findings: report.findings,
      meta: report.meta,
    },
    null,
    2,
  )}\n`;
}

/**
 * Writes `<outDir>/<tableId>.json` per table.
 */
export function createJsonExporter(outDir: string): Exporter {
  return {
    name: "json",
    async export(report) {
      await mkdir(outDir, { recursive: true });
      await writeFile(join(outDir, `${report.tableId}.json`), serializeReport(report), "utf8");
    },
  };
}

export interface MemoryExporter extends Exporter {
  reports: TableReport[];
}

export function createMemoryExporter(): MemoryExporter {
  const reports: TableReport[] = [];
  return {
    name: "memory",
    reports,
    async export(report) {
      reports.push(report);
    },
  };
}
