import { setImmediate as yieldToEventLoop } from "node:timers/promises";
import type { Logger } from "pino";
import { deriveMetrics } from "./derive.js";
import { CancelledError, createFinding, findingFromError, PipelineError } from "./errors.js";
import { locateTable, locatorOptionsFor } from "./locateTable.js";
import { cleanRecords } from "./sanitize.js";
import type { DerivedSpec, TableDefinition } from "./schema.js";
import { mapColumns, numericLabelProbe } from "./semantics.js";
import type {
  CanonicalRecord,
  ExcludedRow,
  FieldDescriptor,
  PipelineStep,
  RawSheet,
  SemanticType,
  TableReport,
  ValidationFinding,
} from "./types.js";
import { ENGINE_VERSION } from "./types.js";
import { tableStatus, validateRecords } from "./validate.js";

/**
 * Module: Per-Table Core
 * Purpose: Run locate → map → clean → derive → validate for one sheet and one table
 * definition, resolving to a `TableReport`. Pure apart from logging.
 * Design:
 * - Table-scoped failures (`PipelineError`) become a `failed` report naming the step.
 * - Each step boundary yields to the event loop before polling `shouldStop`, so a run
 *   timeout or abort fired during the previous step is seen; a stop yields a
 *   `cancelled` report.
 * - Any other exception is caught and reported as an `internal_error` finding; this
 *   function does not throw.
 * - Records are attached only when the table is publishable.
 */
export interface TableRunContext {
  tableId: string;
  shouldStop?: () => boolean;
  logger?: Logger;
}

const derivedType = (d: DerivedSpec): SemanticType =>
  d.formula === "growth_rate" || d.formula === "share_of_total" ? "percentage" : "numeric";

export const describeFields = (table: Pick<TableDefinition, "fields" | "derived">): FieldDescriptor[] => [
  ...table.fields.map((f) => ({ id: f.id, type: f.type, required: f.required, derived: false })),
  ...table.derived.map((d) => ({ id: d.id, type: derivedType(d), required: false, derived: true })),
];

export function emptyReport(tableId: string, fields: FieldDescriptor[], status: TableReport["status"], findings: ValidationFinding[]): TableReport {
  return {
    tableId,
    status,
    records: null,
    fields,
    findings,
    meta: { excludedRows: [], totalRows: 0, parsedRows: 0, engineVersion: ENGINE_VERSION },
  };
}

/**
 * Process one raw sheet against one table definition.
 */
export async function runTable(sheet: RawSheet, table: Readonly<TableDefinition>, context: TableRunContext): Promise<TableReport> {
  const log = context.logger;
  const fields = describeFields(table);
  const findings: ValidationFinding[] = [];
  const report: TableReport = emptyReport(context.tableId, fields, "failed", findings);
  report.meta.sourceId = sheet.sourceId;
  report.meta.sheetName = sheet.sheetName;

  let current: PipelineStep = "locate";
  const checkpoint = async (step: PipelineStep): Promise<void> => {
    await yieldToEventLoop();
    if (context.shouldStop?.()) throw new CancelledError(step);
    current = step;
  };

  try {
    await checkpoint("locate");
    const region = locateTable(sheet, locatorOptionsFor(table, numericLabelProbe(table)));
    report.meta.title = region.metadata.title;
    report.meta.unit = region.metadata.unit;
    report.meta.headerRows = [region.headerStart + 1, region.headerEnd + 1];
    report.meta.dataRows = [region.dataStart + 1, region.dataEnd + 1];
    report.meta.totalRows = region.rows.length;
    report.meta.excludedRows = [...region.preamble, ...region.rows].flatMap((r): ExcludedRow[] =>
      r.tag.kind === "excluded" ? [{ row: r.index + 1, reason: r.tag.reason, label: r.tag.label }] : [],
    );
    log?.debug({ headerRows: report.meta.headerRows, dataRows: report.meta.dataRows }, "table located");

    await checkpoint("map");
    const mapping = mapColumns(sheet, region, table);
    report.meta.columnMap = mapping.columns;
    findings.push(...mapping.findings);
    log?.debug({ absentFields: mapping.absentFields }, "columns mapped");

    await checkpoint("clean");
    const cleaned = cleanRecords(sheet, region, mapping, table);
    findings.push(...cleaned.findings);
    report.meta.parsedRows = cleaned.records.length;
    if (!cleaned.records.length) {
      findings.push(
        createFinding({ severity: "error", rule: "no_records", step: "clean", message: "no data row survived cleaning" }),
      );
    }
    log?.debug({ records: cleaned.records.length, dropped: cleaned.droppedRows.length }, "values cleaned");

    await checkpoint("derive");
    const derived: CanonicalRecord[] = deriveMetrics(cleaned.records, table);

    await checkpoint("validate");
    findings.push(...validateRecords(derived, table));

    report.status = tableStatus(findings);
    if (report.status !== "failed") report.records = derived;
  } catch (err) {
    if (!(err instanceof PipelineError)) {
      // unexpected defects stay table-scoped like every other failure
      log?.error({ err, step: current }, "table step crashed");
      report.status = "failed";
      findings.push(
        createFinding({
          severity: "error",
          rule: "internal_error",
          step: current,
          message: `${current} step crashed: ${err instanceof Error ? err.message : String(err)}`,
        }),
      );
      return report;
    }
    if (err instanceof CancelledError) {
      report.status = "cancelled";
      log?.warn({ step: err.step }, "table cancelled");
    } else {
      report.status = "failed";
      findings.push(findingFromError(err));
    }
  }
  return report;
}
