import type { Logger } from "pino";
import type { SheetAccessor, SourceLocation } from "./accessor.js";
import { CancelledError, createFinding, findingFromError, PipelineError, SourceReadError, UnknownTableError } from "./errors.js";
import type { Exporter } from "./exporters.js";
import { createLogger } from "./logger.js";
import { describeFields, emptyReport, runTable } from "./runTable.js";
import type { SchemaRegistry } from "./schema.js";
import type { ExportFailure, PipelineStep, RawSheet, RunCounts, RunReport, TableReport, ValidationFinding } from "./types.js";

/**
 * Module: Pipeline Orchestrator
 * Purpose: Run the per-table core for a set of tables, independently and up to
 * `concurrency` at once, then hand publishable reports to exporters and aggregate a
 * run report.
 * Design:
 * - One table's failure never aborts the others; every table yields a report.
 * - A run timeout or the caller's `signal` stops in-flight tables at their next step
 *   boundary; they are reported `cancelled`, distinct from `failed`.
 * - No step is retried. Source I/O retries belong to the accessor.
 * - `tables` order is preserved in the run report regardless of completion order.
 */
export interface TableJob {
  tableId: string;
  source?: SourceLocation; // defaults to the registry's `source`
}

export interface RunPipelineOptions {
  tables: Array<string | TableJob>;
  registry: SchemaRegistry;
  accessor: SheetAccessor;
  exporters?: Exporter[];
  validateOnly?: boolean;
  exportFailed?: boolean; // also hand `failed` tables to exporters
  concurrency?: number;
  timeoutMs?: number;
  signal?: AbortSignal;
  logger?: Logger;
}

const messageOf = (err: unknown): string => (err instanceof Error ? err.message : String(err));

// Rejects with `CancelledError` as soon as the signal aborts, so a hung read cannot hold the run.
function untilAborted<T>(promise: Promise<T>, signal: AbortSignal, step: PipelineStep): Promise<T> {
  if (signal.aborted) return Promise.reject(new CancelledError(step));
  return new Promise<T>((resolve, reject) => {
    const onAbort = () => reject(new CancelledError(step));
    signal.addEventListener("abort", onAbort, { once: true });
    void promise.then(
      (value) => {
        signal.removeEventListener("abort", onAbort);
        resolve(value);
      },
      (err: unknown) => {
        signal.removeEventListener("abort", onAbort);
        reject(err);
      },
    );
  });
}

function linkedController(signal: AbortSignal | undefined, timeoutMs: number): { controller: AbortController; dispose: () => void } {
  const controller = new AbortController();
  const onAbort = () => controller.abort();
  if (signal?.aborted) controller.abort();
  else signal?.addEventListener("abort", onAbort, { once: true });
  const timer = timeoutMs > 0 ? setTimeout(onAbort, timeoutMs) : undefined;
  return {
    controller,
    dispose: () => {
      if (timer) clearTimeout(timer);
      signal?.removeEventListener("abort", onAbort);
    },
  };
}

export const countStatuses = (tables: readonly TableReport[]): RunCounts => ({
  attempted: tables.length,
  passed: tables.filter((t) => t.status === "passed").length,
  warned: tables.filter((t) => t.status === "passed-with-warnings").length,
  failed: tables.filter((t) => t.status === "failed").length,
  cancelled: tables.filter((t) => t.status === "cancelled").length,
});

export async function runPipeline(options: RunPipelineOptions): Promise<RunReport> {
  const startedAt = new Date().toISOString();
  const logger = options.logger ?? createLogger("silent");
  const jobs: TableJob[] = options.tables.map((t) => (typeof t === "string" ? { tableId: t } : t));
  const concurrency = Math.max(1, Math.min(options.concurrency ?? 4, jobs.length || 1));
  const validateOnly = options.validateOnly ?? false;
  const exporters = options.exporters ?? [];
  const { controller, dispose } = linkedController(options.signal, options.timeoutMs ?? 0);
  const signal = controller.signal;
  const exportFailures: ExportFailure[] = [];
  const exportFindings: Array<ValidationFinding & { tableId: string }> = [];

  logger.info({ tables: jobs.length, concurrency, validateOnly }, "pipeline run started");

  const exportReport = async (report: TableReport, log: Logger): Promise<void> => {
    const publishable = report.status === "passed" || report.status === "passed-with-warnings";
    if (validateOnly || !(publishable || (options.exportFailed && report.status === "failed"))) return;
    for (const exporter of exporters) {
      try {
        await exporter.export(report);
        log.debug({ exporter: exporter.name }, "table exported");
      } catch (err) {
        const message = messageOf(err);
        log.error({ exporter: exporter.name, err }, "export failed");
        exportFailures.push({ tableId: report.tableId, exporter: exporter.name, message });
        exportFindings.push({
          ...createFinding({ severity: "error", rule: "export_failed", step: "export", message: `${exporter.name}: ${message}` }),
          tableId: report.tableId,
        });
      }
    }
  };

  const processTable = async (job: TableJob): Promise<TableReport> => {
    const log = logger.child({ tableId: job.tableId });
    const table = options.registry.get(job.tableId);
    if (!table) {
      log.error("table not registered");
      return emptyReport(job.tableId, [], "failed", [findingFromError(new UnknownTableError(job.tableId))]);
    }
    const fields = describeFields(table);
    if (signal.aborted) return emptyReport(job.tableId, fields, "cancelled", []);

    const source = job.source ?? table.source;
    let sheet: RawSheet;
    try {
      if (!source) throw new SourceReadError(`no source location for table "${job.tableId}"`);
      log.debug({ source }, "reading source");
      sheet = await untilAborted(options.accessor.read(source), signal, "read");
    } catch (err) {
      if (err instanceof CancelledError) return emptyReport(job.tableId, fields, "cancelled", []);
      const failure = err instanceof PipelineError ? err : new SourceReadError(messageOf(err));
      log.error({ code: failure.code }, failure.message);
      return emptyReport(job.tableId, fields, "failed", [findingFromError(failure)]);
    }

    const report = await runTable(sheet, table, { tableId: job.tableId, shouldStop: () => signal.aborted, logger: log });

    const errors = report.findings.filter((f) => f.severity === "error").length;
    const counts = { errors, warnings: report.findings.length - errors, records: report.records?.length ?? 0 };
    if (report.status === "failed") log.error(counts, "table failed");
    else if (report.status === "passed-with-warnings") log.warn(counts, "table passed with warnings");
    else if (report.status === "passed") log.info(counts, "table passed");

    await exportReport(report, log);
    return report;
  };

  const reports: TableReport[] = [];
  let next = 0;
  const worker = async (): Promise<void> => {
    while (next < jobs.length) {
      const i = next++;
      reports[i] = await processTable(jobs[i]);
    }
  };
  try {
    await Promise.all(Array.from({ length: concurrency }, () => worker()));
  } finally {
    dispose();
  }

  const counts = countStatuses(reports);
  const findings = [
    ...reports.flatMap((r) => r.findings.map((f) => ({ ...f, tableId: r.tableId }))),
    ...exportFindings,
  ];
  logger.info({ ...counts, exportFailures: exportFailures.length }, "pipeline run finished");
  return {
    startedAt,
    finishedAt: new Date().toISOString(),
    validateOnly,
    counts,
    tables: reports,
    findings,
    exportFailures,
  };
}

/**
 * 0 when every table passed (warnings allowed) and every export succeeded,
 * 1 when any table or export failed, 2 when tables were only cancelled.
 */
export function runExitCode(report: Pick<RunReport, "counts" | "exportFailures">): 0 | 1 | 2 {
  if (report.counts.failed > 0 || report.exportFailures.length > 0) return 1;
  if (report.counts.cancelled > 0) return 2;
  return 0;
}

export function formatRunSummary(report: RunReport): string {
  const c = report.counts;
  const lines = [
    `tables: ${c.attempted} attempted, ${c.passed} passed, ${c.warned} warned, ${c.failed} failed, ${c.cancelled} cancelled${report.validateOnly ? " (validate-only)" : ""}`,
  ];
  for (const t of report.tables) {
    lines.push(`- ${t.tableId}: ${t.status}${t.records ? ` (${t.records.length} records)` : ""}`);
    for (const f of t.findings) lines.push(`    ${f.severity} ${f.step}/${f.rule}: ${f.message}`);
  }
  for (const e of report.exportFailures) lines.push(`- export ${e.exporter} failed for ${e.tableId}: ${e.message}`);
  return lines.join("\n");
}
