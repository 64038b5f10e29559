/**
 * Module: Public Entry Point
 * Purpose: Re-export the pipeline steps, registry, readers and orchestrator so callers
 * can run a whole batch (`runPipeline`) or a single sheet (`runTable`).
 */
export * from "./types.js";
export * from "./errors.js";
export * from "./period.js";
export {
  createSchemaRegistry,
  loadSchemaRegistry,
  DEFAULT_SENTINELS,
  type DerivedSpec,
  type FieldSpec,
  type LayoutSpec,
  type RegistryInput,
  type RuleSpec,
  type SchemaRegistry,
  type TableDefinition,
} from "./schema.js";
export { cellText, foldText, normalizeHeaderLabel, mapColumns, type ColumnAssignment, type ColumnMapResult } from "./semantics.js";
export { locateTable, locatorOptionsFor, type LocatorOptions } from "./locateTable.js";
export { cleanRecords, sanitizeCell, type CellOutcome, type CleanResult } from "./sanitize.js";
export { deriveMetrics, rollupByQuarter, growthRate, shareOfTotal, balance } from "./derive.js";
export { validateRecords, tableStatus } from "./validate.js";
export { runTable, type TableRunContext } from "./runTable.js";
export { parseCsvToSheet, type CsvSheetOptions } from "./csv.js";
export { readWorkbookSheet, type WorkbookSheetOptions } from "./xlsx.js";
export { createFileSheetAccessor, type SheetAccessor, type SourceLocation } from "./accessor.js";
export { createJsonExporter, createMemoryExporter, type Exporter, type MemoryExporter } from "./exporters.js";
export { runPipeline, runExitCode, formatRunSummary, type RunPipelineOptions, type TableJob } from "./pipeline.js";
export { loadConfig, type PipelineConfig } from "./config.js";
export { createLogger, type Logger } from "./logger.js";
