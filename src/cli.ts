#!/usr/bin/env node
/**
 * Table normalization CLI
 *
 * Usage:
 *   tabular-normalize --all
 *   tabular-normalize --tables trade_values,exports_by_region --validate-only
 *   tabular-normalize --all --registry ./config/tables.json --data-dir ./data --out-dir ./output
 */
import { createFileSheetAccessor } from "./accessor.js";
import { loadConfig, type PipelineConfig } from "./config.js";
import { RegistryError } from "./errors.js";
import { createJsonExporter } from "./exporters.js";
import { createLogger } from "./logger.js";
import { formatRunSummary, runExitCode, runPipeline } from "./pipeline.js";
import { loadSchemaRegistry } from "./schema.js";

interface CliFlags extends Partial<PipelineConfig> {
  tables?: string[];
  all?: boolean;
  help?: boolean;
}

function parseFlags(args: string[]): CliFlags {
  const flags: CliFlags = {};

  for (let i = 0; i < args.length; i++) {
    const arg = args[i];
    if (arg === "--help" || arg === "-h") flags.help = true;
    else if (arg === "--all") flags.all = true;
    else if (arg === "--validate-only") flags.validateOnly = true;
    else if (arg === "--tables" && args[i + 1]) flags.tables = args[++i].split(",").map((t) => t.trim()).filter(Boolean);
    else if (arg === "--registry" && args[i + 1]) flags.registryPath = args[++i];
    else if (arg === "--data-dir" && args[i + 1]) flags.dataDir = args[++i];
    else if (arg === "--out-dir" && args[i + 1]) flags.outputDir = args[++i];
    else if (arg === "--concurrency" && args[i + 1]) flags.concurrency = parseInt(args[++i], 10);
    else if (arg === "--timeout" && args[i + 1]) flags.timeoutMs = parseInt(args[++i], 10);
    else if (arg === "--log-level" && args[i + 1]) flags.logLevel = args[++i];
    else throw new Error(`Unknown or incomplete flag: ${arg}`);
  }

  return flags;
}

function printUsage() {
  console.log(`
Spreadsheet table normalization pipeline

Usage:
  tabular-normalize (--all | --tables <id,id>) [flags]

Flags:
  --tables <ids>         Comma-separated table ids from the registry
  --all                  Process every registered table
  --validate-only        Run every step but write no output
  --registry <path>      Schema registry JSON (default: ./config/tables.json)
  --data-dir <dir>       Directory source files are resolved against (default: ./data)
  --out-dir <dir>        Directory for exported tables (default: ./output)
  --concurrency <n>      Tables processed at once (default: 4)
  --timeout <ms>         Cancel unfinished tables after this many milliseconds
  --log-level <level>    fatal|error|warn|info|debug|trace|silent (default: info)

Exit codes:
  0  every table passed (warnings allowed)
  1  at least one table or export failed
  2  tables were cancelled
`);
}

async function main(): Promise<number> {
  const { tables, all, help, ...overrides } = parseFlags(process.argv.slice(2));
  if (help || (!all && !tables?.length)) {
    printUsage();
    return help ? 0 : 1;
  }

  const config = loadConfig(overrides);
  // logs go to stderr so stdout carries only the summary
  const logger = createLogger(config.logLevel, process.stderr);
  const registry = await loadSchemaRegistry(config.registryPath);

  const report = await runPipeline({
    tables: all ? registry.tableIds() : tables ?? [],
    registry,
    accessor: createFileSheetAccessor(config.dataDir),
    exporters: [createJsonExporter(config.outputDir)],
    validateOnly: config.validateOnly,
    concurrency: config.concurrency,
    timeoutMs: config.timeoutMs,
    logger,
  });

  console.log(formatRunSummary(report));
  return runExitCode(report);
}

main().then(
  (code) => {
    process.exitCode = code;
  },
  (err: unknown) => {
    if (err instanceof RegistryError) console.error(`${err.code}: ${err.message}`);
    else console.error("Fatal error:", err);
    process.exitCode = 1;
  },
);
