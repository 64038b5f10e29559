/**
 * Pipeline run configuration
 *
 * Paths, worker count, timeout and mode for a run.
 * Override via environment variables or CLI flags.
 */
import { z } from "zod";
import { ConfigError } from "./errors.js";

export interface PipelineConfig {
  /** Directory the source files in the registry are resolved against */
  dataDir: string;
  /** Schema registry JSON document */
  registryPath: string;
  /** Directory exporters write to */
  outputDir: string;
  /** Maximum tables processed at once */
  concurrency: number;
  /** Run-level timeout in milliseconds (0 = none) */
  timeoutMs: number;
  /** Run every step but hand nothing to exporters */
  validateOnly: boolean;
  logLevel: string;
}

const LOG_LEVELS = ["fatal", "error", "warn", "info", "debug", "trace", "silent"] as const;

const configSchema = z.object({
  dataDir: z.string().min(1),
  registryPath: z.string().min(1),
  outputDir: z.string().min(1),
  concurrency: z.number().int().min(1).max(64),
  timeoutMs: z.number().int().nonnegative(),
  validateOnly: z.boolean(),
  logLevel: z.enum(LOG_LEVELS),
});

const envNumber = (raw: string | undefined, fallback: number): number => (raw === undefined || raw === "" ? fallback : Number(raw));
const envFlag = (raw: string | undefined): boolean => raw === "true" || raw === "1";

export function loadConfig(overrides: Partial<PipelineConfig> = {}, env: NodeJS.ProcessEnv = process.env): PipelineConfig {
  const candidate = {
    dataDir: overrides.dataDir ?? env.TABULAR_DATA_DIR ?? "./data",
    registryPath: overrides.registryPath ?? env.TABULAR_REGISTRY_PATH ?? "./config/tables.json",
    outputDir: overrides.outputDir ?? env.TABULAR_OUTPUT_DIR ?? "./output",
    concurrency: overrides.concurrency ?? envNumber(env.TABULAR_CONCURRENCY, 4),
    timeoutMs: overrides.timeoutMs ?? envNumber(env.TABULAR_TIMEOUT_MS, 0),
    validateOnly: overrides.validateOnly ?? envFlag(env.TABULAR_VALIDATE_ONLY),
    logLevel: overrides.logLevel ?? env.LOG_LEVEL ?? "info",
  };
  const parsed = configSchema.safeParse(candidate);
  if (!parsed.success) {
    throw new ConfigError(
      "invalid pipeline configuration",
      parsed.error.issues.map((issue) => ({ path: issue.path.join("."), message: issue.message })),
    );
  }
  return parsed.data;
}
