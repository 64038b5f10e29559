import type { FindingSeverity, PipelineStep, ValidationFinding } from "./types.js";

/**
 * Module: Error Taxonomy & Findings
 * Purpose: Table-scoped failures carry a stable `code` so the orchestrator can turn
 * them into `failed` reports; row and rule level problems never throw and are
 * recorded as immutable findings instead.
 */
export class PipelineError extends Error {
  constructor(
    public code: string,
    message: string,
    public step: PipelineStep,
  ) {
    super(message);
    this.name = "PipelineError";
  }
}

export class LayoutNotRecognizedError extends PipelineError {
  constructor(message: string) {
    super("LAYOUT_NOT_RECOGNIZED", message, "locate");
    this.name = "LayoutNotRecognizedError";
  }
}

export class SchemaMismatchError extends PipelineError {
  constructor(
    public missingFields: string[],
    tolerance: number,
  ) {
    super(
      "SCHEMA_MISMATCH",
      `required field(s) not found in header: ${missingFields.join(", ")} (tolerance ${tolerance})`,
      "map",
    );
    this.name = "SchemaMismatchError";
  }
}

export class UnknownTableError extends PipelineError {
  constructor(tableId: string) {
    super("UNKNOWN_TABLE", `no schema registered for table "${tableId}"`, "map");
    this.name = "UnknownTableError";
  }
}

export class SourceReadError extends PipelineError {
  constructor(message: string) {
    super("SOURCE_UNREADABLE", message, "read");
    this.name = "SourceReadError";
  }
}

export class CancelledError extends PipelineError {
  constructor(step: PipelineStep) {
    super("CANCELLED", `cancelled before ${step}`, step);
    this.name = "CancelledError";
  }
}

// Configuration errors happen before any table runs, so they carry zod-style issue paths.
export class RegistryError extends Error {
  constructor(
    public code: "REGISTRY_INVALID" | "CONFIG_INVALID",
    message: string,
    public details: Array<{ path: string; message: string }> = [],
  ) {
    super(details.length ? `${message}: ${details.map((d) => `${d.path || "<root>"} ${d.message}`).join("; ")}` : message);
    this.name = "RegistryError";
  }
}

export function createFinding(input: {
  severity: FindingSeverity;
  rule: string;
  step: PipelineStep;
  message: string;
  rows?: number[];
  fields?: string[];
}): ValidationFinding {
  return Object.freeze({
    severity: input.severity,
    rule: input.rule,
    step: input.step,
    message: input.message,
    rows: Object.freeze([...(input.rows ?? [])]),
    fields: Object.freeze([...(input.fields ?? [])]),
    fatal: input.severity === "error",
  });
}

export const findingFromError = (err: PipelineError): ValidationFinding =>
  createFinding({
    severity: "error",
    rule: err.code.toLowerCase(),
    step: err.step,
    message: err.message,
    fields: err instanceof SchemaMismatchError ? err.missingFields : [],
  });

export class ConfigError extends RegistryError {
  constructor(message: string, details: Array<{ path: string; message: string }> = []) {
    super("CONFIG_INVALID", message, details);
    this.name = "ConfigError";
  }
}
