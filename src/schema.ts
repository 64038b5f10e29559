import { readFile } from "node:fs/promises";
import { z } from "zod";
import { RegistryError } from "./errors.js";
import { normalizeHeaderLabel } from "./semantics.js";

/**
 * Module: Schema Registry
 * Purpose: Declare, per table family, the canonical fields (labels, semantic types,
 * sentinels), derived formulas and validation rules. The registry is parsed once with
 * zod, cross-checked, deep-frozen and then passed to every table run as a read-only
 * context object.
 */
export const DEFAULT_SENTINELS = ["", "-", "–", "—", "…", "...", "－"];

const DEFAULT_LAYOUT = {
  scanWindow: 20,
  maxHeaderRows: 4,
  footnotePrefixes: ["註", "注", "說明", "資料來源", "note", "source", "*"],
  comparisonPrefixes: ["較上", "比較", "增減", "compared with", "change from", "vs"],
  subHeaderPrefixes: ["單位", "unit:"],
  unitMarkers: ["單位", "unit"],
};

function isValidRegExp(source: string): boolean {
  try {
    new RegExp(source, "u");
    return true;
  } catch {
    return false;
  }
}

const fieldIdSchema = z.string().regex(/^[a-z][a-z0-9_]*$/, "must be snake_case");

const fieldSchema = z.object({
  id: fieldIdSchema,
  type: z.enum(["numeric", "percentage", "categorical", "period"]),
  required: z.boolean().default(false),
  labels: z.array(z.string().min(1)).min(1),
  sentinels: z.array(z.string()).default([]),
  calendar: z.enum(["gregorian", "roc"]).default("gregorian"),
  percentScale: z.enum(["percent", "fraction"]).default("percent"),
  description: z.string().optional(),
});

const derivedSchema = z.discriminatedUnion("formula", [
  z.object({
    id: fieldIdSchema,
    formula: z.literal("growth_rate"),
    of: z.string(),
    lag: z.enum(["previous", "year_over_year"]).default("previous"),
  }),
  z.object({ id: fieldIdSchema, formula: z.literal("share_of_total"), value: z.string(), total: z.string() }),
  z.object({ id: fieldIdSchema, formula: z.literal("balance"), a: z.string(), b: z.string() }),
  z.object({
    id: fieldIdSchema,
    formula: z.literal("cumulative"),
    of: z.string(),
    resetEvery: z.literal("year").optional(),
  }),
  z.object({ id: fieldIdSchema, formula: z.literal("scale"), of: z.string(), factor: z.number().finite() }),
]);

const ruleSchema = z.discriminatedUnion("kind", [
  z.object({
    id: z.string().optional(),
    kind: z.literal("range"),
    field: z.string(),
    min: z.number().optional(),
    max: z.number().optional(),
    fatal: z.boolean().default(false),
  }),
  z.object({
    id: z.string().optional(),
    kind: z.literal("arithmetic"),
    field: z.string(),
    op: z.enum(["difference", "sum", "ratio"]),
    operands: z.array(z.string()).min(1),
    tolerance: z.number().nonnegative().default(1e-6),
  }),
  z.object({
    id: z.string().optional(),
    kind: z.literal("share_sum"),
    shares: z.array(z.string()).min(1),
    values: z.array(z.string()).optional(),
    total: z.string().optional(),
    // category-per-row breakdowns: sum the single share field over records with equal `groupBy` values
    groupBy: z.string().optional(),
    expected: z.number().default(1),
    tolerance: z.number().nonnegative().default(0.005),
  }),
  z.object({
    id: z.string().optional(),
    kind: z.literal("period_sequence"),
    field: z.string().optional(),
  }),
]);

const layoutSchema = z.object({
  minHeaderCells: z.number().int().positive().optional(),
  scanWindow: z.number().int().positive().default(DEFAULT_LAYOUT.scanWindow),
  maxHeaderRows: z.number().int().positive().default(DEFAULT_LAYOUT.maxHeaderRows),
  footnotePrefixes: z.array(z.string().min(1)).default(DEFAULT_LAYOUT.footnotePrefixes),
  comparisonPrefixes: z.array(z.string().min(1)).default(DEFAULT_LAYOUT.comparisonPrefixes),
  // regular expressions tested against the folded lead cell, e.g. "^\\d{1,2}月$" for month-only restatements
  comparisonPatterns: z.array(z.string().refine(isValidRegExp, "invalid regular expression")).default([]),
  subHeaderPrefixes: z.array(z.string().min(1)).default(DEFAULT_LAYOUT.subHeaderPrefixes),
  unitMarkers: z.array(z.string().min(1)).default(DEFAULT_LAYOUT.unitMarkers),
});

const tableObjectSchema = z.object({
  title: z.string().optional(),
  source: z.object({ file: z.string().min(1), sheet: z.union([z.string(), z.number().int().nonnegative()]).optional() }).optional(),
  layout: layoutSchema.default({}),
  decimalSeparator: z.enum([".", ","]).default("."),
  unmappedRequiredTolerance: z.number().int().nonnegative().default(0),
  fields: z.array(fieldSchema).min(1),
  derived: z.array(derivedSchema).default([]),
  rules: z.array(ruleSchema).default([]),
});

const tableSchema = tableObjectSchema.superRefine((table, ctx) => checkCrossReferences(table, ctx));

const registrySchema = z.object({
  version: z.literal(1),
  sentinels: z.array(z.string()).default(DEFAULT_SENTINELS),
  tables: z.record(z.string().regex(/^[A-Za-z0-9_.-]+$/), tableSchema),
});

type ParsedTable = z.output<typeof tableObjectSchema>;
export type FieldSpec = z.output<typeof fieldSchema>;
export type DerivedSpec = z.output<typeof derivedSchema>;
export type RuleSpec = z.output<typeof ruleSchema>;
export type LayoutSpec = z.output<typeof layoutSchema>;
export type RegistryInput = z.input<typeof registrySchema>;

export type TableDefinition = ParsedTable & {
  id: string;
  sentinels: string[]; // registry-wide sentinels; per-field ones live on each FieldSpec
  periodField?: string;
};

export interface SchemaRegistry {
  get(tableId: string): Readonly<TableDefinition> | undefined;
  tableIds(): string[];
}

export function derivedInputs(d: DerivedSpec): string[] {
  switch (d.formula) {
    case "growth_rate":
    case "cumulative":
    case "scale":
      return [d.of];
    case "share_of_total":
      return [d.value, d.total];
    case "balance":
      return [d.a, d.b];
  }
}

function checkCrossReferences(table: ParsedTable, ctx: z.RefinementCtx): void {
  const numeric = new Set<string>();
  const known = new Set<string>();
  const periodFields = table.fields.filter((f) => f.type === "period").map((f) => f.id);
  const labelOwner = new Map<string, string>();

  table.fields.forEach((f, i) => {
    if (known.has(f.id)) ctx.addIssue({ code: "custom", path: ["fields", i, "id"], message: `duplicate field id "${f.id}"` });
    known.add(f.id);
    if (f.type === "numeric" || f.type === "percentage") numeric.add(f.id);
    for (const label of f.labels) {
      const key = normalizeHeaderLabel(label);
      const owner = labelOwner.get(key);
      if (owner !== undefined && owner !== f.id) {
        ctx.addIssue({ code: "custom", path: ["fields", i, "labels"], message: `label "${label}" also maps to "${owner}"` });
      }
      labelOwner.set(key, f.id);
    }
  });
  if (periodFields.length > 1) {
    ctx.addIssue({ code: "custom", path: ["fields"], message: `at most one period field allowed, found ${periodFields.join(", ")}` });
  }

  table.derived.forEach((d, i) => {
    for (const input of derivedInputs(d)) {
      if (!numeric.has(input)) {
        ctx.addIssue({ code: "custom", path: ["derived", i], message: `"${input}" is not a numeric field declared before "${d.id}"` });
      }
    }
    if ((d.formula === "growth_rate" || d.formula === "cumulative") && periodFields.length === 0) {
      ctx.addIssue({ code: "custom", path: ["derived", i], message: `${d.formula} requires a period field` });
    }
    if (known.has(d.id)) ctx.addIssue({ code: "custom", path: ["derived", i, "id"], message: `duplicate field id "${d.id}"` });
    known.add(d.id);
    numeric.add(d.id);
  });

  table.rules.forEach((r, i) => {
    const refs: string[] = [];
    switch (r.kind) {
      case "range":
        refs.push(r.field);
        break;
      case "arithmetic":
        refs.push(r.field, ...r.operands);
        if (r.op !== "sum" && r.operands.length !== 2) {
          ctx.addIssue({ code: "custom", path: ["rules", i, "operands"], message: `${r.op} takes exactly two operands` });
        }
        break;
      case "share_sum":
        refs.push(...r.shares, ...(r.values ?? []), ...(r.total ? [r.total] : []));
        if (r.values && r.values.length !== r.shares.length) {
          ctx.addIssue({ code: "custom", path: ["rules", i, "values"], message: "values must parallel shares" });
        }
        if (r.groupBy && (r.shares.length !== 1 || r.values || r.total)) {
          ctx.addIssue({ code: "custom", path: ["rules", i, "groupBy"], message: "groupBy takes exactly one share field and no values or total" });
        }
        if (r.groupBy && !known.has(r.groupBy)) {
          ctx.addIssue({ code: "custom", path: ["rules", i, "groupBy"], message: `"${r.groupBy}" is not a declared field` });
        }
        break;
      case "period_sequence": {
        const target = r.field ?? periodFields[0];
        if (!target || !periodFields.includes(target)) {
          ctx.addIssue({ code: "custom", path: ["rules", i], message: "period_sequence requires a period field" });
        }
        break;
      }
    }
    for (const ref of refs) {
      if (!numeric.has(ref)) ctx.addIssue({ code: "custom", path: ["rules", i], message: `"${ref}" is not a numeric field` });
    }
  });
}

function deepFreeze<T extends object>(obj: T): T {
  for (const value of Object.values(obj)) {
    if (typeof value === "object" && value !== null && !Object.isFrozen(value)) deepFreeze(value);
  }
  return Object.freeze(obj);
}

/**
 * Validate an in-memory registry document and return the frozen registry.
 * Throws `RegistryError` listing every zod issue path when the document is invalid.
 */
export function createSchemaRegistry(input: unknown): SchemaRegistry {
  const parsed = registrySchema.safeParse(input);
  if (!parsed.success) {
    throw new RegistryError(
      "REGISTRY_INVALID",
      "schema registry is invalid",
      parsed.error.issues.map((issue) => ({ path: issue.path.join("."), message: issue.message })),
    );
  }
  const tables = new Map<string, Readonly<TableDefinition>>();
  for (const [id, table] of Object.entries(parsed.data.tables)) {
    const periodField = table.fields.find((f) => f.type === "period")?.id;
    tables.set(id, deepFreeze({ ...table, id, sentinels: [...parsed.data.sentinels], periodField }));
  }
  return Object.freeze({
    get: (tableId: string) => tables.get(tableId),
    tableIds: () => [...tables.keys()],
  });
}

export async function loadSchemaRegistry(path: string): Promise<SchemaRegistry> {
  let text: string;
  try {
    text = await readFile(path, "utf8");
  } catch (err) {
    throw new RegistryError("REGISTRY_INVALID", `cannot read schema registry ${path}: ${err instanceof Error ? err.message : String(err)}`);
  }
  let json: unknown;
  try {
    json = JSON.parse(text);
  } catch (err) {
    throw new RegistryError("REGISTRY_INVALID", `schema registry ${path} is not valid JSON: ${err instanceof Error ? err.message : String(err)}`);
  }
  return createSchemaRegistry(json);
}
