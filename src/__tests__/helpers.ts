import { createSchemaRegistry, type RegistryInput, type SchemaRegistry, type TableDefinition } from "../schema.js";
import type { CellValue, RawSheet } from "../types.js";

export const sheetOf = (cells: CellValue[][], sheetName = "Sheet1", sourceId = "test.xlsx"): RawSheet => ({
  sourceId,
  sheetName,
  cells,
});

export function tableFrom(def: RegistryInput["tables"][string], id = "t"): Readonly<TableDefinition> {
  const registry = createSchemaRegistry({ version: 1, tables: { [id]: def } });
  const table = registry.get(id);
  if (!table) throw new Error(`table ${id} not registered`);
  return table;
}

export const registryOf = (tables: RegistryInput["tables"]): SchemaRegistry => createSchemaRegistry({ version: 1, tables });

// Year / Exports / Imports with balance and growth, the smallest complete table family.
export const TRADE_TABLE: RegistryInput["tables"][string] = {
  fields: [
    { id: "period", type: "period", required: true, labels: ["Year"] },
    { id: "export_value", type: "numeric", required: true, labels: ["Exports"] },
    { id: "import_value", type: "numeric", required: true, labels: ["Imports"] },
  ],
  derived: [
    { id: "trade_balance", formula: "balance", a: "export_value", b: "import_value" },
    { id: "export_growth", formula: "growth_rate", of: "export_value" },
  ],
};

export const TRADE_SHEET: CellValue[][] = [
  ["Year", "Exports", "Imports"],
  [2023, 100, 80],
  [2024, 120, 80],
];
