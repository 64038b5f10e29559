import { readFile } from "node:fs/promises";
import { extname, resolve } from "node:path";
import { parseCsvToSheet } from "./csv.js";
import { SourceReadError } from "./errors.js";
import type { RawSheet } from "./types.js";
import { readWorkbookSheet } from "./xlsx.js";

/**
 * Module: Source Accessors
 * Purpose: Yield a complete in-memory `RawSheet` per (file, sheet) pair. The core never
 * sees file handles; the file is read in one call and released before locating starts.
 */
export interface SourceLocation {
  file: string;
  sheet?: string | number;
}

export interface SheetAccessor {
  read(location: SourceLocation): Promise<RawSheet>;
}

/**
 * Default accessor resolving locations against `baseDir` and dispatching on extension.
 */
export function createFileSheetAccessor(baseDir: string): SheetAccessor {
  return {
    async read(location) {
      const path = resolve(baseDir, location.file);
      const ext = extname(path).toLowerCase();
      if (ext !== ".xlsx" && ext !== ".xls" && ext !== ".csv") {
        throw new SourceReadError(`${location.file}: unsupported file type "${ext || "(none)"}"`);
      }
      let bytes: Buffer;
      try {
        bytes = await readFile(path);
      } catch (err) {
        throw new SourceReadError(`${location.file}: ${err instanceof Error ? err.message : String(err)}`);
      }
      if (ext === ".csv") {
        return parseCsvToSheet(bytes.toString("utf8"), {
          sourceId: location.file,
          sheetName: typeof location.sheet === "string" ? location.sheet : undefined,
        });
      }
      return readWorkbookSheet(bytes, { sourceId: location.file, sheet: location.sheet });
    },
  };
}
