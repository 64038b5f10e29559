import type { CellValue, RawSheet } from "./types.js";

export interface CsvSheetOptions {
  sourceId: string;
  sheetName?: string;
  delimiter?: string;
}

/**
 * Parse CSV text into a raw cell grid using a simple state machine that handles
 * quoted fields, doubled-quote escapes and delimiters within quotes.
 * Empty fields become `null`; everything else stays text for the cleaner to coerce.
 */
export function parseCsvToSheet(csvText: string, options: CsvSheetOptions): RawSheet {
  const delimiter = options.delimiter ?? ",";
  const text = csvText.charCodeAt(0) === 0xfeff ? csvText.slice(1) : csvText;
  const rows: CellValue[][] = [];
  let current: CellValue[] = [];
  let field = "";
  let inQuotes = false;

  const pushField = () => {
    current.push(field === "" ? null : field);
    field = "";
  };
  const pushRow = () => {
    rows.push(current);
    current = [];
  };

  for (let i = 0; i < text.length; i++) {
    const c = text[i];
    if (inQuotes) {
      if (c === `"`) {
        if (text[i + 1] === `"`) {
          field += `"`;
          i++;
        } else {
          inQuotes = false;
        }
      } else {
        field += c;
      }
    } else if (c === `"`) {
      inQuotes = true;
    } else if (c === delimiter) {
      pushField();
    } else if (c === "\n") {
      pushField();
      pushRow();
    } else if (c !== "\r") {
      field += c;
    }
  }
  pushField();
  pushRow();
  // Trim possible trailing empty last row
  if (rows.length && rows[rows.length - 1].every((v) => v === null)) rows.pop();

  return Object.freeze({
    sourceId: options.sourceId,
    sheetName: options.sheetName ?? options.sourceId,
    cells: Object.freeze(rows.map((r) => Object.freeze(r))),
  });
}
