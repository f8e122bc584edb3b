import { parse } from "csv-parse/sync";
import { stringify } from "csv-stringify/sync";
import { z } from "zod";

import type { InputCatalog } from "../../model/src/catalog.js";
import { FarmError, errorMessage } from "../../model/src/errors.js";
import type { CropRecord } from "../../model/src/schema.js";
import { FIXED_COLUMNS, computeColumnSchema } from "./column-schema.js";
import { flattenRecord, unflattenRow } from "./flatten.js";

const CsvTableSchema = z.array(z.array(z.string()));

export type CsvDocument = {
  columns: string[];
  text: string;
};

/**
 * Two passes: compute the column union, then write one row per record.
 * Cells of kinds a record does not carry stay empty.
 */
export function recordsToCsv(records: readonly CropRecord[], catalog: InputCatalog): CsvDocument {
  const columns = computeColumnSchema(records, catalog).columns();
  const rows = records.map((r) => Object.fromEntries(flattenRecord(r, catalog)));

  const text = stringify(rows, { header: true, columns });
  return { columns, text };
}

function readTable(text: string): string[][] {
  let raw: unknown;
  try {
    raw = parse(text, { bom: true, skip_empty_lines: true, relax_column_count: true });
  } catch (e) {
    throw new FarmError("PARSE_ERROR", `Malformed CSV: ${errorMessage(e)}`, {}, { cause: e });
  }

  const r = CsvTableSchema.safeParse(raw);
  if (!r.success) {
    throw new FarmError("PARSE_ERROR", "Malformed CSV: expected rows of text cells.");
  }
  return r.data;
}

/**
 * Parses every row before returning; the first failing row aborts the whole
 * document. Short rows simply lack their trailing columns.
 */
export function parseRecordsCsv(text: string, catalog: InputCatalog): CropRecord[] {
  const [header, ...body] = readTable(text);
  if (!header) {
    throw new FarmError("SCHEMA_ERROR", "CSV has no header row.");
  }

  const missing = FIXED_COLUMNS.filter((c) => !header.includes(c));
  if (missing.length) {
    throw new FarmError("SCHEMA_ERROR", `CSV header is missing column(s): ${missing.join(", ")}.`, {
      column: missing[0],
    });
  }

  return body.map((cells, i) => {
    const row = new Map<string, string>();
    header.forEach((column, j) => {
      const v = cells[j];
      if (v !== undefined) row.set(column, v);
    });
    return unflattenRow(row, catalog, i + 1);
  });
}
