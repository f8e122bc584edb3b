// packages/codec/src/csv-file.ts
import * as fs from "node:fs";

import type { InputCatalog } from "../../model/src/catalog.js";
import { FarmError, errorMessage } from "../../model/src/errors.js";
import type { RecordStore } from "../../records/src/store.js";
import { parseRecordsCsv, recordsToCsv } from "./csv.js";

export type ExportResult =
  | { ok: true; path: string; rows: number; columns: string[] }
  | { ok: false; reason: "NO_DATA" };

export type ImportResult = {
  path: string;
  rows: number;
};

function isErrnoException(e: unknown): e is NodeJS.ErrnoException {
  return e instanceof Error && "code" in e;
}

/**
 * Writes the whole store to `filePath`, replacing any previous content.
 * An empty store leaves the file alone.
 */
export function exportRecordsToCsv(store: RecordStore, catalog: InputCatalog, filePath: string): ExportResult {
  const records = store.list();
  if (records.length === 0) return { ok: false, reason: "NO_DATA" };

  const doc = recordsToCsv(records, catalog);
  try {
    fs.writeFileSync(filePath, doc.text, "utf8");
  } catch (e) {
    throw new FarmError("IO_ERROR", `Cannot write ${filePath}: ${errorMessage(e)}`, { path: filePath }, { cause: e });
  }

  return { ok: true, path: filePath, rows: records.length, columns: doc.columns };
}

export function readCsvFile(filePath: string): string {
  try {
    return fs.readFileSync(filePath, "utf8");
  } catch (e) {
    const message =
      isErrnoException(e) && e.code === "ENOENT"
        ? `File '${filePath}' not found. Please make sure the file exists and try again.`
        : `Cannot open '${filePath}': ${errorMessage(e)}`;
    throw new FarmError("MISSING_FILE", message, { path: filePath }, { cause: e });
  }
}

/**
 * All-or-nothing: the store is replaced only after every row parsed.
 */
export function importRecordsFromCsv(store: RecordStore, catalog: InputCatalog, filePath: string): ImportResult {
  const records = parseRecordsCsv(readCsvFile(filePath), catalog);
  store.replaceAll(records);
  return { path: filePath, rows: records.length };
}
