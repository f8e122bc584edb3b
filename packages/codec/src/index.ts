// ---------- Column schema ----------
export {
  FIXED_COLUMNS,
  MEASUREMENT_FIELDS,
  OrderedColumnSet,
  computeColumnSchema,
  measurementColumn,
} from "./column-schema.js";

export type { FixedColumn, MeasurementField } from "./column-schema.js";

// ---------- Rows ----------
export { flattenRecord, unflattenRow } from "./flatten.js";
export type { FlatRow } from "./flatten.js";

// ---------- CSV ----------
export { recordsToCsv, parseRecordsCsv } from "./csv.js";
export type { CsvDocument } from "./csv.js";

export { exportRecordsToCsv, importRecordsFromCsv, readCsvFile } from "./csv-file.js";
export type { ExportResult, ImportResult } from "./csv-file.js";
