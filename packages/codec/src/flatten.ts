import type { InputCatalog } from "../../model/src/catalog.js";
import { FarmError } from "../../model/src/errors.js";
import type { CropRecord, InputKindId, Measurement } from "../../model/src/schema.js";
import { formatNumberCell, parseIntegerCell, parseRealCell, requireRange } from "./cells.js";
import { measurementColumn } from "./column-schema.js";

/** One flat row: column name → cell text, in column order. */
export type FlatRow = ReadonlyMap<string, string>;

/**
 * Pass 2 of export for one record. Kinds the record does not carry are left
 * out of the row entirely.
 */
export function flattenRecord(record: CropRecord, catalog: InputCatalog): FlatRow {
  const row = new Map<string, string>([
    ["type", record.crop_type],
    ["length", formatNumberCell(record.length)],
    ["width", formatNumberCell(record.width)],
    ["area", formatNumberCell(record.area)],
    ["num_rows", formatNumberCell(record.num_rows)],
  ]);

  for (const kind of catalog.inputKinds(record.crop_type)) {
    const m = record.measurements.get(kind.id);
    if (!m) continue;
    row.set(measurementColumn(kind.id, "name"), m.name);
    row.set(measurementColumn(kind.id, "amount_per_ha"), formatNumberCell(m.amount_per_ha));
    row.set(measurementColumn(kind.id, "total_amount"), formatNumberCell(m.total_amount));
    row.set(measurementColumn(kind.id, "unit"), m.unit);
  }

  return row;
}

function requireCell(row: FlatRow, column: string, rowNumber: number): string {
  const v = row.get(column);
  if (v === undefined) {
    throw new FarmError("SCHEMA_ERROR", `Row ${rowNumber}: missing column '${column}'.`, { column, row: rowNumber });
  }
  return v;
}

/**
 * Rebuilds a record from a flat row (rowNumber is 1-based, for messages).
 * - area is taken from the row as-is
 * - a kind is present when its `{kind}_name` cell exists and is non-empty
 */
export function unflattenRow(row: FlatRow, catalog: InputCatalog, rowNumber: number): CropRecord {
  const at = (column: string) => ({ column, row: rowNumber });

  const crop_type = requireCell(row, "type", rowNumber);
  if (!catalog.hasCropType(crop_type)) {
    throw new FarmError("UNKNOWN_CROP_TYPE", `Row ${rowNumber}: unknown crop type '${crop_type}'.`, at("type"));
  }

  const length = parseRealCell(requireCell(row, "length", rowNumber), at("length"));
  requireRange(length, length > 0, "> 0", at("length"));

  const width = parseRealCell(requireCell(row, "width", rowNumber), at("width"));
  requireRange(width, width > 0, "> 0", at("width"));

  const area = parseRealCell(requireCell(row, "area", rowNumber), at("area"));
  requireRange(area, area >= 0, ">= 0", at("area"));

  const num_rows = parseIntegerCell(requireCell(row, "num_rows", rowNumber), at("num_rows"));
  requireRange(num_rows, num_rows >= 0, ">= 0", at("num_rows"));

  const measurements = new Map<InputKindId, Measurement>();
  for (const kind of catalog.inputKinds(crop_type)) {
    const nameCol = measurementColumn(kind.id, "name");
    const name = row.get(nameCol);
    if (name === undefined || name === "") continue;

    const perHaCol = measurementColumn(kind.id, "amount_per_ha");
    const totalCol = measurementColumn(kind.id, "total_amount");
    const unitCol = measurementColumn(kind.id, "unit");

    const amount_per_ha = parseRealCell(requireCell(row, perHaCol, rowNumber), at(perHaCol));
    requireRange(amount_per_ha, amount_per_ha >= 0, ">= 0", at(perHaCol));

    measurements.set(kind.id, {
      name,
      amount_per_ha,
      total_amount: parseRealCell(requireCell(row, totalCol, rowNumber), at(totalCol)),
      unit: requireCell(row, unitCol, rowNumber),
    });
  }

  return { crop_type, length, width, area, num_rows, measurements };
}
