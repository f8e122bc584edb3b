// packages/codec/src/column-schema.ts
import type { InputCatalog } from "../../model/src/catalog.js";
import type { CropRecord, InputKindId } from "../../model/src/schema.js";

export const FIXED_COLUMNS = ["type", "length", "width", "area", "num_rows"] as const;
export type FixedColumn = (typeof FIXED_COLUMNS)[number];

export const MEASUREMENT_FIELDS = ["name", "amount_per_ha", "total_amount", "unit"] as const;
export type MeasurementField = (typeof MEASUREMENT_FIELDS)[number];

export function measurementColumn(kind: InputKindId, field: MeasurementField): string {
  return `${kind}_${field}`;
}

/**
 * Insertion-ordered set of column names. Adding an existing name is a no-op,
 * so the first occurrence fixes the position.
 */
export class OrderedColumnSet {
  private readonly names: string[] = [];
  private readonly seen = new Set<string>();

  constructor(initial: Iterable<string> = []) {
    for (const n of initial) this.add(n);
  }

  add(name: string): void {
    if (this.seen.has(name)) return;
    this.seen.add(name);
    this.names.push(name);
  }

  columns(): string[] {
    return [...this.names];
  }
}

/**
 * Pass 1 of export: the fixed columns, then four columns per input kind that
 * any record carries. Kinds appear in the order first met across records;
 * inside one record the catalog order of its crop type decides.
 */
export function computeColumnSchema(records: readonly CropRecord[], catalog: InputCatalog): OrderedColumnSet {
  const set = new OrderedColumnSet(FIXED_COLUMNS);

  for (const r of records) {
    for (const kind of catalog.inputKinds(r.crop_type)) {
      if (!r.measurements.has(kind.id)) continue;
      for (const field of MEASUREMENT_FIELDS) set.add(measurementColumn(kind.id, field));
    }
  }

  return set;
}
