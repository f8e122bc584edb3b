import { describe, it, expect } from "vitest";

import { FIXED_COLUMNS, OrderedColumnSet, computeColumnSchema } from "../src/column-schema.js";
import { testCatalog } from "../../model/__tests__/_helpers/catalog.js";
import { mixedRecords, record } from "./_helpers/records.js";

function group(kind: string): string[] {
  return [`${kind}_name`, `${kind}_amount_per_ha`, `${kind}_total_amount`, `${kind}_unit`];
}

describe("OrderedColumnSet", () => {
  it("keeps first-insertion order and ignores repeats", () => {
    const s = new OrderedColumnSet(["b", "a"]);
    s.add("c");
    s.add("a");

    expect(s.columns()).toEqual(["b", "a", "c"]);
  });
});

describe("computeColumnSchema", () => {
  it("is just the fixed columns without measurements", () => {
    expect(computeColumnSchema([], testCatalog()).columns()).toEqual([...FIXED_COLUMNS]);
    expect(computeColumnSchema([record("Corn", 10, 10, 1)], testCatalog()).columns()).toEqual([
      "type",
      "length",
      "width",
      "area",
      "num_rows",
    ]);
  });

  it("unions kinds across records in first-met order, catalog order inside a record", () => {
    const cols = computeColumnSchema(mixedRecords(), testCatalog()).columns();

    expect(cols).toEqual([...FIXED_COLUMNS, ...group("fertilizer"), ...group("nitrogen"), ...group("herbicide")]);
  });

  it("is stable across calls", () => {
    const a = computeColumnSchema(mixedRecords(), testCatalog()).columns();
    const b = computeColumnSchema(mixedRecords(), testCatalog()).columns();
    expect(b).toEqual(a);
  });
});
