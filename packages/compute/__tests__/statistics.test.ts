import { describe, it, expect } from "vitest";

import { describeSeries, summarizeRecords } from "../src/statistics.js";
import type { CropRecord } from "../../model/src/schema.js";
import { buildCropRecord } from "../../records/src/record.js";
import { testCatalog } from "../../model/__tests__/_helpers/catalog.js";

function fixtures(): CropRecord[] {
  const c = testCatalog();
  return [
    buildCropRecord(c, {
      crop_type: "Soybean",
      length: 100,
      width: 50,
      num_rows: 10,
      amounts_per_ha: new Map([["fertilizer", 200]]),
    }),
    buildCropRecord(c, {
      crop_type: "Soybean",
      length: 200,
      width: 50,
      num_rows: 20,
      amounts_per_ha: new Map([
        ["fertilizer", 100],
        ["herbicide", 2],
      ]),
    }),
    buildCropRecord(c, {
      crop_type: "Corn",
      length: 100,
      width: 100,
      num_rows: 30,
      amounts_per_ha: new Map([["nitrogen", 50]]),
    }),
  ];
}

describe("describeSeries", () => {
  it("uses the sample standard deviation", () => {
    expect(describeSeries([10, 20, 30])).toEqual({ total: 60, mean: 20, sd: 10 });
  });

  it("has no sd for one value or identical values, no mean for none", () => {
    expect(describeSeries([4])).toEqual({ total: 4, mean: 4, sd: null });
    expect(describeSeries([2, 2, 2])).toEqual({ total: 6, mean: 2, sd: null });
    expect(describeSeries([])).toEqual({ total: 0, mean: null, sd: null });
  });
});

describe("summarizeRecords", () => {
  it("aggregates area and rows over all records", () => {
    const s = summarizeRecords(fixtures());

    expect(s.crop_count).toBe(3);
    expect(s.area.total).toBe(2.5);
    expect(s.area.mean).toBeCloseTo(2.5 / 3, 12);
    expect(s.area.sd).toBeCloseTo(Math.sqrt(1 / 12), 12);
    expect(s.num_rows).toEqual({ total: 60, mean: 20, sd: 10 });
  });

  it("groups by crop type, sorted by name", () => {
    const s = summarizeRecords(fixtures());

    expect(s.by_crop_type.map((t) => t.crop_type)).toEqual(["Corn", "Soybean"]);

    const [corn, soy] = s.by_crop_type;
    expect(corn.count).toBe(1);
    expect(corn.area).toEqual({ total: 1, mean: 1, sd: null });
    expect(corn.num_rows).toEqual({ total: 30, mean: 30, sd: null });

    expect(soy.count).toBe(2);
    expect(soy.area.total).toBe(1.5);
    expect(soy.area.mean).toBe(0.75);
    expect(soy.area.sd).toBeCloseTo(Math.sqrt(0.125), 12);
    expect(soy.num_rows.mean).toBe(15);
    expect(soy.num_rows.sd).toBeCloseTo(Math.sqrt(50), 12);
  });

  it("lists material usage in first-seen order, counting absent kinds as zero", () => {
    const s = summarizeRecords(fixtures());

    expect(s.materials.map((m) => m.kind)).toEqual(["fertilizer", "herbicide", "nitrogen"]);

    const [fert, herb, nitro] = s.materials;
    expect(fert).toEqual({
      kind: "fertilizer",
      name: "NPK 02-20-20",
      unit: "kg",
      total_amount: 200,
      mean_amount_per_ha: 100,
      sd_amount_per_ha: 100,
      records_using: 2,
    });

    expect(herb.total_amount).toBe(2);
    expect(herb.mean_amount_per_ha).toBeCloseTo(2 / 3, 12);
    expect(herb.sd_amount_per_ha).toBeNull();
    expect(herb.records_using).toBe(1);

    expect(nitro.unit).toBe("kg");
    expect(nitro.total_amount).toBe(50);
    expect(nitro.sd_amount_per_ha).toBeNull();
  });

  it("omits materials whose total is zero", () => {
    const r: CropRecord = {
      crop_type: "Soybean",
      length: 10,
      width: 10,
      area: 0.01,
      num_rows: 1,
      measurements: new Map([["herbicide", { name: "Glyphosate", amount_per_ha: 0, total_amount: 0, unit: "L" }]]),
    };

    expect(summarizeRecords([r]).materials).toEqual([]);
  });

  it("summarizes an empty list", () => {
    const s = summarizeRecords([]);

    expect(s.crop_count).toBe(0);
    expect(s.area).toEqual({ total: 0, mean: null, sd: null });
    expect(s.by_crop_type).toEqual([]);
    expect(s.materials).toEqual([]);
  });
});
