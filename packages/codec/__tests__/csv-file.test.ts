import { describe, it, expect } from "vitest";
import * as fs from "node:fs";
import * as os from "node:os";
import * as path from "node:path";

import { exportRecordsToCsv, importRecordsFromCsv } from "../src/csv-file.js";
import { isFarmError } from "../../model/src/errors.js";
import type { FarmErrorCode } from "../../model/src/errors.js";
import { InMemoryRecordStore } from "../../records/src/in-memory-store.js";
import { testCatalog } from "../../model/__tests__/_helpers/catalog.js";
import { mixedRecords, record } from "./_helpers/records.js";

function tmpdir(): string {
  return fs.mkdtempSync(path.join(os.tmpdir(), "farmtech-csv-"));
}

function expectCode(fn: () => unknown, code: FarmErrorCode): void {
  try {
    fn();
  } catch (e) {
    expect(isFarmError(e, code)).toBe(true);
    return;
  }
  throw new Error(`expected ${code}`);
}

describe("CSV export", () => {
  it("does nothing for an empty store", () => {
    const dir = tmpdir();
    const f = path.join(dir, "crop_data.csv");

    expect(exportRecordsToCsv(new InMemoryRecordStore(), testCatalog(), f)).toEqual({ ok: false, reason: "NO_DATA" });
    expect(fs.existsSync(f)).toBe(false);

    fs.writeFileSync(f, "keep me\n", "utf8");
    exportRecordsToCsv(new InMemoryRecordStore(), testCatalog(), f);
    expect(fs.readFileSync(f, "utf8")).toBe("keep me\n");
  });

  it("overwrites the target and reports what it wrote", () => {
    const dir = tmpdir();
    const f = path.join(dir, "crop_data.csv");
    fs.writeFileSync(f, "old content\n".repeat(50), "utf8");

    const r = exportRecordsToCsv(new InMemoryRecordStore([record("Corn", 10, 10, 2)]), testCatalog(), f);

    expect(r).toEqual({ ok: true, path: f, rows: 1, columns: ["type", "length", "width", "area", "num_rows"] });
    expect(fs.readFileSync(f, "utf8")).toBe("type,length,width,area,num_rows\nCorn,10,10,0.01,2\n");
  });

  it("writes identical bytes when re-exporting unchanged data", () => {
    const dir = tmpdir();
    const a = path.join(dir, "a.csv");
    const b = path.join(dir, "b.csv");
    const store = new InMemoryRecordStore(mixedRecords());

    exportRecordsToCsv(store, testCatalog(), a);
    exportRecordsToCsv(store, testCatalog(), b);
    expect(fs.readFileSync(b, "utf8")).toBe(fs.readFileSync(a, "utf8"));
  });

  it("fails with IO_ERROR when the target cannot be written", () => {
    const dir = tmpdir();
    const store = new InMemoryRecordStore([record("Corn", 10, 10, 2)]);
    expectCode(() => exportRecordsToCsv(store, testCatalog(), path.join(dir, "missing-dir", "x.csv")), "IO_ERROR");
  });
});

describe("CSV import", () => {
  it("restores an exported store", () => {
    const dir = tmpdir();
    const f = path.join(dir, "crop_data.csv");
    const original = new InMemoryRecordStore(mixedRecords());
    exportRecordsToCsv(original, testCatalog(), f);

    const restored = new InMemoryRecordStore([record("Corn", 1, 1, 1)]);
    const r = importRecordsFromCsv(restored, testCatalog(), f);

    expect(r).toEqual({ path: f, rows: 4 });
    expect(restored.list()).toEqual(original.list());
  });

  it("reports a missing file and keeps the store", () => {
    const dir = tmpdir();
    const store = new InMemoryRecordStore([record("Corn", 10, 10, 2)]);
    const before = store.list();

    expectCode(() => importRecordsFromCsv(store, testCatalog(), path.join(dir, "nope.csv")), "MISSING_FILE");
    expect(store.list()).toEqual(before);
  });

  it("keeps the store when a later row names an unknown crop type", () => {
    const dir = tmpdir();
    const f = path.join(dir, "rice.csv");
    fs.writeFileSync(f, "type,length,width,area,num_rows\nSoybean,100,50,0.5,10\nRice,10,10,0.01,1\n", "utf8");

    const store = new InMemoryRecordStore([record("Corn", 10, 10, 2)]);
    const before = store.list();

    expectCode(() => importRecordsFromCsv(store, testCatalog(), f), "UNKNOWN_CROP_TYPE");
    expect(store.list()).toEqual(before);
  });

  it("keeps the store when a cell does not parse", () => {
    const dir = tmpdir();
    const f = path.join(dir, "bad.csv");
    fs.writeFileSync(f, "type,length,width,area,num_rows\nSoybean,100,50,0.5,ten\n", "utf8");

    const store = new InMemoryRecordStore([record("Corn", 10, 10, 2)]);
    expectCode(() => importRecordsFromCsv(store, testCatalog(), f), "PARSE_ERROR");
    expect(store.size()).toBe(1);
  });

  it("keeps the store when a fixed column is absent", () => {
    const dir = tmpdir();
    const f = path.join(dir, "short.csv");
    fs.writeFileSync(f, "type,length,width\nSoybean,100,50\n", "utf8");

    const store = new InMemoryRecordStore([record("Corn", 10, 10, 2)]);
    expectCode(() => importRecordsFromCsv(store, testCatalog(), f), "SCHEMA_ERROR");
    expect(store.size()).toBe(1);
  });
});
