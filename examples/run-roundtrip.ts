// examples/run-roundtrip.ts
import * as fs from "node:fs";
import * as os from "node:os";
import * as path from "node:path";

import { exportRecordsToCsv, importRecordsFromCsv } from "../packages/codec/src/index.js";
import { summarizeRecords } from "../packages/compute/src/index.js";
import { loadInputCatalog } from "../packages/model/src/index.js";
import { InMemoryRecordStore, buildCropRecord } from "../packages/records/src/index.js";
import { formatRecords, formatSummary } from "../packages/shell/src/index.js";

// ---- tiny assert helper ----
function assert(cond: unknown, msg: string): asserts cond {
  if (!cond) throw new Error(msg);
}

const catalog = loadInputCatalog("data/crop_inputs.json");

const store = new InMemoryRecordStore();
store.append(
  buildCropRecord(catalog, {
    crop_type: "Soybean",
    length: 100,
    width: 50,
    num_rows: 10,
    amounts_per_ha: new Map([["fertilizer", 200]]),
  })
);
store.append(
  buildCropRecord(catalog, {
    crop_type: "Sugarcane",
    length: 400,
    width: 250,
    num_rows: 160,
    amounts_per_ha: new Map([
      ["limestone", 2],
      ["fertilizer", 450],
    ]),
  })
);

const dir = fs.mkdtempSync(path.join(os.tmpdir(), "farmtech-example-"));
const file = path.join(dir, "crop_data.csv");

const exported = exportRecordsToCsv(store, catalog, file);
assert(exported.ok, "export should write a file");
console.log(`exported ${exported.rows} rows, columns: ${exported.columns.join(", ")}`);

const restored = new InMemoryRecordStore();
importRecordsFromCsv(restored, catalog, file);
assert(
  JSON.stringify(restored.list().map((r) => [...r.measurements.keys()])) ===
    JSON.stringify(store.list().map((r) => [...r.measurements.keys()])),
  "measurement kinds should survive the round trip"
);

for (const line of formatRecords(restored.list())) console.log(line);
console.log("");
for (const line of formatSummary(summarizeRecords(restored.list()))) console.log(line);
