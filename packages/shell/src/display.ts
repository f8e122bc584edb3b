import type { RecordSummary, SeriesStats } from "../../compute/src/statistics.js";
import type { CropRecord } from "../../model/src/schema.js";

function fixed2(n: number): string {
  return n.toFixed(2);
}

function orNA(n: number | null): string {
  return n === null ? "N/A" : fixed2(n);
}

export function formatRecord(r: CropRecord, position: number): string[] {
  const lines = [
    `Crop ${position}:`,
    `Type: ${r.crop_type}`,
    `Field dimensions: ${r.length}m x ${r.width}m`,
    `Area: ${fixed2(r.area)} ha`,
    `Number of rows: ${r.num_rows}`,
    "Input Management:",
  ];

  for (const [kind, m] of r.measurements) {
    lines.push(`  ${kind} (${m.name}):`);
    lines.push(`    Amount per hectare: ${fixed2(m.amount_per_ha)} ${m.unit}`);
    lines.push(`    Total amount needed: ${fixed2(m.total_amount)} ${m.unit}`);
  }

  return lines;
}

export function formatRecords(records: readonly CropRecord[]): string[] {
  if (records.length === 0) return ["No data available."];

  const out: string[] = [];
  records.forEach((r, i) => {
    out.push("");
    out.push(...formatRecord(r, i + 1));
  });
  return out;
}

function seriesLines(title: string, s: SeriesStats, total: (n: number) => string): string[] {
  return [
    `${title}:`,
    `  Total across all crops: ${total(s.total)}`,
    `  Average / crop: ${orNA(s.mean)}`,
    `  Standard Deviation: ${orNA(s.sd)}`,
    "",
  ];
}

export function formatSummary(s: RecordSummary): string[] {
  const out: string[] = ["Statistical Analysis Results:", `Total number of crops: ${s.crop_count}`, ""];

  out.push(...seriesLines("Area (ha)", s.area, fixed2));
  out.push(...seriesLines("Number of Rows", s.num_rows, String));

  out.push("Data Summary by Crop Type:");
  for (const t of s.by_crop_type) {
    out.push(`  ${t.crop_type}:`);
    out.push(`    Count: ${t.count}`);
    out.push(`    Total Area (ha): ${fixed2(t.area.total)}`);
    out.push(`    Avg Area / Crop (ha): ${orNA(t.area.mean)}`);
    out.push(`    SD Area (ha): ${orNA(t.area.sd)}`);
    out.push(`    Total Rows: ${t.num_rows.total}`);
    out.push(`    Avg Rows / Crop: ${orNA(t.num_rows.mean)}`);
    out.push(`    SD Rows: ${orNA(t.num_rows.sd)}`);
  }
  out.push("");

  out.push("Full List of Material Usage:");
  for (const m of s.materials) {
    out.push(`${m.kind} (${m.name}):`);
    out.push(`  Total Amount: ${fixed2(m.total_amount)} ${m.unit}`);
    out.push(`  Avg Amount / ha: ${fixed2(m.mean_amount_per_ha)} ${m.unit}`);
    out.push(
      m.sd_amount_per_ha === null
        ? "  SD / crops using material: N/A (used by single crop or not used)"
        : `  SD / crops using material: ${fixed2(m.sd_amount_per_ha)} ${m.unit}`
    );
    out.push(`  Number of crops using: ${m.records_using}`);
    out.push("");
  }

  return out;
}
