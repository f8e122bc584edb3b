import type { CropRecord, CropType, InputKindId } from "../../model/src/schema.js";

export type SeriesStats = {
  total: number;
  mean: number | null; // null for an empty series
  sd: number | null; // sample sd; null for <= 1 value or all-equal values
};

export type CropTypeSummary = {
  crop_type: CropType;
  count: number;
  area: SeriesStats;
  num_rows: SeriesStats;
};

export type MaterialUsage = {
  kind: InputKindId;
  name: string;
  unit: string;
  total_amount: number;
  mean_amount_per_ha: number;
  sd_amount_per_ha: number | null; // null when used by a single record or none
  records_using: number;
};

export type RecordSummary = {
  crop_count: number;
  area: SeriesStats;
  num_rows: SeriesStats;
  by_crop_type: CropTypeSummary[];
  materials: MaterialUsage[];
};

export function describeSeries(values: readonly number[]): SeriesStats {
  const total = values.reduce((acc, v) => acc + v, 0);
  if (values.length === 0) return { total, mean: null, sd: null };

  const mean = total / values.length;
  return { total, mean, sd: sampleStdDev(values, mean) };
}

function sampleStdDev(values: readonly number[], mean: number): number | null {
  if (values.length <= 1) return null;
  if (new Set(values).size === 1) return null;

  const ss = values.reduce((acc, v) => acc + (v - mean) ** 2, 0);
  return Math.sqrt(ss / (values.length - 1));
}

/**
 * Aggregates over a list of records:
 * - area / row totals, means and sample sd
 * - the same per crop type (sorted by name)
 * - per input kind usage, in first-seen order; a record without the kind
 *   counts as 0 towards the per-ha mean and sd
 */
export function summarizeRecords(records: readonly CropRecord[]): RecordSummary {
  const byType = new Map<CropType, CropRecord[]>();
  for (const r of records) {
    const list = byType.get(r.crop_type);
    if (list) list.push(r);
    else byType.set(r.crop_type, [r]);
  }

  const by_crop_type: CropTypeSummary[] = [...byType.entries()]
    .sort(([a], [b]) => a.localeCompare(b))
    .map(([crop_type, list]) => ({
      crop_type,
      count: list.length,
      area: describeSeries(list.map((r) => r.area)),
      num_rows: describeSeries(list.map((r) => r.num_rows)),
    }));

  return {
    crop_count: records.length,
    area: describeSeries(records.map((r) => r.area)),
    num_rows: describeSeries(records.map((r) => r.num_rows)),
    by_crop_type,
    materials: summarizeMaterials(records),
  };
}

function summarizeMaterials(records: readonly CropRecord[]): MaterialUsage[] {
  const kinds: InputKindId[] = [];
  for (const r of records) {
    for (const kind of r.measurements.keys()) {
      if (!kinds.includes(kind)) kinds.push(kind);
    }
  }

  const out: MaterialUsage[] = [];

  for (const kind of kinds) {
    const perHa = records.map((r) => r.measurements.get(kind)?.amount_per_ha ?? 0);
    const totals = records.map((r) => r.measurements.get(kind)?.total_amount ?? 0);

    const total_amount = totals.reduce((acc, v) => acc + v, 0);
    if (total_amount <= 0) continue;

    const first = records.map((r) => r.measurements.get(kind)).find((m) => m !== undefined);
    const records_using = perHa.filter((v) => v > 0).length;
    const stats = describeSeries(perHa);

    out.push({
      kind,
      name: first?.name ?? kind,
      unit: first?.unit ?? "",
      total_amount,
      mean_amount_per_ha: stats.mean ?? 0,
      sd_amount_per_ha: records_using <= 1 ? null : stats.sd,
      records_using,
    });
  }

  return out;
}
