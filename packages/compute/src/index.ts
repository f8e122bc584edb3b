// ---------- Area and totals ----------
export { computeArea, computeTotalInput } from "./area.js";

// ---------- Statistics ----------
export { describeSeries, summarizeRecords } from "./statistics.js";

export type {
  CropTypeSummary,
  MaterialUsage,
  RecordSummary,
  SeriesStats,
} from "./statistics.js";
