// FarmTech record model v1
// Types only. No functions.

/* ----------------------------- Catalog ------------------------------ */

export type CropType = string;
export type InputKindId = string;

export interface InputKind {
  id: InputKindId;
  name: string;
  unit: string; // "kg", "L", ...
}

export interface CropCatalogEntry {
  crop_type: CropType;
  inputs: InputKind[]; // declared order
}

/* ----------------------------- Records ------------------------------ */

export interface Measurement {
  name: string;
  amount_per_ha: number;
  total_amount: number; // area * amount_per_ha
  unit: string;
}

export interface CropRecord {
  crop_type: CropType;

  length: number; // meters
  width: number; // meters
  area: number; // hectares

  num_rows: number;

  // present kinds only, in catalog order
  measurements: ReadonlyMap<InputKindId, Measurement>;
}

/**
 * What the operator supplies for a new record. Area and totals are derived.
 */
export interface CropRecordDraft {
  crop_type: CropType;
  length: number;
  width: number;
  num_rows: number;
  amounts_per_ha: ReadonlyMap<InputKindId, number>;
}
