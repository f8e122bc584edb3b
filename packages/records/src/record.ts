import { computeArea, computeTotalInput } from "../../compute/src/area.js";
import type { InputCatalog } from "../../model/src/catalog.js";
import { FarmError } from "../../model/src/errors.js";
import type { CropRecord, CropRecordDraft, InputKindId, Measurement } from "../../model/src/schema.js";

/**
 * Builds a record from operator input:
 * - crop type must be in the catalog
 * - area is derived from length × width
 * - one measurement per kind with amount > 0, in catalog order
 */
export function buildCropRecord(catalog: InputCatalog, draft: CropRecordDraft): CropRecord {
  const kinds = catalog.inputKinds(draft.crop_type);

  for (const id of draft.amounts_per_ha.keys()) {
    if (!catalog.inputKind(draft.crop_type, id)) {
      throw new FarmError("UNKNOWN_INPUT_KIND", `Input kind '${id}' does not apply to ${draft.crop_type}.`);
    }
  }

  if (!Number.isInteger(draft.num_rows) || draft.num_rows < 0) {
    throw new FarmError("INVALID_ARGUMENT", `Number of rows must be a non-negative integer (got ${draft.num_rows}).`);
  }

  const area = computeArea(draft.length, draft.width);

  const measurements = new Map<InputKindId, Measurement>();
  for (const kind of kinds) {
    const perHa = draft.amounts_per_ha.get(kind.id) ?? 0;
    const total_amount = computeTotalInput(area, perHa);
    if (perHa === 0) continue;

    measurements.set(kind.id, {
      name: kind.name,
      amount_per_ha: perHa,
      total_amount,
      unit: kind.unit,
    });
  }

  return {
    crop_type: draft.crop_type,
    length: draft.length,
    width: draft.width,
    area,
    num_rows: draft.num_rows,
    measurements,
  };
}

export function cloneRecord(r: CropRecord): CropRecord {
  const measurements = new Map<InputKindId, Measurement>();
  for (const [id, m] of r.measurements) measurements.set(id, { ...m });
  return { ...r, measurements };
}
