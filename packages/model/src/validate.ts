import { z } from "zod";

import { FarmError } from "./errors.js";
import type { CropCatalogEntry } from "./schema.js";

/* ------------------------------------------------------------------ */
/*                              Primitives                            */
/* ------------------------------------------------------------------ */

const Label = z.string().trim().min(1, "Must be a non-empty string");
// Object records cannot hold a "__proto__" key, so it would vanish silently.
const Key = z
  .string()
  .min(1, "Keys must be non-empty")
  .refine((k) => k !== "__proto__", "Key '__proto__' is reserved");

/* ------------------------------------------------------------------ */
/*                             Input kinds                            */
/* ------------------------------------------------------------------ */

const InputKindInfoSchema = z.object({
  name: Label,
  unit: Label,
});

const CropInputsSchema = z.record(Key, InputKindInfoSchema);

/* ------------------------------------------------------------------ */
/*                               Catalog                              */
/* ------------------------------------------------------------------ */

// Zod v4 record requires (keyType, valueType)
export const InputCatalogDocumentSchema = z
  .record(Key, CropInputsSchema)
  .refine((doc) => Object.keys(doc).length > 0, "Catalog must declare at least one crop type");

/**
 * Validates a parsed catalog document and returns its crop types with their
 * input kinds, both in declared (object key) order.
 */
export function parseCatalogEntries(input: unknown): CropCatalogEntry[] {
  const r = InputCatalogDocumentSchema.safeParse(input);
  if (!r.success) {
    const issues = r.error.issues.map((i) => {
      const at = i.path.length ? i.path.map(String).join(".") : "(root)";
      return `${at}: ${i.message}`;
    });
    throw new FarmError("CATALOG_ERROR", `Invalid input catalog: ${issues.join("; ")}`, { issues });
  }

  return Object.entries(r.data).map(([crop_type, inputs]) => ({
    crop_type,
    inputs: Object.entries(inputs).map(([id, info]) => ({ id, name: info.name, unit: info.unit })),
  }));
}
