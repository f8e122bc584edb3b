// packages/model/src/catalog.ts
import * as fs from "node:fs";

import { FarmError, errorMessage } from "./errors.js";
import type { CropCatalogEntry, CropType, InputKind, InputKindId } from "./schema.js";
import { parseCatalogEntries } from "./validate.js";

/**
 * Read-only mapping from crop type to the input kinds that apply to it.
 * Crop types and kinds keep the order they were declared in.
 */
export class InputCatalog {
  private readonly entries: ReadonlyMap<CropType, readonly InputKind[]>;

  constructor(entries: CropCatalogEntry[]) {
    const m = new Map<CropType, readonly InputKind[]>();
    for (const e of entries) {
      if (m.has(e.crop_type)) {
        throw new FarmError("CATALOG_ERROR", `Duplicate crop type: ${e.crop_type}`);
      }
      m.set(e.crop_type, Object.freeze(e.inputs.map((k) => Object.freeze({ ...k }))));
    }
    this.entries = m;
  }

  cropTypes(): CropType[] {
    return [...this.entries.keys()];
  }

  hasCropType(crop_type: string): boolean {
    return this.entries.has(crop_type);
  }

  /** 1-based, as presented to the operator. */
  cropTypeAt(position: number): CropType {
    const types = this.cropTypes();
    const t = Number.isInteger(position) ? types[position - 1] : undefined;
    if (t === undefined) {
      throw new FarmError("INVALID_CHOICE", `Choose a crop type between 1 and ${types.length}.`, { position });
    }
    return t;
  }

  inputKinds(crop_type: CropType): readonly InputKind[] {
    const kinds = this.entries.get(crop_type);
    if (!kinds) {
      throw new FarmError("UNKNOWN_CROP_TYPE", `Unknown crop type: ${crop_type}`);
    }
    return kinds;
  }

  inputKind(crop_type: CropType, id: InputKindId): InputKind | null {
    return this.inputKinds(crop_type).find((k) => k.id === id) ?? null;
  }
}

export function parseInputCatalog(input: unknown): InputCatalog {
  return new InputCatalog(parseCatalogEntries(input));
}

/**
 * Loads the catalog document from disk. Every failure is a CATALOG_ERROR:
 * the process cannot do anything useful without one.
 */
export function loadInputCatalog(filePath: string): InputCatalog {
  let raw: string;
  try {
    raw = fs.readFileSync(filePath, "utf8");
  } catch (e) {
    throw new FarmError("CATALOG_ERROR", `Cannot read input catalog ${filePath}: ${errorMessage(e)}`, { path: filePath }, { cause: e });
  }

  let doc: unknown;
  try {
    doc = JSON.parse(raw);
  } catch (e) {
    throw new FarmError("CATALOG_ERROR", `Input catalog ${filePath} is not valid JSON. First 120 chars: ${raw.slice(0, 120)}`, { path: filePath }, { cause: e });
  }

  return parseInputCatalog(doc);
}
