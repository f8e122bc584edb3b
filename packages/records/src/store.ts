// packages/records/src/store.ts
import type { CropRecord } from "../../model/src/schema.js";

/**
 * RecordStore contract
 * - Ordered; positions are 1-based (as shown to the operator).
 * - Mutators are all-or-nothing: a failed call leaves content and order as-is.
 * - Records are copied on the way in and out; callers never share them.
 */
export type RecordStore = {
  append(record: CropRecord): void;

  /** Replace in place. INDEX_OUT_OF_RANGE if there is no such position. */
  updateAt(position: number, record: CropRecord): void;

  /** Remove one record; later ones shift down. INDEX_OUT_OF_RANGE if invalid. */
  deleteAt(position: number): CropRecord;

  /** Swap the whole content (import). */
  replaceAll(records: readonly CropRecord[]): void;

  get(position: number): CropRecord | null;
  list(): readonly CropRecord[];
  size(): number;
};
