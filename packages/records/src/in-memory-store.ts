import { FarmError } from "../../model/src/errors.js";
import type { CropRecord } from "../../model/src/schema.js";
import { cloneRecord } from "./record.js";
import type { RecordStore } from "./store.js";

export class InMemoryRecordStore implements RecordStore {
  private records: CropRecord[] = [];

  constructor(initial: readonly CropRecord[] = []) {
    this.records = initial.map(cloneRecord);
  }

  append(record: CropRecord): void {
    this.records.push(cloneRecord(record));
  }

  updateAt(position: number, record: CropRecord): void {
    const idx = this.indexOf(position);
    this.records[idx] = cloneRecord(record);
  }

  deleteAt(position: number): CropRecord {
    const idx = this.indexOf(position);
    const [removed] = this.records.splice(idx, 1);
    return removed;
  }

  replaceAll(records: readonly CropRecord[]): void {
    this.records = records.map(cloneRecord);
  }

  get(position: number): CropRecord | null {
    if (!this.isValidPosition(position)) return null;
    return cloneRecord(this.records[position - 1]);
  }

  list(): readonly CropRecord[] {
    return this.records.map(cloneRecord);
  }

  size(): number {
    return this.records.length;
  }

  private isValidPosition(position: number): boolean {
    return Number.isInteger(position) && position >= 1 && position <= this.records.length;
  }

  private indexOf(position: number): number {
    if (!this.isValidPosition(position)) {
      throw new FarmError(
        "INDEX_OUT_OF_RANGE",
        this.records.length === 0
          ? `No record at position ${position}: the store is empty.`
          : `No record at position ${position}: choose between 1 and ${this.records.length}.`,
        { position }
      );
    }
    return position - 1;
  }
}
