export { buildCropRecord, cloneRecord } from "./record.js";

export type { RecordStore } from "./store.js";
export { InMemoryRecordStore } from "./in-memory-store.js";
