import * as path from "node:path";

import { exportRecordsToCsv, importRecordsFromCsv } from "../../codec/src/csv-file.js";
import type { InputCatalog } from "../../model/src/catalog.js";
import { isFarmError } from "../../model/src/errors.js";
import type { CropRecord, InputKindId } from "../../model/src/schema.js";
import { InMemoryRecordStore } from "../../records/src/in-memory-store.js";
import { buildCropRecord } from "../../records/src/record.js";
import type { RecordStore } from "../../records/src/store.js";
import { formatRecords } from "./display.js";
import type { Prompter } from "./prompter.js";
import { EndOfInputError, askCropType, askInteger, askLine, askNumber, toInteger } from "./prompts.js";

export type FarmSessionOptions = {
  catalog: InputCatalog;
  prompter: Prompter;
  exportPath: string;
  store?: RecordStore;
};

export const MENU_LINES = [
  "--- FarmTech Menu ---",
  "1. Enter crop data",
  "2. Display crop data",
  "3. Update crop data",
  "4. Delete crop data",
  "5. Export data to CSV",
  "6. Import data from CSV",
  "7. Exit",
] as const;

/**
 * One interactive session: owns the record store and dispatches menu choices.
 */
export class FarmSession {
  readonly store: RecordStore;
  private readonly catalog: InputCatalog;
  private readonly p: Prompter;
  private readonly exportPath: string;

  constructor(opts: FarmSessionOptions) {
    this.catalog = opts.catalog;
    this.p = opts.prompter;
    this.exportPath = opts.exportPath;
    this.store = opts.store ?? new InMemoryRecordStore();
  }

  async run(): Promise<void> {
    try {
      let running = true;
      while (running) running = await this.step();
    } catch (e) {
      if (!(e instanceof EndOfInputError)) throw e;
      this.p.print("");
      this.p.print("Input closed. Goodbye!");
    }
  }

  /** Shows the menu, runs one choice; false once the operator exits. */
  async step(): Promise<boolean> {
    this.p.print("");
    for (const line of MENU_LINES) this.p.print(line);

    const choice = (await askLine(this.p, "Enter your choice (1-7): ")).trim();
    switch (choice) {
      case "1":
        await this.enterRecord();
        return true;
      case "2":
        this.displayRecords();
        return true;
      case "3":
        await this.updateRecord();
        return true;
      case "4":
        await this.deleteRecord();
        return true;
      case "5":
        this.exportRecords();
        return true;
      case "6":
        await this.importRecords();
        return true;
      case "7":
        this.p.print("Exiting the program. Goodbye!");
        return false;
      default:
        this.p.print("Invalid choice. Please try again.");
        return true;
    }
  }

  async enterRecord(): Promise<void> {
    this.store.append(await this.promptRecord());
    this.p.print("Data added successfully.");
  }

  displayRecords(): void {
    for (const line of formatRecords(this.store.list())) this.p.print(line);
  }

  async updateRecord(): Promise<void> {
    if (this.store.size() === 0) {
      this.p.print("No data available to update.");
      return;
    }
    const position = await this.askPosition("Enter the index of the crop to update: ");
    if (position === null) return;

    const record = await this.promptRecord();
    this.store.updateAt(position, record);
    this.p.print("Data updated successfully.");
  }

  async deleteRecord(): Promise<void> {
    if (this.store.size() === 0) {
      this.p.print("No data available to delete.");
      return;
    }
    const position = await this.askPosition("Enter the index of the crop to delete: ");
    if (position === null) return;

    this.store.deleteAt(position);
    this.p.print("Data deleted successfully.");
  }

  exportRecords(): void {
    try {
      const r = exportRecordsToCsv(this.store, this.catalog, this.exportPath);
      if (!r.ok) {
        this.p.print("No data available to export.");
        return;
      }
      this.p.print(`Data exported to ${path.basename(r.path)} successfully.`);
    } catch (e) {
      if (!isFarmError(e)) throw e;
      this.p.print(`Error: ${e.message}`);
    }
  }

  async importRecords(): Promise<void> {
    const filename = (await askLine(this.p, "Enter the name of the CSV file to import: ")).trim();
    try {
      const r = importRecordsFromCsv(this.store, this.catalog, filename);
      this.p.print(`Successfully imported ${r.rows} crops from ${filename}.`);
    } catch (e) {
      if (!isFarmError(e)) throw e;
      this.p.print(e.code === "MISSING_FILE" ? e.message : `Error: ${e.message}`);
    }
  }

  /** Null (after "Invalid index.") when the answer names no stored record. */
  private async askPosition(question: string): Promise<number | null> {
    const answer = await askLine(this.p, question);
    let position: number;
    try {
      position = toInteger(answer, "positive");
    } catch (e) {
      if (!isFarmError(e, "INVALID_NUMBER")) throw e;
      this.p.print("Invalid index.");
      return null;
    }
    if (this.store.get(position) === null) {
      this.p.print("Invalid index.");
      return null;
    }
    return position;
  }

  private async promptRecord(): Promise<CropRecord> {
    const crop_type = await askCropType(this.p, this.catalog);

    const length = await askNumber(this.p, "Enter field length (in meters): ", "positive");
    const width = await askNumber(this.p, "Enter field width (in meters): ", "positive");
    const num_rows = await askInteger(this.p, "Enter the number of rows in the field: ", "non-negative");

    const amounts_per_ha = new Map<InputKindId, number>();
    this.p.print("");
    this.p.print("Enter the quantity for each input (or 0 to skip):");
    for (const kind of this.catalog.inputKinds(crop_type)) {
      const perHa = await askNumber(this.p, `${kind.id} (${kind.name}) in ${kind.unit} per hectare: `, "non-negative");
      if (perHa > 0) amounts_per_ha.set(kind.id, perHa);
    }

    return buildCropRecord(this.catalog, { crop_type, length, width, num_rows, amounts_per_ha });
  }
}
