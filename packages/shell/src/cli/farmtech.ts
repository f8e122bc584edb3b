#!/usr/bin/env node
// packages/shell/src/cli/farmtech.ts
import { config as loadDotenv } from "dotenv";

import { importRecordsFromCsv } from "../../../codec/src/csv-file.js";
import { summarizeRecords } from "../../../compute/src/statistics.js";
import { loadInputCatalog } from "../../../model/src/catalog.js";
import type { InputCatalog } from "../../../model/src/catalog.js";
import { isFarmError } from "../../../model/src/errors.js";
import { InMemoryRecordStore } from "../../../records/src/in-memory-store.js";
import { resolveConfig } from "../config.js";
import type { FarmConfig } from "../config.js";
import { formatSummary } from "../display.js";
import { logError } from "../log.js";
import { createReadlinePrompter } from "../prompter.js";
import { FarmSession } from "../session.js";

function usage(): string {
  return `farmtech - field crop records

Usage:
  farmtech --help
  farmtech [menu] [--catalog <path>] [--out <path>]
  farmtech stats <file.csv> [--catalog <path>] [--json]

Options:
  --catalog <path>   input catalog JSON (default: data/crop_inputs.json, env FARMTECH_CATALOG)
  --out <path>       CSV written by "Export data to CSV" (default: crop_data.csv, env FARMTECH_EXPORT)
  --json             print the statistics as JSON

A .env file in the working directory is read before the environment.

Examples:
  farmtech
  farmtech --catalog ./my_inputs.json --out ./fields.csv
  farmtech stats crop_data.csv
`;
}

const VALUE_FLAGS = new Set(["--catalog", "--out"]);

/** Arguments that are neither flags nor the value of a flag. */
function positionals(args: string[]): string[] {
  const out: string[] = [];
  for (let i = 0; i < args.length; i++) {
    const a = args[i] ?? "";
    if (VALUE_FLAGS.has(a)) {
      i++;
      continue;
    }
    if (!a.startsWith("-")) out.push(a);
  }
  return out;
}

function openCatalog(cfg: FarmConfig): InputCatalog | null {
  try {
    return loadInputCatalog(cfg.catalogPath);
  } catch (e) {
    if (!isFarmError(e, "CATALOG_ERROR")) throw e;
    logError(e.message);
    return null;
  }
}

async function cmdMenu(cfg: FarmConfig): Promise<number> {
  const catalog = openCatalog(cfg);
  if (!catalog) return 1;

  const prompter = createReadlinePrompter();
  try {
    await new FarmSession({ catalog, prompter, exportPath: cfg.exportPath }).run();
  } finally {
    prompter.close();
  }
  return 0;
}

function cmdStats(cfg: FarmConfig, file: string, asJson: boolean): number {
  const catalog = openCatalog(cfg);
  if (!catalog) return 1;

  const store = new InMemoryRecordStore();
  try {
    importRecordsFromCsv(store, catalog, file);
  } catch (e) {
    if (!isFarmError(e)) throw e;
    logError(e.message);
    return 1;
  }

  const summary = summarizeRecords(store.list());
  if (asJson) {
    process.stdout.write(JSON.stringify(summary, null, 2) + "\n");
  } else {
    process.stdout.write(formatSummary(summary).join("\n") + "\n");
  }
  return 0;
}

export async function run(argv: string[] = process.argv): Promise<number> {
  const args = argv.slice(2);

  if (args.includes("--help") || args.includes("-h")) {
    process.stdout.write(usage());
    return 0;
  }

  loadDotenv();
  const cfg = resolveConfig(args, process.env);
  const [cmd = "menu", file] = positionals(args);

  if (cmd === "menu") return cmdMenu(cfg);

  if (cmd === "stats") {
    if (!file) {
      logError("Missing file.\n");
      process.stderr.write(usage());
      return 1;
    }
    return cmdStats(cfg, file, args.includes("--json"));
  }

  logError(`Unknown command: ${cmd}\n`);
  process.stderr.write(usage());
  return 1;
}

// Entrypoint: only when this file is the invoked script (node dist or tsx)
const argv1 = process.argv[1] ?? "";
if (argv1.endsWith("farmtech.ts") || argv1.endsWith("farmtech.js") || argv1.endsWith("farmtech")) {
  run(process.argv).then(
    (code) => {
      process.exitCode = code;
    },
    (e: unknown) => {
      logError(e instanceof Error ? (e.stack ?? e.message) : String(e));
      process.exitCode = 1;
    }
  );
}
