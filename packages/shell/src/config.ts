// packages/shell/src/config.ts
import * as path from "node:path";
import { z } from "zod";

export const DEFAULT_CATALOG_PATH = "data/crop_inputs.json";
export const DEFAULT_EXPORT_PATH = "crop_data.csv";

const OptionalPath = z.preprocess(
  (v) => (typeof v === "string" && v.trim() === "" ? undefined : v),
  z.string().trim().optional()
);

const EnvSchema = z.object({
  FARMTECH_CATALOG: OptionalPath,
  FARMTECH_EXPORT: OptionalPath,
});

export type FarmConfig = {
  catalogPath: string; // absolute
  exportPath: string; // absolute
};

export function getFlagValue(args: string[], flag: string): string | null {
  const i = args.indexOf(flag);
  if (i < 0) return null;
  const v = args[i + 1];
  if (!v || v.startsWith("--")) return null;
  return v;
}

/**
 * flag > environment > default; relative paths resolve against `cwd`.
 */
export function resolveConfig(
  args: string[],
  env: Record<string, string | undefined>,
  cwd: string = process.cwd()
): FarmConfig {
  const e = EnvSchema.parse(env);

  const catalog = getFlagValue(args, "--catalog") ?? e.FARMTECH_CATALOG ?? DEFAULT_CATALOG_PATH;
  const out = getFlagValue(args, "--out") ?? e.FARMTECH_EXPORT ?? DEFAULT_EXPORT_PATH;

  return {
    catalogPath: path.resolve(cwd, catalog),
    exportPath: path.resolve(cwd, out),
  };
}
