import { FarmError } from "../../model/src/errors.js";
import { parseDecimal, parseInteger } from "../../model/src/numbers.js";

export type CellContext = { column: string; row: number };

export function formatNumberCell(n: number): string {
  return String(n);
}

export function parseRealCell(value: string, at: CellContext): number {
  const n = parseDecimal(value);
  if (n === null) {
    throw new FarmError("PARSE_ERROR", `Row ${at.row}: column '${at.column}' is not a number: '${value}'.`, at);
  }
  return n;
}

export function parseIntegerCell(value: string, at: CellContext): number {
  const n = parseInteger(value);
  if (n === null) {
    throw new FarmError("PARSE_ERROR", `Row ${at.row}: column '${at.column}' is not an integer: '${value}'.`, at);
  }
  return n;
}

export function requireRange(n: number, ok: boolean, expected: string, at: CellContext): void {
  if (!ok) {
    throw new FarmError("PARSE_ERROR", `Row ${at.row}: column '${at.column}' must be ${expected} (got ${n}).`, at);
  }
}
