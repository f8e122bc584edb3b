import type { InputCatalog } from "../../model/src/catalog.js";
import { FarmError, isFarmError } from "../../model/src/errors.js";
import { parseDecimal, parseInteger } from "../../model/src/numbers.js";
import type { CropType } from "../../model/src/schema.js";
import type { Prompter } from "./prompter.js";

export class EndOfInputError extends Error {
  constructor() {
    super("Input ended.");
    this.name = "EndOfInputError";
  }
}

export async function askLine(p: Prompter, question: string): Promise<string> {
  const answer = await p.ask(question);
  if (answer === null) throw new EndOfInputError();
  return answer;
}

/**
 * Re-asks until `convert` accepts the answer. INVALID_NUMBER / INVALID_CHOICE
 * are printed and retried; anything else propagates.
 */
export async function askUntil<T>(p: Prompter, question: string, convert: (answer: string) => T): Promise<T> {
  for (;;) {
    const answer = await askLine(p, question);
    try {
      return convert(answer);
    } catch (e) {
      if (isFarmError(e, "INVALID_NUMBER") || isFarmError(e, "INVALID_CHOICE")) {
        p.print(e.message);
        continue;
      }
      throw e;
    }
  }
}

export type NumberBound = "positive" | "non-negative";

function checkBound(n: number, bound: NumberBound): number {
  if (bound === "positive" && n <= 0) {
    throw new FarmError("INVALID_NUMBER", "Please enter a positive number.");
  }
  if (bound === "non-negative" && n < 0) {
    throw new FarmError("INVALID_NUMBER", "Please enter a non-negative number.");
  }
  return n;
}

export function toNumber(answer: string, bound: NumberBound): number {
  const n = parseDecimal(answer);
  if (n === null) throw new FarmError("INVALID_NUMBER", "Please enter a valid number.");
  return checkBound(n, bound);
}

export function toInteger(answer: string, bound: NumberBound): number {
  const n = parseInteger(answer);
  if (n === null) throw new FarmError("INVALID_NUMBER", "Please enter a whole number.");
  return checkBound(n, bound);
}

export function askNumber(p: Prompter, question: string, bound: NumberBound): Promise<number> {
  return askUntil(p, question, (a) => toNumber(a, bound));
}

export function askInteger(p: Prompter, question: string, bound: NumberBound): Promise<number> {
  return askUntil(p, question, (a) => toInteger(a, bound));
}

export async function askCropType(p: Prompter, catalog: InputCatalog): Promise<CropType> {
  p.print("");
  p.print("Select crop type:");
  catalog.cropTypes().forEach((t, i) => p.print(`${i + 1}. ${t}`));

  return askUntil(p, "Enter the number of your choice: ", (answer) => {
    const n = parseInteger(answer);
    if (n === null) throw new FarmError("INVALID_NUMBER", "Please enter a valid number.");
    try {
      return catalog.cropTypeAt(n);
    } catch (e) {
      if (isFarmError(e, "INVALID_CHOICE")) {
        throw new FarmError("INVALID_CHOICE", "Invalid choice. Please try again.", e.details);
      }
      throw e;
    }
  });
}
