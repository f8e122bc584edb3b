import { FarmError } from "../../model/src/errors.js";

const SQUARE_METERS_PER_HECTARE = 10_000;

function requirePositive(value: number, label: string): void {
  if (!Number.isFinite(value) || value <= 0) {
    throw new FarmError("INVALID_ARGUMENT", `${label} must be a positive number (got ${value}).`);
  }
}

/**
 * Rectangular field area in hectares from length and width in meters.
 */
export function computeArea(length: number, width: number): number {
  requirePositive(length, "Field length");
  requirePositive(width, "Field width");
  return (length * width) / SQUARE_METERS_PER_HECTARE;
}

/**
 * Total input needed for a field: area (ha) × amount per hectare.
 */
export function computeTotalInput(area: number, amountPerHa: number): number {
  if (!Number.isFinite(area) || area < 0) {
    throw new FarmError("INVALID_ARGUMENT", `Area must be a non-negative number (got ${area}).`);
  }
  if (!Number.isFinite(amountPerHa) || amountPerHa < 0) {
    throw new FarmError("INVALID_ARGUMENT", `Amount per hectare must be a non-negative number (got ${amountPerHa}).`);
  }
  return area * amountPerHa;
}
