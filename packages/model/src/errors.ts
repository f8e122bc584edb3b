export type FarmErrorCode =
  | "INVALID_CHOICE"
  | "INVALID_NUMBER"
  | "INVALID_ARGUMENT"
  | "INDEX_OUT_OF_RANGE"
  | "MISSING_FILE"
  | "IO_ERROR"
  | "SCHEMA_ERROR"
  | "PARSE_ERROR"
  | "UNKNOWN_CROP_TYPE"
  | "UNKNOWN_INPUT_KIND"
  | "CATALOG_ERROR";

export type FarmErrorDetails = {
  path?: string;
  column?: string;
  row?: number; // 1-based data row, header excluded
  position?: number;
  issues?: string[];
};

export class FarmError extends Error {
  readonly code: FarmErrorCode;
  readonly details: FarmErrorDetails;

  constructor(code: FarmErrorCode, message: string, details: FarmErrorDetails = {}, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "FarmError";
    this.code = code;
    this.details = details;
  }
}

export function isFarmError(e: unknown, code?: FarmErrorCode): e is FarmError {
  if (!(e instanceof FarmError)) return false;
  return code == null || e.code === code;
}

export function errorMessage(e: unknown): string {
  return e instanceof Error ? e.message : String(e);
}
