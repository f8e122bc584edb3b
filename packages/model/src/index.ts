export * from "./schema.js";

export { FarmError, isFarmError, errorMessage } from "./errors.js";
export type { FarmErrorCode, FarmErrorDetails } from "./errors.js";

export { InputCatalogDocumentSchema, parseCatalogEntries } from "./validate.js";

export { InputCatalog, parseInputCatalog, loadInputCatalog } from "./catalog.js";

export { parseDecimal, parseInteger } from "./numbers.js";
