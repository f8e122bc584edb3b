export { FarmSession, MENU_LINES } from "./session.js";
export type { FarmSessionOptions } from "./session.js";

export type { Prompter } from "./prompter.js";
export { createReadlinePrompter } from "./prompter.js";

export { EndOfInputError, askCropType, askInteger, askNumber, askUntil, toInteger, toNumber } from "./prompts.js";

export { formatRecord, formatRecords, formatSummary } from "./display.js";

export { resolveConfig, getFlagValue, DEFAULT_CATALOG_PATH, DEFAULT_EXPORT_PATH } from "./config.js";
export type { FarmConfig } from "./config.js";

export { run } from "./cli/farmtech.js";
