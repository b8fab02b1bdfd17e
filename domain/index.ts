/**
 * Public API of the timestamp/zone-aware tabular codec.
 */

export * from "./core.js";
export * from "./errors.js";
export * from "./civil.js";
export * from "./zone.js";
export * from "./zonedTimestamp.js";
export * from "./serialDate.js";
export * from "./table.js";
export * from "./schema.js";
export * from "./delimited.js";
export * from "./spreadsheet.js";
export * from "./format.js";
