/**
 * ts-datacompat: Main entry point
 * Exports the source markers and the runtime helpers used by generated classes
 */

export { DataCompat, Default } from "./markers";
export type { DataCompatOptions } from "./markers";

export { compareNumbers, valuesEqual, hashValue, combineHash } from "./runtime";
