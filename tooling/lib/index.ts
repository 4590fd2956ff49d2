/**
 * Central export point for all library modules
 */

export * from "./types";
export * from "./plan";
export * from "./config";
export * from "./logger";
export * from "./errors";
export * from "./diagnostics";
export * from "./naming";
export * from "./default-collector";
export * from "./validator";
export * from "./classifier";
export * from "./synthesis";
export * from "./emitter";
export * from "./host";
export * from "./report";
export * from "./processor";
