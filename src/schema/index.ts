/**
 * Schema Module
 * Exports schema types, validation, and JSON schemas
 */

export * from "./types";
export * from "./json-schema";
export * from "./validator";
