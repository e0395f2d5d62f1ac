/**
 * Core module - conversion engine shared by the CLI and library callers
 */

// Re-export error classes
export * from "./errors.js";

// Re-export all core modules
export * from "./nquads/index.js";
export * from "./tables/index.js";
export * from "./registry/index.js";
export * from "./catalog/index.js";
export * from "./population/index.js";
export * from "./resolver/index.js";
export * from "./scheduler/index.js";
export * from "./emitters/index.js";
export * from "./converter/index.js";

// Re-export types
export * from "../types/index.js";
