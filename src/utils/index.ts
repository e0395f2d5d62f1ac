/**
 * Shared utilities
 */

// Re-export logger module
export * from "./logger.js";

// Re-export file system utilities
export * from "./fs.js";

// Re-export option validation
export * from "./validation.js";
