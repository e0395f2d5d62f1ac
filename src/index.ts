/**
 * domain-model-nq
 *
 * Library entry point. The CLI lives in ./cli/index.ts.
 */

export * from "./core/index.js";
export { createLogger, parseConvertOptions, ConvertOptionsSchema, type ConvertOptions, type Logger } from "./utils/index.js";
