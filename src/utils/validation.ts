/**
 * Runtime Validation Schemas
 *
 * Zod schemas for validating conversion options at runtime.
 *
 * @module
 */

import { z } from "zod";
import { err, ok, type Result } from "../types/result.js";

/**
 * Current local time as an ISO timestamp without milliseconds or zone,
 * used as the default ontology version.
 */
export function defaultVersionInfo(now: Date = new Date()): string {
  const pad = (n: number) => String(n).padStart(2, "0");
  return (
    `${now.getFullYear()}-${pad(now.getMonth() + 1)}-${pad(now.getDate())}` +
    `T${pad(now.getHours())}:${pad(now.getMinutes())}:${pad(now.getSeconds())}`
  );
}

const optionalPath = z
  .string()
  .trim()
  .min(1)
  .optional();

/**
 * Options accepted by a conversion run
 */
export const ConvertOptionsSchema = z.object({
  /** Directory containing the domain model CSV tables */
  input: z.string().trim().min(1, "an input directory is required"),

  /** Destination N-Quads file */
  output: z.string().trim().min(1, "an output file is required"),

  /** Construction-sequence trace file */
  log: optionalPath,

  /** Icon-mapping JSON file */
  mapping: optionalPath,

  /** Force visibility flags true and drop construction-state flags */
  unfiltered: z.boolean().default(false),

  /** Expand population triplets */
  expanded: z.boolean().default(false),

  /** Ontology versionInfo; defaults to the current timestamp */
  version: z
    .string()
    .trim()
    .min(1)
    .optional()
    .transform((value) => value ?? defaultVersionInfo()),

  /** Replacement for the last path segment of the domain graph URI */
  name: z.string().trim().min(1).optional(),

  /** Replacement for the ontology label */
  label: z.string().min(1).optional(),
});

export type ConvertOptionsInput = z.input<typeof ConvertOptionsSchema>;
export type ConvertOptions = z.output<typeof ConvertOptionsSchema>;

/**
 * Validate raw options, returning a readable message per invalid field
 */
export function parseConvertOptions(raw: unknown): Result<ConvertOptions, string[]> {
  const result = ConvertOptionsSchema.safeParse(raw);
  if (result.success) {
    return ok(result.data);
  }
  return err(
    result.error.issues.map((issue) => `${issue.path.join(".") || "options"}: ${issue.message}`)
  );
}
