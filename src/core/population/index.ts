/**
 * Population Module
 *
 * @module
 */

export {
  MIN_SUFFIX,
  MAX_SUFFIX,
  VARIANT_SUFFIXES,
  expandPopulation,
  variantIdentifier,
} from "./expander.js";
