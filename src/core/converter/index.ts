/**
 * Converter Module
 *
 * @module
 */

export {
  DomainModelConverter,
  createConverter,
  type ConversionPhase,
  type ConversionProgressEvent,
  type ConversionSummary,
  type DomainModelConverterOptions,
  type SectionCount,
} from "./converter.js";

export { convertDomainModel, type ConvertRunOptions } from "./convert.js";
