/**
 * Catalog Module
 *
 * Ordered entity catalogs, memoised derived records and the run context.
 *
 * @module
 */

export { Catalog, CATALOG_PREFIXES, type CatalogFamily } from "./catalog.js";
export { DerivedRecords } from "./derived-records.js";
export {
  ConversionContext,
  createConversionContext,
  type Catalogs,
  type ConversionFlags,
} from "./context.js";
