/**
 * Tables Module
 *
 * Reading the CSV tables of a domain model and binding them by column name.
 *
 * @module
 */

export { CsvTableSource, MemoryTableSource, type RawTable, type TableSource } from "./source.js";
export { SENTINEL_URI, TableRow, BoundTable, bindTable, columnsWhen } from "./schema.js";
