/**
 * Table sources
 *
 * A domain model is a directory of CSV files, one per table, each with a
 * header row. Sources hand out raw tables by name ("DomainAsset" reads
 * DomainAsset.csv).
 *
 * @module
 */

import * as fs from "node:fs";
import * as path from "node:path";
import { parse } from "csv-parse/sync";
import { ConfigurationError, ErrorCode } from "../errors.js";

export interface RawTable {
  name: string;
  header: string[];
  records: string[][];
}

export interface TableSource {
  has(name: string): boolean;

  /**
   * @throws ConfigurationError if the table does not exist or cannot be parsed
   */
  read(name: string): RawTable;
}

function toRawTable(name: string, rows: string[][]): RawTable {
  const [header, ...records] = rows;
  if (!header) {
    throw new ConfigurationError("Table has no header row", ErrorCode.CONFIG_BAD_TABLE, { table: name });
  }
  return { name, header: header.map((column) => column.trim()), records };
}

// =============================================================================
// CSV directory
// =============================================================================

export class CsvTableSource implements TableSource {
  constructor(readonly directory: string) {}

  private pathFor(name: string): string {
    return path.join(this.directory, `${name}.csv`);
  }

  has(name: string): boolean {
    return fs.existsSync(this.pathFor(name));
  }

  read(name: string): RawTable {
    const file = this.pathFor(name);
    if (!this.has(name)) {
      throw new ConfigurationError(`Table not found: ${file}`, ErrorCode.CONFIG_TABLE_NOT_FOUND, {
        table: name,
      });
    }

    let rows: string[][];
    try {
      rows = parse(fs.readFileSync(file, "utf-8"), {
        bom: true,
        relax_column_count: true,
        skip_empty_lines: true,
      });
    } catch (error) {
      throw new ConfigurationError(
        `Cannot parse ${file}: ${error instanceof Error ? error.message : String(error)}`,
        ErrorCode.CONFIG_BAD_TABLE,
        { table: name }
      );
    }
    return toRawTable(name, rows);
  }
}

// =============================================================================
// In-memory
// =============================================================================

/**
 * Tables supplied as row arrays (header first). Tables not found here are
 * looked up in the optional fallback source, so a few tables can be
 * overridden on top of a directory.
 */
export class MemoryTableSource implements TableSource {
  private readonly tables: Map<string, string[][]>;

  constructor(tables: Record<string, string[][]>, private readonly fallback?: TableSource) {
    this.tables = new Map(Object.entries(tables));
  }

  has(name: string): boolean {
    return this.tables.has(name) || (this.fallback?.has(name) ?? false);
  }

  read(name: string): RawTable {
    const rows = this.tables.get(name);
    if (rows) {
      return toRawTable(name, rows);
    }
    if (this.fallback) {
      return this.fallback.read(name);
    }
    throw new ConfigurationError(`Table not found: ${name}`, ErrorCode.CONFIG_TABLE_NOT_FOUND, {
      table: name,
    });
  }
}
