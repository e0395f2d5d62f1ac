/**
 * Column binding
 *
 * Tables are addressed by column name, never by position. Binding checks
 * up front that every required column is present and drops the sentinel
 * placeholder rows that some tables carry.
 *
 * @module
 */

import { ConfigurationError, ErrorCode, ValueError } from "../errors.js";
import type { RawTable } from "./source.js";

/** Placeholder identifier marking rows to be ignored */
export const SENTINEL_URI = "domain#000000";

export class TableRow<C extends string> {
  constructor(
    private readonly table: string,
    private readonly columns: ReadonlyMap<string, number>,
    readonly fields: readonly string[],
    /** 1-based line in the source table, header included */
    readonly line: number
  ) {}

  has(column: C): boolean {
    return this.columns.has(column);
  }

  get(column: C): string {
    const index = this.columns.get(column);
    if (index === undefined) {
      throw new ConfigurationError(`Missing column "${column}"`, ErrorCode.CONFIG_MISSING_COLUMN, {
        table: this.table,
        line: this.line,
      });
    }
    return this.fields[index] ?? "";
  }

  /** Case-insensitive "true"; anything else is false */
  flag(column: C): boolean {
    return this.get(column).trim().toLowerCase() === "true";
  }

  /**
   * Strict boolean: "true" or "false" in any case
   *
   * @throws ValueError for any other value
   */
  strictFlag(column: C): boolean {
    const value = this.get(column).trim().toLowerCase();
    if (value === "true") return true;
    if (value === "false") return false;
    throw new ValueError(
      `Column "${column}" in ${this.table} line ${this.line} must be TRUE or FALSE`,
      this.get(column),
      ErrorCode.VALUE_BAD_FLAG
    );
  }
}

export class BoundTable<C extends string> implements Iterable<TableRow<C>> {
  private readonly rowList: TableRow<C>[];

  constructor(readonly name: string, private readonly columns: ReadonlyMap<string, number>, rows: TableRow<C>[]) {
    this.rowList = rows;
  }

  hasColumn(column: C): boolean {
    return this.columns.has(column);
  }

  rows(): readonly TableRow<C>[] {
    return this.rowList;
  }

  get size(): number {
    return this.rowList.length;
  }

  [Symbol.iterator](): Iterator<TableRow<C>> {
    return this.rowList[Symbol.iterator]();
  }
}

/**
 * Bind a raw table to its column names.
 *
 * @param required - columns that must be in the header
 * @param optional - columns that may be absent; reading one that is absent throws
 * @throws ConfigurationError naming the first missing required column
 */
export function bindTable<C extends string>(
  raw: RawTable,
  required: readonly C[],
  optional: readonly C[] = []
): BoundTable<C> {
  const columns = new Map<string, number>();
  raw.header.forEach((column, index) => {
    if (!columns.has(column)) {
      columns.set(column, index);
    }
  });

  for (const column of required) {
    if (!columns.has(column)) {
      throw new ConfigurationError(
        `Missing column "${column}" (have: ${raw.header.join(", ")})`,
        ErrorCode.CONFIG_MISSING_COLUMN,
        { table: raw.name }
      );
    }
  }

  const known = new Set<string>([...required, ...optional]);
  const bound = new Map([...columns].filter(([column]) => known.has(column)));

  const rows: TableRow<C>[] = [];
  raw.records.forEach((fields, index) => {
    if (fields.includes(SENTINEL_URI)) {
      return;
    }
    rows.push(new TableRow<C>(raw.name, bound, fields, index + 2));
  });

  return new BoundTable<C>(raw.name, bound, rows);
}

/**
 * Columns that are required only under some condition, usually a declared feature
 */
export function columnsWhen<C extends string>(condition: boolean, ...columns: C[]): C[] {
  return condition ? columns : [];
}
