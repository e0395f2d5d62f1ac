/**
 * Shared plumbing for the table emitters
 */

import type { ConversionContext } from "../catalog/index.js";
import type { NQuadsWriter } from "../nquads/index.js";
import { bindTable, type BoundTable, type TableRow, type TableSource } from "../tables/index.js";

export interface EmitterDeps {
  ctx: ConversionContext;
  tables: TableSource;
  writer: NQuadsWriter;
}

export function readTable<C extends string>(
  deps: EmitterDeps,
  name: string,
  required: readonly C[],
  optional: readonly C[] = []
): BoundTable<C> {
  return bindTable(deps.tables.read(name), required, optional);
}

/**
 * Rows of a packaged table that belong to an enabled package
 */
export function activeRows<C extends string>(
  deps: EmitterDeps,
  name: string,
  required: readonly (C | "package")[],
  optional: readonly C[] = []
): TableRow<C | "package">[] {
  const table = readTable<C | "package">(deps, name, required, optional);
  return table.rows().filter((row) => deps.ctx.inActivePackage(row));
}
