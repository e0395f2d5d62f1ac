/**
 * Package registry
 */

import type { BoundTable } from "../tables/index.js";
import { Feature } from "./features.js";
import { createLogger, type Logger } from "../../utils/logger.js";

export const PACKAGE_COLUMNS = ["URI", "Label", "Description", "Enabled"] as const;
export type PackageColumn = (typeof PACKAGE_COLUMNS)[number];

export interface PackageRecord {
  uri: string;
  label: string;
  comment: string;
  enabled: boolean;
}

export interface PackageState {
  records: PackageRecord[];
  /** URIs of enabled packages; rows in any other package are skipped */
  active: ReadonlySet<string>;
}

/**
 * Without the optional-packages feature every package is enabled and the
 * Enabled column is not read.
 */
export function loadPackages(
  table: BoundTable<PackageColumn>,
  features: ReadonlySet<string>,
  logger: Logger = createLogger("registry")
): PackageState {
  const optional = features.has(Feature.OptionalPackages);
  const records: PackageRecord[] = [];
  const active = new Set<string>();

  for (const row of table) {
    const record: PackageRecord = {
      uri: row.get("URI"),
      label: row.get("Label"),
      comment: row.get("Description"),
      enabled: optional ? row.flag("Enabled") : true,
    };
    records.push(record);

    if (record.enabled) {
      active.add(record.uri);
    } else {
      logger.info({ package: record.uri }, "Package is disabled; its rows will be skipped");
    }
  }

  return { records, active };
}
