import { SSM_PREFIX } from "../nquads/index.js";
import { bindTable, type TableSource } from "../tables/index.js";

export interface IconMapping {
  ontology: string;
  graph: string;
  defaultUserAccess: true;
  /** Full asset URI to icon path */
  icons: Record<string, string>;
}

/**
 * Icons for every asset with one. Package gating does not apply: the mapping
 * describes the palette, not the packaged model.
 */
export function buildIconMapping(tables: TableSource, ontology: string, graph: string): IconMapping {
  const assets = bindTable(tables.read("DomainAsset"), ["URI", "icon"]);
  const icons: Record<string, string> = {};
  for (const row of assets) {
    const icon = row.get("icon");
    if (icon) {
      icons[`${SSM_PREFIX}/${row.get("URI")}`] = icon;
    }
  }
  return { ontology, graph, defaultUserAccess: true, icons };
}

export function serializeIconMapping(mapping: IconMapping): string {
  return JSON.stringify(mapping, null, 4);
}
