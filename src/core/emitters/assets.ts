/**
 * Assets and relationships
 *
 * Both families are catalogued for later Node and Role Link resolution.
 *
 * @module
 */

import { Feature } from "../registry/index.js";
import {
  OWL,
  RDFS,
  RDF_TYPE,
  core,
  encodeBoolean,
  encodeString,
  packageResource,
  ssm,
} from "../nquads/index.js";
import { columnsWhen, type TableRow } from "../tables/index.js";
import { activeRows, type EmitterDeps } from "./common.js";

export const ASSETS_HEADING = "Domain asset definitions";
export const RELATIONSHIPS_HEADING = "Asset relationship definitions";

type ClassColumn =
  | "URI"
  | "package"
  | "label"
  | "comment"
  | "isAssertable"
  | "isVisible"
  | "constructionState";

/**
 * Quads shared by assets and relationships. Visibility is forced true for
 * unfiltered output, and the construction-state flag is written only when
 * set, declared and filtered.
 */
function emitClassRow(
  deps: EmitterDeps,
  row: TableRow<ClassColumn>,
  type: string,
  constructionState: boolean,
  extra: readonly [predicate: string, object: string][] = []
): void {
  const { ctx, writer } = deps;
  const uri = ssm(row.get("URI"));
  const isVisible = ctx.flags.unfiltered ? encodeBoolean(true) : encodeBoolean(row.get("isVisible"));

  writer.quad(uri, RDF_TYPE, type);
  writer.quad(uri, core("inPackage"), packageResource(row.get("package")));
  writer.quad(uri, RDFS.label, encodeString(row.get("label")));
  writer.quad(uri, RDFS.comment, encodeString(row.get("comment")));
  writer.quad(uri, core("isAssertable"), encodeBoolean(row.get("isAssertable")));
  writer.quad(uri, core("isVisible"), isVisible);
  for (const [predicate, object] of extra) {
    writer.quad(uri, predicate, object);
  }
  if (constructionState && row.strictFlag("constructionState") && !ctx.flags.unfiltered) {
    writer.quad(uri, core("isConstructionState"), encodeBoolean(true));
  }
}

/**
 * Two-column companion table: `URI <predicate> value`
 */
export function emitPropertyTable(
  deps: EmitterDeps,
  table: string,
  column: string,
  predicate: string
): number {
  const rows = activeRows(deps, table, ["URI", "package", column]);
  for (const row of rows) {
    deps.writer.quad(ssm(row.get("URI")), predicate, ssm(row.get(column)));
  }
  deps.writer.spacer();
  return rows.length;
}

export function emitAssets(deps: EmitterDeps): number {
  const { ctx, writer } = deps;
  writer.section(ASSETS_HEADING);

  const constructionState = ctx.hasFeature(Feature.ConstructionStateFlags);
  const rows = activeRows(deps, "DomainAsset", [
    "URI",
    "package",
    "label",
    "comment",
    "isAssertable",
    "isVisible",
    ...columnsWhen(constructionState, "constructionState"),
  ]);

  for (const row of rows) {
    emitClassRow(deps, row, OWL.Class, constructionState);
    writer.spacer();
    ctx.catalogs.asset.add(row.get("URI"));
  }
  writer.spacer();

  emitPropertyTable(deps, "DomainAssetParents", "subClassOf", RDFS.subClassOf);
  return rows.length;
}

export function emitRelationships(deps: EmitterDeps): number {
  const { ctx, writer } = deps;
  writer.section(RELATIONSHIPS_HEADING);

  const constructionState = ctx.hasFeature(Feature.ConstructionStateFlags);
  const rows = activeRows(deps, "ObjectProperty", [
    "URI",
    "package",
    "label",
    "comment",
    "isAssertable",
    "isVisible",
    "hidden",
    ...columnsWhen(constructionState, "constructionState"),
  ]);

  for (const row of rows) {
    emitClassRow(deps, row, OWL.ObjectProperty, constructionState, [
      [core("hidden"), encodeBoolean(row.get("hidden"))],
    ]);
    writer.spacer();
    ctx.catalogs.relationship.add(row.get("URI"));
  }
  writer.spacer();

  emitPropertyTable(deps, "ObjectPropertyParents", "subPropertyOf", RDFS.subPropertyOf);
  emitPropertyTable(deps, "ObjectPropertyDomains", "domain", RDFS.domain);
  emitPropertyTable(deps, "ObjectPropertyRanges", "range", RDFS.range);
  return rows.length;
}
