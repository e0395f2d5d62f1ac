/**
 * Root and matching patterns
 *
 * Every node and link a pattern mentions is resolved against the catalogs
 * here, which both validates it and records it for the derived-node and
 * role-link sections at the end of the output.
 *
 * @module
 */

import { ErrorCode, ValueError } from "../errors.js";
import { RDFS, RDF_TYPE, core, encodeString, packageResource, ssm } from "../nquads/index.js";
import { activeRows, type EmitterDeps } from "./common.js";

export const ROOT_PATTERNS_HEADING = "Root pattern definitions";
export const MATCHING_PATTERNS_HEADING = "Matching pattern definitions";

export function emitRootPatterns(deps: EmitterDeps): number {
  const { ctx, writer } = deps;
  writer.section(ROOT_PATTERNS_HEADING);

  const rows = activeRows(deps, "RootPattern", ["URI", "package", "label", "comment"]);
  for (const row of rows) {
    const uri = ssm(row.get("URI"));
    writer.quad(uri, RDF_TYPE, core("RootPattern"));
    writer.quad(uri, core("inPackage"), packageResource(row.get("package")));
    writer.quad(uri, RDFS.label, encodeString(row.get("label")));
    writer.spacer();
  }
  writer.spacer();

  for (const row of activeRows(deps, "RootPatternNodes", ["URI", "package", "hasNode", "keyNode"])) {
    const keyNode = row.get("keyNode").toLowerCase();
    if (keyNode !== "true" && keyNode !== "false") {
      throw new ValueError(
        `Root pattern ${row.get("URI")} has bad keyNode value "${row.get("keyNode")}"`,
        row.get("keyNode"),
        ErrorCode.VALUE_BAD_FLAG
      );
    }
    const predicate = keyNode === "true" ? core("hasKeyNode") : core("hasRootNode");
    writer.quad(ssm(row.get("URI")), predicate, ssm(row.get("hasNode")));
    ctx.resolveNode(row.get("hasNode"));
  }
  writer.spacer();

  for (const row of activeRows(deps, "RootPatternLinks", ["URI", "package", "hasLink"])) {
    writer.quad(ssm(row.get("URI")), core("hasLink"), ssm(row.get("hasLink")));
    ctx.resolveLink(row.get("hasLink"));
  }
  writer.spacer();

  return rows.length;
}

/**
 * Mandatory nodes are necessary, or sufficient when also flagged so;
 * otherwise a node is prohibited or optional.
 */
function nodeRole(row: { flag(column: "mandatoryNode" | "prohibitedNode" | "sufficientNode"): boolean }): string {
  if (row.flag("mandatoryNode")) {
    return row.flag("sufficientNode") ? "hasSufficientNode" : "hasNecessaryNode";
  }
  return row.flag("prohibitedNode") ? "hasProhibitedNode" : "hasOptionalNode";
}

export function emitMatchingPatterns(deps: EmitterDeps): number {
  const { ctx, writer } = deps;
  writer.section(MATCHING_PATTERNS_HEADING);

  const rows = activeRows(deps, "MatchingPattern", ["URI", "package", "label", "comment", "hasRootPattern"]);
  for (const row of rows) {
    const uri = ssm(row.get("URI"));
    writer.quad(uri, RDF_TYPE, core("MatchingPattern"));
    writer.quad(uri, core("inPackage"), packageResource(row.get("package")));
    writer.quad(uri, RDFS.label, encodeString(row.get("label")));
    writer.quad(uri, RDFS.comment, encodeString(row.get("comment")));
    writer.quad(uri, core("hasRootPattern"), ssm(row.get("hasRootPattern")));
    writer.spacer();
  }
  writer.spacer();

  const nodeRows = activeRows(deps, "MatchingPatternNodes", [
    "URI",
    "package",
    "hasNode",
    "mandatoryNode",
    "prohibitedNode",
    "sufficientNode",
  ]);
  for (const row of nodeRows) {
    writer.quad(ssm(row.get("URI")), core(nodeRole(row)), ssm(row.get("hasNode")));
    ctx.resolveNode(row.get("hasNode"));
  }
  writer.spacer();

  for (const row of activeRows(deps, "MatchingPatternLinks", ["URI", "package", "hasLink", "prohibited"])) {
    const predicate = row.flag("prohibited") ? core("hasProhibitedLink") : core("hasLink");
    writer.quad(ssm(row.get("URI")), predicate, ssm(row.get("hasLink")));
    ctx.resolveLink(row.get("hasLink"));
  }
  writer.spacer();

  for (const row of activeRows(deps, "MatchingPatternDNG", ["URI", "package", "hasDistinctNodeGroup"])) {
    const group = ssm(row.get("hasDistinctNodeGroup"));
    writer.quad(group, RDF_TYPE, core("DistinctNodeGroup"));
    writer.quad(ssm(row.get("URI")), core("hasDistinctNodeGroup"), group);
  }
  writer.spacer();

  for (const row of activeRows(deps, "DistinctNodeGroupNodes", ["URI", "package", "hasNode"])) {
    writer.quad(ssm(row.get("URI")), core("hasNode"), ssm(row.get("hasNode")));
  }
  writer.spacer();

  return rows.length;
}
