/**
 * Construction patterns
 *
 * Priorities come from the hasPriority column, or, under the
 * construction-dependencies feature, from the scheduler. Marker patterns
 * take part in sequencing but are not written.
 *
 * @module
 */

import { SequencingError } from "../errors.js";
import { Feature } from "../registry/index.js";
import {
  RDFS,
  RDF_TYPE,
  core,
  encodeBoolean,
  encodeInteger,
  encodeString,
  packageResource,
  ssm,
} from "../nquads/index.js";
import {
  buildPredecessorMap,
  computeConstructionSequence,
  formatSequenceTrace,
  type ConstructionSequence,
  type DependencyEdge,
} from "../scheduler/index.js";
import { columnsWhen, type TableRow } from "../tables/index.js";
import { activeRows, readTable, type EmitterDeps } from "./common.js";

export const CONSTRUCTION_HEADING = "Construction pattern definitions";
export const SEQUENCE_TRACE_HEADER = "Construction pattern sequence";

function dependencyEdges(deps: EmitterDeps, table: string, column: "hasPredecessor" | "hasSuccessor"): DependencyEdge[] {
  return activeRows(deps, table, ["URI", "package", column, "fake"]).map((row) => ({
    pattern: row.get("URI"),
    other: row.get(column),
    fake: row.flag("fake"),
  }));
}

/**
 * Rank the active patterns and record the sequence and its trace on the context
 *
 * @throws SequencingError if any pattern is left unranked
 */
export function sequenceConstructionPatterns(deps: EmitterDeps, patterns: readonly string[]): ConstructionSequence {
  const { ctx } = deps;
  const predecessors = buildPredecessorMap(
    {
      patterns,
      predecessors: dependencyEdges(deps, "ConstructionPredecessor", "hasPredecessor"),
      successors: dependencyEdges(deps, "ConstructionSuccessor", "hasSuccessor"),
    },
    ctx.logger
  );
  const sequence = computeConstructionSequence(patterns, predecessors, ctx.logger);
  ctx.sequence = sequence;
  ctx.sequenceTrace = formatSequenceTrace(SEQUENCE_TRACE_HEADER, patterns, sequence, predecessors);

  if (sequence.unranked.length > 0) {
    const described = sequence.cycles.map((cycle) => cycle.join(" -> ")).join("; ");
    throw new SequencingError(
      `Construction patterns cannot be ranked: ${sequence.unranked.join(", ")}` +
        (described ? ` (cycles: ${described})` : ""),
      sequence.cycles
    );
  }
  return sequence;
}

type PatternColumn =
  | "URI"
  | "package"
  | "label"
  | "comment"
  | "hasMatchingPattern"
  | "iterate"
  | "maxIterations"
  | "hasPriority"
  | "marker";

export function emitConstructionPatterns(deps: EmitterDeps): number {
  const { ctx, writer } = deps;
  writer.section(CONSTRUCTION_HEADING);

  const dependencies = ctx.hasFeature(Feature.ConstructionDependencies);
  const table = readTable<PatternColumn>(
    deps,
    "ConstructionPattern",
    [
      "URI",
      "package",
      "label",
      "comment",
      "hasMatchingPattern",
      "iterate",
      "maxIterations",
      ...columnsWhen(!dependencies, "hasPriority"),
    ],
    ["marker"]
  );
  const rows = table.rows().filter((row) => ctx.inActivePackage(row));
  const useMarker = dependencies && table.hasColumn("marker");

  const sequence = dependencies ? sequenceConstructionPatterns(deps, rows.map((row) => row.get("URI"))) : null;

  const priority = (row: TableRow<PatternColumn>): string => {
    if (!sequence) {
      return encodeInteger(row.get("hasPriority"));
    }
    return encodeInteger(sequence.ranks.get(row.get("URI")) ?? 0);
  };

  let emitted = 0;
  for (const row of rows) {
    if (useMarker && row.flag("marker")) {
      ctx.logger.debug({ pattern: row.get("URI") }, "Skipping marker construction pattern");
      continue;
    }
    const uri = ssm(row.get("URI"));
    writer.quad(uri, RDF_TYPE, core("ConstructionPattern"));
    writer.quad(uri, core("inPackage"), packageResource(row.get("package")));
    writer.quad(uri, RDFS.label, encodeString(row.get("label")));
    writer.quad(uri, RDFS.comment, encodeString(row.get("comment")));
    writer.quad(uri, core("hasMatchingPattern"), ssm(row.get("hasMatchingPattern")));
    writer.quad(uri, core("hasPriority"), priority(row));
    writer.quad(uri, core("iterate"), encodeBoolean(row.get("iterate")));
    writer.quad(uri, core("maxIterations"), encodeInteger(row.get("maxIterations")));
    writer.spacer();
    emitted++;
  }
  writer.spacer();

  emitInferredNodes(deps);
  return emitted;
}

function emitInferredNodes(deps: EmitterDeps): void {
  const { ctx, writer } = deps;

  const settings = activeRows(deps, "InferredNodeSetting", [
    "package",
    "inPattern",
    "hasNode",
    "hasSetting",
    "displayedAtNode",
    "displayedAtLink",
    "displayedAt",
  ]);
  for (const row of settings) {
    const pattern = ssm(row.get("inPattern"));
    const node = ssm(row.get("hasNode"));
    const setting = ssm(row.get("hasSetting"));
    const displayedAt = row.flag("displayedAtNode") ? core("displayedAtNode") : core("displayedAtLink");

    writer.quad(pattern, core("hasInferredNode"), node);
    writer.quad(pattern, core("hasInferredNodeSetting"), setting);
    writer.quad(setting, RDF_TYPE, core("InferredNodeSetting"));
    writer.quad(setting, core("hasNode"), node);
    writer.quad(setting, displayedAt, ssm(row.get("displayedAt")));
    ctx.resolveNode(row.get("hasNode"));
    writer.spacer();
  }
  writer.spacer();

  for (const row of activeRows(deps, "InferredNodeSettingIncludes", ["URI", "package", "includesNodeInURI"])) {
    writer.quad(ssm(row.get("URI")), core("includesNodeInURI"), ssm(row.get("includesNodeInURI")));
  }
  writer.spacer();

  for (const row of activeRows(deps, "ConstructionPatternLinks", ["URI", "package", "hasInferredLink"])) {
    writer.quad(ssm(row.get("URI")), core("hasInferredLink"), ssm(row.get("hasInferredLink")));
    ctx.resolveLink(row.get("hasInferredLink"));
  }
  writer.spacer();
}
