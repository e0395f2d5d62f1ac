/**
 * Ordinal scales (trustworthiness, likelihood, impact, risk, population,
 * cost, performance impact). Scales are not packaged.
 */

import { RDFS, RDF_TYPE, core, encodeInteger, encodeString, ssm } from "../nquads/index.js";
import { readTable, type EmitterDeps } from "./common.js";

export interface ScaleDefinition {
  table: string;
  /** Class of each level, in the core namespace */
  entity: string;
  heading: string;
}

export const SCALES: readonly ScaleDefinition[] = [
  {
    table: "TrustworthinessLevel",
    entity: "TrustworthinessLevel",
    heading: "Scale for (asset) Trustworthiness Levels",
  },
  {
    table: "Likelihood",
    entity: "Likelihood",
    heading: "Scale for (threat or asset behaviour) Likelihood Levels",
  },
  {
    table: "ImpactLevel",
    entity: "ImpactLevel",
    heading: "Scale for (asset behaviour) Impact Levels",
  },
  {
    table: "RiskLevel",
    entity: "RiskLevel",
    heading: "Scale for (threat or asset behaviour) Risk Levels",
  },
  {
    table: "PopulationLevel",
    entity: "PopulationLevel",
    heading: "Scale for asset Population Levels",
  },
  {
    table: "CostLevel",
    entity: "CostLevel",
    heading: "Scale for Control Cost Levels",
  },
  {
    table: "PerformanceImpactLevel",
    entity: "PerformanceImpactLevel",
    heading: "Scale for Control Performance Overhead Levels",
  },
];

export function emitScale(deps: EmitterDeps, scale: ScaleDefinition): number {
  const { writer } = deps;
  writer.section(scale.heading);

  const table = readTable(deps, scale.table, ["URI", "label", "comment", "levelValue"]);
  const type = core(scale.entity);
  for (const row of table) {
    const uri = ssm(row.get("URI"));
    const levelValue = encodeInteger(row.get("levelValue"));
    writer.quad(uri, RDF_TYPE, type);
    writer.quad(uri, RDFS.label, encodeString(row.get("label")));
    writer.quad(uri, RDFS.comment, encodeString(row.get("comment")));
    writer.quad(uri, core("levelValue"), levelValue);
    writer.spacer();
  }

  writer.spacer();
  return table.size;
}
