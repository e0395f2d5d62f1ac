/**
 * Controls, misbehaviours and trustworthiness attributes
 *
 * Each row is one logical entity. Under the population model it becomes
 * three resources linked by hasMin/hasMax/minOf/maxOf; the min and max
 * resources are hidden unless output is unfiltered.
 *
 * @module
 */

import type { CatalogFamily } from "../catalog/index.js";
import {
  RDFS,
  RDF_TYPE,
  core,
  encodeBoolean,
  encodeString,
  encodeStringTriplet,
  packageResource,
  ssm,
  ssmTriplet,
} from "../nquads/index.js";
import { expandPopulation } from "../population/index.js";
import { columnsWhen } from "../tables/index.js";
import { activeRows, type EmitterDeps } from "./common.js";

export type PopulationFamily = "Control" | "Misbehaviour" | "TrustworthinessAttribute";

interface FamilyDefinition {
  table: string;
  locations: string;
  heading: string;
  catalog: CatalogFamily;
}

export const POPULATION_FAMILIES: Record<PopulationFamily, FamilyDefinition> = {
  Control: {
    table: "Control",
    locations: "ControlLocations",
    heading: "Control definitions",
    catalog: "control",
  },
  Misbehaviour: {
    table: "Misbehaviour",
    locations: "MisbehaviourLocations",
    heading: "Misbehaviour definitions",
    catalog: "misbehaviour",
  },
  TrustworthinessAttribute: {
    table: "TrustworthinessAttribute",
    locations: "TWALocations",
    heading: "Trustworthiness Attribute definitions",
    catalog: "trustworthinessAttribute",
  },
};

export function emitPopulationEntities(deps: EmitterDeps, family: PopulationFamily): number {
  const { ctx, writer } = deps;
  const definition = POPULATION_FAMILIES[family];
  const isControl = family === "Control";
  const type = core(family);
  const logger = ctx.logger;
  writer.section(definition.heading);

  const rows = activeRows(deps, definition.table, [
    "URI",
    "package",
    "label",
    "comment",
    "isVisible",
    ...columnsWhen(isControl, "unitCost", "performanceImpact"),
  ]);

  for (const row of rows) {
    const [minUri, avgUri, maxUri] = ssmTriplet(expandPopulation(row.get("URI"), undefined, logger));
    const [minLabel, avgLabel, maxLabel] = encodeStringTriplet(
      expandPopulation(row.get("label"), undefined, logger)
    );
    const comment = encodeString(row.get("comment"));
    const avgVisible = ctx.flags.unfiltered ? encodeBoolean(true) : encodeBoolean(row.get("isVisible"));
    const extremeVisible = encodeBoolean(ctx.flags.unfiltered);
    const costs: [string, string][] = isControl
      ? [
          [core("unitCost"), ssm(row.get("unitCost"))],
          [core("performanceImpact"), ssm(row.get("performanceImpact"))],
        ]
      : [];

    writer.quad(avgUri, RDF_TYPE, type);
    writer.quad(avgUri, core("inPackage"), packageResource(row.get("package")));
    writer.quad(avgUri, RDFS.comment, comment);
    writer.quad(avgUri, RDFS.label, avgLabel);
    writer.quad(avgUri, core("isVisible"), avgVisible);
    for (const [predicate, object] of costs) {
      writer.quad(avgUri, predicate, object);
    }

    if (ctx.population) {
      for (const [uri, label] of [
        [minUri, minLabel],
        [maxUri, maxLabel],
      ] as const) {
        writer.quad(uri, RDF_TYPE, type);
        writer.quad(uri, RDFS.comment, comment);
        writer.quad(uri, RDFS.label, label);
        writer.quad(uri, core("isVisible"), extremeVisible);
        for (const [predicate, object] of costs) {
          writer.quad(uri, predicate, object);
        }
      }
      writer.quad(avgUri, core("hasMin"), minUri);
      writer.quad(avgUri, core("hasMax"), maxUri);
      writer.quad(minUri, core("minOf"), avgUri);
      writer.quad(maxUri, core("maxOf"), avgUri);
    }

    writer.spacer();
    ctx.catalogs[definition.catalog].add(row.get("URI"));
  }
  writer.spacer();

  for (const row of activeRows(deps, definition.locations, ["URI", "package", "metaLocatedAt"])) {
    const [minUri, avgUri, maxUri] = ssmTriplet(expandPopulation(row.get("URI"), undefined, logger));
    const location = ssm(row.get("metaLocatedAt"));
    writer.quad(avgUri, core("metaLocatedAt"), location);
    if (ctx.population) {
      writer.quad(minUri, core("metaLocatedAt"), location);
      writer.quad(maxUri, core("metaLocatedAt"), location);
    }
  }
  writer.spacer();

  return rows.length;
}
