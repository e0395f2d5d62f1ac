/**
 * Default settings: control assertability and default levels for
 * misbehaviours and trustworthiness attributes at an asset
 *
 * @module
 */

import {
  RDF_TYPE,
  core,
  domainFragment,
  encodeBoolean,
  ssm,
  ssmTriplet,
} from "../nquads/index.js";
import { expandPopulation } from "../population/index.js";
import { pickVariant, type PopulationVariant } from "../../types/index.js";
import { activeRows, type EmitterDeps } from "./common.js";

export const CASETTINGS_HEADING = "CASetting definitions: whether a Control is assertible at an Asset";
export const MA_DEFAULTS_HEADING = "MADefaultSetting definitions: default impact level for a Misbehaviour at an Asset";
export const TWAA_DEFAULTS_HEADING =
  "TWAADefaultSetting definitions: default TW level for a Trustworthiness Attribute at an Asset";

/** Independent levels only mean something under the population model */
function independentLevels(deps: EmitterDeps, value: string): string {
  return deps.ctx.population ? encodeBoolean(value) : encodeBoolean(false);
}

/**
 * Under the population model each setting also gets a min and a max copy
 * pointing at the matching control identity.
 */
export function emitControlAssertability(deps: EmitterDeps): number {
  const { ctx, writer } = deps;
  writer.section(CASETTINGS_HEADING);

  const rows = activeRows(deps, "CASetting", [
    "URI",
    "package",
    "metaLocatedAt",
    "hasControl",
    "isAssertable",
    "hasLevel",
    "independentLevels",
  ]);

  for (const row of rows) {
    const control = row.get("hasControl");
    const settings = ssmTriplet(expandPopulation(row.get("URI"), domainFragment(control), ctx.logger));
    const controls = ssmTriplet(expandPopulation(control, undefined, ctx.logger));
    const attributes: [string, string][] = [
      [core("metaLocatedAt"), ssm(row.get("metaLocatedAt"))],
      [core("isAssertable"), encodeBoolean(row.get("isAssertable"))],
      [core("hasLevel"), ssm(row.get("hasLevel"))],
      [core("independentLevels"), independentLevels(deps, row.get("independentLevels"))],
    ];

    const variants: PopulationVariant[] = ctx.population ? ["average", "min", "max"] : ["average"];
    for (const variant of variants) {
      const uri = pickVariant(settings, variant);
      writer.quad(uri, RDF_TYPE, core("CASetting"));
      writer.quad(uri, core("hasControl"), pickVariant(controls, variant));
      for (const [predicate, object] of attributes) {
        writer.quad(uri, predicate, object);
      }
    }
    writer.spacer();
  }
  writer.spacer();

  return rows.length;
}

export function emitMisbehaviourDefaults(deps: EmitterDeps): number {
  const { writer } = deps;
  writer.section(MA_DEFAULTS_HEADING);

  const rows = activeRows(deps, "MADefaultSetting", ["URI", "package", "metaLocatedAt", "hasMisbehaviour", "hasLevel"]);
  for (const row of rows) {
    const uri = ssm(row.get("URI"));
    writer.quad(uri, RDF_TYPE, core("MADefaultSetting"));
    writer.quad(uri, core("metaLocatedAt"), ssm(row.get("metaLocatedAt")));
    writer.quad(uri, core("hasMisbehaviour"), ssm(row.get("hasMisbehaviour")));
    writer.quad(uri, core("hasLevel"), ssm(row.get("hasLevel")));
    writer.spacer();
  }
  writer.spacer();

  return rows.length;
}

export function emitTrustworthinessDefaults(deps: EmitterDeps): number {
  const { writer } = deps;
  writer.section(TWAA_DEFAULTS_HEADING);

  const rows = activeRows(deps, "TWAADefaultSetting", [
    "URI",
    "package",
    "metaLocatedAt",
    "hasTrustworthinessAttribute",
    "hasLevel",
    "independentLevels",
  ]);
  for (const row of rows) {
    const uri = ssm(row.get("URI"));
    writer.quad(uri, RDF_TYPE, core("TWAADefaultSetting"));
    writer.quad(uri, core("metaLocatedAt"), ssm(row.get("metaLocatedAt")));
    writer.quad(uri, core("hasTrustworthinessAttribute"), ssm(row.get("hasTrustworthinessAttribute")));
    writer.quad(uri, core("hasLevel"), ssm(row.get("hasLevel")));
    writer.quad(uri, core("independentLevels"), independentLevels(deps, row.get("independentLevels")));
    writer.spacer();
  }
  writer.spacer();

  return rows.length;
}
