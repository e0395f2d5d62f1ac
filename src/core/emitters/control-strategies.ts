/**
 * Control strategies
 *
 * Strategies are written at their average identity, linked to min and
 * max variants under the population model. ControlStrategyControls then
 * attaches the mandatory and optional control sets.
 *
 * @module
 */

import { ErrorCode, IdentifierError } from "../errors.js";
import { Feature } from "../registry/index.js";
import {
  RDFS,
  RDF_TYPE,
  core,
  encodeBoolean,
  encodeString,
  packageResource,
  ssm,
  ssmTriplet,
} from "../nquads/index.js";
import { expandPopulation } from "../population/index.js";
import { columnsWhen } from "../tables/index.js";
import { activeRows, type EmitterDeps } from "./common.js";

export const CONTROL_STRATEGIES_HEADING = "Control Strategy definitions";

/**
 * `domain#CSG-Firewall-Host` expands after `CSG-Firewall`
 *
 * @throws IdentifierError when the URI has no hyphen
 */
export function controlStrategyDisambiguator(uri: string): string {
  const bits = uri.slice("domain#".length).split("-");
  if (bits.length < 2) {
    throw new IdentifierError(
      `CSG URI has invalid form (needs at least one hyphen): ${uri}`,
      uri,
      ErrorCode.IDENTIFIER_MALFORMED
    );
  }
  return `${bits[0]}-${bits[1]}`;
}

export function emitControlStrategies(deps: EmitterDeps): number {
  const { ctx, writer } = deps;
  writer.section(CONTROL_STRATEGIES_HEADING);

  const riskFlags = ctx.hasFeature(Feature.RiskTypeFlags);
  const rows = activeRows(deps, "ControlStrategy", [
    "URI",
    "package",
    "label",
    "comment",
    "hasBlockingEffect",
    ...columnsWhen(riskFlags, "currentRisk", "futureRisk"),
  ]);

  for (const row of rows) {
    const id = row.get("URI");
    const [minUri, avgUri, maxUri] = ssmTriplet(
      expandPopulation(id, controlStrategyDisambiguator(id), ctx.logger)
    );

    writer.quad(avgUri, RDF_TYPE, core("ControlStrategy"));
    writer.quad(avgUri, core("inPackage"), packageResource(row.get("package")));
    writer.quad(avgUri, RDFS.comment, encodeString(row.get("comment")));
    writer.quad(avgUri, RDFS.label, encodeString(row.get("label")));
    writer.quad(avgUri, core("hasBlockingEffect"), ssm(row.get("hasBlockingEffect")));
    if (riskFlags) {
      writer.quad(avgUri, core("isCurrentRisk"), encodeBoolean(row.get("currentRisk")));
      writer.quad(avgUri, core("isFutureRisk"), encodeBoolean(row.get("futureRisk")));
    }
    if (ctx.population) {
      writer.quad(avgUri, core("hasMin"), minUri);
      writer.quad(avgUri, core("hasMax"), maxUri);
    }
    writer.spacer();
  }
  writer.spacer();

  for (const row of activeRows(deps, "ControlStrategyControls", ["URI", "package", "hasControlSet", "optional"])) {
    const predicate = row.flag("optional") ? core("hasOptionalCS") : core("hasMandatoryCS");
    writer.quad(ssm(row.get("URI")), predicate, ssm(row.get("hasControlSet")));
    ctx.resolveSet(row.get("hasControlSet"), "control");
  }
  writer.spacer();

  return rows.length;
}
