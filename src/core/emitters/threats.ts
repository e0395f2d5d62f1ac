/**
 * Threat categories, compliance sets and threats
 *
 * Threat satellite tables (entry points, secondary effect conditions,
 * effects) name control-free sets, so each row also resolves the TWA or
 * misbehaviour set it mentions for the derived output.
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
import { SET_KINDS } from "../resolver/index.js";
import { columnsWhen } from "../tables/index.js";
import { activeRows, readTable, type EmitterDeps } from "./common.js";

export const THREAT_CATEGORIES_HEADING = "Threat category definitions";
export const COMPLIANCE_SETS_HEADING = "Compliance Set definitions";
export const THREATS_HEADING = "Threat definitions";

export function emitThreatCategories(deps: EmitterDeps): number {
  const { writer } = deps;
  writer.section(THREAT_CATEGORIES_HEADING);

  const rows = readTable(deps, "ThreatCategory", ["URI", "label", "comment"]).rows();
  for (const row of rows) {
    const uri = ssm(row.get("URI"));
    writer.quad(uri, RDF_TYPE, core("ThreatCategory"));
    writer.quad(uri, RDFS.label, encodeString(row.get("label")));
    writer.quad(uri, RDFS.comment, encodeString(row.get("comment")));
    writer.spacer();
  }
  writer.spacer();

  return rows.length;
}

export function emitComplianceSets(deps: EmitterDeps): number {
  const { writer } = deps;
  writer.section(COMPLIANCE_SETS_HEADING);

  const rows = activeRows(deps, "ComplianceSet", ["URI", "package", "label", "comment"]);
  for (const row of rows) {
    const uri = ssm(row.get("URI"));
    writer.quad(uri, RDF_TYPE, core("ComplianceSet"));
    writer.quad(uri, RDFS.label, encodeString(row.get("label")));
    writer.quad(uri, RDFS.comment, encodeString(row.get("comment")));
    writer.spacer();
  }
  writer.spacer();

  for (const row of activeRows(deps, "ComplianceSetThreats", ["URI", "package", "requiresTreatmentOf"])) {
    writer.quad(ssm(row.get("URI")), core("requiresTreatmentOf"), ssm(row.get("requiresTreatmentOf")));
  }
  writer.spacer();

  return rows.length;
}

/**
 * `domain#P.A.HP.1` expands after `P.A`
 *
 * @throws IdentifierError when the URI has fewer than three dots
 */
export function threatDisambiguator(uri: string): string {
  const bits = uri.slice("domain#".length).split(".");
  if (bits.length < 4) {
    throw new IdentifierError(
      `Threat URI has invalid form (needs at least 3 fullstops): ${uri}`,
      uri,
      ErrorCode.IDENTIFIER_MALFORMED
    );
  }
  return `${bits[0]}.${bits[1]}`;
}

export function emitThreats(deps: EmitterDeps): number {
  const { ctx, writer } = deps;
  writer.section(THREATS_HEADING);

  const riskFlags = ctx.hasFeature(Feature.RiskTypeFlags);
  const typeFlags = ctx.hasFeature(Feature.ThreatTypeFlags);

  const rows = activeRows(deps, "Threat", [
    "URI",
    "package",
    "label",
    "comment",
    "hasCategory",
    "appliesTo",
    "threatens",
    "hasFrequency",
    "currentRisk",
    "futureRisk",
    ...columnsWhen(typeFlags, "secondaryThreat", "normalOperation"),
  ]);

  for (const row of rows) {
    const id = row.get("URI");
    const [minUri, avgUri, maxUri] = ssmTriplet(expandPopulation(id, threatDisambiguator(id), ctx.logger));

    writer.quad(avgUri, RDF_TYPE, core("Threat"));
    writer.quad(avgUri, core("inPackage"), packageResource(row.get("package")));
    writer.quad(avgUri, RDFS.label, encodeString(row.get("label")));
    writer.quad(avgUri, RDFS.comment, encodeString(row.get("comment")));
    writer.quad(avgUri, core("hasCategory"), ssm(row.get("hasCategory")));
    writer.quad(avgUri, core("appliesTo"), ssm(row.get("appliesTo")));
    writer.quad(avgUri, core("threatens"), ssm(row.get("threatens")));

    // Compliance threats have no frequency and none of the risk attributes
    const frequency = ssm(row.get("hasFrequency"));
    if (frequency) {
      writer.quad(avgUri, core("hasFrequency"), frequency);
      if (riskFlags) {
        writer.quad(avgUri, core("isCurrentRisk"), encodeBoolean(row.get("currentRisk")));
        writer.quad(avgUri, core("isFutureRisk"), encodeBoolean(row.get("futureRisk")));
      }
      if (typeFlags) {
        writer.quad(avgUri, core("isSecondaryThreat"), encodeBoolean(row.get("secondaryThreat")));
        writer.quad(avgUri, core("isNormalOp"), encodeBoolean(row.get("normalOperation")));
      }
      if (ctx.population) {
        writer.quad(avgUri, core("hasMin"), minUri);
        writer.quad(avgUri, core("hasMax"), maxUri);
      }
    }
    writer.spacer();
  }
  writer.spacer();

  emitEntryPoints(deps);
  emitMisbehaviourSetTable(deps, "ThreatSEC", "hasSecondaryEffectCondition");
  emitMisbehaviourSetTable(deps, "ThreatEffects", "causesMisbehaviour");
  emitThreatTreatments(deps);

  return rows.length;
}

/**
 * The misbehaviour set paired with an entry point's TWA set: same role and
 * variant, with the misbehaviour that undermines the TWA. Unlike impact
 * sets the variant is not crossed; the entry point and its misbehaviour
 * belong to the same population member.
 */
export function entryPointMisbehaviourSet(twasUri: string, twa: string, misbehaviour: string): string {
  const twasPrefix = twa.replace("domain#", SET_KINDS.trustworthinessAttribute.prefix);
  const msPrefix = misbehaviour.replace("domain#", SET_KINDS.misbehaviour.prefix);
  return twasUri.replace(twasPrefix, msPrefix);
}

function emitEntryPoints(deps: EmitterDeps): void {
  const { ctx, writer } = deps;

  for (const row of activeRows(deps, "ThreatEntryPoints", ["URI", "package", "hasEntryPoint"])) {
    const twasUri = row.get("hasEntryPoint");
    writer.quad(ssm(row.get("URI")), core("hasEntryPoint"), ssm(twasUri));

    const twa = ctx.resolveSet(twasUri, "trustworthinessAttribute").entity;
    const misbehaviour = ctx.twaMisbehaviour.get(twa);
    if (misbehaviour === undefined) {
      throw new IdentifierError(
        `No trustworthiness impact set names a misbehaviour affecting ${twa}`,
        twasUri,
        ErrorCode.IDENTIFIER_MISSING_IMPACT,
        { twa, threat: row.get("URI") }
      );
    }
    ctx.resolveSet(entryPointMisbehaviourSet(twasUri, twa, misbehaviour), "misbehaviour");
  }
  writer.spacer();
}

function emitMisbehaviourSetTable(
  deps: EmitterDeps,
  table: string,
  column: "hasSecondaryEffectCondition" | "causesMisbehaviour"
): void {
  const { ctx, writer } = deps;

  for (const row of activeRows(deps, table, ["URI", "package", column])) {
    writer.quad(ssm(row.get("URI")), core(column), ssm(row.get(column)));
    ctx.resolveSet(row.get(column), "misbehaviour");
  }
  writer.spacer();
}

/** Control strategy edges onto threats */
function emitThreatTreatments(deps: EmitterDeps): void {
  const { writer } = deps;

  for (const [table, column] of [
    ["ControlStrategyBlocks", "blocks"],
    ["ControlStrategyMitigates", "mitigates"],
    ["ControlStrategyTriggers", "triggers"],
  ] as const) {
    for (const row of activeRows(deps, table, ["URI", "package", column])) {
      writer.quad(ssm(row.get("URI")), core(column), ssm(row.get(column)));
    }
    writer.spacer();
  }
}
