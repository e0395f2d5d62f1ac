/**
 * Trustworthiness impact sets (which misbehaviour undermines which TWA) and
 * misbehaviour inhibition sets (which control inhibits which misbehaviour)
 *
 * @module
 */

import { RDF_TYPE, core, domainFragment, ssm } from "../nquads/index.js";
import { MAX_SUFFIX, MIN_SUFFIX } from "../population/index.js";
import { activeRows, type EmitterDeps } from "./common.js";

export const TWIS_HEADING =
  "Trustworthiness Impact Set definitions (relationship between Misbehaviours and TWAs)";
export const MIS_HEADING = "Misbehaviour Inhibition Sets (relationship between Misbehaviours and Controls)";

function emitImpactSet(deps: EmitterDeps, uri: string, affects: string, affectedBy: string): void {
  const { writer } = deps;
  writer.quad(uri, RDF_TYPE, core("TrustworthinessImpactSet"));
  writer.quad(uri, core("affectedBy"), affectedBy);
  writer.quad(uri, core("affects"), affects);
}

/**
 * Under the population model a TWA's minimum is driven by the
 * misbehaviour's maximum and vice versa, so two crossed sets are added.
 */
export function emitImpactSets(deps: EmitterDeps): number {
  const { ctx, writer } = deps;
  writer.section(TWIS_HEADING);

  const rows = activeRows(deps, "TWIS", ["URI", "package", "affectedBy", "affects"]);
  for (const row of rows) {
    const twa = row.get("affects");
    const misbehaviour = row.get("affectedBy");
    ctx.twaMisbehaviour.set(twa, misbehaviour);

    emitImpactSet(deps, ssm(row.get("URI")), ssm(twa), ssm(misbehaviour));

    if (ctx.population) {
      const twaName = domainFragment(twa);
      const misbehaviourName = domainFragment(misbehaviour);
      for (const [twaSuffix, misbehaviourSuffix] of [
        [MIN_SUFFIX, MAX_SUFFIX],
        [MAX_SUFFIX, MIN_SUFFIX],
      ]) {
        const affects = twaName + twaSuffix;
        const affectedBy = misbehaviourName + misbehaviourSuffix;
        emitImpactSet(
          deps,
          ssm(`domain#TWIS-${affects}-${affectedBy}`),
          ssm(`domain#${affects}`),
          ssm(`domain#${affectedBy}`)
        );
      }
    }
    writer.spacer();
  }
  writer.spacer();

  return rows.length;
}

export function emitInhibitionSets(deps: EmitterDeps): number {
  const { writer } = deps;
  writer.section(MIS_HEADING);

  const rows = activeRows(deps, "MIS", ["URI", "package", "inhibited", "inhibitedBy"]);
  for (const row of rows) {
    const uri = ssm(row.get("URI"));
    writer.quad(uri, RDF_TYPE, core("MisbehaviourInhibitionSet"));
    writer.quad(uri, core("inhibited"), ssm(row.get("inhibited")));
    writer.quad(uri, core("inhibitedBy"), ssm(row.get("inhibitedBy")));
  }
  writer.spacer();

  return rows.length;
}
