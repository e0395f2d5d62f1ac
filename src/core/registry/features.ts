/**
 * Feature registry
 *
 * Features are opt-in structural capabilities of a domain model, declared
 * in DomainFeature.csv. The declared set is fixed for the whole run.
 *
 * @module
 */

import type { BoundTable } from "../tables/index.js";
import { createLogger, type Logger } from "../../utils/logger.js";

export const Feature = {
  OptionalPackages: "feature#OptionalPackages",
  PopulationModel: "feature#PopulationModel",
  ThreatTypeFlags: "feature#ThreatTypeFlags",
  RiskTypeFlags: "feature#RiskTypeFlags",
  MixedThreatCauses: "feature#MixedThreatCauses",
  ConstructionStateFlags: "feature#ConstructionStateFlags",
  ConstructionDependencies: "feature#ConstructionDependencies",
} as const;

export const FEATURE_COLUMNS = ["URI", "comment", "supported"] as const;
export type FeatureColumn = (typeof FEATURE_COLUMNS)[number];

export interface FeatureState {
  /** Features written to the output and consulted by every later step */
  declared: ReadonlySet<string>;
  /** The table declared population support, whether or not it was honoured */
  populationDeclared: boolean;
  /** Whether min/max identities are materialised */
  population: boolean;
}

export interface LoadFeaturesOptions {
  expanded: boolean;
  logger?: Logger;
}

/**
 * Read the feature table.
 *
 * Population expansion follows the `expanded` option: a declared
 * population feature is dropped when expansion is off, and expansion still
 * happens when it is on but the model does not declare support.
 *
 * @param table - null when the model has no feature table
 */
export function loadFeatures(
  table: BoundTable<FeatureColumn> | null,
  options: LoadFeaturesOptions
): FeatureState {
  const logger = options.logger ?? createLogger("registry");
  const declared = new Set<string>();
  let populationDeclared = false;

  for (const row of table ?? []) {
    const uri = row.get("URI");
    const supported = row.flag("supported");

    if (!supported) {
      logger.info({ feature: uri }, "Feature is not supported by this domain model");
      continue;
    }
    if (uri === Feature.PopulationModel) {
      populationDeclared = true;
      if (!options.expanded) {
        logger.warn({ feature: uri }, "Population model is supported but expansion was not requested; dropping it");
        continue;
      }
    }
    declared.add(uri);
  }

  if (options.expanded && !populationDeclared) {
    logger.warn(
      { feature: Feature.PopulationModel },
      "Population expansion requested but the domain model does not declare support; expanding anyway"
    );
  }

  return { declared, populationDeclared, population: options.expanded };
}
