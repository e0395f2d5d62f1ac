/**
 * Emitters Module
 *
 * One emitter per section of the N-Quads output, in output order.
 */

export { readTable, activeRows, type EmitterDeps } from "./common.js";

export {
  emitDomainModel,
  DOMAIN_MODEL_HEADING,
  UNEXPANDED_GRAPH_SUFFIX,
  UNEXPANDED_LABEL_SUFFIX,
  UNFILTERED_VERSION_SUFFIX,
  type DomainHeader,
  type DomainHeaderOptions,
} from "./domain-model.js";

export { emitScale, SCALES, type ScaleDefinition } from "./scales.js";
export { emitAssets, emitRelationships, emitPropertyTable, ASSETS_HEADING, RELATIONSHIPS_HEADING } from "./assets.js";
export { emitRoles, ROLES_HEADING } from "./roles.js";
export { emitPopulationEntities, POPULATION_FAMILIES, type PopulationFamily } from "./population-entities.js";
export { emitImpactSets, emitInhibitionSets, TWIS_HEADING, MIS_HEADING } from "./impact-sets.js";
export { emitRootPatterns, emitMatchingPatterns, ROOT_PATTERNS_HEADING, MATCHING_PATTERNS_HEADING } from "./patterns.js";

export {
  emitConstructionPatterns,
  sequenceConstructionPatterns,
  CONSTRUCTION_HEADING,
  SEQUENCE_TRACE_HEADER,
} from "./construction.js";

export {
  emitThreatCategories,
  emitComplianceSets,
  emitThreats,
  threatDisambiguator,
  entryPointMisbehaviourSet,
  THREAT_CATEGORIES_HEADING,
  COMPLIANCE_SETS_HEADING,
  THREATS_HEADING,
} from "./threats.js";

export {
  emitControlStrategies,
  controlStrategyDisambiguator,
  CONTROL_STRATEGIES_HEADING,
} from "./control-strategies.js";

export {
  emitControlAssertability,
  emitMisbehaviourDefaults,
  emitTrustworthinessDefaults,
  CASETTINGS_HEADING,
  MA_DEFAULTS_HEADING,
  TWAA_DEFAULTS_HEADING,
} from "./default-settings.js";

export { emitNodes, emitRoleLinks, emitSets, NODES_HEADING, ROLE_LINKS_HEADING, SET_HEADINGS } from "./derived.js";
export { buildIconMapping, serializeIconMapping, type IconMapping } from "./icon-mapping.js";
