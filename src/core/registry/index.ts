/**
 * Registry Module
 *
 * Active features and packages for a run.
 *
 * @module
 */

export {
  Feature,
  FEATURE_COLUMNS,
  loadFeatures,
  type FeatureColumn,
  type FeatureState,
  type LoadFeaturesOptions,
} from "./features.js";

export {
  PACKAGE_COLUMNS,
  loadPackages,
  type PackageColumn,
  type PackageRecord,
  type PackageState,
} from "./packages.js";
