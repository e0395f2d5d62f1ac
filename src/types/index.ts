/**
 * Shared types for domain-model-nq
 */

export * from "./result.js";

/**
 * The three physical identities of one logical entity, in min/average/max order
 */
export type Triplet<T = string> = readonly [min: T, average: T, max: T];

/**
 * Which member of a population triplet an identifier names
 */
export type PopulationVariant = "min" | "average" | "max";

const VARIANT_INDEX: Record<PopulationVariant, 0 | 1 | 2> = {
  min: 0,
  average: 1,
  max: 2,
};

export function mapTriplet<T, U>(triplet: Triplet<T>, fn: (value: T) => U): Triplet<U> {
  return [fn(triplet[0]), fn(triplet[1]), fn(triplet[2])];
}

export function pickVariant<T>(triplet: Triplet<T>, variant: PopulationVariant): T {
  return triplet[VARIANT_INDEX[variant]];
}
