/**
 * Population expansion
 *
 * A logical entity has min, average and max identities. The min and max
 * identifiers are derived from the average one by inserting a marker either
 * at the end or straight after a disambiguating substring:
 *
 * ```
 * expandPopulation("domain#Firewall")
 *   // ["domain#Firewall_Min", "domain#Firewall", "domain#Firewall_Max"]
 * expandPopulation("domain#CAS-Host-Firewall", "Host")
 *   // ["domain#CAS-Host_Min-Firewall", "domain#CAS-Host-Firewall", "domain#CAS-Host_Max-Firewall"]
 * ```
 *
 * @module
 */

import { ErrorCode, ValueError } from "../errors.js";
import type { PopulationVariant, Triplet } from "../../types/index.js";
import { createLogger, type Logger } from "../../utils/logger.js";

export const MIN_SUFFIX = "_Min";
export const MAX_SUFFIX = "_Max";

export const VARIANT_SUFFIXES: Record<PopulationVariant, string> = {
  min: MIN_SUFFIX,
  average: "",
  max: MAX_SUFFIX,
};

let defaultLogger: Logger | null = null;

function getDefaultLogger(): Logger {
  defaultLogger ??= createLogger("population");
  return defaultLogger;
}

/**
 * @param identifier - the average identity
 * @param disambiguator - substring after which the marker goes; the first occurrence is used
 * @throws ValueError if the identifier is empty or the disambiguator does not occur in it
 */
export function expandPopulation(identifier: string, disambiguator?: string, logger?: Logger): Triplet {
  if (identifier === "") {
    throw new ValueError("Cannot expand an empty identifier", identifier, ErrorCode.VALUE_EMPTY);
  }

  if (disambiguator === undefined) {
    return [identifier + MIN_SUFFIX, identifier, identifier + MAX_SUFFIX];
  }

  const at = disambiguator === "" ? -1 : identifier.indexOf(disambiguator);
  if (at < 0) {
    throw new ValueError(
      `"${disambiguator}" cannot be found in "${identifier}"`,
      identifier,
      ErrorCode.VALUE_BAD_DISAMBIGUATOR,
      { disambiguator }
    );
  }

  const head = identifier.slice(0, at + disambiguator.length);
  const tail = identifier.slice(at + disambiguator.length);
  const min = head + MIN_SUFFIX + tail;

  if (tail.includes(disambiguator)) {
    (logger ?? getDefaultLogger()).warn(
      { identifier, disambiguator, min },
      "Disambiguator occurs more than once; using the first occurrence"
    );
  }

  return [min, identifier, head + MAX_SUFFIX + tail];
}

/**
 * The identity of `identifier` for one variant, without the ambiguity warning
 * (the caller has already expanded it once)
 */
export function variantIdentifier(identifier: string, variant: PopulationVariant): string {
  return identifier + VARIANT_SUFFIXES[variant];
}
