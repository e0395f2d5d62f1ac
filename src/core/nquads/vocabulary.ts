/**
 * Predicate and class terms used across the emitters
 */

import { ErrorCode, IdentifierError } from "../errors.js";
import { encodeUri, ssm } from "./codec.js";

export const RDF_TYPE = encodeUri("rdf", "22-rdf-syntax-ns#type");

export const RDFS = {
  label: encodeUri("rdfs", "rdf-schema#label"),
  comment: encodeUri("rdfs", "rdf-schema#comment"),
  subClassOf: encodeUri("rdfs", "rdf-schema#subClassOf"),
  subPropertyOf: encodeUri("rdfs", "rdf-schema#subPropertyOf"),
  domain: encodeUri("rdfs", "rdf-schema#domain"),
  range: encodeUri("rdfs", "rdf-schema#range"),
} as const;

export const OWL = {
  Class: encodeUri("owl", "owl#Class"),
  ObjectProperty: encodeUri("owl", "owl#ObjectProperty"),
  Ontology: encodeUri("owl", "owl#Ontology"),
  imports: encodeUri("owl", "owl#imports"),
  versionInfo: encodeUri("owl", "owl#versionInfo"),
} as const;

/** A term from the core ontology, e.g. `core("hasMin")` */
export function core(local: string): string {
  return ssm(`core#${local}`);
}

export const DOMAIN_PREFIX = "domain#";

/**
 * The local part of a `domain#` reference
 *
 * @throws IdentifierError if the reference is not in the domain namespace
 */
export function domainFragment(reference: string): string {
  if (!reference.startsWith(DOMAIN_PREFIX)) {
    throw new IdentifierError(
      `Expected a reference starting with "${DOMAIN_PREFIX}"`,
      reference,
      ErrorCode.IDENTIFIER_BAD_PREFIX
    );
  }
  return reference.slice(DOMAIN_PREFIX.length);
}

/** `package#Core` is published as `domain#Package-Core` */
export function packageResource(reference: string): string {
  return ssm(reference.replace("package#", "domain#Package-"));
}

/** `feature#PopulationModel` is published as `domain#Feature-PopulationModel` */
export function featureResource(reference: string): string {
  return ssm(reference.replace("feature#", "domain#Feature-"));
}
