/**
 * N-Quads term encoding
 *
 * Every object emitted by the converter is one of: an IRI in one of the
 * fixed namespaces, a typed boolean or integer literal, or a plain string
 * literal. References in the tables are written relative to the SSM
 * namespace ("core#Threat", "domain#Host").
 *
 * @module
 */

import { ErrorCode, ValueError } from "../errors.js";
import { mapTriplet, type Triplet } from "../../types/index.js";

// =============================================================================
// Namespaces
// =============================================================================

export const NAMESPACES = {
  ssm: "http://it-innovation.soton.ac.uk/ontologies/trustworthiness",
  rdf: "http://www.w3.org/1999/02",
  rdfs: "http://www.w3.org/2000/01",
  owl: "http://www.w3.org/2002/07",
  xsd: "http://www.w3.org/2001/XMLSchema",
} as const;

export type NamespaceTag = keyof typeof NAMESPACES;

export const SSM_PREFIX = NAMESPACES.ssm;

const XSD_BOOLEAN = `<${NAMESPACES.xsd}#boolean>`;
const XSD_INTEGER = `<${NAMESPACES.xsd}#integer>`;

/**
 * Encode a namespace-relative reference as an IRI term.
 * An empty reference encodes to the empty string, which the writer treats
 * as an absent term.
 */
export function encodeUri(namespace: NamespaceTag, reference: string): string {
  if (reference === "") {
    return "";
  }
  return `<${NAMESPACES[namespace]}/${reference}>`;
}

/** Shorthand for an SSM-namespace reference such as `domain#Host` */
export function ssm(reference: string): string {
  return encodeUri("ssm", reference);
}

export function ssmTriplet(references: Triplet): Triplet {
  return mapTriplet(references, ssm);
}

// =============================================================================
// Literals
// =============================================================================

/**
 * Encode a table flag, "true" or "false" in any case
 *
 * @throws ValueError for any other text
 */
export function encodeBoolean(text: string | boolean): string {
  const value = typeof text === "boolean" ? String(text) : text.trim().toLowerCase();
  if (value !== "true" && value !== "false") {
    throw new ValueError(`Expected TRUE or FALSE, got "${String(text)}"`, String(text), ErrorCode.VALUE_NOT_BOOLEAN);
  }
  return `"${value}"^^${XSD_BOOLEAN}`;
}

/**
 * Inverse of {@link encodeBoolean}
 *
 * @throws ValueError if the term is not an xsd:boolean literal
 */
export function decodeBoolean(term: string): boolean {
  const match = /^"(true|false)"\^\^(.+)$/.exec(term);
  if (!match || match[2] !== XSD_BOOLEAN) {
    throw new ValueError("Not a boolean literal", term, ErrorCode.VALUE_NOT_BOOLEAN);
  }
  return match[1] === "true";
}

const INTEGER_PATTERN = /^[+-]?\d+$/;

/**
 * @throws ValueError if the text is not a base-10 integer
 */
export function encodeInteger(text: string | number): string {
  const value = typeof text === "number" ? String(text) : text.trim();
  if (!INTEGER_PATTERN.test(value)) {
    throw new ValueError(`Expected an integer, got "${value}"`, value, ErrorCode.VALUE_NOT_INTEGER);
  }
  return `"${value}"^^${XSD_INTEGER}`;
}

/**
 * Escape a string for use inside an N-Quads literal
 */
export function escapeLiteral(value: string): string {
  return value
    .replace(/\\/g, "\\\\")
    .replace(/"/g, '\\"')
    .replace(/\n/g, "\\n")
    .replace(/\r/g, "\\r")
    .replace(/\t/g, "\\t");
}

export function encodeString(text: string): string {
  return `"${escapeLiteral(text)}"`;
}

export function encodeStringTriplet(texts: Triplet): Triplet {
  return mapTriplet(texts, encodeString);
}
