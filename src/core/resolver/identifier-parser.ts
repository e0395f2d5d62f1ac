/**
 * Composite identifier resolution
 *
 * Grammar, with the catalogs as the terminal tables:
 *
 * ```
 * Node := "domain#Node-" Role "-" Asset
 * Link := "domain#Link-" Role "-" Relationship "-" Role
 * Set  := "domain#" Kind "-" Entity [ "_Min" | "_Max" ] "-" Role
 * ```
 *
 * A fragment followed by "-" is matched against catalog entries in
 * insertion order and the first hit wins, even if a later entry would
 * have let the rest of the identifier parse. The trailing fragment must be
 * exactly a catalogued entry.
 *
 * @module
 */

import { ErrorCode, IdentifierError } from "../errors.js";
import type { Catalog } from "../catalog/catalog.js";
import { MAX_SUFFIX, MIN_SUFFIX } from "../population/index.js";
import type { PopulationVariant } from "../../types/index.js";
import { SET_KINDS, type LinkRecord, type NodeRecord, type SetKind, type SetRecord } from "./types.js";

export const NODE_PREFIX = "domain#Node-";
export const LINK_PREFIX = "domain#Link-";

const SEPARATOR = "-";

interface Marker {
  suffix: string;
  variant: PopulationVariant;
}

const AVERAGE_ONLY: readonly Marker[] = [{ suffix: "", variant: "average" }];
const ALL_VARIANTS: readonly Marker[] = [
  { suffix: "", variant: "average" },
  { suffix: MIN_SUFFIX, variant: "min" },
  { suffix: MAX_SUFFIX, variant: "max" },
];

// =============================================================================
// Cursor
// =============================================================================

class IdentifierCursor {
  private position = 0;

  constructor(readonly identifier: string, private readonly kind: string) {}

  get rest(): string {
    return this.identifier.slice(this.position);
  }

  literal(text: string): boolean {
    if (!this.rest.startsWith(text)) {
      return false;
    }
    this.position += text.length;
    return true;
  }

  /**
   * First catalog entry (optionally followed by a population marker) that,
   * with a separator, prefixes the rest of the identifier
   */
  entry(catalog: Catalog, markers: readonly Marker[] = AVERAGE_ONLY): { uri: string; variant: PopulationVariant } | null {
    const rest = this.rest;
    for (const [uri, fragment] of catalog) {
      for (const marker of markers) {
        const token = fragment + marker.suffix + SEPARATOR;
        if (rest.startsWith(token)) {
          this.position += token.length;
          return { uri, variant: marker.variant };
        }
      }
    }
    return null;
  }

  /** The rest of the identifier, which must be a catalogued fragment */
  last(catalog: Catalog): string | null {
    return catalog.uriFor(this.rest) ?? null;
  }

  fail(problem: string, code: ErrorCode): never {
    throw new IdentifierError(`Bad ${this.kind} URI ${this.identifier}: ${problem}`, this.identifier, code);
  }
}

// =============================================================================
// Resolvers
// =============================================================================

export function resolveNode(identifier: string, roles: Catalog, assets: Catalog): NodeRecord {
  const cursor = new IdentifierCursor(identifier, "Node");
  if (!cursor.literal(NODE_PREFIX)) {
    cursor.fail(`expected prefix "${NODE_PREFIX}"`, ErrorCode.IDENTIFIER_BAD_PREFIX);
  }
  const role = cursor.entry(roles) ?? cursor.fail("does not have a valid role", ErrorCode.IDENTIFIER_UNKNOWN_ROLE);
  const asset =
    cursor.last(assets) ?? cursor.fail("does not have a valid asset type", ErrorCode.IDENTIFIER_UNKNOWN_ASSET);
  return { role: role.uri, asset };
}

export function resolveLink(identifier: string, roles: Catalog, relationships: Catalog): LinkRecord {
  const cursor = new IdentifierCursor(identifier, "Role Link");
  if (!cursor.literal(LINK_PREFIX)) {
    cursor.fail(`expected prefix "${LINK_PREFIX}"`, ErrorCode.IDENTIFIER_BAD_PREFIX);
  }
  const from = cursor.entry(roles) ?? cursor.fail("is not from a valid role", ErrorCode.IDENTIFIER_UNKNOWN_ROLE);
  const linkType =
    cursor.entry(relationships) ??
    cursor.fail("does not have a valid relationship type", ErrorCode.IDENTIFIER_UNKNOWN_RELATIONSHIP);
  const to = cursor.last(roles) ?? cursor.fail("is not to a valid role", ErrorCode.IDENTIFIER_UNKNOWN_ROLE);
  return { fromRole: from.uri, linkType: linkType.uri, toRole: to };
}

export interface ResolveSetOptions {
  /** Accept `_Min` / `_Max` after the entity fragment */
  variants?: boolean;
}

export function resolveSet(
  identifier: string,
  kind: SetKind,
  entities: Catalog,
  roles: Catalog,
  options: ResolveSetOptions = {}
): SetRecord {
  const info = SET_KINDS[kind];
  const cursor = new IdentifierCursor(identifier, `${info.label} Set`);
  if (!cursor.literal(info.prefix)) {
    cursor.fail(`expected prefix "${info.prefix}"`, ErrorCode.IDENTIFIER_BAD_PREFIX);
  }
  const entity =
    cursor.entry(entities, options.variants ? ALL_VARIANTS : AVERAGE_ONLY) ??
    cursor.fail(`does not relate to a valid ${info.label}`, ErrorCode.IDENTIFIER_UNKNOWN_ENTITY);
  const role =
    cursor.last(roles) ?? cursor.fail("does not relate to a valid role", ErrorCode.IDENTIFIER_UNKNOWN_ROLE);
  return { kind, entity: entity.uri, variant: entity.variant, locatedAtRole: role };
}
