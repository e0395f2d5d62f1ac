/**
 * Entity catalogs
 *
 * Each primary entity family keeps an ordered catalog of the URIs it has
 * emitted, keyed by URI and carrying the fragment that composite
 * identifiers embed. Iteration follows source-table row order; the
 * resolver relies on it to pick the first matching entry.
 *
 * @module
 */

import { createLogger, type Logger } from "../../utils/logger.js";

export type CatalogFamily =
  | "asset"
  | "relationship"
  | "role"
  | "control"
  | "misbehaviour"
  | "trustworthinessAttribute";

/** Prefix stripped from each family's URIs to give the embedded fragment */
export const CATALOG_PREFIXES: Record<CatalogFamily, string> = {
  asset: "domain#",
  relationship: "domain#",
  role: "domain#Role_",
  control: "domain#",
  misbehaviour: "domain#",
  trustworthinessAttribute: "domain#",
};

export class Catalog implements Iterable<[uri: string, fragment: string]> {
  private readonly entries = new Map<string, string>();
  private readonly byFragment = new Map<string, string>();
  private readonly logger: Logger;
  readonly prefix: string;

  constructor(readonly family: CatalogFamily, logger?: Logger) {
    this.prefix = CATALOG_PREFIXES[family];
    this.logger = logger ?? createLogger("catalog");
  }

  /**
   * Record a URI. Re-adding a URI keeps its original position. A URI
   * without the family prefix is keyed by its full value.
   *
   * @returns the fragment
   */
  add(uri: string): string {
    const existing = this.entries.get(uri);
    if (existing !== undefined) {
      return existing;
    }
    let fragment = uri;
    if (uri.startsWith(this.prefix)) {
      fragment = uri.slice(this.prefix.length);
    } else {
      this.logger.warn(
        { family: this.family, uri, prefix: this.prefix },
        "URI lacks the family prefix; keying it by the full URI"
      );
    }
    this.entries.set(uri, fragment);
    if (!this.byFragment.has(fragment)) {
      this.byFragment.set(fragment, uri);
    }
    return fragment;
  }

  has(uri: string): boolean {
    return this.entries.has(uri);
  }

  fragment(uri: string): string | undefined {
    return this.entries.get(uri);
  }

  /** The URI whose fragment is exactly `fragment`, if catalogued */
  uriFor(fragment: string): string | undefined {
    return this.byFragment.get(fragment);
  }

  get size(): number {
    return this.entries.size;
  }

  [Symbol.iterator](): Iterator<[string, string]> {
    return this.entries.entries();
  }
}
