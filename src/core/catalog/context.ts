/**
 * Run context
 *
 * Everything a conversion accumulates: the active features and packages,
 * the entity catalogs, the memoised derived records and the
 * trustworthiness-attribute to misbehaviour map. One context per run;
 * each field is filled by the step that owns it and only read afterwards.
 *
 * @module
 */

import { Catalog, type CatalogFamily } from "./catalog.js";
import { DerivedRecords } from "./derived-records.js";
import {
  resolveLink,
  resolveNode,
  resolveSet,
  type LinkRecord,
  type NodeRecord,
  type SetKind,
  type SetRecord,
} from "../resolver/index.js";
import type { ConstructionSequence } from "../scheduler/index.js";
import { createLogger, type Logger } from "../../utils/logger.js";

export interface ConversionFlags {
  /** Force visibility true and drop construction-state flags */
  unfiltered: boolean;
  /** Materialise min/max identities */
  expanded: boolean;
}

export type Catalogs = Record<CatalogFamily, Catalog>;

const SET_CATALOG: Record<SetKind, CatalogFamily> = {
  control: "control",
  misbehaviour: "misbehaviour",
  trustworthinessAttribute: "trustworthinessAttribute",
};

export class ConversionContext {
  readonly flags: ConversionFlags;
  readonly logger: Logger;

  features: ReadonlySet<string> = new Set();
  packages: ReadonlySet<string> = new Set();
  population = false;

  readonly catalogs: Catalogs;

  readonly nodes = new DerivedRecords<NodeRecord>();
  readonly links = new DerivedRecords<LinkRecord>();
  readonly sets: Record<SetKind, DerivedRecords<SetRecord>> = {
    control: new DerivedRecords<SetRecord>(),
    misbehaviour: new DerivedRecords<SetRecord>(),
    trustworthinessAttribute: new DerivedRecords<SetRecord>(),
  };

  /** TWA URI to the misbehaviour that affects it, from the impact sets */
  readonly twaMisbehaviour = new Map<string, string>();

  sequence: ConstructionSequence | null = null;
  sequenceTrace: string | null = null;

  constructor(flags: ConversionFlags, logger?: Logger) {
    this.flags = flags;
    this.logger = logger ?? createLogger("converter");
    this.catalogs = {
      asset: new Catalog("asset", this.logger),
      relationship: new Catalog("relationship", this.logger),
      role: new Catalog("role", this.logger),
      control: new Catalog("control", this.logger),
      misbehaviour: new Catalog("misbehaviour", this.logger),
      trustworthinessAttribute: new Catalog("trustworthinessAttribute", this.logger),
    };
  }

  hasFeature(feature: string): boolean {
    return this.features.has(feature);
  }

  /** Whether a row belongs to an enabled package */
  inActivePackage(row: { get(column: "package"): string }): boolean {
    return this.packages.has(row.get("package"));
  }

  resolveNode(identifier: string): NodeRecord {
    return this.nodes.resolve(identifier, (id) => resolveNode(id, this.catalogs.role, this.catalogs.asset));
  }

  resolveLink(identifier: string): LinkRecord {
    return this.links.resolve(identifier, (id) =>
      resolveLink(id, this.catalogs.role, this.catalogs.relationship)
    );
  }

  resolveSet(identifier: string, kind: SetKind): SetRecord {
    return this.sets[kind].resolve(identifier, (id) =>
      resolveSet(id, kind, this.catalogs[SET_CATALOG[kind]], this.catalogs.role, {
        variants: this.population,
      })
    );
  }
}

export function createConversionContext(flags: ConversionFlags, logger?: Logger): ConversionContext {
  return new ConversionContext(flags, logger);
}
