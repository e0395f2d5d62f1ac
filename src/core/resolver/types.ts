/**
 * Records derived from composite identifiers
 */

import type { PopulationVariant } from "../../types/index.js";

/** `domain#Node-<role>-<asset>` */
export interface NodeRecord {
  role: string;
  asset: string;
}

/** `domain#Link-<fromRole>-<relationship>-<toRole>` */
export interface LinkRecord {
  fromRole: string;
  linkType: string;
  toRole: string;
}

export type SetKind = "control" | "misbehaviour" | "trustworthinessAttribute";

/** `domain#<CS|MS|TWAS>-<entity>[_Min|_Max]-<role>` */
export interface SetRecord {
  kind: SetKind;
  /** Average identity of the entity */
  entity: string;
  variant: PopulationVariant;
  locatedAtRole: string;
}

export interface SetKindInfo {
  prefix: string;
  /** Predicate linking the set to its entity, without namespace */
  property: string;
  /** Class of the set, without namespace */
  type: string;
  label: string;
}

export const SET_KINDS: Record<SetKind, SetKindInfo> = {
  control: {
    prefix: "domain#CS-",
    property: "hasControl",
    type: "ControlSet",
    label: "Control",
  },
  misbehaviour: {
    prefix: "domain#MS-",
    property: "hasMisbehaviour",
    type: "MisbehaviourSet",
    label: "Misbehaviour",
  },
  trustworthinessAttribute: {
    prefix: "domain#TWAS-",
    property: "hasTrustworthinessAttribute",
    type: "TrustworthinessAttributeSet",
    label: "Trustworthiness Attribute",
  },
};
