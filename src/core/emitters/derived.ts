/**
 * Derived output: every node, role link and entity set resolved while the
 * tables were written, in first-resolution order
 *
 * @module
 */

import { RDF_TYPE, core, ssm } from "../nquads/index.js";
import { variantIdentifier } from "../population/index.js";
import { SET_KINDS, type SetKind } from "../resolver/index.js";
import type { EmitterDeps } from "./common.js";

export const NODES_HEADING = "Node definitions";
export const ROLE_LINKS_HEADING = "Role Link definitions";

export const SET_HEADINGS: Record<SetKind, string> = {
  control: "Control Set definitions: combination of a Control at an asset with a given Role",
  misbehaviour: "Misbehaviour Set definitions: combination of a Misbehaviour at an asset with a given Role",
  trustworthinessAttribute:
    "Trustworthiness Attribute Set definitions: combination of a Trustworthiness Attribute at an asset with a given Role",
};

export function emitNodes(deps: EmitterDeps): number {
  const { ctx, writer } = deps;
  writer.section(NODES_HEADING);

  for (const [identifier, node] of ctx.nodes) {
    const uri = ssm(identifier);
    writer.quad(uri, RDF_TYPE, core("Node"));
    writer.quad(uri, core("metaHasAsset"), ssm(node.asset));
    writer.quad(uri, core("hasRole"), ssm(node.role));
    writer.spacer();
  }
  writer.spacer();

  return ctx.nodes.size;
}

export function emitRoleLinks(deps: EmitterDeps): number {
  const { ctx, writer } = deps;
  writer.section(ROLE_LINKS_HEADING);

  for (const [identifier, link] of ctx.links) {
    const uri = ssm(identifier);
    writer.quad(uri, RDF_TYPE, core("RoleLink"));
    writer.quad(uri, core("linkType"), ssm(link.linkType));
    writer.quad(uri, core("linksFrom"), ssm(link.fromRole));
    writer.quad(uri, core("linksTo"), ssm(link.toRole));
    writer.spacer();
  }
  writer.spacer();

  return ctx.links.size;
}

/**
 * A set points at the identity it was named with, so a `_Min` set refers
 * to the entity's min identity.
 */
export function emitSets(deps: EmitterDeps, kind: SetKind): number {
  const { ctx, writer } = deps;
  const info = SET_KINDS[kind];
  const sets = ctx.sets[kind];
  writer.section(SET_HEADINGS[kind]);

  for (const [identifier, set] of sets) {
    const uri = ssm(identifier);
    writer.quad(uri, RDF_TYPE, core(info.type));
    writer.quad(uri, core(info.property), ssm(variantIdentifier(set.entity, set.variant)));
    writer.quad(uri, core("locatedAt"), ssm(set.locatedAtRole));
    writer.spacer();
  }
  writer.spacer();

  return sets.size;
}
