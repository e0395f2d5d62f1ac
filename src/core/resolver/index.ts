/**
 * Resolver Module
 *
 * Decomposes Node, Role Link and entity-set identifiers against the catalogs.
 *
 * @module
 */

export {
  NODE_PREFIX,
  LINK_PREFIX,
  resolveNode,
  resolveLink,
  resolveSet,
  type ResolveSetOptions,
} from "./identifier-parser.js";

export {
  SET_KINDS,
  type NodeRecord,
  type LinkRecord,
  type SetKind,
  type SetKindInfo,
  type SetRecord,
} from "./types.js";
