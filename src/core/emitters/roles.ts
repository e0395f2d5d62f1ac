/**
 * Roles
 *
 * Roles are catalogued for Node, Link and set identifiers; their
 * location constraints follow from RoleLocations.
 *
 * @module
 */

import { RDFS, RDF_TYPE, core, encodeString, packageResource, ssm } from "../nquads/index.js";
import { activeRows, type EmitterDeps } from "./common.js";
import { emitPropertyTable } from "./assets.js";

export const ROLES_HEADING = "Role definitions";

export function emitRoles(deps: EmitterDeps): number {
  const { ctx, writer } = deps;
  writer.section(ROLES_HEADING);

  const rows = activeRows(deps, "Role", ["URI", "package", "label", "comment"]);
  for (const row of rows) {
    const uri = ssm(row.get("URI"));
    writer.quad(uri, RDF_TYPE, core("Role"));
    writer.quad(uri, core("inPackage"), packageResource(row.get("package")));
    writer.quad(uri, RDFS.label, encodeString(row.get("label")));
    writer.quad(uri, RDFS.comment, encodeString(row.get("comment")));
    writer.spacer();
    ctx.catalogs.role.add(row.get("URI"));
  }
  writer.spacer();

  emitPropertyTable(deps, "RoleLocations", "metaLocatedAt", core("metaLocatedAt"));
  return rows.length;
}
