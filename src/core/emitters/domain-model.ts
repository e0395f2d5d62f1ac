/**
 * Domain header: ontology annotations, the declared features and the packages
 *
 * This step decides the named graph every later quad is written into.
 *
 * @module
 */

import { ConfigurationError, ErrorCode } from "../errors.js";
import {
  FEATURE_COLUMNS,
  Feature,
  loadFeatures,
  loadPackages,
  type PackageRecord,
} from "../registry/index.js";
import {
  OWL,
  RDFS,
  RDF_TYPE,
  core,
  encodeBoolean,
  encodeString,
  featureResource,
  packageResource,
  ssm,
} from "../nquads/index.js";
import { bindTable, columnsWhen } from "../tables/index.js";
import { readTable, type EmitterDeps } from "./common.js";

export const DOMAIN_MODEL_HEADING = "Domain model namespace, graph and reasoning class";

export interface DomainHeaderOptions {
  version: string;
  /** Replaces the last path segment of the domain graph URI */
  name?: string;
  /** Replaces the ontology label */
  label?: string;
}

export interface DomainHeader {
  ontology: string;
  /** Domain graph URI, unbracketed */
  graph: string;
  label: string;
  versionInfo: string;
  features: string[];
  packages: PackageRecord[];
}

export const UNEXPANDED_GRAPH_SUFFIX = "-unexpanded";
export const UNEXPANDED_LABEL_SUFFIX = "-UNEXPANDED";
export const UNFILTERED_VERSION_SUFFIX = "-unfiltered";

function replaceLastSegment(uri: string, name: string): string {
  const segments = uri.split("/");
  segments[segments.length - 1] = name;
  return segments.join("/");
}

export function emitDomainModel(deps: EmitterDeps, options: DomainHeaderOptions): DomainHeader {
  const { ctx, tables, writer } = deps;
  writer.section(DOMAIN_MODEL_HEADING);

  const featureState = loadFeatures(
    tables.has("DomainFeature") ? bindTable(tables.read("DomainFeature"), FEATURE_COLUMNS) : null,
    { expanded: ctx.flags.expanded, logger: ctx.logger }
  );
  ctx.features = featureState.declared;
  ctx.population = featureState.population;

  const model = readTable(deps, "DomainModel", ["URI", "label", "comment", "domainGraph", "reasonerClass"]);
  const row = model.rows()[0];
  if (!row) {
    throw new ConfigurationError("Domain model table has no data row", ErrorCode.CONFIG_BAD_TABLE, {
      table: "DomainModel",
    });
  }

  let graph = row.get("domainGraph");
  if (options.name) {
    graph = replaceLastSegment(graph, options.name);
  }
  let label = options.label ?? row.get("label");
  if (featureState.populationDeclared && !featureState.population) {
    graph += UNEXPANDED_GRAPH_SUFFIX;
    label += UNEXPANDED_LABEL_SUFFIX;
  }
  const versionInfo = options.version + (ctx.flags.unfiltered ? UNFILTERED_VERSION_SUFFIX : "");

  const graphTerm = `<${graph}>`;
  writer.setGraph(graphTerm);

  const ontology = row.get("URI");
  const uri = `<${ontology}>`;
  writer.quad(uri, OWL.imports, ssm("core"));
  writer.quad(uri, RDF_TYPE, OWL.Ontology);
  writer.quad(uri, core("domainGraph"), graphTerm);
  writer.quad(uri, OWL.versionInfo, encodeString(versionInfo));
  writer.quad(uri, core("reasonerClass"), encodeString(row.get("reasonerClass")));
  writer.quad(uri, RDFS.label, encodeString(label));
  writer.quad(uri, RDFS.comment, encodeString(row.get("comment")));
  writer.spacer();

  const features = [...ctx.features];
  for (const feature of features) {
    writer.quad(featureResource(feature), RDF_TYPE, core("ModelFeature"));
  }
  writer.spacer();

  const optional = ctx.hasFeature(Feature.OptionalPackages);
  const packageTable = bindTable(tables.read("Packages"), [
    "URI",
    "Label",
    "Description",
    ...columnsWhen(optional, "Enabled"),
  ]);
  const packageState = loadPackages(packageTable, ctx.features, ctx.logger);
  ctx.packages = packageState.active;

  for (const record of packageState.records) {
    const resource = packageResource(record.uri);
    writer.quad(resource, RDF_TYPE, core("ModelPackage"));
    writer.quad(resource, RDFS.label, encodeString(record.label));
    writer.quad(resource, RDFS.comment, encodeString(record.comment));
    if (optional) {
      writer.quad(resource, core("enabled"), encodeBoolean(record.enabled));
    }
  }
  writer.spacer();

  ctx.logger.info({ graph, features, packages: [...ctx.packages] }, "Domain header written");

  return { ontology, graph, label, versionInfo, features, packages: packageState.records };
}
