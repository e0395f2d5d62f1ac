/**
 * Emitter tests against in-memory tables
 */

import { describe, it, expect } from "vitest";
import {
  buildIconMapping,
  controlStrategyDisambiguator,
  emitControlAssertability,
  emitNodes,
  emitRootPatterns,
  emitSets,
  entryPointMisbehaviourSet,
  serializeIconMapping,
  threatDisambiguator,
  type EmitterDeps,
} from "../index.js";
import { createConversionContext } from "../../catalog/index.js";
import { MemorySink, NQuadsWriter } from "../../nquads/index.js";
import { MemoryTableSource } from "../../tables/index.js";
import { ErrorCode, IdentifierError } from "../../errors.js";
import { captureLogger, thrown } from "../../__tests__/helpers.js";

const SSM = "http://it-innovation.soton.ac.uk/ontologies/trustworthiness";
const TYPE = "<http://www.w3.org/1999/02/22-rdf-syntax-ns#type>";
const TRUE = '"true"^^<http://www.w3.org/2001/XMLSchema#boolean>';
const FALSE = '"false"^^<http://www.w3.org/2001/XMLSchema#boolean>';
const GRAPH = "<urn:test>";

function term(reference: string): string {
  return `<${SSM}/${reference}>`;
}

function quad(subject: string, predicate: string, object: string): string {
  return `${subject} ${predicate} ${object} ${GRAPH} .`;
}

function setup(tables: Record<string, string[][]>, population = false) {
  const { logger } = captureLogger();
  const ctx = createConversionContext({ unfiltered: false, expanded: population }, logger);
  ctx.population = population;
  ctx.packages = new Set(["package#Core"]);
  const sink = new MemorySink();
  const writer = new NQuadsWriter(sink, logger);
  writer.setGraph(GRAPH);
  const deps: EmitterDeps = { ctx, tables: new MemoryTableSource(tables), writer };
  const quads = () => sink.lines().filter((line) => !line.startsWith("#"));
  return { deps, ctx, writer, quads };
}

describe("identifier helpers", () => {
  it("should take the first two dotted parts of a threat URI", () => {
    expect(threatDisambiguator("domain#H.A.HCP.1")).toBe("H.A");
  });

  it("should reject a threat URI with fewer than three dots", () => {
    const error = thrown(() => threatDisambiguator("domain#H.A.1"));
    expect(error).toBeInstanceOf(IdentifierError);
    expect(error).toMatchObject({ code: ErrorCode.IDENTIFIER_MALFORMED });
  });

  it("should take the first two hyphenated parts of a control strategy URI", () => {
    expect(controlStrategyDisambiguator("domain#CSG-Patching-Host")).toBe("CSG-Patching");
    expect(thrown(() => controlStrategyDisambiguator("domain#CSG"))).toMatchObject({
      code: ErrorCode.IDENTIFIER_MALFORMED,
    });
  });

  it("should swap a TWAS prefix for the affecting misbehaviour set", () => {
    expect(entryPointMisbehaviourSet("domain#TWAS-UserTW-Host", "domain#UserTW", "domain#LossOfAuth")).toBe(
      "domain#MS-LossOfAuth-Host"
    );
  });

  it("should keep the population variant of an entry point uncrossed", () => {
    expect(entryPointMisbehaviourSet("domain#TWAS-UserTW_Min-Host", "domain#UserTW", "domain#LossOfAuth")).toBe(
      "domain#MS-LossOfAuth_Min-Host"
    );
    expect(entryPointMisbehaviourSet("domain#TWAS-UserTW_Max-Host", "domain#UserTW", "domain#LossOfAuth")).toBe(
      "domain#MS-LossOfAuth_Max-Host"
    );
  });
});

describe("emitControlAssertability", () => {
  const CASetting = [
    ["URI", "package", "metaLocatedAt", "hasControl", "isAssertable", "hasLevel", "independentLevels"],
    ["domain#CAS-Host-Firewall", "package#Core", "domain#Host", "domain#Firewall", "TRUE", "domain#Level2", "TRUE"],
    ["domain#CAS-Host-Backup", "package#Other", "domain#Host", "domain#Backup", "TRUE", "domain#Level2", "TRUE"],
  ];

  it("should write one setting per row without the population model", () => {
    const { deps, quads } = setup({ CASetting });
    const uri = term("domain#CAS-Host-Firewall");

    expect(emitControlAssertability(deps)).toBe(1);
    expect(quads()).toEqual([
      quad(uri, TYPE, term("core#CASetting")),
      quad(uri, term("core#hasControl"), term("domain#Firewall")),
      quad(uri, term("core#metaLocatedAt"), term("domain#Host")),
      quad(uri, term("core#isAssertable"), TRUE),
      quad(uri, term("core#hasLevel"), term("domain#Level2")),
      quad(uri, term("core#independentLevels"), FALSE),
    ]);
  });

  it("should write average, min and max settings under the population model", () => {
    const { deps, writer, quads } = setup({ CASetting }, true);
    emitControlAssertability(deps);

    const controls = quads().filter((line) => line.includes("core#hasControl>"));
    expect(controls).toEqual([
      quad(term("domain#CAS-Host-Firewall"), term("core#hasControl"), term("domain#Firewall")),
      quad(term("domain#CAS-Host-Firewall_Min"), term("core#hasControl"), term("domain#Firewall_Min")),
      quad(term("domain#CAS-Host-Firewall_Max"), term("core#hasControl"), term("domain#Firewall_Max")),
    ]);
    expect(quads()).toContain(quad(term("domain#CAS-Host-Firewall_Max"), term("core#independentLevels"), TRUE));
    expect(writer.quadCount).toBe(18);
  });
});

describe("emitRootPatterns", () => {
  function tables(keyNode: string) {
    return {
      RootPattern: [
        ["URI", "package", "label", "comment"],
        ["domain#RP-Hosting", "package#Core", "Hosting", ""],
      ],
      RootPatternNodes: [
        ["URI", "package", "hasNode", "keyNode"],
        ["domain#RP-Hosting", "package#Core", "domain#Node-Host-Host", keyNode],
      ],
      RootPatternLinks: [
        ["URI", "package", "hasLink"],
        ["domain#RP-Hosting", "package#Core", "domain#Link-Host-hosts-Host"],
      ],
    };
  }

  function withCatalogs(keyNode: string) {
    const fixture = setup(tables(keyNode));
    fixture.ctx.catalogs.role.add("domain#Role_Host");
    fixture.ctx.catalogs.asset.add("domain#Host");
    fixture.ctx.catalogs.relationship.add("domain#hosts");
    return fixture;
  }

  it("should write the pattern and record its nodes and links", () => {
    const { deps, ctx, quads } = withCatalogs("TRUE");
    const uri = term("domain#RP-Hosting");

    expect(emitRootPatterns(deps)).toBe(1);
    expect(quads()).toEqual([
      quad(uri, TYPE, term("core#RootPattern")),
      quad(uri, term("core#inPackage"), term("domain#Package-Core")),
      quad(uri, "<http://www.w3.org/2000/01/rdf-schema#label>", '"Hosting"'),
      quad(uri, term("core#hasKeyNode"), term("domain#Node-Host-Host")),
      quad(uri, term("core#hasLink"), term("domain#Link-Host-hosts-Host")),
    ]);
    expect(ctx.nodes.has("domain#Node-Host-Host")).toBe(true);
    expect(ctx.links.has("domain#Link-Host-hosts-Host")).toBe(true);
  });

  it("should mark a non-key node as a root node", () => {
    const { deps, quads } = withCatalogs("false");
    emitRootPatterns(deps);
    expect(quads()).toContain(quad(term("domain#RP-Hosting"), term("core#hasRootNode"), term("domain#Node-Host-Host")));
  });

  it("should reject a keyNode that is not a boolean", () => {
    const { deps } = withCatalogs("yes");
    expect(thrown(() => emitRootPatterns(deps))).toMatchObject({ code: ErrorCode.VALUE_BAD_FLAG, value: "yes" });
  });
});

describe("derived sections", () => {
  it("should write each resolved node once", () => {
    const { deps, ctx, quads } = setup({});
    ctx.catalogs.role.add("domain#Role_Host");
    ctx.catalogs.asset.add("domain#Host");
    ctx.resolveNode("domain#Node-Host-Host");
    ctx.resolveNode("domain#Node-Host-Host");

    const uri = term("domain#Node-Host-Host");
    expect(emitNodes(deps)).toBe(1);
    expect(quads()).toEqual([
      quad(uri, TYPE, term("core#Node")),
      quad(uri, term("core#metaHasAsset"), term("domain#Host")),
      quad(uri, term("core#hasRole"), term("domain#Role_Host")),
    ]);
  });

  it("should point a min set at the min identity", () => {
    const { deps, ctx, quads } = setup({}, true);
    ctx.catalogs.role.add("domain#Role_Host");
    ctx.catalogs.control.add("domain#Firewall");
    ctx.resolveSet("domain#CS-Firewall_Min-Host", "control");

    const uri = term("domain#CS-Firewall_Min-Host");
    expect(emitSets(deps, "control")).toBe(1);
    expect(quads()).toEqual([
      quad(uri, TYPE, term("core#ControlSet")),
      quad(uri, term("core#hasControl"), term("domain#Firewall_Min")),
      quad(uri, term("core#locatedAt"), term("domain#Role_Host")),
    ]);
  });
});

describe("icon mapping", () => {
  const tables = new MemoryTableSource({
    DomainAsset: [
      ["URI", "package", "icon"],
      ["domain#Host", "package#Other", "host.svg"],
      ["domain#Process", "package#Core", ""],
    ],
  });

  it("should map every asset with an icon regardless of package", () => {
    expect(buildIconMapping(tables, "network", "http://example.com/domain/network")).toEqual({
      ontology: "network",
      graph: "http://example.com/domain/network",
      defaultUserAccess: true,
      icons: { [`${SSM}/domain#Host`]: "host.svg" },
    });
  });

  it("should serialise with four-space indentation", () => {
    const text = serializeIconMapping(buildIconMapping(tables, "network", "urn:g"));
    expect(text.split("\n").slice(0, 3)).toEqual(['{', '    "ontology": "network",', '    "graph": "urn:g",']);
  });
});
