/**
 * Feature and package registry tests
 */

import { describe, it, expect } from "vitest";
import { Feature, FEATURE_COLUMNS, loadFeatures } from "../features.js";
import { loadPackages } from "../packages.js";
import { bindTable } from "../../tables/index.js";
import { captureLogger, messagesAt, LEVEL } from "../../__tests__/helpers.js";

function featureTable(rows: [uri: string, supported: string][]) {
  return bindTable(
    { name: "DomainFeature", header: ["URI", "comment", "supported"], records: rows.map(([uri, s]) => [uri, "", s]) },
    FEATURE_COLUMNS
  );
}

function packageTable(rows: string[][], withEnabled = true) {
  return bindTable(
    {
      name: "Packages",
      header: withEnabled ? ["URI", "Label", "Description", "Enabled"] : ["URI", "Label", "Description"],
      records: rows,
    },
    ["URI", "Label", "Description"],
    ["Enabled"]
  );
}

describe("loadFeatures", () => {
  it("should declare supported features and skip the rest", () => {
    const { logger, records } = captureLogger();
    const state = loadFeatures(
      featureTable([
        [Feature.RiskTypeFlags, "TRUE"],
        [Feature.ThreatTypeFlags, "false"],
      ]),
      { expanded: false, logger }
    );

    expect([...state.declared]).toEqual([Feature.RiskTypeFlags]);
    expect(state.population).toBe(false);
    expect(messagesAt(records, LEVEL.info)).toEqual(["Feature is not supported by this domain model"]);
  });

  it("should keep the population model when it is declared and expansion is requested", () => {
    const { logger, records } = captureLogger();
    const state = loadFeatures(featureTable([[Feature.PopulationModel, "true"]]), { expanded: true, logger });

    expect(state.declared.has(Feature.PopulationModel)).toBe(true);
    expect(state.populationDeclared).toBe(true);
    expect(state.population).toBe(true);
    expect(messagesAt(records, LEVEL.warn)).toEqual([]);
  });

  it("should drop a declared population model when expansion is off", () => {
    const { logger, records } = captureLogger();
    const state = loadFeatures(featureTable([[Feature.PopulationModel, "true"]]), { expanded: false, logger });

    expect(state.declared.has(Feature.PopulationModel)).toBe(false);
    expect(state.populationDeclared).toBe(true);
    expect(state.population).toBe(false);
    expect(messagesAt(records, LEVEL.warn)).toHaveLength(1);
  });

  it("should follow the expansion flag when the model does not declare population support", () => {
    const { logger, records } = captureLogger();
    const state = loadFeatures(null, { expanded: true, logger });

    expect(state.declared.size).toBe(0);
    expect(state.population).toBe(true);
    expect(messagesAt(records, LEVEL.warn)).toEqual([
      "Population expansion requested but the domain model does not declare support; expanding anyway",
    ]);
  });
});

describe("loadPackages", () => {
  const rows = [
    ["package#Core", "Core", "Core model", "TRUE"],
    ["package#Wireless", "Wireless", "Radio links", "FALSE"],
  ];

  it("should enable every package without the optional-packages feature", () => {
    const state = loadPackages(packageTable(rows, false), new Set(), captureLogger().logger);
    expect([...state.active]).toEqual(["package#Core", "package#Wireless"]);
    expect(state.records.every((record) => record.enabled)).toBe(true);
  });

  it("should honour the Enabled column under optional packages", () => {
    const { logger, records } = captureLogger();
    const state = loadPackages(packageTable(rows), new Set([Feature.OptionalPackages]), logger);

    expect([...state.active]).toEqual(["package#Core"]);
    expect(state.records[1]).toEqual({
      uri: "package#Wireless",
      label: "Wireless",
      comment: "Radio links",
      enabled: false,
    });
    expect(messagesAt(records, LEVEL.info)).toEqual(["Package is disabled; its rows will be skipped"]);
  });
});
