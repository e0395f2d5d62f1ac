/**
 * Table source and column binding tests
 */

import { describe, it, expect, beforeAll, afterAll } from "vitest";
import * as fs from "node:fs";
import * as path from "node:path";
import * as os from "node:os";
import { CsvTableSource, MemoryTableSource } from "../source.js";
import { bindTable, columnsWhen, SENTINEL_URI } from "../schema.js";
import { ConfigurationError, ErrorCode, ValueError } from "../../errors.js";
import { thrown } from "../../__tests__/helpers.js";

describe("CsvTableSource", () => {
  let tempDir: string;
  let source: CsvTableSource;

  beforeAll(() => {
    tempDir = fs.mkdtempSync(path.join(os.tmpdir(), "csv-source-test-"));
    fs.writeFileSync(
      path.join(tempDir, "Role.csv"),
      '\uFEFFURI, label ,comment\n"domain#Role_Server",Server,"Serves, things"\n\n"domain#Role_Client",Client\n'
    );
    fs.writeFileSync(path.join(tempDir, "Broken.csv"), 'URI,label\n"domain#A,oops\n');
    source = new CsvTableSource(tempDir);
  });

  afterAll(() => {
    fs.rmSync(tempDir, { recursive: true, force: true });
  });

  it("should read the header and records, trimming header cells", () => {
    const table = source.read("Role");
    expect(table.header).toEqual(["URI", "label", "comment"]);
    expect(table.records).toEqual([
      ["domain#Role_Server", "Server", "Serves, things"],
      ["domain#Role_Client", "Client"],
    ]);
  });

  it("should report whether a table exists", () => {
    expect(source.has("Role")).toBe(true);
    expect(source.has("Threat")).toBe(false);
  });

  it("should fail on a missing table", () => {
    expect(thrown(() => source.read("Threat"))).toMatchObject({
      code: ErrorCode.CONFIG_TABLE_NOT_FOUND,
      table: "Threat",
    });
  });

  it("should fail on a table that does not parse", () => {
    expect(thrown(() => source.read("Broken"))).toMatchObject({ code: ErrorCode.CONFIG_BAD_TABLE });
  });
});

describe("MemoryTableSource", () => {
  it("should prefer its own tables over the fallback", () => {
    const fallback = new MemoryTableSource({ Role: [["URI"], ["domain#Role_A"]], Asset: [["URI"]] });
    const source = new MemoryTableSource({ Role: [["URI"], ["domain#Role_B"]] }, fallback);

    expect(source.read("Role").records).toEqual([["domain#Role_B"]]);
    expect(source.has("Asset")).toBe(true);
    expect(source.has("Threat")).toBe(false);
    expect(() => source.read("Threat")).toThrow(ConfigurationError);
  });
});

describe("bindTable", () => {
  const raw = {
    name: "Control",
    header: ["URI", "label", "isVisible", "extra"],
    records: [
      [SENTINEL_URI, "", "TRUE", ""],
      ["domain#Firewall", "Firewall", "TRUE", "x"],
      ["domain#Patching", "Patching", "maybe"],
    ],
  };

  it("should drop sentinel rows and number lines from the header", () => {
    const table = bindTable(raw, ["URI", "label", "isVisible"]);
    expect(table.size).toBe(2);
    expect(table.rows().map((row) => [row.get("URI"), row.line])).toEqual([
      ["domain#Firewall", 3],
      ["domain#Patching", 4],
    ]);
  });

  it("should name the first missing required column", () => {
    const error = thrown(() => bindTable(raw, ["URI", "comment", "package"]));
    expect(error).toBeInstanceOf(ConfigurationError);
    expect(error).toMatchObject({ code: ErrorCode.CONFIG_MISSING_COLUMN, table: "Control" });
    expect(error).toHaveProperty("message", 'Missing column "comment" (have: URI, label, isVisible, extra)');
  });

  it("should bind optional columns only when present", () => {
    const table = bindTable(raw, ["URI"], ["marker"]);
    expect(table.hasColumn("marker")).toBe(false);
    const [row] = table.rows();
    expect(row?.has("marker")).toBe(false);
    expect(() => row?.get("marker")).toThrow(ConfigurationError);
  });

  it("should read a short record's missing fields as empty", () => {
    const table = bindTable(raw, ["URI", "extra"]);
    expect(table.rows().map((row) => row.get("extra"))).toEqual(["x", ""]);
  });

  it("should read flags leniently or strictly", () => {
    const [firewall, patching] = bindTable(raw, ["URI", "isVisible"]).rows();
    expect(firewall?.flag("isVisible")).toBe(true);
    expect(firewall?.strictFlag("isVisible")).toBe(true);
    expect(patching?.flag("isVisible")).toBe(false);
    expect(() => patching?.strictFlag("isVisible")).toThrow(ValueError);
  });
});

describe("columnsWhen", () => {
  it("should include columns only under the condition", () => {
    expect(columnsWhen(true, "currentRisk", "futureRisk")).toEqual(["currentRisk", "futureRisk"]);
    expect(columnsWhen(false, "currentRisk")).toEqual([]);
  });
});
