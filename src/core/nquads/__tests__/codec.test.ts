/**
 * N-Quads codec tests
 */

import { describe, it, expect } from "vitest";
import fc from "fast-check";
import {
  decodeBoolean,
  encodeBoolean,
  encodeInteger,
  encodeString,
  encodeUri,
  escapeLiteral,
  ssm,
  ssmTriplet,
} from "../codec.js";
import { core, domainFragment, featureResource, packageResource, RDF_TYPE } from "../vocabulary.js";
import { ErrorCode, ValueError, IdentifierError } from "../../errors.js";
import { thrown } from "../../__tests__/helpers.js";

const SSM = "http://it-innovation.soton.ac.uk/ontologies/trustworthiness";
const XSD = "http://www.w3.org/2001/XMLSchema";

describe("encodeUri", () => {
  it("should bracket a namespace-relative reference", () => {
    expect(ssm("domain#Host")).toBe(`<${SSM}/domain#Host>`);
    expect(encodeUri("owl", "owl#Class")).toBe("<http://www.w3.org/2002/07/owl#Class>");
  });

  it("should encode an empty reference as an empty term", () => {
    expect(ssm("")).toBe("");
  });

  it("should encode triplets element-wise", () => {
    expect(ssmTriplet(["domain#A_Min", "domain#A", "domain#A_Max"])).toEqual([
      `<${SSM}/domain#A_Min>`,
      `<${SSM}/domain#A>`,
      `<${SSM}/domain#A_Max>`,
    ]);
  });
});

describe("encodeBoolean", () => {
  it("should accept true and false in any case", () => {
    expect(encodeBoolean("TRUE")).toBe(`"true"^^<${XSD}#boolean>`);
    expect(encodeBoolean("False")).toBe(`"false"^^<${XSD}#boolean>`);
    expect(encodeBoolean(true)).toBe(`"true"^^<${XSD}#boolean>`);
  });

  it("should reject anything else", () => {
    expect(() => encodeBoolean("yes")).toThrow(ValueError);
    expect(thrown(() => encodeBoolean(""))).toMatchObject({ code: ErrorCode.VALUE_NOT_BOOLEAN, value: "" });
  });

  it("should decode what it encodes", () => {
    fc.assert(
      fc.property(fc.boolean(), (value) => {
        expect(decodeBoolean(encodeBoolean(value))).toBe(value);
      })
    );
  });

  it("should refuse to decode an integer literal", () => {
    expect(() => decodeBoolean(encodeInteger(1))).toThrow(ValueError);
  });
});

describe("encodeInteger", () => {
  it("should encode base-10 integers", () => {
    expect(encodeInteger("3")).toBe(`"3"^^<${XSD}#integer>`);
    expect(encodeInteger(" -12 ")).toBe(`"-12"^^<${XSD}#integer>`);
    expect(encodeInteger(0)).toBe(`"0"^^<${XSD}#integer>`);
  });

  it("should reject non-integers", () => {
    expect(() => encodeInteger("1.5")).toThrow(ValueError);
    expect(() => encodeInteger("")).toThrow(ValueError);
  });
});

describe("encodeString", () => {
  it("should quote plain text unchanged", () => {
    expect(encodeString("Host")).toBe('"Host"');
  });

  it("should escape quotes, backslashes and line breaks", () => {
    expect(encodeString('say "hi"')).toBe('"say \\"hi\\""');
    expect(escapeLiteral("a\\b\nc\td\r")).toBe("a\\\\b\\nc\\td\\r");
  });

  it("should never leave a raw newline or unescaped quote", () => {
    fc.assert(
      fc.property(fc.string(), (text) => {
        const body = encodeString(text).slice(1, -1);
        expect(body).not.toMatch(/\n|\r/);
        expect(body.replace(/\\\\/g, "").replace(/\\"/g, "")).not.toContain('"');
      })
    );
  });
});

describe("vocabulary", () => {
  it("should build core and rdf terms", () => {
    expect(core("hasMin")).toBe(`<${SSM}/core#hasMin>`);
    expect(RDF_TYPE).toBe("<http://www.w3.org/1999/02/22-rdf-syntax-ns#type>");
  });

  it("should publish packages and features in the domain namespace", () => {
    expect(packageResource("package#Core")).toBe(`<${SSM}/domain#Package-Core>`);
    expect(featureResource("feature#PopulationModel")).toBe(`<${SSM}/domain#Feature-PopulationModel>`);
  });

  it("should strip the domain prefix", () => {
    expect(domainFragment("domain#Firewall")).toBe("Firewall");
    expect(() => domainFragment("core#Firewall")).toThrow(IdentifierError);
  });
});
