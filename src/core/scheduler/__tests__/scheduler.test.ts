/**
 * Construction sequencing tests
 */

import { describe, it, expect } from "vitest";
import fc from "fast-check";
import {
  buildPredecessorMap,
  computeConstructionSequence,
  findCycles,
  formatSequenceTrace,
  type DependencyEdge,
} from "../index.js";
import { captureLogger, messagesAt, LEVEL } from "../../__tests__/helpers.js";

const A = "domain#CP-A";
const B = "domain#CP-B";
const C = "domain#CP-C";

function edge(pattern: string, other: string, fake = false): DependencyEdge {
  return { pattern, other, fake };
}

describe("buildPredecessorMap", () => {
  it("should combine predecessor and successor tables", () => {
    const map = buildPredecessorMap(
      { patterns: [A, B, C], predecessors: [edge(B, A)], successors: [edge(B, C)] },
      captureLogger().logger
    );
    expect(map.get(A)).toEqual(new Set());
    expect(map.get(B)).toEqual(new Set([A]));
    expect(map.get(C)).toEqual(new Set([B]));
  });

  it("should ignore fake edges", () => {
    const map = buildPredecessorMap(
      { patterns: [A, B], predecessors: [edge(A, B, true)], successors: [edge(A, B, true)] },
      captureLogger().logger
    );
    expect(map.get(A)?.size).toBe(0);
    expect(map.get(B)?.size).toBe(0);
  });

  it("should warn about and drop edges to inactive patterns", () => {
    const { logger, records } = captureLogger();
    const map = buildPredecessorMap(
      { patterns: [A], predecessors: [edge(A, "domain#CP-Disabled")], successors: [] },
      logger
    );
    expect(map.get(A)?.size).toBe(0);
    expect(messagesAt(records, LEVEL.warn)).toEqual([
      "Ignoring dependency on a construction pattern that is not active",
    ]);
  });
});

describe("computeConstructionSequence", () => {
  it("should rank a chain in successive rounds", () => {
    const map = new Map([
      [A, new Set<string>()],
      [B, new Set([A])],
      [C, new Set([B])],
    ]);
    const sequence = computeConstructionSequence([A, B, C], map, captureLogger().logger);

    expect(Object.fromEntries(sequence.ranks)).toEqual({ [A]: 1, [B]: 2, [C]: 3 });
    expect(sequence.rounds).toBe(3);
    expect(sequence.unranked).toEqual([]);
    expect(sequence.cycles).toEqual([]);
  });

  it("should give independent patterns the same rank", () => {
    const map = new Map([
      [A, new Set<string>()],
      [B, new Set<string>()],
      [C, new Set([A, B])],
    ]);
    const sequence = computeConstructionSequence([A, B, C], map, captureLogger().logger);
    expect(Object.fromEntries(sequence.ranks)).toEqual({ [A]: 1, [B]: 1, [C]: 2 });
    expect(sequence.rounds).toBe(2);
  });

  it("should leave the patterns on and behind a cycle unranked", () => {
    const { logger, records } = captureLogger();
    const map = new Map([
      [A, new Set([B])],
      [B, new Set([A])],
      [C, new Set([A])],
    ]);
    const sequence = computeConstructionSequence([A, B, C], map, logger);

    expect(sequence.ranks.size).toBe(0);
    expect(sequence.rounds).toBe(0);
    expect(sequence.unranked).toEqual([A, B, C]);
    expect(sequence.cycles).toEqual([[A, B]]);
    expect(messagesAt(records, LEVEL.warn)).toEqual(["Some construction patterns could not be ranked"]);
  });

  it("should not modify the predecessor map", () => {
    const map = new Map([
      [A, new Set<string>()],
      [B, new Set([A])],
    ]);
    computeConstructionSequence([A, B], map, captureLogger().logger);
    expect(map.get(B)).toEqual(new Set([A]));
  });

  it("should report a pattern without a predecessor list", () => {
    const { logger, records } = captureLogger();
    const sequence = computeConstructionSequence([A, B], new Map([[A, new Set<string>()]]), logger);

    expect(sequence.unranked).toEqual([B]);
    expect(sequence.cycles).toEqual([]);
    expect(messagesAt(records, LEVEL.error)).toEqual(["Construction pattern has no list of predecessors"]);
  });

  it("should rank each pattern one above its highest predecessor", () => {
    const size = 8;
    const patterns = Array.from({ length: size }, (_, i) => `domain#CP-P${i}`);
    fc.assert(
      fc.property(fc.array(fc.tuple(fc.nat(size - 1), fc.nat(size - 1))), (pairs) => {
        const map = new Map(patterns.map((pattern) => [pattern, new Set<string>()]));
        for (const [x, y] of pairs) {
          if (x < y) {
            map.get(patterns[y])?.add(patterns[x]);
          }
        }
        const { ranks, unranked } = computeConstructionSequence(patterns, map, captureLogger().logger);

        expect(unranked).toEqual([]);
        for (const pattern of patterns) {
          const highest = Math.max(0, ...[...(map.get(pattern) ?? [])].map((p) => ranks.get(p) ?? 0));
          expect(ranks.get(pattern)).toBe(highest + 1);
        }
      })
    );
  });
});

describe("findCycles", () => {
  it("should find a self-dependent pattern", () => {
    const map = new Map([[A, new Set([A])]]);
    expect(findCycles(map, new Set([A]))).toEqual([[A]]);
  });

  it("should ignore edges leaving the given nodes", () => {
    const map = new Map([
      [A, new Set([B])],
      [B, new Set([A])],
    ]);
    expect(findCycles(map, new Set([A]))).toEqual([]);
  });
});

describe("formatSequenceTrace", () => {
  it("should list ranks and predecessors sorted by URI", () => {
    const map = new Map([
      [C, new Set([B, A])],
      [A, new Set<string>()],
      [B, new Set([A])],
    ]);
    const sequence = computeConstructionSequence([C, A, B], map, captureLogger().logger);

    expect(formatSequenceTrace("Construction pattern sequence", [C, A, B], sequence, map)).toBe(
      "Construction pattern sequence\n" +
        "A: 1, no predecessors\n" +
        "B: 2, predecessors: A\n" +
        "C: 3, predecessors: B, A\n\n"
    );
  });

  it("should show unranked patterns at rank 0", () => {
    const map = new Map([
      [A, new Set([B])],
      [B, new Set([A])],
    ]);
    const sequence = computeConstructionSequence([A, B, C], map, captureLogger().logger);

    expect(formatSequenceTrace("Trace", [A, B, C], sequence, map)).toBe(
      "Trace\nA: 0, predecessors: B\nB: 0, predecessors: A\nC: 0: found no predecessors list\n\n"
    );
  });
});
