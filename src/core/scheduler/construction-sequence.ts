/**
 * Construction sequence
 *
 * Ranks construction patterns in rounds. Round n ranks, with n, every
 * pattern whose remaining predecessor set is empty; the patterns ranked in
 * a round are then removed from every other pattern's set. Patterns on or
 * behind a cycle are never ranked.
 *
 * @module
 */

import { findCycles } from "./dependency-graph.js";
import { createLogger, type Logger } from "../../utils/logger.js";

export interface ConstructionSequence {
  /** Pattern URI to rank, starting at 1; unranked patterns are absent */
  ranks: Map<string, number>;
  /** Number of rounds that ranked at least one pattern */
  rounds: number;
  /** Patterns that never reached a rank, in input order */
  unranked: string[];
  /** Cycles among the unranked patterns */
  cycles: string[][];
}

/**
 * @param patterns - pattern URIs in table order
 * @param predecessors - left untouched
 */
export function computeConstructionSequence(
  patterns: readonly string[],
  predecessors: ReadonlyMap<string, ReadonlySet<string>>,
  logger?: Logger
): ConstructionSequence {
  const log = logger ?? createLogger("scheduler");

  const remaining = new Map<string, Set<string>>();
  for (const pattern of patterns) {
    const declared = predecessors.get(pattern);
    if (declared) {
      remaining.set(pattern, new Set(declared));
    } else {
      log.error({ pattern }, "Construction pattern has no list of predecessors");
    }
  }

  const ranks = new Map<string, number>();
  let round = 0;

  // Each productive round ranks at least one pattern
  while (round < patterns.length) {
    const ready: string[] = [];
    for (const [pattern, pending] of remaining) {
      if (!ranks.has(pattern) && pending.size === 0) {
        ready.push(pattern);
      }
    }
    if (ready.length === 0) break;

    round++;
    for (const pattern of ready) {
      ranks.set(pattern, round);
    }
    for (const pending of remaining.values()) {
      for (const pattern of ready) {
        pending.delete(pattern);
      }
    }
  }

  const unranked = patterns.filter((pattern) => !ranks.has(pattern));
  const cycles = findCycles(predecessors, new Set(unranked.filter((pattern) => remaining.has(pattern))));

  if (unranked.length > 0) {
    log.warn({ unranked, cycles }, "Some construction patterns could not be ranked");
  }
  log.debug({ rounds: round, ranked: ranks.size }, "Construction sequence computed");

  return { ranks, rounds: round, unranked, cycles };
}

// =============================================================================
// Trace
// =============================================================================

const PATTERN_PREFIX = "domain#CP-";

function shortName(uri: string): string {
  return uri.replace(PATTERN_PREFIX, "");
}

/**
 * Human-readable listing of every pattern's rank (0 when unranked) and its
 * declared predecessors, sorted by URI
 */
export function formatSequenceTrace(
  header: string,
  patterns: readonly string[],
  sequence: ConstructionSequence,
  predecessors: ReadonlyMap<string, ReadonlySet<string>>
): string {
  const lines = [header];
  for (const pattern of [...patterns].sort()) {
    const rank = sequence.ranks.get(pattern) ?? 0;
    const declared = predecessors.get(pattern);
    let line = `${shortName(pattern)}: ${rank}`;
    if (!declared) {
      line += ": found no predecessors list";
    } else if (declared.size === 0) {
      line += ", no predecessors";
    } else {
      line += `, predecessors: ${[...declared].map(shortName).join(", ")}`;
    }
    lines.push(line);
  }
  return lines.join("\n") + "\n\n";
}
