/**
 * Construction-pattern dependency graph
 *
 * Predecessor edges come from two tables: ConstructionPredecessor says
 * "pattern has predecessor P" and ConstructionSuccessor says "pattern has
 * successor S", which is the same as "S has predecessor pattern". Edges
 * flagged fake are documentation only and take no part in sequencing.
 *
 * @module
 */

import { createLogger, type Logger } from "../../utils/logger.js";

// =============================================================================
// Types
// =============================================================================

export interface DependencyEdge {
  /** The pattern the table row belongs to */
  pattern: string;
  /** Its predecessor or successor */
  other: string;
  fake: boolean;
}

/**
 * Pattern URI to the URIs that must be ranked before it. Sets keep
 * insertion order, so the trace lists predecessors in table order.
 */
export type PredecessorMap = Map<string, Set<string>>;

export interface PredecessorMapInput {
  /** Active construction patterns, in table order */
  patterns: readonly string[];
  predecessors: readonly DependencyEdge[];
  successors: readonly DependencyEdge[];
}

// =============================================================================
// Graph Building
// =============================================================================

export function buildPredecessorMap(input: PredecessorMapInput, logger?: Logger): PredecessorMap {
  const log = logger ?? createLogger("scheduler");
  const map: PredecessorMap = new Map();
  for (const pattern of input.patterns) {
    map.set(pattern, new Set());
  }

  const addEdge = (before: string, after: string, edge: DependencyEdge) => {
    const predecessors = map.get(after);
    if (!predecessors || !map.has(before)) {
      log.warn(
        { pattern: edge.pattern, other: edge.other },
        "Ignoring dependency on a construction pattern that is not active"
      );
      return;
    }
    predecessors.add(before);
  };

  let fakeCount = 0;
  for (const edge of input.predecessors) {
    if (edge.fake) {
      fakeCount++;
      continue;
    }
    addEdge(edge.other, edge.pattern, edge);
  }
  for (const edge of input.successors) {
    if (edge.fake) {
      fakeCount++;
      continue;
    }
    addEdge(edge.pattern, edge.other, edge);
  }

  log.debug({ patterns: map.size, fakeEdges: fakeCount }, "Predecessor map built");
  return map;
}

// =============================================================================
// Cycle Detection
// =============================================================================

/**
 * Strongly connected components among `nodes` that form cycles: more than
 * one member, or a single member that is its own predecessor. Tarjan's
 * algorithm over predecessor edges.
 */
export function findCycles(
  predecessors: ReadonlyMap<string, ReadonlySet<string>>,
  nodes: ReadonlySet<string>
): string[][] {
  const index = new Map<string, number>();
  const onStack = new Set<string>();
  const stack: string[] = [];
  const cycles: string[][] = [];
  let currentIndex = 0;

  function strongConnect(nodeId: string): number {
    const nodeIndex = currentIndex++;
    let low = nodeIndex;
    index.set(nodeId, nodeIndex);
    stack.push(nodeId);
    onStack.add(nodeId);

    for (const depId of predecessors.get(nodeId) ?? []) {
      if (!nodes.has(depId)) continue;

      const depIndex = index.get(depId);
      if (depIndex === undefined) {
        low = Math.min(low, strongConnect(depId));
      } else if (onStack.has(depId)) {
        low = Math.min(low, depIndex);
      }
    }

    if (low === nodeIndex) {
      const scc: string[] = [];
      let member: string | undefined;
      do {
        member = stack.pop();
        if (member === undefined) break;
        onStack.delete(member);
        scc.push(member);
      } while (member !== nodeId);

      const selfLoop = scc.length === 1 && (predecessors.get(nodeId)?.has(nodeId) ?? false);
      if (scc.length > 1 || selfLoop) {
        cycles.push(scc.reverse());
      }
    }
    return low;
  }

  for (const nodeId of nodes) {
    if (!index.has(nodeId)) {
      strongConnect(nodeId);
    }
  }

  return cycles;
}
