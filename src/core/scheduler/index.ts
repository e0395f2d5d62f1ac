/**
 * Scheduler Module
 *
 * Priority ranks for construction patterns from their dependency edges.
 *
 * @module
 */

export {
  buildPredecessorMap,
  findCycles,
  type DependencyEdge,
  type PredecessorMap,
  type PredecessorMapInput,
} from "./dependency-graph.js";

export {
  computeConstructionSequence,
  formatSequenceTrace,
  type ConstructionSequence,
} from "./construction-sequence.js";
