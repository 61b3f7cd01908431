export {
  findEntryCandidates,
  getNode,
  successorOf,
  reachableFrom,
  validateGraph,
  loadGraph,
  materializeGraph,
  resolveEntryPoint,
} from "./graph.js";
export type { GraphValidationResult, MaterializeOptions } from "./graph.js";
