/**
 * Authentication Graph Module
 *
 * @module
 */

export { AuthGraph } from "./auth-graph.js";
export { AuthGraphBuilder, contributionKeys } from "./builder.js";
export { computeEffectiveStatus } from "./effective-status.js";
export { GraphReducer, type ReductionResult } from "./reducer.js";
export {
  TRUST_EDGE_KINDS,
  dnskeyNodeId,
  dsNodeId,
  edgeId,
  isTrustEdge,
  negativeNodeId,
  rrsetNodeId,
  zoneNodeId,
  type DnskeyNode,
  type DsNode,
  type EdgeKind,
  type GraphEdge,
  type GraphNode,
  type NegativeNode,
  type NodeKind,
  type RRsetNode,
  type ZoneNode,
} from "./types.js";
