/**
 * Graph Reducer
 *
 * Removes trust edges that another, at least as strong, path already
 * implies. What remains is the smallest picture that shows the same trust:
 * every node keeps its effective status.
 *
 * @module
 */

import { ErrorCode, GraphError } from "../errors.js";
import { strength } from "../evaluation/status.js";
import { createLogger } from "../../utils/logger.js";
import type { AuthGraph } from "./auth-graph.js";
import { isTrustEdge, type GraphEdge } from "./types.js";

const logger = createLogger("reducer");

export interface ReductionResult {
  /** Identities of removed edges, in removal order */
  removed: string[];
  passes: number;
}

export class GraphReducer {
  /**
   * Remove redundant trust edges until none remains.
   *
   * @throws GraphError when trust anchors have not been applied
   */
  reduce(graph: AuthGraph): ReductionResult {
    if (!graph.trustApplied) {
      throw new GraphError("Cannot reduce a graph before trust anchors are applied", ErrorCode.GRAPH_NOT_FINALIZED);
    }

    const removed: string[] = [];
    let passes = 0;
    let changed = true;
    while (changed) {
      changed = false;
      passes++;
      const candidates = graph.edges.filter(isTrustEdge).sort((a, b) => (a.id < b.id ? -1 : a.id > b.id ? 1 : 0));
      for (const edge of candidates) {
        if (this.isRedundant(graph, edge)) {
          graph.removeEdge(edge.id);
          removed.push(edge.id);
          changed = true;
        }
      }
    }

    logger.debug({ removed: removed.length, passes }, "Reduced graph");
    return { removed, passes };
  }

  /**
   * Whether `edge` (u → v) is implied by a path u ⇝ v of two or more trust
   * edges, each at least as strong as `edge`. Edges into anchors are kept.
   */
  isRedundant(graph: AuthGraph, edge: GraphEdge): boolean {
    const target = graph.getNode(edge.to);
    if (!target || (target.kind === "dnskey" && target.trustAnchor)) {
      return false;
    }

    const floor = strength(edge.status);
    const usable = graph.edges.filter(
      (e) => isTrustEdge(e) && strength(e.status) >= floor && !(e.from === edge.from && e.to === edge.to)
    );

    const seen = new Set<string>([edge.from]);
    const queue = [edge.from];
    while (queue.length > 0) {
      const current = queue.shift();
      if (current === undefined) break;
      for (const next of usable) {
        if (next.from !== current || seen.has(next.to)) continue;
        if (next.to === edge.to) return true;
        seen.add(next.to);
        queue.push(next.to);
      }
    }
    return false;
  }
}
