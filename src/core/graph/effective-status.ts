/**
 * Effective status: the best trust a node receives from any anchor, where a
 * path is only as strong as its weakest edge.
 *
 * @module
 */

import { strength, weakest, type ValidationStatus } from "../evaluation/status.js";
import type { AuthGraph } from "./auth-graph.js";
import { isTrustEdge } from "./types.js";

/**
 * Widest-path statuses from the trust anchors over `signs` and `validates`
 * edges. Nodes no anchor reaches are absent from the result.
 */
export function computeEffectiveStatus(graph: AuthGraph): Map<string, ValidationStatus> {
  const result = new Map<string, ValidationStatus>();
  for (const anchor of graph.trustAnchors()) {
    result.set(anchor.id, "secure");
  }

  const edges = graph.edges.filter(isTrustEdge);
  let changed = result.size > 0;
  while (changed) {
    changed = false;
    for (const edge of edges) {
      const source = result.get(edge.from);
      if (source === undefined) continue;
      const candidate = weakest(source, edge.status);
      const current = result.get(edge.to);
      if (current === undefined || strength(candidate) > strength(current)) {
        result.set(edge.to, candidate);
        changed = true;
      }
    }
  }
  return result;
}
