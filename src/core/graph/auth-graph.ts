/**
 * Authentication Graph
 *
 * Directed multigraph of records, keys, delegation signers and zones. Nodes
 * and edges are keyed by identity, so adding the same thing twice merges the
 * two observations instead of duplicating them.
 *
 * @module
 */

import { ErrorCode, GraphError } from "../errors.js";
import { mergeStatus, type ValidationStatus } from "../evaluation/status.js";
import { edgeId, type DnskeyNode, type EdgeKind, type GraphEdge, type GraphNode } from "./types.js";

function union(into: string[], values: readonly string[]): void {
  for (const value of values) {
    if (!into.includes(value)) into.push(value);
  }
}

export class AuthGraph {
  private readonly nodeMap = new Map<string, GraphNode>();
  private readonly edgeMap = new Map<string, GraphEdge>();
  private finalized = false;

  // ===========================================================================
  // Nodes
  // ===========================================================================

  get nodes(): GraphNode[] {
    return [...this.nodeMap.values()];
  }

  get nodeCount(): number {
    return this.nodeMap.size;
  }

  hasNode(id: string): boolean {
    return this.nodeMap.has(id);
  }

  getNode(id: string): GraphNode | undefined {
    return this.nodeMap.get(id);
  }

  /**
   * Add a node, or merge it into the node already stored under its identity.
   * Returns the stored node.
   */
  addNode(node: GraphNode): GraphNode {
    const existing = this.nodeMap.get(node.id);
    if (!existing) {
      this.nodeMap.set(node.id, node);
      return node;
    }

    existing.status = mergeStatus(existing.status, node.status);
    union(existing.servers, node.servers);
    union(existing.queries, node.queries);
    existing.zone ??= node.zone;

    if (existing.kind === "dnskey" && node.kind === "dnskey") {
      existing.missing = existing.missing && node.missing;
      existing.trustAnchor = existing.trustAnchor || node.trustAnchor;
      existing.flags ??= node.flags;
      existing.record ??= node.record;
    }
    return existing;
  }

  trustAnchors(): DnskeyNode[] {
    const anchors: DnskeyNode[] = [];
    for (const node of this.nodeMap.values()) {
      if (node.kind === "dnskey" && node.trustAnchor) anchors.push(node);
    }
    return anchors;
  }

  // ===========================================================================
  // Edges
  // ===========================================================================

  get edges(): GraphEdge[] {
    return [...this.edgeMap.values()];
  }

  get edgeCount(): number {
    return this.edgeMap.size;
  }

  getEdge(id: string): GraphEdge | undefined {
    return this.edgeMap.get(id);
  }

  /**
   * Add an edge between two existing nodes, merging status with an existing
   * edge of the same kind and endpoints.
   *
   * @throws GraphError when either endpoint is not in the graph
   */
  addEdge(kind: EdgeKind, from: string, to: string, status: ValidationStatus, detail?: string): GraphEdge {
    for (const end of [from, to]) {
      if (!this.nodeMap.has(end)) {
        throw new GraphError(`Cannot add ${kind} edge: no node ${end}`, ErrorCode.GRAPH_NODE_NOT_FOUND, {
          from,
          to,
        });
      }
    }

    const id = edgeId(kind, from, to);
    const existing = this.edgeMap.get(id);
    if (existing) {
      const merged = mergeStatus(existing.status, status);
      if (merged !== existing.status) {
        existing.status = merged;
        existing.detail = detail;
      }
      return existing;
    }

    const edge: GraphEdge = { id, kind, from, to, status, detail };
    this.edgeMap.set(id, edge);
    return edge;
  }

  removeEdge(id: string): boolean {
    return this.edgeMap.delete(id);
  }

  // ===========================================================================
  // Trust
  // ===========================================================================

  /** Whether trust anchors have been applied; the graph is then final */
  get trustApplied(): boolean {
    return this.finalized;
  }

  markTrustApplied(): void {
    this.finalized = true;
  }
}
