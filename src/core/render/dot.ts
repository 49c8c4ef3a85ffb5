/**
 * DOT serialization of an authentication graph.
 *
 * Output is deterministic: clusters, nodes and edges are emitted in identity
 * order so the same graph always yields the same text.
 *
 * @module
 */

import { DNSKEY_FLAG_REVOKE, DNSKEY_FLAG_SEP } from "../dns/records.js";
import type { ValidationStatus } from "../evaluation/status.js";
import type { AuthGraph } from "../graph/auth-graph.js";
import type { EdgeKind, GraphEdge, GraphNode } from "../graph/types.js";

export const STATUS_COLORS: Readonly<Record<ValidationStatus, string>> = {
  secure: "#0a879a",
  bogus: "#be1515",
  insecure: "#000000",
  indeterminate: "#f4b800",
};

const EDGE_STYLES: Readonly<Record<EdgeKind, string>> = {
  signs: "solid",
  validates: "dashed",
  "delegates-to": "dotted",
};

type Attributes = Record<string, string | number>;

function escape(value: string): string {
  return value.replace(/\\/g, "\\\\").replace(/"/g, '\\"');
}

function quote(value: string): string {
  return `"${escape(value)}"`;
}

/** Multi-line label: lines joined with DOT's `\n` escape */
function label(lines: readonly string[]): string {
  return `"${lines.map(escape).join("\\n")}"`;
}

function attributes(attrs: Attributes): string {
  return Object.entries(attrs)
    .map(([key, value]) => `${key}=${typeof value === "number" ? String(value) : quote(value)}`)
    .join(", ");
}

function byId<T extends { id: string }>(a: T, b: T): number {
  return a.id < b.id ? -1 : a.id > b.id ? 1 : 0;
}

// =============================================================================
// Nodes
// =============================================================================

export function nodeLabel(node: GraphNode): string[] {
  switch (node.kind) {
    case "rrset":
      return [`${node.owner}/${node.rrtype}`];
    case "dnskey": {
      const lines = ["DNSKEY", `alg=${node.algorithm}, id=${node.keyTag}`];
      const flags: string[] = [];
      if (node.flags !== undefined && node.flags & DNSKEY_FLAG_SEP) flags.push("SEP");
      if (node.flags !== undefined && node.flags & DNSKEY_FLAG_REVOKE) flags.push("REVOKE");
      if (node.missing) flags.push("missing");
      if (flags.length > 0) lines.push(flags.join(", "));
      return lines;
    }
    case "ds":
      return [node.rrtype, `alg=${node.algorithm}, id=${node.keyTag}`, `digest alg=${node.digestType}`];
    case "zone":
      return [node.name];
    case "nxdomain":
    case "nodata":
      return [node.kind === "nxdomain" ? "NXDOMAIN" : "NO DATA", `${node.name}/${node.rrtype}`];
  }
}

function nodeAttributes(node: GraphNode): Attributes {
  const color = STATUS_COLORS[node.status];
  const base: Attributes = { id: node.id, color };

  switch (node.kind) {
    case "rrset":
      return { ...base, shape: "rectangle", style: "rounded,filled", fillcolor: "#ffffff" };
    case "dnskey":
      return {
        ...base,
        shape: "ellipse",
        style: node.missing ? "dashed" : "filled",
        fillcolor: "#ffffff",
        ...(node.trustAnchor ? { peripheries: 2 } : {}),
      };
    case "ds":
      return { ...base, shape: "ellipse", style: "filled", fillcolor: "#d7d7d7" };
    case "zone":
      return { ...base, shape: "folder", style: "filled", fillcolor: "#ffffff" };
    case "nxdomain":
    case "nodata":
      return { ...base, shape: "rectangle", style: "rounded,dashed" };
  }
}

function nodeStatement(node: GraphNode): string {
  return `${quote(node.id)} [label=${label(nodeLabel(node))}, ${attributes(nodeAttributes(node))}];`;
}

function edgeAttributes(edge: GraphEdge): Attributes {
  return {
    id: edge.id,
    dir: "back",
    color: STATUS_COLORS[edge.status],
    style: EDGE_STYLES[edge.kind],
  };
}

// =============================================================================
// Document
// =============================================================================

/**
 * Serialize the graph as a Graphviz digraph, one cluster per zone.
 */
export function toDot(graph: AuthGraph): string {
  const clusters = new Map<string, GraphNode[]>();
  const loose: GraphNode[] = [];
  for (const node of graph.nodes) {
    if (node.zone === undefined) {
      loose.push(node);
      continue;
    }
    const members = clusters.get(node.zone) ?? [];
    members.push(node);
    clusters.set(node.zone, members);
  }

  const lines: string[] = [
    "digraph {",
    '  graph [compound=true, rankdir=TB, fontname="Helvetica", fontsize=10];',
    '  node [fontname="Helvetica", fontsize=10, penwidth=1.5];',
    "  edge [penwidth=1.5];",
  ];

  const zones = [...clusters.keys()].sort();
  zones.forEach((zone, index) => {
    lines.push(`  subgraph ${quote(`cluster_${index}`)} {`);
    lines.push(`    label=${quote(zone)};`);
    lines.push('    style="rounded";');
    lines.push('    color="#c0c0c0";');
    for (const node of (clusters.get(zone) ?? []).sort(byId)) {
      lines.push(`    ${nodeStatement(node)}`);
    }
    lines.push("  }");
  });

  for (const node of loose.sort(byId)) {
    lines.push(`  ${nodeStatement(node)}`);
  }

  for (const edge of graph.edges.sort(byId)) {
    lines.push(`  ${quote(edge.from)} -> ${quote(edge.to)} [${attributes(edgeAttributes(edge))}];`);
  }

  lines.push("}");
  return lines.join("\n") + "\n";
}
