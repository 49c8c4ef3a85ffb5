/**
 * Authentication Graph Types
 *
 * Node and edge shapes of the authentication graph, and the identity keys
 * that let contributions from different queries (or names) merge.
 *
 * @module
 */

import type { DomainName } from "../dns/domain-name.js";
import type { DnskeyRecord } from "../dns/records.js";
import { rrTypeToText } from "../dns/rr-types.js";
import type { ValidationStatus } from "../evaluation/status.js";

// =============================================================================
// Nodes
// =============================================================================

export type NodeKind = "rrset" | "dnskey" | "ds" | "zone" | "nxdomain" | "nodata";

interface NodeBase {
  /** Identity key; see the `*NodeId` helpers */
  id: string;
  status: ValidationStatus;
  /** Zone whose cluster the node is drawn in */
  zone?: string;
  /** Servers that returned the data */
  servers: string[];
  /** Query keys that contributed the node */
  queries: string[];
}

export interface RRsetNode extends NodeBase {
  kind: "rrset";
  owner: string;
  rrtype: string;
  ttl: number;
  rdata: string[];
}

export interface DnskeyNode extends NodeBase {
  kind: "dnskey";
  owner: string;
  algorithm: number;
  keyTag: number;
  flags?: number;
  /** Referenced by a signature but absent from the DNSKEY RRset */
  missing: boolean;
  trustAnchor: boolean;
  record?: DnskeyRecord;
}

export interface DsNode extends NodeBase {
  kind: "ds";
  owner: string;
  rrtype: "DS" | "DLV";
  algorithm: number;
  keyTag: number;
  digestType: number;
}

export interface ZoneNode extends NodeBase {
  kind: "zone";
  name: string;
}

export interface NegativeNode extends NodeBase {
  kind: "nxdomain" | "nodata";
  name: string;
  rrtype: string;
}

export type GraphNode = RRsetNode | DnskeyNode | DsNode | ZoneNode | NegativeNode;

// =============================================================================
// Edges
// =============================================================================

export type EdgeKind = "signs" | "delegates-to" | "validates";

/** Edges that carry trust from an authority to its subject */
export const TRUST_EDGE_KINDS: ReadonlySet<EdgeKind> = new Set<EdgeKind>(["signs", "validates"]);

export interface GraphEdge {
  id: string;
  kind: EdgeKind;
  /** Authority end */
  from: string;
  /** Subject end */
  to: string;
  status: ValidationStatus;
  /** Check outcome behind the status, e.g. "expired" */
  detail?: string;
}

export function isTrustEdge(edge: GraphEdge): boolean {
  return TRUST_EDGE_KINDS.has(edge.kind);
}

// =============================================================================
// Identity Keys
// =============================================================================

export function rrsetNodeId(owner: DomainName, rrtype: number): string {
  return `rrset:${owner.toString()}/${rrTypeToText(rrtype)}`;
}

export function dnskeyNodeId(owner: DomainName, algorithm: number, keyTag: number): string {
  return `dnskey:${owner.toString()}/${algorithm}/${keyTag}`;
}

export function dsNodeId(
  owner: DomainName,
  rrtype: "DS" | "DLV",
  algorithm: number,
  keyTag: number,
  digestType: number
): string {
  return `ds:${owner.toString()}/${rrtype}/${algorithm}/${keyTag}/${digestType}`;
}

export function zoneNodeId(name: DomainName): string {
  return `zone:${name.toString()}`;
}

export function negativeNodeId(kind: "nxdomain" | "nodata", name: DomainName, rrtype: number): string {
  return `${kind}:${name.toString()}/${rrTypeToText(rrtype)}`;
}

export function edgeId(kind: EdgeKind, from: string, to: string): string {
  return `${kind}:${from}->${to}`;
}
