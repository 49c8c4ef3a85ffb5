/**
 * Authentication Graph Builder
 *
 * Turns the evaluation of one query into nodes and edges: the answer RRsets
 * (or negative responses and their proofs), the keys that signed them, and the
 * chain of zones, keys and delegation signers above. Contributions from many
 * queries, or many names, merge into the same graph by node identity.
 *
 * @module
 */

import type { AnalysisStore } from "../analysis/analysis-store.js";
import { formatQueryKey, type QueryKey } from "../analysis/query-key.js";
import type { DomainName } from "../dns/domain-name.js";
import { isRevoked } from "../dns/records.js";
import { DELEGATION_TYPES, rrTypeToText } from "../dns/rr-types.js";
import { ErrorCode, GraphError } from "../errors.js";
import type {
  DelegationSignerEvaluation,
  NegativeEvaluation,
  RRsetEvaluation,
  SignatureEvaluation,
  StoreEvaluation,
  ZoneEvaluation,
} from "../evaluation/status-evaluator.js";
import type { TrustAnchorSet } from "../trust/trust-anchors.js";
import { createLogger } from "../../utils/logger.js";
import { AuthGraph } from "./auth-graph.js";
import { dnskeyNodeId, dsNodeId, negativeNodeId, rrsetNodeId, zoneNodeId } from "./types.js";

const logger = createLogger("graph");

/**
 * Query keys that trigger a contribution: everything but delegation data,
 * which is drawn as part of the zone chain, optionally restricted to
 * `rrTypes`.
 */
export function contributionKeys(store: AnalysisStore, rrTypes?: readonly number[]): QueryKey[] {
  return store
    .queryKeys()
    .filter((key) => !DELEGATION_TYPES.has(key.rrtype))
    .filter((key) => rrTypes === undefined || rrTypes.length === 0 || rrTypes.includes(key.rrtype));
}

/**
 * Adds evaluated data to authentication graphs.
 *
 * @example
 * ```typescript
 * const builder = new AuthGraphBuilder();
 * const graph = new AuthGraph();
 * for (const key of contributionKeys(store)) {
 *   builder.contribute(graph, evaluation, key);
 * }
 * builder.applyTrust(graph, anchors);
 * ```
 */
export class AuthGraphBuilder {
  /**
   * Add the nodes and edges for one query of an evaluated store.
   *
   * @throws GraphError when the query is not part of the evaluation
   */
  contribute(graph: AuthGraph, evaluation: StoreEvaluation, queryKey: QueryKey): AuthGraph {
    const text = formatQueryKey(queryKey);
    const query = evaluation.queries.get(text);
    if (!query) {
      throw new GraphError(`No evaluated query ${text} for ${evaluation.store.name.toString()}`, ErrorCode.GRAPH_NODE_NOT_FOUND);
    }

    const contribution = new Contribution(graph, evaluation, text);
    for (const rrset of query.rrsets) {
      contribution.rrset(rrset);
    }
    for (const negative of query.negatives) {
      contribution.negative(negative);
    }

    logger.debug({ query: text, nodes: graph.nodeCount, edges: graph.edgeCount }, "Contributed query");
    return graph;
  }

  /**
   * Mark every DNSKEY node matched by an anchor. Revoked keys never anchor
   * trust, as in the evaluator. Topology is left as is.
   */
  applyTrust(graph: AuthGraph, anchors: TrustAnchorSet): AuthGraph {
    let marked = 0;
    for (const node of graph.nodes) {
      if (node.kind !== "dnskey" || !node.record) continue;
      if (!isRevoked(node.record) && anchors.matchesKey(node.record)) {
        node.trustAnchor = true;
        marked++;
      }
    }
    graph.markTrustApplied();
    logger.debug({ anchors: marked }, "Applied trust anchors");
    return graph;
  }
}

// =============================================================================
// Contribution
// =============================================================================

/** State of one `contribute` call: the zones already drawn during it */
class Contribution {
  private readonly zonesDone = new Set<string>();

  constructor(
    private readonly graph: AuthGraph,
    private readonly evaluation: StoreEvaluation,
    private readonly queryText?: string
  ) {}

  rrset(evaluated: RRsetEvaluation, fromQuery = true): string {
    const { rrset } = evaluated;
    const id = rrsetNodeId(rrset.name, rrset.rrtype);
    this.graph.addNode({
      id,
      kind: "rrset",
      owner: rrset.name.toString(),
      rrtype: rrTypeToText(rrset.rrtype),
      ttl: rrset.ttl,
      rdata: [...rrset.rdata],
      status: evaluated.status,
      zone: evaluated.zone?.toString(),
      servers: [...rrset.servers],
      queries: fromQuery && this.queryText ? [this.queryText] : [],
    });
    if (evaluated.zone) this.zone(evaluated.zone);

    for (const signature of evaluated.signatures) {
      this.signature(signature, [id]);
    }
    return id;
  }

  negative(evaluated: NegativeEvaluation, fromQuery = true): string {
    const { response } = evaluated;
    const id = negativeNodeId(response.kind, evaluated.key.name, evaluated.key.rrtype);
    this.graph.addNode({
      id,
      kind: response.kind,
      name: evaluated.key.name.toString(),
      rrtype: rrTypeToText(evaluated.key.rrtype),
      status: evaluated.status,
      zone: evaluated.zone?.toString(),
      servers: [...response.servers],
      queries: fromQuery && this.queryText ? [this.queryText] : [],
    });
    if (evaluated.zone) this.zone(evaluated.zone);

    for (const proof of evaluated.proofs) {
      const proofId = this.rrset(proof, false);
      this.graph.addEdge("validates", proofId, id, proof.status);
    }
    return id;
  }

  /**
   * Draw a `signs` edge from the signing key to each target, adding the key
   * as a missing placeholder when the signer's DNSKEY RRset lacks it.
   */
  private signature(signature: SignatureEvaluation, targets: readonly string[]): void {
    const { rrsig } = signature;
    const keyId = dnskeyNodeId(rrsig.signer, rrsig.algorithm, rrsig.keyTag);
    if (this.evaluation.zones.has(rrsig.signer.toString())) {
      this.zone(rrsig.signer);
    }

    if (!this.graph.hasNode(keyId)) {
      this.graph.addNode({
        id: keyId,
        kind: "dnskey",
        owner: rrsig.signer.toString(),
        algorithm: rrsig.algorithm,
        keyTag: rrsig.keyTag,
        missing: signature.key === undefined,
        trustAnchor: false,
        record: signature.key,
        flags: signature.key?.flags,
        status: (signature.key && this.evaluation.zones.get(rrsig.signer.toString())?.status) ?? "indeterminate",
        zone: rrsig.signer.toString(),
        servers: [],
        queries: [],
      });
    }

    for (const target of targets) {
      this.graph.addEdge("signs", keyId, target, signature.status, signature.outcome);
    }
  }

  // ===========================================================================
  // Zone Chain
  // ===========================================================================

  zone(name: DomainName): void {
    const id = name.toString();
    if (this.zonesDone.has(id)) return;
    this.zonesDone.add(id);

    const zone = this.evaluation.zones.get(id);
    if (!zone) {
      logger.debug({ zone: id }, "Zone has no evaluation; drawing name only");
      this.graph.addNode({
        id: zoneNodeId(name),
        kind: "zone",
        name: id,
        status: "indeterminate",
        zone: id,
        servers: [],
        queries: [],
      });
      return;
    }

    this.graph.addNode({
      id: zoneNodeId(zone.name),
      kind: "zone",
      name: id,
      status: zone.status,
      zone: id,
      servers: [],
      queries: [],
    });

    if (zone.parent) {
      this.zone(zone.parent);
      this.graph.addEdge("delegates-to", zoneNodeId(zone.parent), zoneNodeId(zone.name), zone.status);
    }

    this.keys(zone);
    if (zone.ds) {
      this.delegationSigners(zone, zone.ds, "DS");
    }
    for (const denial of zone.dsDenial) {
      this.negative(denial, false);
    }
    if (zone.dlv && zone.dlvZone) {
      this.zone(zone.dlvZone);
      this.delegationSigners(zone, zone.dlv, "DLV");
    }
  }

  private keys(zone: ZoneEvaluation): void {
    const keyIds: string[] = [];
    for (const { key, status } of zone.keys) {
      const id = dnskeyNodeId(zone.name, key.algorithm, key.keyTag);
      this.graph.addNode({
        id,
        kind: "dnskey",
        owner: zone.name.toString(),
        algorithm: key.algorithm,
        keyTag: key.keyTag,
        flags: key.flags,
        missing: false,
        trustAnchor: false,
        record: key,
        status,
        zone: zone.name.toString(),
        servers: zone.keyset ? [...zone.keyset.rrset.servers] : [],
        queries: [],
      });
      keyIds.push(id);
    }

    for (const signature of zone.keyset?.signatures ?? []) {
      this.signature(signature, keyIds);
    }
  }

  private delegationSigners(zone: ZoneEvaluation, signers: DelegationSignerEvaluation, rrtype: "DS" | "DLV"): void {
    const servedBy = signers.rrset.zone?.toString();
    const dsIds: string[] = [];

    for (const ds of signers.records) {
      const id = dsNodeId(zone.name, rrtype, ds.algorithm, ds.keyTag, ds.digestType);
      this.graph.addNode({
        id,
        kind: "ds",
        owner: zone.name.toString(),
        rrtype,
        algorithm: ds.algorithm,
        keyTag: ds.keyTag,
        digestType: ds.digestType,
        status: signers.rrset.status,
        zone: servedBy,
        servers: [...signers.rrset.rrset.servers],
        queries: [],
      });
      dsIds.push(id);
    }

    for (const signature of signers.rrset.signatures) {
      this.signature(signature, dsIds);
    }

    for (const digest of signers.digests) {
      const from = dsNodeId(zone.name, rrtype, digest.ds.algorithm, digest.ds.keyTag, digest.ds.digestType);
      const to = dnskeyNodeId(zone.name, digest.key.algorithm, digest.key.keyTag);
      this.graph.addEdge("validates", from, to, digest.status, digest.outcome);
    }
  }
}
