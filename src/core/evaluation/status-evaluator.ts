/**
 * Status Evaluator
 *
 * Walks an Analysis Store and decides, relative to a Trust Anchor Set, the
 * validation status of every zone in the delegation chain, every signature,
 * DS digest, RRset and negative response. Cryptographic and structural
 * failures become statuses; they are never thrown.
 *
 * Results live in a {@link StoreEvaluation}; the store itself is not touched,
 * so evaluating again with other anchors starts from scratch.
 *
 * @module
 */

import type {
  AnalysisStore,
  NameAnalysis,
  NegativeResponse,
  ResourceRecordSet,
} from "../analysis/analysis-store.js";
import { createQueryKey, formatQueryKey, type QueryKey } from "../analysis/query-key.js";
import {
  buildSigningInput,
  computeDsDigest,
  isSupportedAlgorithm,
  isSupportedDigestType,
  verifySignature,
} from "../dns/crypto.js";
import type { DomainName } from "../dns/domain-name.js";
import { RdataError } from "../dns/rdata.js";
import {
  bytesEqual,
  isRevoked,
  isZoneKey,
  parseDnskey,
  parseDs,
  type DnskeyRecord,
  type DsRecord,
  type RrsigRecord,
} from "../dns/records.js";
import { RRType, rrTypeToText } from "../dns/rr-types.js";
import type { TrustAnchorSet } from "../trust/trust-anchors.js";
import { createLogger } from "../../utils/logger.js";
import { statusInZone, type ValidationStatus } from "./status.js";

const logger = createLogger("evaluator");

// =============================================================================
// Types
// =============================================================================

export type SignatureOutcome =
  | "valid"
  | "invalid-signature"
  | "expired"
  | "premature"
  | "missing-key"
  | "unsupported-algorithm"
  | "bad-key"
  | "unencodable"
  | "covers-other-type";

interface SignatureCheck {
  rrsig: RrsigRecord;
  /** The DNSKEY the signature was checked against, when one was found */
  key?: DnskeyRecord;
  outcome: SignatureOutcome;
}

export interface SignatureEvaluation extends SignatureCheck {
  status: ValidationStatus;
}

export interface RRsetEvaluation {
  rrset: ResourceRecordSet;
  /** Zone serving the RRset */
  zone?: DomainName;
  status: ValidationStatus;
  signatures: SignatureEvaluation[];
}

export interface NegativeEvaluation {
  response: NegativeResponse;
  key: QueryKey;
  zone?: DomainName;
  status: ValidationStatus;
  proofs: RRsetEvaluation[];
}

export interface KeyEvaluation {
  key: DnskeyRecord;
  status: ValidationStatus;
  anchored: boolean;
}

export type DigestOutcome = "match" | "mismatch" | "unsupported-digest";

export interface DigestEvaluation {
  ds: DsRecord;
  key: DnskeyRecord;
  outcome: DigestOutcome;
  status: ValidationStatus;
}

export interface DelegationSignerEvaluation {
  /** DS RRset (or DLV RRset) with its signatures */
  rrset: RRsetEvaluation;
  records: DsRecord[];
  digests: DigestEvaluation[];
}

export interface ZoneEvaluation {
  name: DomainName;
  parent?: DomainName;
  status: ValidationStatus;
  /** Why the zone has its status, for diagnostics */
  reason: string;
  keys: KeyEvaluation[];
  keyset?: RRsetEvaluation;
  ds?: DelegationSignerEvaluation;
  dsDenial: NegativeEvaluation[];
  dlv?: DelegationSignerEvaluation;
  dlvZone?: DomainName;
}

export interface QueryEvaluation {
  key: QueryKey;
  zone?: DomainName;
  rrsets: RRsetEvaluation[];
  negatives: NegativeEvaluation[];
}

export interface StoreEvaluation {
  store: AnalysisStore;
  anchors: TrustAnchorSet;
  referenceTime: Date;
  zones: ReadonlyMap<string, ZoneEvaluation>;
  queries: ReadonlyMap<string, QueryEvaluation>;
}

export interface EvaluatorOptions {
  /** Reference time when the analysis carries none */
  now?: Date;
}

/** Outcomes that prove something is wrong, as opposed to merely unknown */
const FAILED_OUTCOMES: ReadonlySet<SignatureOutcome> = new Set<SignatureOutcome>([
  "invalid-signature",
  "expired",
  "premature",
]);

export function isFailedOutcome(outcome: SignatureOutcome): boolean {
  return FAILED_OUTCOMES.has(outcome);
}

// =============================================================================
// Evaluator
// =============================================================================

class Evaluation {
  private readonly zones = new Map<string, ZoneEvaluation>();
  private readonly pending = new Set<string>();
  private readonly nowSeconds: number;

  constructor(
    private readonly store: AnalysisStore,
    private readonly anchors: TrustAnchorSet,
    readonly referenceTime: Date
  ) {
    this.nowSeconds = Math.floor(referenceTime.getTime() / 1000);
  }

  get zoneResults(): ReadonlyMap<string, ZoneEvaluation> {
    return this.zones;
  }

  // ===========================================================================
  // Zones
  // ===========================================================================

  zone(block: NameAnalysis): ZoneEvaluation {
    const id = block.name.toString();
    const existing = this.zones.get(id);
    if (existing) return existing;

    this.pending.add(id);
    try {
      const result = this.computeZone(block);
      this.zones.set(id, result);
      logger.debug({ zone: id, status: result.status, reason: result.reason }, "Zone evaluated");
      return result;
    } finally {
      this.pending.delete(id);
    }
  }

  /** Zone evaluation for a signer name, unless it is unknown or being computed */
  private signerZone(name: DomainName): ZoneEvaluation | undefined {
    const block = this.store.getBlock(name);
    if (!block || this.pending.has(name.toString())) return undefined;
    return this.zone(block);
  }

  private computeZone(block: NameAnalysis): ZoneEvaluation {
    const name = block.name;
    const keysetRRset = this.store
      .getQuery(createQueryKey(name, RRType.DNSKEY), block)
      ?.answer.find((r) => r.rrtype === RRType.DNSKEY && r.name.equals(name));
    const keys = keysetRRset ? parseKeys(name, keysetRRset) : [];

    // Self-signatures are checked before statuses exist: status depends on them
    const keysetChecks = keysetRRset
      ? keysetRRset.rrsigs.map(
          (rrsig): SignatureCheck =>
            rrsig.signer.equals(name) ? this.checkSignature(rrsig, keysetRRset, keys) : { rrsig, outcome: "missing-key" }
        )
      : [];
    const keysetFailed = keysetChecks.some((c) => isFailedOutcome(c.outcome));
    const signsKeyset = (entry: readonly DnskeyRecord[]): boolean =>
      keysetChecks.some((c) => c.outcome === "valid" && c.key !== undefined && entry.includes(c.key));

    const anchored = keys.filter((k) => !isRevoked(k) && this.anchors.matchesKey(k));
    const parent = block.parent ? this.zone(block.parent) : undefined;

    const ds = this.delegationSigners(name, block, RRType.DS, name, parent, keys);
    const dsQuery = this.store.getQuery(createQueryKey(name, RRType.DS), block);
    const dsDenial = (dsQuery?.negative ?? []).map((n) => this.negative(n, dsQuery?.key ?? createQueryKey(name, RRType.DS), parent));

    let status: ValidationStatus;
    let reason: string;

    if (anchored.length > 0) {
      if (signsKeyset(anchored) && !keysetFailed) {
        [status, reason] = ["secure", "DNSKEY RRset signed by a trust anchor"];
      } else {
        [status, reason] = ["bogus", "trust anchor does not validate the DNSKEY RRset"];
      }
    } else if (!parent) {
      [status, reason] = ["indeterminate", "no trust anchor and no parent zone"];
    } else if (parent.status !== "secure") {
      [status, reason] = [parent.status, `parent zone ${parent.name.toString()} is ${parent.status}`];
    } else if (ds) {
      [status, reason] = this.delegationStatus(ds, signsKeyset, keysetFailed);
    } else if (dsDenial.length > 0) {
      if (dsDenial.some((n) => n.status === "bogus")) {
        [status, reason] = ["bogus", "denial of DS does not validate"];
      } else if (dsDenial.every((n) => n.status === "secure")) {
        [status, reason] = ["insecure", "parent proves there is no DS"];
      } else {
        [status, reason] = ["indeterminate", "denial of DS could not be authenticated"];
      }
    } else {
      [status, reason] = ["indeterminate", "no DS data for delegation"];
    }

    let dlv: DelegationSignerEvaluation | undefined;
    let dlvZone: DomainName | undefined;
    if ((status === "insecure" || status === "indeterminate") && block.dlvParent) {
      const lookaside = this.zone(block.dlvParent);
      dlvZone = lookaside.name;
      dlv = this.delegationSigners(name.concat(lookaside.name), block, RRType.DLV, name, lookaside, keys);
      if (lookaside.status === "secure" && dlv) {
        const [dlvStatus, dlvReason] = this.delegationStatus(dlv, signsKeyset, keysetFailed);
        if (dlvStatus === "secure") {
          [status, reason] = ["secure", `${dlvReason} (look-aside via ${lookaside.name.toString()})`];
        }
      }
    }

    const keyResults: KeyEvaluation[] = keys.map((key) => ({
      key,
      status,
      anchored: anchored.includes(key),
    }));

    const keyset = keysetRRset
      ? this.finishRRset(
          keysetRRset,
          name,
          status,
          keysetChecks.map((c) => ({ ...c, status: signatureStatus(c.outcome, status) }))
        )
      : undefined;

    return {
      name,
      parent: parent?.name,
      status,
      reason,
      keys: keyResults,
      keyset,
      ds,
      dsDenial,
      dlv,
      dlvZone,
    };
  }

  private delegationStatus(
    signers: DelegationSignerEvaluation,
    signsKeyset: (entry: readonly DnskeyRecord[]) => boolean,
    keysetFailed: boolean
  ): [ValidationStatus, string] {
    const label = rrTypeToText(signers.rrset.rrset.rrtype);
    if (signers.rrset.status === "bogus") {
      return ["bogus", `${label} RRset does not validate`];
    }
    if (signers.rrset.status !== "secure") {
      return [signers.rrset.status, `${label} RRset is ${signers.rrset.status}`];
    }

    const usable = signers.records.filter((r) => isSupportedAlgorithm(r.algorithm) && isSupportedDigestType(r.digestType));
    if (usable.length === 0) {
      return ["insecure", `no ${label} record uses a supported algorithm`];
    }

    const matched = signers.digests.filter((d) => d.outcome === "match" && !isRevoked(d.key)).map((d) => d.key);
    const digestFailed = signers.digests.some((d) => d.outcome === "mismatch");
    if (signsKeyset(matched) && !keysetFailed && !digestFailed) {
      return ["secure", `${label} matches a key that signs the DNSKEY RRset`];
    }
    if (digestFailed) {
      return ["bogus", `${label} digest does not match its DNSKEY`];
    }
    return ["bogus", `no ${label} leads to a key that signs the DNSKEY RRset`];
  }

  /**
   * Evaluate the DS (or DLV) RRset published for `zoneName` at `owner`, in
   * the zone `signerZone`, and check its digests against `keys`.
   */
  private delegationSigners(
    owner: DomainName,
    block: NameAnalysis,
    rrtype: number,
    zoneName: DomainName,
    signerZone: ZoneEvaluation | undefined,
    keys: readonly DnskeyRecord[]
  ): DelegationSignerEvaluation | undefined {
    const rrset = this.store
      .getQuery(createQueryKey(owner, rrtype), block)
      ?.answer.find((r) => r.rrtype === rrtype && r.name.equals(owner));
    if (!rrset) return undefined;

    const evaluated = this.rrset(rrset, signerZone);
    const records: DsRecord[] = [];
    for (const text of rrset.rdata) {
      try {
        records.push(parseDs(zoneName, text, rrtype));
      } catch (error) {
        logger.warn({ zone: zoneName.toString(), rdata: text, err: error }, "Skipping unparseable delegation signer");
      }
    }

    const digests: DigestEvaluation[] = [];
    for (const ds of records) {
      for (const key of keys) {
        if (key.keyTag !== ds.keyTag || key.algorithm !== ds.algorithm) continue;
        const digest = computeDsDigest(zoneName, key.rdata, ds.digestType);
        let outcome: DigestOutcome;
        if (digest === undefined) {
          outcome = "unsupported-digest";
        } else {
          outcome = bytesEqual(digest, ds.digest) ? "match" : "mismatch";
        }
        digests.push({ ds, key, outcome, status: "indeterminate" });
      }
    }

    for (const digest of digests) {
      digest.status = digestStatus(digest.outcome, evaluated.status);
    }

    return { rrset: evaluated, records, digests };
  }

  // ===========================================================================
  // RRsets and Signatures
  // ===========================================================================

  private checkSignature(
    rrsig: RrsigRecord,
    rrset: ResourceRecordSet,
    keys: readonly DnskeyRecord[]
  ): SignatureCheck {
    if (rrsig.typeCovered !== rrset.rrtype) {
      return { rrsig, outcome: "covers-other-type" };
    }
    if (!isSupportedAlgorithm(rrsig.algorithm)) {
      return { rrsig, outcome: "unsupported-algorithm" };
    }

    const candidates = keys.filter((k) => k.keyTag === rrsig.keyTag && k.algorithm === rrsig.algorithm && isZoneKey(k));
    if (candidates.length === 0) {
      return { rrsig, outcome: "missing-key" };
    }

    let data: Uint8Array;
    try {
      data = buildSigningInput(rrsig, rrset);
    } catch (error) {
      if (error instanceof RdataError) {
        logger.warn({ rrset: rrset.name.toString(), err: error }, "Cannot build signing input");
        return { rrsig, key: candidates[0], outcome: "unencodable" };
      }
      throw error;
    }

    // Colliding key tags: any candidate that verifies wins
    let result: SignatureCheck = { rrsig, outcome: "missing-key" };
    for (const key of candidates) {
      const verified = verifySignature(rrsig.algorithm, key.publicKey, data, rrsig.signature);
      if (verified === "valid") {
        return { rrsig, key, outcome: this.windowOutcome(rrsig) };
      }
      if (result.outcome !== "invalid-signature") {
        result = { rrsig, key, outcome: verified === "invalid" ? "invalid-signature" : "bad-key" };
      }
    }
    return result;
  }

  private windowOutcome(rrsig: RrsigRecord): SignatureOutcome {
    if (this.nowSeconds > rrsig.expiration) return "expired";
    if (this.nowSeconds < rrsig.inception) return "premature";
    return "valid";
  }

  private signature(rrsig: RrsigRecord, rrset: ResourceRecordSet): SignatureEvaluation {
    const signer = this.signerZone(rrsig.signer);
    if (!signer) {
      return { rrsig, outcome: "missing-key", status: "indeterminate" };
    }
    const check = this.checkSignature(
      rrsig,
      rrset,
      signer.keys.map((k) => k.key)
    );
    return { ...check, status: signatureStatus(check.outcome, signer.status) };
  }

  rrset(rrset: ResourceRecordSet, zone: ZoneEvaluation | undefined): RRsetEvaluation {
    const signatures = rrset.rrsigs.map((rrsig) => this.signature(rrsig, rrset));
    return this.finishRRset(rrset, zone?.name, zone?.status, signatures);
  }

  private finishRRset(
    rrset: ResourceRecordSet,
    zone: DomainName | undefined,
    zoneStatus: ValidationStatus | undefined,
    signatures: SignatureEvaluation[]
  ): RRsetEvaluation {
    return {
      rrset,
      zone,
      status: statusInZone(
        zoneStatus,
        signatures.map((s) => s.status)
      ),
      signatures,
    };
  }

  negative(response: NegativeResponse, key: QueryKey, zone: ZoneEvaluation | undefined): NegativeEvaluation {
    const proofs = response.proof.map((rrset) => this.rrset(rrset, zone));
    return {
      response,
      key,
      zone: zone?.name,
      status: statusInZone(
        zone?.status,
        proofs.map((p) => p.status),
        true
      ),
      proofs,
    };
  }

  // ===========================================================================
  // Queries
  // ===========================================================================

  query(block: NameAnalysis, key: QueryKey): QueryEvaluation {
    const result = this.store.getQuery(key, block);
    const zoneBlock = this.store.zoneOf(block, key.rrtype);
    const zone = zoneBlock ? this.zone(zoneBlock) : undefined;

    return {
      key,
      zone: zone?.name,
      rrsets: (result?.answer ?? []).map((rrset) => this.rrset(rrset, zone)),
      negatives: (result?.negative ?? []).map((n) => this.negative(n, key, zone)),
    };
  }
}

// =============================================================================
// Status Rules
// =============================================================================

/**
 * Edge status of a signature: a cryptographic failure is bogus; a valid
 * signature is as good as the key that made it; anything that could not be
 * checked is indeterminate.
 */
export function signatureStatus(outcome: SignatureOutcome, keyStatus: ValidationStatus): ValidationStatus {
  if (outcome === "valid") return keyStatus;
  if (isFailedOutcome(outcome)) return "bogus";
  return "indeterminate";
}

function digestStatus(outcome: DigestOutcome, dsStatus: ValidationStatus): ValidationStatus {
  if (outcome === "mismatch") return "bogus";
  if (outcome === "unsupported-digest") return "indeterminate";
  return dsStatus;
}

function parseKeys(zone: DomainName, rrset: ResourceRecordSet): DnskeyRecord[] {
  const keys: DnskeyRecord[] = [];
  for (const text of rrset.rdata) {
    try {
      keys.push(parseDnskey(zone, text));
    } catch (error) {
      logger.warn({ zone: zone.toString(), rdata: text, err: error }, "Skipping unparseable DNSKEY");
    }
  }
  return keys;
}

// =============================================================================
// Public API
// =============================================================================

/**
 * Evaluate every query of the store's name, and every zone its delegation
 * chain passes through, against `anchors`.
 */
export function evaluateStore(
  store: AnalysisStore,
  anchors: TrustAnchorSet,
  options: EvaluatorOptions = {}
): StoreEvaluation {
  const referenceTime = store.referenceTime ?? options.now ?? new Date();
  const evaluation = new Evaluation(store, anchors, referenceTime);

  for (const block of store.blocks) {
    if (block.isZone) evaluation.zone(block);
  }

  const queries = new Map<string, QueryEvaluation>();
  for (const key of store.queryKeys()) {
    queries.set(formatQueryKey(key), evaluation.query(store.root, key));
  }

  logger.debug(
    { name: store.name.toString(), zones: evaluation.zoneResults.size, queries: queries.size },
    "Store evaluated"
  );

  return {
    store,
    anchors,
    referenceTime,
    zones: evaluation.zoneResults,
    queries,
  };
}
