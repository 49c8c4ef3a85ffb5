/**
 * DNSSEC test fixtures: Ed25519 zone keys generated in process, RRsets signed
 * over the canonical form, and a small `.` → `example.` delegation chain.
 */

import * as crypto from "node:crypto";
import { DomainName } from "../../dns/domain-name.js";
import { buildSigningInput, computeDsDigest } from "../../dns/crypto.js";
import { parseDnskey, type DnskeyRecord } from "../../dns/records.js";
import { Algorithm, parseRRType } from "../../dns/rr-types.js";

/** 2024-01-01T00:00:00Z */
export const INCEPTION = 1704067200;
/** 2030-01-01T00:00:00Z */
export const EXPIRATION = 1893456000;
export const ANALYSIS_END = "2026-01-01T00:00:00Z";

export interface TestKey {
  zone: DomainName;
  rdataText: string;
  record: DnskeyRecord;
  privateKey: crypto.KeyObject;
}

export interface RrsigJson {
  covered: string;
  algorithm: number;
  labels: number;
  original_ttl: number;
  expiration: number;
  inception: number;
  key_tag: number;
  signer: string;
  signature: string;
}

export interface RRsetJson {
  name: string;
  type: string;
  ttl: number;
  rdata: string[];
  servers?: string[];
  rrsigs?: RrsigJson[];
}

export interface SignOptions {
  inception?: number;
  expiration?: number;
  /** Flip a bit of the signature */
  tamper?: boolean;
}

export function generateKey(zone: string, flags = 257): TestKey {
  const { publicKey, privateKey } = crypto.generateKeyPairSync("ed25519");
  const raw = Buffer.from(publicKey.export({ format: "jwk" }).x ?? "", "base64url");
  const owner = DomainName.parse(zone);
  const rdataText = `${flags} 3 ${Algorithm.ED25519} ${raw.toString("base64")}`;
  return { zone: owner, rdataText, record: parseDnskey(owner, rdataText), privateKey };
}

function typeOf(text: string): number {
  const rrtype = parseRRType(text);
  if (rrtype === undefined) throw new Error(`unknown type ${text}`);
  return rrtype;
}

export function sign(rrset: RRsetJson, key: TestKey, options: SignOptions = {}): RrsigJson {
  const name = DomainName.parse(rrset.name);
  const fields = {
    typeCovered: typeOf(rrset.type),
    algorithm: Algorithm.ED25519,
    labels: name.signatureLabels,
    originalTtl: rrset.ttl,
    expiration: options.expiration ?? EXPIRATION,
    inception: options.inception ?? INCEPTION,
    keyTag: key.record.keyTag,
    signer: key.zone,
  };
  const data = buildSigningInput(fields, { name, rrtype: fields.typeCovered, rdata: rrset.rdata });
  const signature = crypto.sign(null, data, key.privateKey);
  if (options.tamper) {
    signature[0] = (signature[0] ?? 0) ^ 0x01;
  }

  return {
    covered: rrset.type,
    algorithm: fields.algorithm,
    labels: fields.labels,
    original_ttl: fields.originalTtl,
    expiration: fields.expiration,
    inception: fields.inception,
    key_tag: fields.keyTag,
    signer: key.zone.toString(),
    signature: signature.toString("base64"),
  };
}

/**
 * Keys for two zones whose key tags collide. Tags are 16 bits, so a few
 * hundred keys are enough.
 */
export function keysWithSharedTag(first: string, second: string): [TestKey, TestKey] {
  const seen = new Map<number, TestKey>();
  for (;;) {
    const candidate = generateKey(first);
    seen.set(candidate.record.keyTag, candidate);
    const other = generateKey(second);
    const match = seen.get(other.record.keyTag);
    if (match) return [match, other];
  }
}

/** The RRset with an RRSIG from each key */
export function signed(rrset: RRsetJson, keys: readonly TestKey[], options: SignOptions = {}): RRsetJson {
  return { ...rrset, rrsigs: [...(rrset.rrsigs ?? []), ...keys.map((k) => sign(rrset, k, options))] };
}

export function dsFor(key: TestKey, digestType = 2): string {
  const digest = computeDsDigest(key.zone, key.record.rdata, digestType);
  if (!digest) throw new Error(`unsupported digest type ${digestType}`);
  return `${key.record.keyTag} ${key.record.algorithm} ${digestType} ${Buffer.from(digest).toString("hex").toUpperCase()}`;
}

export function anchorFor(key: TestKey): string {
  return `${key.zone.toString()} IN DNSKEY ${key.rdataText}`;
}

// =============================================================================
// Delegation Chain
// =============================================================================

export interface ChainOptions {
  /** How `example.` is delegated (default: a matching DS) */
  delegation?: "ds" | "ds-mismatch" | "denied" | "denied-without-proof";
  /** Corrupt the signature over the answer */
  tamperAnswer?: boolean;
  /** Let the answer's signature expire before the analysis time */
  expiredAnswer?: boolean;
  /** Sign the answer with a key the DNSKEY RRset does not carry */
  strayAnswerKey?: boolean;
  /** DNSKEY flags of the root key (default 257) */
  rootFlags?: number;
}

export interface Chain {
  document: Record<string, unknown>;
  rootKey: TestKey;
  childKey: TestKey;
  /** Key that signed the answer */
  answerKey: TestKey;
  /** Trust anchor text for the root key */
  anchors: string;
}

export function buildChain(options: ChainOptions = {}): Chain {
  const rootKey = generateKey(".", options.rootFlags);
  const childKey = generateKey("example.");
  const answerKey = options.strayAnswerKey ? generateKey("example.", 256) : childKey;
  const delegation = options.delegation ?? "ds";

  const rootKeyset: RRsetJson = { name: ".", type: "DNSKEY", ttl: 3600, rdata: [rootKey.rdataText] };
  const childKeyset: RRsetJson = { name: "example.", type: "DNSKEY", ttl: 3600, rdata: [childKey.rdataText] };

  let dsQuery: Record<string, unknown>;
  if (delegation === "ds" || delegation === "ds-mismatch") {
    const rdata =
      delegation === "ds"
        ? dsFor(childKey)
        : `${childKey.record.keyTag} ${Algorithm.ED25519} 2 ${"00".repeat(32)}`;
    dsQuery = { answer: [signed({ name: "example.", type: "DS", ttl: 3600, rdata: [rdata] }, [rootKey])] };
  } else {
    const nsec: RRsetJson = { name: "example.", type: "NSEC", ttl: 3600, rdata: ["test. NS RRSIG NSEC"] };
    const proof = delegation === "denied" ? [signed(nsec, [rootKey])] : [];
    dsQuery = { nodata: [{ servers: ["198.51.100.1"], proof }] };
  }

  const answer: RRsetJson = {
    name: "www.example.",
    type: "A",
    ttl: 300,
    rdata: ["192.0.2.1"],
    servers: ["192.0.2.53"],
  };
  const answerSignOptions: SignOptions = {
    tamper: options.tamperAnswer,
    ...(options.expiredAnswer ? { inception: INCEPTION, expiration: INCEPTION + 86400 } : {}),
  };

  const document: Record<string, unknown> = {
    ".": {
      zone: true,
      queries: {
        "./IN/DNSKEY": { answer: [signed(rootKeyset, [rootKey])] },
      },
    },
    "example.": {
      zone: true,
      parent: ".",
      queries: {
        "example./IN/DNSKEY": { answer: [signed(childKeyset, [childKey])] },
        "example./IN/DS": dsQuery,
      },
    },
    "www.example.": {
      parent: "example.",
      analysis_end: ANALYSIS_END,
      queries: {
        "www.example./IN/A": { answer: [signed(answer, [answerKey], answerSignOptions)] },
        "www.example./IN/AAAA": {
          nodata: [
            {
              servers: ["192.0.2.53"],
              proof: [
                signed(
                  { name: "www.example.", type: "NSEC", ttl: 300, rdata: ["zz.example. A RRSIG NSEC"] },
                  [childKey]
                ),
              ],
            },
          ],
        },
      },
    },
    "mail.example.": {
      parent: "example.",
      analysis_end: ANALYSIS_END,
      queries: {
        "mail.example./IN/A": {
          answer: [signed({ name: "mail.example.", type: "A", ttl: 300, rdata: ["192.0.2.25"] }, [childKey])],
        },
      },
    },
  };

  return { document, rootKey, childKey, answerKey, anchors: anchorFor(rootKey) };
}
