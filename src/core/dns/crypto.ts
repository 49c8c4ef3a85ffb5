/**
 * DNSSEC cryptography on top of node:crypto.
 *
 * Key tags (RFC 4034 Appendix B), DS digests (RFC 4034 section 5.1.4,
 * RFC 4509, RFC 6605) and RRSIG verification over the canonical signing
 * input (RFC 4034 section 3.1.8.1 and section 6).
 *
 * @module
 */

import * as crypto from "node:crypto";
import { DomainName } from "./domain-name.js";
import { encodeRdata } from "./rdata.js";
import { Algorithm, DigestType } from "./rr-types.js";
import type { RrsigRecord } from "./records.js";

const CLASS_IN = 1;

/**
 * Outcome of checking one signature against one key.
 */
export type VerifyOutcome = "valid" | "invalid" | "unsupported" | "bad-key";

// =============================================================================
// Key Tags and Digests
// =============================================================================

export function computeKeyTag(rdata: Uint8Array, algorithm: number): number {
  if (algorithm === Algorithm.RSAMD5) {
    // Least significant 16 bits of the modulus
    if (rdata.length < 4) return 0;
    return ((rdata[rdata.length - 3] ?? 0) << 8) | (rdata[rdata.length - 2] ?? 0);
  }

  let ac = 0;
  for (let i = 0; i < rdata.length; i++) {
    const b = rdata[i] ?? 0;
    ac += i & 1 ? b : b << 8;
  }
  ac += (ac >>> 16) & 0xffff;
  return ac & 0xffff;
}

const DIGEST_HASHES: ReadonlyMap<number, string> = new Map([
  [DigestType.SHA1, "sha1"],
  [DigestType.SHA256, "sha256"],
  [DigestType.SHA384, "sha384"],
]);

export function isSupportedDigestType(digestType: number): boolean {
  return DIGEST_HASHES.has(digestType);
}

/**
 * Digest of owner name and DNSKEY rdata, or undefined for an unsupported
 * digest type.
 */
export function computeDsDigest(owner: DomainName, dnskeyRdata: Uint8Array, digestType: number): Uint8Array | undefined {
  const hash = DIGEST_HASHES.get(digestType);
  if (!hash) return undefined;
  return crypto.createHash(hash).update(owner.toWire(true)).update(dnskeyRdata).digest();
}

// =============================================================================
// Public Keys
// =============================================================================

interface AlgorithmSpec {
  hash: string | null;
  toJwk(publicKey: Uint8Array): crypto.JsonWebKey | undefined;
}

function base64url(bytes: Uint8Array): string {
  return Buffer.from(bytes).toString("base64url");
}

/** RFC 3110 exponent length prefix, then exponent, then modulus */
function rsaJwk(publicKey: Uint8Array): crypto.JsonWebKey | undefined {
  if (publicKey.length < 3) return undefined;
  let offset = 1;
  let exponentLength = publicKey[0] ?? 0;
  if (exponentLength === 0) {
    exponentLength = ((publicKey[1] ?? 0) << 8) | (publicKey[2] ?? 0);
    offset = 3;
  }
  const exponent = publicKey.subarray(offset, offset + exponentLength);
  const modulus = publicKey.subarray(offset + exponentLength);
  if (exponent.length !== exponentLength || modulus.length === 0) return undefined;
  return { kty: "RSA", n: base64url(modulus), e: base64url(exponent) };
}

function ecJwk(curve: string, size: number): (publicKey: Uint8Array) => crypto.JsonWebKey | undefined {
  return (publicKey) => {
    if (publicKey.length !== size * 2) return undefined;
    return {
      kty: "EC",
      crv: curve,
      x: base64url(publicKey.subarray(0, size)),
      y: base64url(publicKey.subarray(size)),
    };
  };
}

function okpJwk(curve: string, size: number): (publicKey: Uint8Array) => crypto.JsonWebKey | undefined {
  return (publicKey) => (publicKey.length === size ? { kty: "OKP", crv: curve, x: base64url(publicKey) } : undefined);
}

const ALGORITHMS: ReadonlyMap<number, AlgorithmSpec> = new Map<number, AlgorithmSpec>([
  [Algorithm.RSASHA1, { hash: "sha1", toJwk: rsaJwk }],
  [Algorithm.RSASHA1_NSEC3_SHA1, { hash: "sha1", toJwk: rsaJwk }],
  [Algorithm.RSASHA256, { hash: "sha256", toJwk: rsaJwk }],
  [Algorithm.RSASHA512, { hash: "sha512", toJwk: rsaJwk }],
  [Algorithm.ECDSAP256SHA256, { hash: "sha256", toJwk: ecJwk("P-256", 32) }],
  [Algorithm.ECDSAP384SHA384, { hash: "sha384", toJwk: ecJwk("P-384", 48) }],
  [Algorithm.ED25519, { hash: null, toJwk: okpJwk("Ed25519", 32) }],
  [Algorithm.ED448, { hash: null, toJwk: okpJwk("Ed448", 57) }],
]);

export function isSupportedAlgorithm(algorithm: number): boolean {
  return ALGORITHMS.has(algorithm);
}

/**
 * Verify a raw DNSSEC signature. ECDSA signatures are r||s as carried in
 * RRSIG records.
 */
export function verifySignature(
  algorithm: number,
  publicKey: Uint8Array,
  data: Uint8Array,
  signature: Uint8Array
): VerifyOutcome {
  const spec = ALGORITHMS.get(algorithm);
  if (!spec) return "unsupported";

  const jwk = spec.toJwk(publicKey);
  if (!jwk) return "bad-key";

  let key: crypto.KeyObject;
  try {
    key = crypto.createPublicKey({ key: jwk, format: "jwk" });
  } catch {
    return "bad-key";
  }

  try {
    const ok = crypto.verify(spec.hash, data, { key, dsaEncoding: "ieee-p1363" }, signature);
    return ok ? "valid" : "invalid";
  } catch {
    // OpenSSL rejects malformed signature encodings instead of returning false
    return "invalid";
  }
}

// =============================================================================
// Signing Input
// =============================================================================

export interface SignedRRset {
  name: DomainName;
  rrtype: number;
  rdata: readonly string[];
}

function u16(value: number): Uint8Array {
  const buf = Buffer.alloc(2);
  buf.writeUInt16BE(value & 0xffff);
  return buf;
}

function u32(value: number): Uint8Array {
  const buf = Buffer.alloc(4);
  buf.writeUInt32BE(value >>> 0);
  return buf;
}

/** RRSIG rdata up to, and excluding, the signature field */
export function rrsigPrefix(rrsig: Omit<RrsigRecord, "signature">): Uint8Array {
  return Buffer.concat([
    u16(rrsig.typeCovered),
    Uint8Array.of(rrsig.algorithm & 0xff, rrsig.labels & 0xff),
    u32(rrsig.originalTtl),
    u32(rrsig.expiration),
    u32(rrsig.inception),
    u16(rrsig.keyTag),
    rrsig.signer.toWire(true),
  ]);
}

/**
 * Owner name as signed: a synthesized answer is signed under the wildcard it
 * was expanded from.
 */
function signedOwner(name: DomainName, labels: number): DomainName {
  if (labels < name.signatureLabels) {
    return name.suffix(labels).child("*");
  }
  return name;
}

/**
 * The octets an RRSIG's signature covers.
 *
 * @throws RdataError when a record's rdata cannot be encoded
 */
export function buildSigningInput(rrsig: Omit<RrsigRecord, "signature">, rrset: SignedRRset): Uint8Array {
  const owner = signedOwner(rrset.name, rrsig.labels).toWire(true);
  const header = Buffer.concat([owner, u16(rrset.rrtype), u16(CLASS_IN), u32(rrsig.originalTtl)]);

  const encoded = rrset.rdata.map((text) => Buffer.from(encodeRdata(rrset.rrtype, text, true)));
  encoded.sort(Buffer.compare);

  const records: Uint8Array[] = [];
  let previous: Buffer | undefined;
  for (const rdata of encoded) {
    if (previous && previous.equals(rdata)) continue;
    records.push(header, u16(rdata.length), rdata);
    previous = rdata;
  }

  return Buffer.concat([rrsigPrefix(rrsig), ...records]);
}
