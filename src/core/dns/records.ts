/**
 * DNSSEC record models parsed from presentation format.
 *
 * @module
 */

import { DomainName } from "./domain-name.js";
import { decodeBase64, decodeHex, encodeRdata, tokenizeRdata } from "./rdata.js";
import { RRType, rrTypeToText } from "./rr-types.js";
import { computeKeyTag } from "./crypto.js";

/** DNSKEY flag bits */
export const DNSKEY_FLAG_ZONE = 0x0100;
export const DNSKEY_FLAG_SEP = 0x0001;
export const DNSKEY_FLAG_REVOKE = 0x0080;

export interface DnskeyRecord {
  owner: DomainName;
  flags: number;
  protocol: number;
  algorithm: number;
  publicKey: Uint8Array;
  keyTag: number;
  /** Wire-format rdata, used for digests and anchor matching */
  rdata: Uint8Array;
}

export interface DsRecord {
  owner: DomainName;
  /** DS, or DLV for look-aside records */
  rrtype: number;
  keyTag: number;
  algorithm: number;
  digestType: number;
  digest: Uint8Array;
}

export interface RrsigRecord {
  typeCovered: number;
  algorithm: number;
  labels: number;
  originalTtl: number;
  /** Seconds since the epoch */
  expiration: number;
  /** Seconds since the epoch */
  inception: number;
  keyTag: number;
  signer: DomainName;
  signature: Uint8Array;
}

function fieldsOf(text: string): string[] {
  return tokenizeRdata(text).map((t) => t.text);
}

/**
 * @throws RdataError or Error on malformed text
 */
export function parseDnskey(owner: DomainName, text: string): DnskeyRecord {
  const fields = fieldsOf(text);
  if (fields.length < 4) {
    throw new Error(`DNSKEY rdata needs 4 fields: "${text}"`);
  }
  const rdata = encodeRdata(RRType.DNSKEY, text);
  const algorithm = Number(fields[2]);
  return {
    owner,
    flags: Number(fields[0]),
    protocol: Number(fields[1]),
    algorithm,
    publicKey: decodeBase64(fields.slice(3).join("")),
    keyTag: computeKeyTag(rdata, algorithm),
    rdata,
  };
}

/**
 * @throws RdataError or Error on malformed text
 */
export function parseDs(owner: DomainName, text: string, rrtype: number = RRType.DS): DsRecord {
  const fields = fieldsOf(text);
  if (fields.length < 4) {
    throw new Error(`${rrTypeToText(rrtype)} rdata needs 4 fields: "${text}"`);
  }
  encodeRdata(rrtype, text);
  return {
    owner,
    rrtype,
    keyTag: Number(fields[0]),
    algorithm: Number(fields[1]),
    digestType: Number(fields[2]),
    digest: decodeHex(fields.slice(3).join("")),
  };
}

export function isRevoked(key: DnskeyRecord): boolean {
  return (key.flags & DNSKEY_FLAG_REVOKE) !== 0;
}

export function isZoneKey(key: DnskeyRecord): boolean {
  return (key.flags & DNSKEY_FLAG_ZONE) !== 0;
}

export function bytesEqual(a: Uint8Array, b: Uint8Array): boolean {
  return Buffer.compare(a, b) === 0;
}
