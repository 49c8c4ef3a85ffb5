/**
 * Resource record type and algorithm mnemonics.
 *
 * @module
 */

export const RRType = {
  A: 1,
  NS: 2,
  CNAME: 5,
  SOA: 6,
  PTR: 12,
  MX: 15,
  TXT: 16,
  AAAA: 28,
  SRV: 33,
  NAPTR: 35,
  DNAME: 39,
  DS: 43,
  SSHFP: 44,
  RRSIG: 46,
  NSEC: 47,
  DNSKEY: 48,
  NSEC3: 50,
  NSEC3PARAM: 51,
  TLSA: 52,
  CDS: 59,
  CDNSKEY: 60,
  SVCB: 64,
  HTTPS: 65,
  CAA: 257,
  DLV: 32769,
} as const;

const BY_NAME = new Map<string, number>(Object.entries(RRType));
const BY_VALUE = new Map<number, string>(Object.entries(RRType).map(([name, value]) => [value, name]));

/**
 * Types never graphed as top-level queries; they are consumed while building
 * signature and delegation edges.
 */
export const DELEGATION_TYPES: ReadonlySet<number> = new Set<number>([RRType.NS, RRType.DNSKEY, RRType.DS, RRType.DLV]);

/**
 * Parse a type mnemonic (`"AAAA"`) or generic form (`"TYPE65"`).
 * Returns undefined for anything else.
 */
export function parseRRType(text: string): number | undefined {
  const upper = text.trim().toUpperCase();
  const known = BY_NAME.get(upper);
  if (known !== undefined) {
    return known;
  }
  const generic = /^TYPE(\d{1,5})$/.exec(upper);
  if (generic?.[1] !== undefined) {
    const value = Number(generic[1]);
    return value <= 0xffff ? value : undefined;
  }
  return undefined;
}

export function rrTypeToText(value: number): string {
  return BY_VALUE.get(value) ?? `TYPE${value}`;
}

/** DNSSEC algorithm numbers (IANA registry) */
export const Algorithm = {
  RSAMD5: 1,
  DSA: 3,
  RSASHA1: 5,
  DSA_NSEC3_SHA1: 6,
  RSASHA1_NSEC3_SHA1: 7,
  RSASHA256: 8,
  RSASHA512: 10,
  ECC_GOST: 12,
  ECDSAP256SHA256: 13,
  ECDSAP384SHA384: 14,
  ED25519: 15,
  ED448: 16,
} as const;

/** DS digest type numbers */
export const DigestType = {
  SHA1: 1,
  SHA256: 2,
  GOST: 3,
  SHA384: 4,
} as const;
