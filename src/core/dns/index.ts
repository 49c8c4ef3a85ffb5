/**
 * DNS Primitives
 *
 * Domain names, RR type numbers, presentation-format rdata and the DNSSEC
 * cryptography the evaluator needs.
 *
 * @module
 */

export { DomainName, InvalidNameError, nameToFileStem } from "./domain-name.js";
export { Algorithm, DigestType, RRType, parseRRType, rrTypeToText } from "./rr-types.js";
export { RdataError, encodeRdata } from "./rdata.js";
export {
  DNSKEY_FLAG_REVOKE,
  DNSKEY_FLAG_SEP,
  DNSKEY_FLAG_ZONE,
  parseDnskey,
  parseDs,
  type DnskeyRecord,
  type DsRecord,
  type RrsigRecord,
} from "./records.js";
export {
  buildSigningInput,
  computeDsDigest,
  computeKeyTag,
  isSupportedAlgorithm,
  isSupportedDigestType,
  verifySignature,
  type SignedRRset,
  type VerifyOutcome,
} from "./crypto.js";
