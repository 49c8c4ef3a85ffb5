/**
 * Trust Anchor Set
 *
 * Parses zone-file-style DNSKEY and DS records into the keys validation
 * starts from. An empty set is valid: nothing can then be judged secure.
 *
 * @module
 */

import { DomainName } from "../dns/domain-name.js";
import { computeDsDigest } from "../dns/crypto.js";
import { bytesEqual, parseDnskey, parseDs, type DnskeyRecord, type DsRecord } from "../dns/records.js";
import { RRType } from "../dns/rr-types.js";
import { KeyParseError } from "../errors.js";
import { err, ok, type Result } from "../../types/result.js";
import { createLogger } from "../../utils/logger.js";

const logger = createLogger("trust");

// =============================================================================
// Types
// =============================================================================

export type TrustAnchor =
  | { kind: "dnskey"; name: DomainName; key: DnskeyRecord }
  | { kind: "ds"; name: DomainName; ds: DsRecord };

export class TrustAnchorSet implements Iterable<TrustAnchor> {
  private readonly anchors: readonly TrustAnchor[];
  private readonly byName: ReadonlyMap<string, readonly TrustAnchor[]>;

  static readonly EMPTY = new TrustAnchorSet([]);

  constructor(anchors: readonly TrustAnchor[]) {
    this.anchors = [...anchors];
    const byName = new Map<string, TrustAnchor[]>();
    for (const anchor of this.anchors) {
      const id = anchor.name.toString();
      byName.set(id, [...(byName.get(id) ?? []), anchor]);
    }
    this.byName = byName;
  }

  get size(): number {
    return this.anchors.length;
  }

  isEmpty(): boolean {
    return this.anchors.length === 0;
  }

  forName(name: DomainName): readonly TrustAnchor[] {
    return this.byName.get(name.toString()) ?? [];
  }

  /**
   * Whether `key` is one of the anchors: same owner, algorithm and public key
   * for a DNSKEY anchor, or a matching digest for a DS anchor.
   */
  matchesKey(key: DnskeyRecord): boolean {
    return this.forName(key.owner).some((anchor) => {
      if (anchor.kind === "dnskey") {
        return (
          anchor.key.algorithm === key.algorithm &&
          anchor.key.protocol === key.protocol &&
          bytesEqual(anchor.key.publicKey, key.publicKey)
        );
      }
      if (anchor.ds.keyTag !== key.keyTag || anchor.ds.algorithm !== key.algorithm) {
        return false;
      }
      const digest = computeDsDigest(key.owner, key.rdata, anchor.ds.digestType);
      return digest !== undefined && bytesEqual(digest, anchor.ds.digest);
    });
  }

  [Symbol.iterator](): Iterator<TrustAnchor> {
    return this.anchors[Symbol.iterator]();
  }
}

// =============================================================================
// Zone File Lines
// =============================================================================

interface LogicalLine {
  /** 1-based line number where the record starts */
  line: number;
  /** Whether the record starts with whitespace (owner inherited) */
  continuesOwner: boolean;
  tokens: string[];
}

/**
 * Strip comments and join parenthesized records into logical lines.
 */
function splitLogicalLines(text: string): Result<LogicalLine[], { line: number; message: string }> {
  const lines: LogicalLine[] = [];
  let current: LogicalLine | undefined;
  let depth = 0;

  const physical = text.split(/\r?\n/);
  for (let index = 0; index < physical.length; index++) {
    const raw = physical[index] ?? "";
    let body = "";
    let quoted = false;
    for (const ch of raw) {
      if (ch === '"') quoted = !quoted;
      if (ch === ";" && !quoted) break;
      body += ch;
    }

    for (const ch of body) {
      if (ch === "(") depth++;
      if (ch === ")") depth--;
      if (depth < 0) {
        return err({ line: index + 1, message: "unbalanced parenthesis" });
      }
    }

    const tokens = body.replace(/[()]/g, " ").trim().split(/\s+/).filter((t) => t.length > 0);
    if (!current) {
      if (tokens.length === 0) continue;
      current = { line: index + 1, continuesOwner: /^\s/.test(body), tokens };
    } else {
      current.tokens.push(...tokens);
    }

    if (depth === 0) {
      lines.push(current);
      current = undefined;
    }
  }

  if (depth !== 0 && current) {
    return err({ line: current.line, message: "unterminated parenthesis" });
  }
  return ok(lines);
}

const CLASSES = new Set(["IN", "CH", "HS"]);
const DNSKEY_PROTOCOL = 3;

interface ParserState {
  origin: DomainName;
  lastOwner?: DomainName;
}

function parseRecordLine(record: LogicalLine, state: ParserState): Result<TrustAnchor | undefined, string> {
  const tokens = [...record.tokens];
  const first = tokens[0];
  if (first === undefined) return ok(undefined);

  if (first.startsWith("$")) {
    const directive = first.toUpperCase();
    if (directive === "$ORIGIN") {
      const value = tokens[1];
      if (!value) return err("$ORIGIN needs a name");
      state.origin = DomainName.parse(value, state.origin);
      return ok(undefined);
    }
    if (directive === "$TTL") {
      return ok(undefined);
    }
    return err(`unsupported directive ${first}`);
  }

  let owner: DomainName | undefined;
  if (record.continuesOwner) {
    owner = state.lastOwner;
  } else {
    const ownerText = tokens.shift();
    owner = ownerText === undefined ? undefined : DomainName.parse(ownerText, state.origin);
  }
  if (!owner) {
    return err("record has no owner name");
  }
  state.lastOwner = owner;

  // TTL and class, both optional, in either order
  for (let i = 0; i < 2; i++) {
    const next = tokens[0];
    if (next !== undefined && (/^\d+$/.test(next) || CLASSES.has(next.toUpperCase()))) {
      if (CLASSES.has(next.toUpperCase()) && next.toUpperCase() !== "IN") {
        return err(`unsupported class ${next}`);
      }
      tokens.shift();
    }
  }

  const type = tokens.shift()?.toUpperCase();
  const rdata = tokens.join(" ");
  if (type === "DNSKEY") {
    const key = parseDnskey(owner, rdata);
    if (key.protocol !== DNSKEY_PROTOCOL) {
      return err(`DNSKEY protocol must be ${DNSKEY_PROTOCOL}, got ${key.protocol}`);
    }
    return ok({ kind: "dnskey", name: owner, key });
  }
  if (type === "DS") {
    return ok({ kind: "ds", name: owner, ds: parseDs(owner, rdata, RRType.DS) });
  }
  return err(type === undefined ? "record has no type" : `unsupported record type ${type}`);
}

/**
 * Parse zone-file-style trust anchor text.
 *
 * @throws KeyParseError on malformed record syntax
 */
export function parseTrustAnchors(text: string): TrustAnchorSet {
  const split = splitLogicalLines(text);
  if (!split.ok) {
    throw new KeyParseError(split.error.message, undefined, { line: split.error.line });
  }

  const state: ParserState = { origin: DomainName.ROOT };
  const anchors: TrustAnchor[] = [];

  for (const record of split.value) {
    let result: Result<TrustAnchor | undefined, string>;
    try {
      result = parseRecordLine(record, state);
    } catch (error) {
      const reason = error instanceof Error ? error.message : String(error);
      throw new KeyParseError(reason, undefined, { line: record.line });
    }
    if (!result.ok) {
      throw new KeyParseError(result.error, undefined, { line: record.line });
    }
    if (result.value) {
      anchors.push(result.value);
    }
  }

  logger.debug({ count: anchors.length }, "Parsed trust anchors");
  return new TrustAnchorSet(anchors);
}
