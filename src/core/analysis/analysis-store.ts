/**
 * Analysis Store
 *
 * In-memory form of one domain name's collected DNS/DNSSEC data, together
 * with the blocks of every zone its delegation chain refers to. Built once by
 * {@link deserializeAnalysis}; read-only afterwards.
 *
 * @module
 */

import { DomainName, InvalidNameError } from "../dns/domain-name.js";
import { decodeBase64 } from "../dns/rdata.js";
import type { RrsigRecord } from "../dns/records.js";
import { RRType, parseRRType } from "../dns/rr-types.js";
import { ErrorCode, MalformedInputError, SchemaError } from "../errors.js";
import { createLogger } from "../../utils/logger.js";
import { formatQueryKey, parseQueryKey, type QueryKey } from "./query-key.js";
import {
  NameAnalysisSchema,
  formatIssuePath,
  type AnalysisDocument,
  type NameAnalysisInput,
  type NegativeResponseInput,
  type RRsetInput,
  type RrsigInput,
} from "./schema.js";

const logger = createLogger("analysis");

// =============================================================================
// Types
// =============================================================================

export interface ResourceRecordSet {
  name: DomainName;
  rrtype: number;
  ttl: number;
  /** Presentation-format rdata, one entry per record */
  rdata: readonly string[];
  rrsigs: readonly RrsigRecord[];
  servers: readonly string[];
}

export type NegativeKind = "nxdomain" | "nodata";

export interface NegativeResponse {
  kind: NegativeKind;
  servers: readonly string[];
  clients: readonly string[];
  /** SOA/NSEC/NSEC3 RRsets returned with the response */
  proof: readonly ResourceRecordSet[];
}

export interface QueryResult {
  key: QueryKey;
  answer: readonly ResourceRecordSet[];
  negative: readonly NegativeResponse[];
}

export interface NameAnalysis {
  name: DomainName;
  isZone: boolean;
  /** Enclosing zone block; for a zone apex, the parent zone's block */
  parent?: NameAnalysis;
  dlvParent?: NameAnalysis;
  analysisEnd?: Date;
  queries: ReadonlyMap<string, QueryResult>;
}

// =============================================================================
// Analysis Store
// =============================================================================

export class AnalysisStore {
  readonly name: DomainName;
  readonly root: NameAnalysis;
  private readonly byName: ReadonlyMap<string, NameAnalysis>;

  constructor(root: NameAnalysis, blocks: ReadonlyMap<string, NameAnalysis>) {
    this.name = root.name;
    this.root = root;
    this.byName = blocks;
  }

  /** Every block reachable from the requested name */
  get blocks(): NameAnalysis[] {
    return [...this.byName.values()];
  }

  getBlock(name: DomainName): NameAnalysis | undefined {
    return this.byName.get(name.toString());
  }

  /** Query keys of the requested name, in document order */
  queryKeys(): QueryKey[] {
    return [...this.root.queries.values()].map((q) => q.key);
  }

  /**
   * Look a query up in a block of the store, the requested name's by default.
   * DS and DLV data for a zone sit in that zone's own block.
   */
  getQuery(key: QueryKey, block: NameAnalysis = this.root): QueryResult | undefined {
    return block.queries.get(formatQueryKey(key));
  }

  /**
   * The zone block that serves `block`'s data of type `rrtype`: the block
   * itself for a zone apex, its parent for DS records and for names that are
   * not zones.
   */
  zoneOf(block: NameAnalysis, rrtype: number): NameAnalysis | undefined {
    if (block.isZone && rrtype !== RRType.DS) {
      return block;
    }
    return block.parent;
  }

  /** Reference time for signature validity windows */
  get referenceTime(): Date | undefined {
    return this.root.analysisEnd;
  }
}

// =============================================================================
// Deserialization
// =============================================================================

class BlockBuilder {
  private readonly built = new Map<string, NameAnalysis>();
  private readonly inProgress = new Set<string>();
  private readonly index: ReadonlyMap<string, { key: string; value: unknown }>;

  constructor(document: AnalysisDocument) {
    const index = new Map<string, { key: string; value: unknown }>();
    for (const [key, value] of Object.entries(document)) {
      try {
        index.set(DomainName.parse(key).toString(), { key, value });
      } catch (error) {
        if (!(error instanceof InvalidNameError)) throw error;
        logger.warn({ key }, "Ignoring document entry with an invalid name");
      }
    }
    this.index = index;
  }

  get blocks(): ReadonlyMap<string, NameAnalysis> {
    return this.built;
  }

  has(name: DomainName): boolean {
    return this.index.has(name.toString());
  }

  build(name: DomainName): NameAnalysis {
    const id = name.toString();
    const existing = this.built.get(id);
    if (existing) return existing;

    if (this.inProgress.has(id)) {
      throw new SchemaError(`Parent references form a cycle through ${id}`, ErrorCode.INPUT_REFERENCE_CYCLE, {
        path: JSON.stringify(id),
      });
    }

    const entry = this.index.get(id);
    if (!entry) {
      throw new MalformedInputError(`No analysis for ${id} in input document`, ErrorCode.INPUT_NAME_NOT_FOUND, {
        domainName: id,
      });
    }

    const parsed = NameAnalysisSchema.safeParse(entry.value);
    if (!parsed.success) {
      const issue = parsed.error.issues[0];
      const path = formatIssuePath(entry.key, issue?.path ?? []);
      throw new SchemaError(`Invalid analysis for ${id}: ${issue?.message ?? "invalid value"}`, undefined, { path });
    }

    this.inProgress.add(id);
    try {
      const block = this.convert(name, entry.key, parsed.data);
      this.built.set(id, block);
      return block;
    } finally {
      this.inProgress.delete(id);
    }
  }

  private resolveReference(from: string, field: string, text: string | undefined): NameAnalysis | undefined {
    if (text === undefined) return undefined;
    const name = parseName(text, formatIssuePath(from, [field]));
    if (!this.has(name)) {
      logger.warn({ name: from, [field]: name.toString() }, "Referenced zone is absent from input document");
      return undefined;
    }
    return this.build(name);
  }

  private convert(name: DomainName, key: string, input: NameAnalysisInput): NameAnalysis {
    const queries = new Map<string, QueryResult>();
    for (const [keyText, result] of Object.entries(input.queries)) {
      const queryKey = parseQueryKey(keyText);
      const path = formatIssuePath(key, ["queries", keyText]);
      const negative: NegativeResponse[] = [
        ...result.nxdomain.map((n, i) => convertNegative("nxdomain", n, `${path}.nxdomain[${i}]`)),
        ...result.nodata.map((n, i) => convertNegative("nodata", n, `${path}.nodata[${i}]`)),
      ];
      queries.set(formatQueryKey(queryKey), {
        key: queryKey,
        answer: result.answer.map((rrset, i) => convertRRset(rrset, `${path}.answer[${i}]`)),
        negative,
      });
    }

    const parent = this.resolveReference(key, "parent", input.parent);
    const dlvParent = this.resolveReference(key, "dlv_parent", input.dlv_parent);

    return {
      name,
      isZone: input.zone,
      parent,
      dlvParent,
      analysisEnd: input.analysis_end,
      queries,
    };
  }
}

function parseName(text: string, path: string): DomainName {
  try {
    return DomainName.parse(text);
  } catch (error) {
    if (error instanceof InvalidNameError) {
      throw new SchemaError(error.message, undefined, { path });
    }
    throw error;
  }
}

function parseType(text: string, path: string): number {
  const rrtype = parseRRType(text);
  if (rrtype === undefined) {
    throw new SchemaError(`Unknown record type "${text}"`, undefined, { path });
  }
  return rrtype;
}

function convertRrsig(input: RrsigInput, path: string): RrsigRecord {
  let signature: Uint8Array;
  try {
    signature = decodeBase64(input.signature);
  } catch {
    throw new SchemaError("Signature is not valid base64", undefined, { path: `${path}.signature` });
  }
  return {
    typeCovered: parseType(input.covered, `${path}.covered`),
    algorithm: input.algorithm,
    labels: input.labels,
    originalTtl: input.original_ttl,
    expiration: input.expiration,
    inception: input.inception,
    keyTag: input.key_tag,
    signer: parseName(input.signer, `${path}.signer`),
    signature,
  };
}

function convertRRset(input: RRsetInput, path: string): ResourceRecordSet {
  return {
    name: parseName(input.name, `${path}.name`),
    rrtype: parseType(input.type, `${path}.type`),
    ttl: input.ttl,
    rdata: input.rdata,
    rrsigs: input.rrsigs.map((sig, i) => convertRrsig(sig, `${path}.rrsigs[${i}]`)),
    servers: input.servers,
  };
}

function convertNegative(kind: NegativeKind, input: NegativeResponseInput, path: string): NegativeResponse {
  return {
    kind,
    servers: input.servers,
    clients: input.clients,
    proof: input.proof.map((rrset, i) => convertRRset(rrset, `${path}.proof[${i}]`)),
  };
}

/**
 * Reconstruct the Analysis Store for `name` from a parsed input document.
 *
 * @throws MalformedInputError when the document has no entry for `name`
 * @throws SchemaError when a required field is missing or malformed
 */
export function deserializeAnalysis(name: DomainName | string, document: AnalysisDocument): AnalysisStore {
  const target = typeof name === "string" ? parseRequestedName(name) : name;
  const builder = new BlockBuilder(document);
  const root = builder.build(target);

  logger.debug(
    { name: target.toString(), blocks: builder.blocks.size, queries: root.queries.size },
    "Deserialized analysis"
  );
  return new AnalysisStore(root, builder.blocks);
}

function parseRequestedName(text: string): DomainName {
  try {
    return DomainName.parse(text);
  } catch (error) {
    if (error instanceof InvalidNameError) {
      throw new MalformedInputError(error.message, ErrorCode.INPUT_MALFORMED, { domainName: text });
    }
    throw error;
  }
}
