/**
 * Analysis Store Tests
 *
 * @module
 */

import { describe, it, expect } from "vitest";
import { DomainName } from "../../dns/domain-name.js";
import { RRType } from "../../dns/rr-types.js";
import { ErrorCode, MalformedInputError, SchemaError } from "../../errors.js";
import { buildChain } from "../../__tests__/fixtures/dnssec.js";
import { deserializeAnalysis } from "../analysis-store.js";
import { parseAnalysisDocument } from "../loader.js";
import { createQueryKey, formatQueryKey, parseQueryKey } from "../query-key.js";

function schemaError(fn: () => unknown): SchemaError {
  try {
    fn();
  } catch (error) {
    if (error instanceof SchemaError) return error;
    throw error;
  }
  throw new Error("expected a SchemaError");
}

describe("query keys", () => {
  it("round-trips the text form", () => {
    const key = parseQueryKey("Example.COM./IN/aaaa");
    expect(key.rrtype).toBe(RRType.AAAA);
    expect(formatQueryKey(key)).toBe("example.com./IN/AAAA");
    expect(formatQueryKey(parseQueryKey("example.com./MX"))).toBe("example.com./IN/MX");
  });

  it("rejects other classes and shapes", () => {
    expect(() => parseQueryKey("example.com./CH/TXT")).toThrow(SchemaError);
    expect(() => parseQueryKey("example.com.")).toThrow(SchemaError);
    expect(() => parseQueryKey("example.com./IN/NOPE")).toThrow(SchemaError);
  });
});

describe("parseAnalysisDocument", () => {
  it("parses JSON and YAML", () => {
    expect(parseAnalysisDocument('{"example.": {"zone": true}}')).toEqual({ "example.": { zone: true } });
    expect(parseAnalysisDocument("example.:\n  zone: true\n", "yaml")).toEqual({ "example.": { zone: true } });
  });

  it("rejects syntax errors and non-mappings", () => {
    expect(() => parseAnalysisDocument("{")).toThrow(MalformedInputError);
    expect(() => parseAnalysisDocument("[1, 2]")).toThrow("Input document must be a mapping of names to analysis blocks");
  });
});

describe("deserializeAnalysis", () => {
  it("links the delegation chain through parent references", () => {
    const { document } = buildChain();
    const store = deserializeAnalysis("WWW.example", document);

    expect(store.name.toString()).toBe("www.example.");
    expect(store.blocks.map((b) => b.name.toString())).toEqual([".", "example.", "www.example."]);
    expect(store.root.parent?.name.toString()).toBe("example.");
    expect(store.root.parent?.parent?.isZone).toBe(true);
    expect(store.referenceTime?.toISOString()).toBe("2026-01-01T00:00:00.000Z");
    expect(store.queryKeys().map(formatQueryKey)).toEqual(["www.example./IN/A", "www.example./IN/AAAA"]);
  });

  it("converts RRsets, signatures and negative responses", () => {
    const { document, childKey } = buildChain();
    const store = deserializeAnalysis("www.example.", document);
    const answer = store.getQuery(createQueryKey(store.name, RRType.A))?.answer[0];
    const nodata = store.getQuery(createQueryKey(store.name, RRType.AAAA))?.negative[0];

    expect(answer?.rdata).toEqual(["192.0.2.1"]);
    expect(answer?.servers).toEqual(["192.0.2.53"]);
    expect(answer?.rrsigs[0]?.keyTag).toBe(childKey.record.keyTag);
    expect(answer?.rrsigs[0]?.signer.toString()).toBe("example.");
    expect(nodata?.kind).toBe("nodata");
    expect(nodata?.proof[0]?.rrtype).toBe(RRType.NSEC);
  });

  it("finds the zone serving each type", () => {
    const store = deserializeAnalysis("www.example.", buildChain().document);
    const example = store.getBlock(DomainName.parse("example."));
    if (!example) throw new Error("missing example. block");

    expect(store.zoneOf(store.root, RRType.A)?.name.toString()).toBe("example.");
    expect(store.zoneOf(example, RRType.DNSKEY)?.name.toString()).toBe("example.");
    expect(store.zoneOf(example, RRType.DS)?.name.toString()).toBe(".");
  });

  it("reads compact signature times", () => {
    const document = {
      "example.": {
        queries: {
          "example./IN/A": {
            answer: [
              {
                name: "example.",
                type: "A",
                ttl: 60,
                rdata: ["192.0.2.7"],
                rrsigs: [
                  {
                    covered: "A",
                    algorithm: 15,
                    labels: 1,
                    original_ttl: 60,
                    expiration: "20300101000000",
                    inception: 1704067200,
                    key_tag: 1,
                    signer: "example.",
                    signature: "AAAA",
                  },
                ],
              },
            ],
          },
        },
      },
    };

    const store = deserializeAnalysis("example.", document);
    expect(store.root.queries.get("example./IN/A")?.answer[0]?.rrsigs[0]?.expiration).toBe(1893456000);
  });

  it("reports a requested name the document lacks", () => {
    expect(() => deserializeAnalysis("absent.example.", buildChain().document)).toThrow(
      "No analysis for absent.example. in input document"
    );
  });

  it("points at the offending field of a malformed block", () => {
    const error = schemaError(() =>
      deserializeAnalysis("example.", { "example.": { queries: { "example./IN/A": { answer: [{ name: "example." }] } } } })
    );
    expect(error.path).toBe('"example.".queries.example./IN/A.answer[0].type');
  });

  it("reports an unknown record type with its location", () => {
    const error = schemaError(() =>
      deserializeAnalysis("example.", {
        "example.": { queries: { "example./IN/A": { answer: [{ name: "example.", type: "BOGUS", ttl: 1, rdata: ["x"] }] } } },
      })
    );
    expect(error.message).toBe('Unknown record type "BOGUS"');
    expect(error.path).toBe('"example.".queries.example./IN/A.answer[0].type');
  });

  it("detects parent reference cycles", () => {
    const error = schemaError(() =>
      deserializeAnalysis("a.", { "a.": { zone: true, parent: "b." }, "b.": { zone: true, parent: "a." } })
    );
    expect(error.code).toBe(ErrorCode.INPUT_REFERENCE_CYCLE);
  });

  it("tolerates a parent that is absent from the document", () => {
    const store = deserializeAnalysis("a.example.", { "a.example.": { zone: true, parent: "example." } });
    expect(store.root.parent).toBeUndefined();
  });
});
