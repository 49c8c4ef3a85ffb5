/**
 * Status Evaluator Tests
 *
 * @module
 */

import { describe, it, expect } from "vitest";
import { deserializeAnalysis } from "../../analysis/analysis-store.js";
import { TrustAnchorSet, parseTrustAnchors } from "../../trust/trust-anchors.js";
import { buildChain, type ChainOptions } from "../../__tests__/fixtures/dnssec.js";
import { evaluateStore, signatureStatus, type StoreEvaluation } from "../status-evaluator.js";
import { mergeStatus, statusInZone, strength, weakest } from "../status.js";

function evaluate(options: ChainOptions = {}, anchored = true): StoreEvaluation {
  const chain = buildChain(options);
  const store = deserializeAnalysis("www.example.", chain.document);
  const anchors = anchored ? parseTrustAnchors(chain.anchors) : TrustAnchorSet.EMPTY;
  return evaluateStore(store, anchors);
}

function zoneStatus(evaluation: StoreEvaluation, name: string): string | undefined {
  return evaluation.zones.get(name)?.status;
}

function answerStatus(evaluation: StoreEvaluation): string | undefined {
  return evaluation.queries.get("www.example./IN/A")?.rrsets[0]?.status;
}

describe("status rules", () => {
  it("merges observations with bogus taking precedence", () => {
    expect(mergeStatus("secure", "bogus")).toBe("bogus");
    expect(mergeStatus("insecure", "secure")).toBe("secure");
    expect(mergeStatus("indeterminate", "insecure")).toBe("insecure");
  });

  it("orders path strength from bogus to secure", () => {
    expect(weakest("secure", "indeterminate")).toBe("indeterminate");
    expect(weakest("bogus", "indeterminate")).toBe("bogus");
    expect(strength("insecure")).toBeGreaterThan(strength("indeterminate"));
  });

  it("judges data in a secure zone by its items", () => {
    expect(statusInZone("secure", [])).toBe("bogus");
    expect(statusInZone("secure", ["indeterminate", "secure"])).toBe("secure");
    expect(statusInZone("secure", ["indeterminate", "secure"], true)).toBe("indeterminate");
    expect(statusInZone("secure", ["secure", "bogus"])).toBe("bogus");
    expect(statusInZone("insecure", ["bogus"])).toBe("insecure");
    expect(statusInZone(undefined, ["secure"])).toBe("indeterminate");
  });

  it("maps signature outcomes to edge statuses", () => {
    expect(signatureStatus("valid", "secure")).toBe("secure");
    expect(signatureStatus("expired", "secure")).toBe("bogus");
    expect(signatureStatus("missing-key", "secure")).toBe("indeterminate");
  });
});

describe("evaluateStore", () => {
  it("validates a signed chain from the root anchor", () => {
    const evaluation = evaluate();

    expect(evaluation.referenceTime.toISOString()).toBe("2026-01-01T00:00:00.000Z");
    expect([...evaluation.zones.keys()]).toEqual([".", "example."]);
    expect(evaluation.zones.get(".")?.reason).toBe("DNSKEY RRset signed by a trust anchor");
    expect(evaluation.zones.get("example.")?.reason).toBe("DS matches a key that signs the DNSKEY RRset");
    expect(zoneStatus(evaluation, "example.")).toBe("secure");
    expect(answerStatus(evaluation)).toBe("secure");

    const signature = evaluation.queries.get("www.example./IN/A")?.rrsets[0]?.signatures[0];
    expect(signature?.outcome).toBe("valid");
    expect(signature?.status).toBe("secure");

    const digest = evaluation.zones.get("example.")?.ds?.digests[0];
    expect(digest?.outcome).toBe("match");
    expect(digest?.status).toBe("secure");
  });

  it("marks the root key as anchored", () => {
    const evaluation = evaluate();
    expect(evaluation.zones.get(".")?.keys.map((k) => k.anchored)).toEqual([true]);
    expect(evaluation.zones.get("example.")?.keys.map((k) => k.anchored)).toEqual([false]);
  });

  it("proves a NODATA response with a signed NSEC", () => {
    const query = evaluate().queries.get("www.example./IN/AAAA");
    expect(query?.zone?.toString()).toBe("example.");
    expect(query?.negatives.map((n) => n.status)).toEqual(["secure"]);
  });

  it("makes a tampered answer bogus without touching the zones", () => {
    const evaluation = evaluate({ tamperAnswer: true });
    expect(answerStatus(evaluation)).toBe("bogus");
    expect(evaluation.queries.get("www.example./IN/A")?.rrsets[0]?.signatures[0]?.outcome).toBe("invalid-signature");
    expect(zoneStatus(evaluation, "example.")).toBe("secure");
  });

  it("treats an expired signature as bogus", () => {
    const evaluation = evaluate({ expiredAnswer: true });
    expect(evaluation.queries.get("www.example./IN/A")?.rrsets[0]?.signatures[0]?.outcome).toBe("expired");
    expect(answerStatus(evaluation)).toBe("bogus");
  });

  it("leaves everything indeterminate without trust anchors", () => {
    const evaluation = evaluate({}, false);
    expect(zoneStatus(evaluation, ".")).toBe("indeterminate");
    expect(zoneStatus(evaluation, "example.")).toBe("indeterminate");
    expect(answerStatus(evaluation)).toBe("indeterminate");
    // The signature verifies; only the trust is missing
    expect(evaluation.queries.get("www.example./IN/A")?.rrsets[0]?.signatures[0]?.outcome).toBe("valid");
  });

  it("makes a child insecure when the parent proves there is no DS", () => {
    const evaluation = evaluate({ delegation: "denied" });
    expect(zoneStatus(evaluation, "example.")).toBe("insecure");
    expect(evaluation.zones.get("example.")?.reason).toBe("parent proves there is no DS");
    expect(answerStatus(evaluation)).toBe("insecure");
  });

  it("makes a child bogus when the DS denial carries no proof", () => {
    const evaluation = evaluate({ delegation: "denied-without-proof" });
    expect(evaluation.zones.get("example.")?.dsDenial.map((n) => n.status)).toEqual(["bogus"]);
    expect(zoneStatus(evaluation, "example.")).toBe("bogus");
    expect(answerStatus(evaluation)).toBe("bogus");
  });

  it("makes a child bogus when the DS digest does not match", () => {
    const evaluation = evaluate({ delegation: "ds-mismatch" });
    const zone = evaluation.zones.get("example.");
    expect(zone?.ds?.digests.map((d) => d.outcome)).toEqual(["mismatch"]);
    expect(zone?.status).toBe("bogus");
    expect(zone?.reason).toBe("DS digest does not match its DNSKEY");
  });

  it("does not change the store between evaluations", () => {
    const chain = buildChain();
    const store = deserializeAnalysis("www.example.", chain.document);
    const first = evaluateStore(store, parseTrustAnchors(chain.anchors));
    const second = evaluateStore(store, TrustAnchorSet.EMPTY);
    const third = evaluateStore(store, parseTrustAnchors(chain.anchors));

    expect(first.zones.get("example.")?.status).toBe("secure");
    expect(second.zones.get("example.")?.status).toBe("indeterminate");
    expect(third.zones.get("example.")?.status).toBe("secure");
  });

  it("falls back to the given time when the analysis has none", () => {
    const chain = buildChain();
    const document = { ...chain.document };
    const block = document["www.example."];
    if (typeof block === "object" && block !== null) {
      document["www.example."] = { ...block, analysis_end: undefined };
    }
    const store = deserializeAnalysis("www.example.", document);
    const now = new Date("2025-06-01T00:00:00Z");

    expect(evaluateStore(store, TrustAnchorSet.EMPTY, { now }).referenceTime).toBe(now);
  });
});
