/**
 * Graph Session Tests
 *
 * @module
 */

import { describe, it, expect, beforeEach, afterEach } from "vitest";
import * as fs from "node:fs/promises";
import * as os from "node:os";
import * as path from "node:path";
import { deserializeAnalysis } from "../../analysis/analysis-store.js";
import { DomainName } from "../../dns/domain-name.js";
import { RRType } from "../../dns/rr-types.js";
import { ErrorCode, MalformedInputError } from "../../errors.js";
import { evaluateStore } from "../../evaluation/status-evaluator.js";
import type { ILayoutEngine } from "../../interfaces/ILayoutEngine.js";
import { GraphRenderer } from "../../render/renderer.js";
import { parseTrustAnchors, type TrustAnchorSet } from "../../trust/trust-anchors.js";
import {
  ANALYSIS_END,
  anchorFor,
  buildChain,
  keysWithSharedTag,
  signed,
  type Chain,
  type TestKey,
} from "../../__tests__/fixtures/dnssec.js";
import { dnskeyNodeId } from "../../graph/types.js";
import { buildGraph, deserializeAll, outputFileFor, runGraphSession, summarizeStore } from "../graph-session.js";

class StaticLayout implements ILayoutEngine {
  async layout(): Promise<string> {
    return "<svg/>";
  }
}

describe("graph session", () => {
  let chain: Chain;
  let anchors: TrustAnchorSet;
  let tempDir: string;
  const renderer = new GraphRenderer({ layout: new StaticLayout() });

  beforeEach(async () => {
    chain = buildChain();
    anchors = parseTrustAnchors(chain.anchors);
    tempDir = await fs.mkdtemp(path.join(os.tmpdir(), "authgraph-session-"));
  });

  afterEach(async () => {
    await fs.rm(tempDir, { recursive: true, force: true });
  });

  it("names per-name files after the domain", () => {
    expect(outputFileFor(DomainName.parse("WWW.Example."), "png", "out")).toBe(path.join("out", "www.example.png"));
    expect(outputFileFor(DomainName.ROOT, "dot")).toBe("root.dot");
  });

  it("deserializes each distinct name once", () => {
    const stores = deserializeAll(["www.example.", "WWW.EXAMPLE", "mail.example."], chain.document);
    expect(stores.map((s) => s.name.toString())).toEqual(["www.example.", "mail.example."]);
  });

  it("fails before rendering when a name is absent", async () => {
    const written: string[] = [];
    await expect(
      runGraphSession({
        names: ["www.example.", "absent.example."],
        document: chain.document,
        anchors,
        format: "dot",
        perName: true,
        outputDir: tempDir,
        renderer,
        onFileWritten: (_name, file) => written.push(file),
      })
    ).rejects.toMatchObject({ code: ErrorCode.INPUT_NAME_NOT_FOUND });

    expect(written).toEqual([]);
    expect(await fs.readdir(tempDir)).toEqual([]);
  });

  it("writes one independent graph per name", async () => {
    const result = await runGraphSession({
      names: ["www.example.", "mail.example."],
      document: chain.document,
      anchors,
      format: "dot",
      perName: true,
      outputDir: tempDir,
      renderer,
    });

    const www = path.join(tempDir, "www.example.dot");
    const mail = path.join(tempDir, "mail.example.dot");
    expect(result.files).toEqual([www, mail]);

    const wwwDot = await fs.readFile(www, "utf8");
    const mailDot = await fs.readFile(mail, "utf8");
    expect(wwwDot).toContain('"rrset:www.example./A"');
    expect(wwwDot).not.toContain("mail.example.");
    expect(mailDot).toContain('"rrset:mail.example./A"');
    expect(mailDot).not.toContain("www.example.");
  });

  it("merges all names into one combined graph", async () => {
    const result = await runGraphSession({
      names: ["www.example.", "mail.example."],
      document: chain.document,
      anchors,
      format: "dot",
      renderer,
    });

    expect(result.files).toEqual([]);
    const dot = result.rendered?.data.toString() ?? "";
    expect(dot).toContain('"rrset:www.example./A"');
    expect(dot).toContain('"rrset:mail.example./A"');
    expect(dot.match(/label="example\.";/g)).toHaveLength(1);
  });

  it("writes a combined graph to the output file", async () => {
    const file = path.join(tempDir, "combined.svg");
    const result = await runGraphSession({
      names: ["www.example."],
      document: chain.document,
      anchors,
      format: "svg",
      outputFile: file,
      renderer,
    });

    expect(result.files).toEqual([file]);
    expect(await fs.readFile(file, "utf8")).toBe("<svg/>");
  });

  it("restricts the graph to the requested types", () => {
    const evaluation = evaluateStore(deserializeAnalysis("www.example.", chain.document), anchors);
    const { graph } = buildGraph([evaluation], anchors, { rrTypes: [RRType.AAAA] });

    expect(graph.nodes.some((n) => n.kind === "nodata")).toBe(true);
    expect(graph.nodes.some((n) => n.kind === "rrset" && n.rrtype === "A")).toBe(false);
    expect(graph.trustApplied).toBe(true);
  });

  it("summarizes zone and response statuses", () => {
    const evaluation = evaluateStore(deserializeAnalysis("www.example.", chain.document), anchors);

    expect(summarizeStore(evaluation)).toEqual({
      name: "www.example.",
      referenceTime: "2026-01-01T00:00:00.000Z",
      zones: [
        { name: ".", status: "secure", reason: "DNSKEY RRset signed by a trust anchor" },
        { name: "example.", status: "secure", reason: "DS matches a key that signs the DNSKEY RRset" },
      ],
      queries: [
        {
          query: "www.example./IN/A",
          zone: "example.",
          rrsets: [{ name: "www.example.", type: "A", status: "secure" }],
          negatives: [],
        },
        {
          query: "www.example./IN/AAAA",
          zone: "example.",
          rrsets: [],
          negatives: [{ kind: "nodata", status: "secure" }],
        },
      ],
    });
  });

  describe("keys sharing a tag under different owners", () => {
    function zoneBlock(key: TestKey, address: string): Record<string, unknown> {
      const owner = key.zone.toString();
      return {
        zone: true,
        analysis_end: ANALYSIS_END,
        queries: {
          [`${owner}/IN/DNSKEY`]: {
            answer: [signed({ name: owner, type: "DNSKEY", ttl: 3600, rdata: [key.rdataText] }, [key])],
          },
          [`${owner}/IN/A`]: {
            answer: [signed({ name: owner, type: "A", ttl: 300, rdata: [address] }, [key])],
          },
        },
      };
    }

    const [first, second] = keysWithSharedTag("a.test.", "b.test.");
    const document = { "a.test.": zoneBlock(first, "192.0.2.10"), "b.test.": zoneBlock(second, "192.0.2.20") };
    const sharedAnchors = parseTrustAnchors([anchorFor(first), anchorFor(second)].join("\n"));
    const firstId = dnskeyNodeId(first.zone, 15, first.record.keyTag);
    const secondId = dnskeyNodeId(second.zone, 15, second.record.keyTag);

    it("keeps two DNSKEY nodes in a combined graph", () => {
      const evaluations = deserializeAll(["a.test.", "b.test."], document).map((s) => evaluateStore(s, sharedAnchors));
      const { graph } = buildGraph(evaluations, sharedAnchors);
      const keys = graph.nodes.filter((n) => n.kind === "dnskey");

      expect(first.record.keyTag).toBe(second.record.keyTag);
      expect(keys.map((n) => n.id).sort()).toEqual([firstId, secondId]);
      expect(graph.trustAnchors().map((n) => n.id).sort()).toEqual([firstId, secondId]);
    });

    it("keeps per-name outputs disjoint", async () => {
      await runGraphSession({
        names: ["a.test.", "b.test."],
        document,
        anchors: sharedAnchors,
        format: "dot",
        perName: true,
        outputDir: tempDir,
        renderer,
      });

      const firstDot = await fs.readFile(path.join(tempDir, "a.test.dot"), "utf8");
      const secondDot = await fs.readFile(path.join(tempDir, "b.test.dot"), "utf8");
      expect(firstDot).toContain(`"${firstId}"`);
      expect(firstDot).not.toContain("b.test.");
      expect(secondDot).toContain(`"${secondId}"`);
      expect(secondDot).not.toContain("a.test.");
    });
  });

  it("rejects an unknown name with the name in the error", () => {
    expect(() => deserializeAll(["absent.example."], chain.document)).toThrow(MalformedInputError);
  });
});
