/**
 * Renderer Tests
 *
 * Layout and rasterization are replaced with in-process stand-ins; the HTML
 * template is the real one shipped in templates/.
 *
 * @module
 */

import { describe, it, expect, beforeEach, afterEach } from "vitest";
import * as fs from "node:fs/promises";
import * as os from "node:os";
import * as path from "node:path";
import { ErrorCode, RenderError, UnsupportedFormatError } from "../../errors.js";
import { AuthGraph } from "../../graph/auth-graph.js";
import type { ILayoutEngine } from "../../interfaces/ILayoutEngine.js";
import type { IRasterizer, RasterFormat } from "../../interfaces/IRasterizer.js";
import { inferOutputFormat, parseOutputFormat, type OutputFormat } from "../formats.js";
import { fillTemplate, loadTemplate, scriptJson } from "../html.js";
import { GraphRenderer, writeOutput } from "../renderer.js";

const SVG = '<svg id="g"/>';

class FakeLayout implements ILayoutEngine {
  readonly inputs: string[] = [];

  async layout(dot: string): Promise<string> {
    this.inputs.push(dot);
    return SVG;
  }
}

class FakeRasterizer implements IRasterizer {
  async rasterize(svg: string, format: RasterFormat): Promise<Buffer> {
    return Buffer.from(`${format}:${svg}`);
  }
}

function oneNodeGraph(): AuthGraph {
  const graph = new AuthGraph();
  graph.addNode({ id: "zone:.", kind: "zone", name: ".", status: "secure", zone: ".", servers: [], queries: [] });
  graph.markTrustApplied();
  return graph;
}

describe("output formats", () => {
  it("parses names and aliases case-insensitively", () => {
    expect(parseOutputFormat("SVG")).toBe("svg");
    expect(parseOutputFormat(" jpeg ")).toBe("jpg");
    expect(parseOutputFormat("gv")).toBe("dot");
  });

  it("rejects unknown formats", () => {
    expect(() => parseOutputFormat("pdf")).toThrow(UnsupportedFormatError);
    expect(() => parseOutputFormat("pdf")).toThrow("Unsupported output format: pdf");
  });

  it("infers a format from the file extension", () => {
    expect(inferOutputFormat("out/example.com.PNG")).toBe("png");
    expect(inferOutputFormat("graph.htm")).toBe("html");
    expect(inferOutputFormat("graph")).toBeUndefined();
  });

  it("rejects an extension that names no format", () => {
    expect(() => inferOutputFormat("graph.txt")).toThrow("Unsupported output format: txt");
  });
});

describe("GraphRenderer", () => {
  let layout: FakeLayout;
  let renderer: GraphRenderer;

  beforeEach(() => {
    layout = new FakeLayout();
    renderer = new GraphRenderer({ layout, rasterizer: new FakeRasterizer(), assetBase: "/static/" });
  });

  it("returns DOT text without laying out", async () => {
    const rendered = await renderer.render(oneNodeGraph(), "dot");
    expect(rendered.format).toBe("dot");
    expect(typeof rendered.data === "string" && rendered.data.startsWith("digraph {\n")).toBe(true);
    expect(layout.inputs).toEqual([]);
  });

  it("lays out the DOT text for svg", async () => {
    const rendered = await renderer.render(oneNodeGraph(), "svg");
    expect(rendered.data).toBe(SVG);
    expect(layout.inputs).toHaveLength(1);
  });

  it("rasterizes the laid out SVG for png and jpg", async () => {
    const png = await renderer.render(oneNodeGraph(), "png");
    const jpg = await renderer.render(oneNodeGraph(), "jpg");
    expect(png.data.toString()).toBe(`png:${SVG}`);
    expect(jpg.data.toString()).toBe(`jpg:${SVG}`);
  });

  it("rejects a format from untyped input", async () => {
    const format: OutputFormat = JSON.parse('"pdf"');
    await expect(renderer.render(oneNodeGraph(), format)).rejects.toThrow(UnsupportedFormatError);
    await expect(renderer.render(oneNodeGraph(), format)).rejects.toThrow("Unsupported output format: pdf");
    expect(layout.inputs).toEqual([]);
  });

  it("fills the HTML template with the asset base and graph data", async () => {
    const rendered = await renderer.render(oneNodeGraph(), "html");
    const html = rendered.data.toString();

    expect(html).toContain('<link rel="stylesheet" href="/static/css/auth-graph.css">');
    expect(html).toContain('<script src="/static/js/auth-graph.js"></script>');
    expect(html).toContain(
      'AuthGraphView.mount(document.getElementById("auth-graph"), {"svg":"\\u003csvg id=\\"g\\"/\\u003e","nodes":[{"id":"zone:.","kind":"zone","status":"secure","label":["."],"zone":".","servers":[],"queries":[]}],"edges":[]});'
    );
    expect(html).not.toContain("{{");
  });

  it("reports a missing template", async () => {
    const missing = new GraphRenderer({ layout, templatePath: path.join(os.tmpdir(), "no-such-template.html") });
    await expect(missing.render(oneNodeGraph(), "html")).rejects.toBeInstanceOf(RenderError);
    await expect(loadTemplate(path.join(os.tmpdir(), "no-such-template.html"))).rejects.toMatchObject({
      code: ErrorCode.RENDER_TEMPLATE_MISSING,
    });
  });
});

describe("html helpers", () => {
  it("replaces every placeholder and escapes the asset base", () => {
    const template = "{{ASSET_BASE}}/a {{ASSET_BASE}}/b <script>{{GRAPH_SCRIPT}}</script>";
    expect(fillTemplate(template, 'x"y/', "S")).toBe("x&quot;y/a x&quot;y/b <script>S</script>");
  });

  it("keeps script-closing text out of inline JSON", () => {
    expect(scriptJson({ text: "</script>" })).toBe('{"text":"\\u003c/script\\u003e"}');
  });
});

describe("writeOutput", () => {
  let tempDir: string;

  beforeEach(async () => {
    tempDir = await fs.mkdtemp(path.join(os.tmpdir(), "authgraph-render-"));
  });

  afterEach(async () => {
    await fs.rm(tempDir, { recursive: true, force: true });
  });

  it("creates missing directories", async () => {
    const target = path.join(tempDir, "nested", "graph.dot");
    await writeOutput(target, "digraph {}\n");
    expect(await fs.readFile(target, "utf8")).toBe("digraph {}\n");
  });

  it("writes rendered output to a target file", async () => {
    const renderer = new GraphRenderer({ layout: new FakeLayout(), rasterizer: new FakeRasterizer() });
    const target = path.join(tempDir, "graph.png");
    await renderer.render(oneNodeGraph(), "png", target);
    expect(await fs.readFile(target, "utf8")).toBe(`png:${SVG}`);
  });
});
