/**
 * Interactive HTML output: the laid-out SVG plus node and edge metadata,
 * dropped into a page template that loads the viewer script and stylesheet
 * from a configurable asset base.
 *
 * @module
 */

import * as fs from "node:fs/promises";
import { fileURLToPath } from "node:url";
import { ErrorCode, RenderError } from "../errors.js";
import type { AuthGraph } from "../graph/auth-graph.js";
import { nodeLabel } from "./dot.js";

export const DEFAULT_TEMPLATE_PATH = fileURLToPath(new URL("../../../templates/auth-graph.html", import.meta.url));

export const ASSET_BASE_PLACEHOLDER = "{{ASSET_BASE}}";
export const GRAPH_SCRIPT_PLACEHOLDER = "{{GRAPH_SCRIPT}}";

export interface HtmlOptions {
  /** Base path or URL of `js/auth-graph.js` and `css/auth-graph.css` */
  assetBase: string;
  templatePath?: string;
}

export interface GraphViewData {
  svg: string;
  nodes: Array<{
    id: string;
    kind: string;
    status: string;
    label: string[];
    zone?: string;
    servers: string[];
    queries: string[];
  }>;
  edges: Array<{
    id: string;
    kind: string;
    from: string;
    to: string;
    status: string;
    detail?: string;
  }>;
}

export function graphViewData(graph: AuthGraph, svg: string): GraphViewData {
  return {
    svg,
    nodes: graph.nodes.map((node) => ({
      id: node.id,
      kind: node.kind,
      status: node.status,
      label: nodeLabel(node),
      zone: node.zone,
      servers: [...node.servers],
      queries: [...node.queries],
    })),
    edges: graph.edges.map((edge) => ({
      id: edge.id,
      kind: edge.kind,
      from: edge.from,
      to: edge.to,
      status: edge.status,
      detail: edge.detail,
    })),
  };
}

/** JSON that is safe inside an inline `<script>` element */
export function scriptJson(value: unknown): string {
  return JSON.stringify(value)
    .replace(/</g, "\\u003c")
    .replace(/>/g, "\\u003e")
    .replace(/\u2028/g, "\\u2028")
    .replace(/\u2029/g, "\\u2029");
}

function escapeAttribute(value: string): string {
  return value.replace(/&/g, "&amp;").replace(/"/g, "&quot;").replace(/</g, "&lt;").replace(/>/g, "&gt;");
}

export function graphScript(data: GraphViewData): string {
  return `AuthGraphView.mount(document.getElementById("auth-graph"), ${scriptJson(data)});`;
}

/**
 * Substitute both placeholders. Every occurrence is replaced; the template
 * is otherwise left as is.
 */
export function fillTemplate(template: string, assetBase: string, script: string): string {
  return template
    .split(ASSET_BASE_PLACEHOLDER)
    .join(escapeAttribute(assetBase.replace(/\/+$/, "")))
    .split(GRAPH_SCRIPT_PLACEHOLDER)
    .join(script);
}

export async function loadTemplate(templatePath: string = DEFAULT_TEMPLATE_PATH): Promise<string> {
  try {
    return await fs.readFile(templatePath, "utf8");
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new RenderError(`Cannot read HTML template ${templatePath}: ${reason}`, ErrorCode.RENDER_TEMPLATE_MISSING, {
      templatePath,
    });
  }
}

export async function renderHtml(graph: AuthGraph, svg: string, options: HtmlOptions): Promise<string> {
  const template = await loadTemplate(options.templatePath);
  return fillTemplate(template, options.assetBase, graphScript(graphViewData(graph, svg)));
}
