/**
 * Graph Renderer
 *
 * Serializes a finalized authentication graph to one of the output formats,
 * either returning the bytes or writing them to a file (`-` for stdout).
 *
 * @module
 */

import * as fs from "node:fs/promises";
import * as path from "node:path";
import type { ILayoutEngine } from "../interfaces/ILayoutEngine.js";
import type { IRasterizer } from "../interfaces/IRasterizer.js";
import { ErrorCode, AuthGraphError, UnsupportedFormatError } from "../errors.js";
import type { AuthGraph } from "../graph/auth-graph.js";
import { createLogger } from "../../utils/logger.js";
import { toDot } from "./dot.js";
import type { OutputFormat } from "./formats.js";
import { renderHtml } from "./html.js";
import { VizLayoutEngine } from "./layout.js";
import { SharpRasterizer } from "./raster.js";

const logger = createLogger("render");

export interface RenderedGraph {
  format: OutputFormat;
  data: string | Buffer;
}

export interface GraphRendererOptions {
  layout?: ILayoutEngine;
  rasterizer?: IRasterizer;
  /** Asset base written into HTML output (default: "share") */
  assetBase?: string;
  templatePath?: string;
}

/**
 * @example
 * ```typescript
 * const renderer = new GraphRenderer({ assetBase: "/static" });
 * const { data } = await renderer.render(graph, "svg");
 * await renderer.render(graph, "png", "example.com.png");
 * ```
 */
export class GraphRenderer {
  private readonly layout: ILayoutEngine;
  private readonly rasterizer: IRasterizer;
  private readonly assetBase: string;
  private readonly templatePath?: string;

  constructor(options: GraphRendererOptions = {}) {
    this.layout = options.layout ?? new VizLayoutEngine();
    this.rasterizer = options.rasterizer ?? new SharpRasterizer();
    this.assetBase = options.assetBase ?? "share";
    this.templatePath = options.templatePath;
  }

  render(graph: AuthGraph, format: OutputFormat): Promise<RenderedGraph>;
  render(graph: AuthGraph, format: OutputFormat, target: string): Promise<void>;
  async render(graph: AuthGraph, format: OutputFormat, target?: string): Promise<RenderedGraph | void> {
    const data = await this.serialize(graph, format);
    logger.debug({ format, nodes: graph.nodeCount, edges: graph.edgeCount, target }, "Rendered graph");

    if (target === undefined) {
      return { format, data };
    }
    await writeOutput(target, data);
  }

  /**
   * @throws UnsupportedFormatError for a format outside OutputFormat, which
   * untyped callers can still pass
   */
  private async serialize(graph: AuthGraph, format: OutputFormat): Promise<string | Buffer> {
    const dot = toDot(graph);
    switch (format) {
      case "dot":
        return dot;
      case "svg":
        return this.layout.layout(dot);
      case "png":
      case "jpg":
        return this.rasterizer.rasterize(await this.layout.layout(dot), format);
      case "html":
        return renderHtml(graph, await this.layout.layout(dot), {
          assetBase: this.assetBase,
          templatePath: this.templatePath,
        });
      default: {
        const unknown: never = format;
        throw new UnsupportedFormatError(String(unknown));
      }
    }
  }
}

/**
 * Write rendered output to a file, or to stdout for `-`.
 */
export async function writeOutput(target: string, data: string | Buffer): Promise<void> {
  if (target === "-") {
    await new Promise<void>((resolve, reject) => {
      process.stdout.write(data, (error) => (error ? reject(error) : resolve()));
    });
    return;
  }

  try {
    await fs.mkdir(path.dirname(path.resolve(target)), { recursive: true });
    await fs.writeFile(target, data);
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new AuthGraphError(`Cannot write ${target}: ${reason}`, ErrorCode.FILE_SYSTEM_ERROR, { target });
  }
}
