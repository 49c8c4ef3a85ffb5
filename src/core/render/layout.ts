/**
 * Graphviz layout via WebAssembly.
 *
 * @module
 */

import { instance } from "@viz-js/viz";
import type { ILayoutEngine } from "../interfaces/ILayoutEngine.js";
import { ErrorCode, RenderError } from "../errors.js";
import { createLogger } from "../../utils/logger.js";

const logger = createLogger("render");

type VizInstance = Awaited<ReturnType<typeof instance>>;

export class VizLayoutEngine implements ILayoutEngine {
  private viz: Promise<VizInstance> | null = null;

  /** Graphviz engine name, e.g. "dot" or "neato" */
  constructor(private readonly engine: string = "dot") {}

  private getInstance(): Promise<VizInstance> {
    if (!this.viz) {
      logger.debug("Loading Graphviz");
      this.viz = instance();
    }
    return this.viz;
  }

  async layout(dot: string): Promise<string> {
    const viz = await this.getInstance();
    try {
      return viz.renderString(dot, { format: "svg", engine: this.engine });
    } catch (error) {
      const reason = error instanceof Error ? error.message : String(error);
      throw new RenderError(`Graph layout failed: ${reason}`, ErrorCode.RENDER_LAYOUT_FAILED, {
        engine: this.engine,
      });
    }
  }
}
