/**
 * SVG rasterization with sharp.
 *
 * @module
 */

import sharp from "sharp";
import type { IRasterizer, RasterFormat } from "../interfaces/IRasterizer.js";
import { ErrorCode, RenderError } from "../errors.js";

export interface SharpRasterizerOptions {
  /** Pixels per inch used to read the SVG (default: 96) */
  density?: number;
  /** Background JPEG output is flattened onto (default: white) */
  background?: string;
}

export class SharpRasterizer implements IRasterizer {
  private readonly options: Required<SharpRasterizerOptions>;

  constructor(options: SharpRasterizerOptions = {}) {
    this.options = {
      density: options.density ?? 96,
      background: options.background ?? "#ffffff",
    };
  }

  async rasterize(svg: string, format: RasterFormat): Promise<Buffer> {
    const image = sharp(Buffer.from(svg, "utf8"), { density: this.options.density });
    try {
      if (format === "jpg") {
        return await image.flatten({ background: this.options.background }).jpeg().toBuffer();
      }
      return await image.png().toBuffer();
    } catch (error) {
      const reason = error instanceof Error ? error.message : String(error);
      throw new RenderError(`Cannot rasterize graph as ${format}: ${reason}`, ErrorCode.RENDER_LAYOUT_FAILED);
    }
  }
}
