/**
 * IRasterizer - SVG to bitmap conversion interface
 *
 * @module
 */

export type RasterFormat = "png" | "jpg";

export interface IRasterizer {
  /**
   * Convert an SVG document to a PNG or JPEG image
   * @throws RenderError if the image cannot be produced
   */
  rasterize(svg: string, format: RasterFormat): Promise<Buffer>;
}
