/**
 * Render Module
 *
 * @module
 */

export { STATUS_COLORS, nodeLabel, toDot } from "./dot.js";
export { OUTPUT_FORMATS, inferOutputFormat, parseOutputFormat, type OutputFormat } from "./formats.js";
export { fillTemplate, graphViewData, renderHtml, type HtmlOptions } from "./html.js";
export { VizLayoutEngine } from "./layout.js";
export { SharpRasterizer, type SharpRasterizerOptions } from "./raster.js";
export { GraphRenderer, writeOutput, type GraphRendererOptions, type RenderedGraph } from "./renderer.js";
