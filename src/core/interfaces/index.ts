/**
 * Core Interfaces
 *
 * @module
 */

export type { ILayoutEngine } from "./ILayoutEngine.js";
export type { IRasterizer, RasterFormat } from "./IRasterizer.js";
