/**
 * Core module - Shared functionality between the CLI and library users
 */

// Re-export error classes
export * from "./errors.js";

// Re-export all core modules
export * from "./dns/index.js";
export * from "./analysis/index.js";
export * from "./trust/index.js";
export * from "./evaluation/index.js";
export * from "./graph/index.js";
export * from "./render/index.js";
export * from "./session/index.js";
export type { ILayoutEngine, IRasterizer, RasterFormat } from "./interfaces/index.js";

// Re-export types
export * from "../types/result.js";
