/**
 * authgraph
 *
 * Library entry point: deserialize collected DNS/DNSSEC analysis data,
 * evaluate it against trust anchors, and render the authentication graph.
 *
 * @example
 * ```typescript
 * import { parseAnalysisDocument, parseTrustAnchors, runGraphSession } from "dnssec-authgraph";
 *
 * const { rendered } = await runGraphSession({
 *   names: ["example.com"],
 *   document: parseAnalysisDocument(json),
 *   anchors: parseTrustAnchors(rootKeys),
 *   format: "svg",
 * });
 * ```
 *
 * @module
 */

export * from "./core/index.js";
export { AppConfigSchema, loadConfig, type AppConfig } from "./utils/index.js";
