/**
 * Analysis Module
 *
 * Deserialization of collected DNS/DNSSEC data into Analysis Stores.
 *
 * @module
 */

export {
  AnalysisStore,
  deserializeAnalysis,
  type NameAnalysis,
  type NegativeKind,
  type NegativeResponse,
  type QueryResult,
  type ResourceRecordSet,
} from "./analysis-store.js";
export { parseAnalysisDocument, type InputSyntax } from "./loader.js";
export { createQueryKey, formatQueryKey, parseQueryKey, type QueryKey } from "./query-key.js";
export { AnalysisDocumentSchema, NameAnalysisSchema, type AnalysisDocument } from "./schema.js";
