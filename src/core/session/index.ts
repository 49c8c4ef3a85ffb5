/**
 * Session Module
 *
 * @module
 */

export {
  buildGraph,
  deserializeAll,
  outputFileFor,
  runGraphSession,
  summarizeStore,
  type BuiltGraph,
  type GraphBuildOptions,
  type GraphSessionOptions,
  type GraphSessionResult,
  type StoreSummary,
} from "./graph-session.js";
