/**
 * Graph Session
 *
 * Runs the whole pipeline for a set of requested names: deserialize every
 * store up front, evaluate, build, finalize, reduce and render. In combined
 * mode all names share one graph; in per-name mode each name gets a fresh
 * graph and its own output file, and nothing is carried from one name to the
 * next.
 *
 * @module
 */

import * as path from "node:path";
import { deserializeAnalysis, type AnalysisStore } from "../analysis/analysis-store.js";
import { formatQueryKey } from "../analysis/query-key.js";
import type { AnalysisDocument } from "../analysis/schema.js";
import { nameToFileStem, type DomainName } from "../dns/domain-name.js";
import { rrTypeToText } from "../dns/rr-types.js";
import { evaluateStore, type StoreEvaluation } from "../evaluation/status-evaluator.js";
import type { ValidationStatus } from "../evaluation/status.js";
import { AuthGraph } from "../graph/auth-graph.js";
import { AuthGraphBuilder, contributionKeys } from "../graph/builder.js";
import { GraphReducer } from "../graph/reducer.js";
import type { OutputFormat } from "../render/formats.js";
import { GraphRenderer, type RenderedGraph } from "../render/renderer.js";
import type { TrustAnchorSet } from "../trust/trust-anchors.js";
import { createLogger } from "../../utils/logger.js";

const logger = createLogger("session");

// =============================================================================
// Types
// =============================================================================

export interface GraphBuildOptions {
  /** Only graph queries of these RR types */
  rrTypes?: readonly number[];
  /** Keep redundant edges */
  showRedundant?: boolean;
  /** Reference time when the analysis carries none */
  now?: Date;
}

export interface GraphSessionOptions extends GraphBuildOptions {
  names: readonly string[];
  document: AnalysisDocument;
  anchors: TrustAnchorSet;
  format: OutputFormat;
  /**
   * Combined output file (`-` for stdout). Without one, combined output is
   * returned.
   */
  outputFile?: string;
  /** One output file per name, written to `outputDir` */
  perName?: boolean;
  outputDir?: string;
  renderer?: GraphRenderer;
  /** Called after each per-name file is written */
  onFileWritten?: (name: DomainName, file: string) => void;
}

export interface GraphSessionResult {
  /** Combined output, when no output file was given */
  rendered?: RenderedGraph;
  /** Files written, in name order */
  files: string[];
}

export interface BuiltGraph {
  graph: AuthGraph;
  /** Edges removed by reduction */
  removed: string[];
}

// =============================================================================
// Pipeline Steps
// =============================================================================

/**
 * Deserialize a store for every name, failing before any graph work if one
 * cannot be built. Repeated names are deserialized once.
 */
export function deserializeAll(names: readonly string[], document: AnalysisDocument): AnalysisStore[] {
  const stores = new Map<string, AnalysisStore>();
  for (const name of names) {
    const store = deserializeAnalysis(name, document);
    const id = store.name.toString();
    if (!stores.has(id)) stores.set(id, store);
  }
  return [...stores.values()];
}

/**
 * Build, finalize and (unless disabled) reduce one graph from the given
 * evaluations.
 */
export function buildGraph(
  evaluations: readonly StoreEvaluation[],
  anchors: TrustAnchorSet,
  options: GraphBuildOptions = {}
): BuiltGraph {
  const builder = new AuthGraphBuilder();
  const graph = new AuthGraph();

  for (const evaluation of evaluations) {
    for (const key of contributionKeys(evaluation.store, options.rrTypes)) {
      builder.contribute(graph, evaluation, key);
    }
  }
  builder.applyTrust(graph, anchors);

  const removed = options.showRedundant ? [] : new GraphReducer().reduce(graph).removed;
  return { graph, removed };
}

export function outputFileFor(name: DomainName, format: OutputFormat, outputDir = "."): string {
  return path.join(outputDir, `${nameToFileStem(name)}.${format}`);
}

// =============================================================================
// Session
// =============================================================================

export async function runGraphSession(options: GraphSessionOptions): Promise<GraphSessionResult> {
  const stores = deserializeAll(options.names, options.document);
  const renderer = options.renderer ?? new GraphRenderer();
  const evaluate = (store: AnalysisStore): StoreEvaluation =>
    evaluateStore(store, options.anchors, { now: options.now });

  if (options.perName) {
    const files: string[] = [];
    for (const store of stores) {
      const { graph, removed } = buildGraph([evaluate(store)], options.anchors, options);
      const file = outputFileFor(store.name, options.format, options.outputDir);
      await renderer.render(graph, options.format, file);
      logger.info(
        { name: store.name.toString(), file, nodes: graph.nodeCount, edges: graph.edgeCount, removed: removed.length },
        "Wrote graph"
      );
      options.onFileWritten?.(store.name, file);
      files.push(file);
    }
    return { files };
  }

  const { graph, removed } = buildGraph(stores.map(evaluate), options.anchors, options);
  logger.debug({ names: stores.length, nodes: graph.nodeCount, edges: graph.edgeCount, removed: removed.length }, "Built combined graph");

  if (options.outputFile === undefined) {
    return { rendered: await renderer.render(graph, options.format), files: [] };
  }
  await renderer.render(graph, options.format, options.outputFile);
  return { files: options.outputFile === "-" ? [] : [options.outputFile] };
}

// =============================================================================
// Summary
// =============================================================================

export interface StoreSummary {
  name: string;
  referenceTime: string;
  zones: Array<{ name: string; status: ValidationStatus; reason: string }>;
  queries: Array<{
    query: string;
    zone?: string;
    rrsets: Array<{ name: string; type: string; status: ValidationStatus }>;
    negatives: Array<{ kind: string; status: ValidationStatus }>;
  }>;
}

/**
 * Statuses of an evaluated store, zones from the top of the chain down.
 */
export function summarizeStore(evaluation: StoreEvaluation): StoreSummary {
  const zones = [...evaluation.zones.values()].sort((a, b) => a.name.depth - b.name.depth || a.name.compare(b.name));
  return {
    name: evaluation.store.name.toString(),
    referenceTime: evaluation.referenceTime.toISOString(),
    zones: zones.map((z) => ({ name: z.name.toString(), status: z.status, reason: z.reason })),
    queries: [...evaluation.queries.values()].map((q) => ({
      query: formatQueryKey(q.key),
      zone: q.zone?.toString(),
      rrsets: q.rrsets.map((r) => ({ name: r.rrset.name.toString(), type: rrTypeToText(r.rrset.rrtype), status: r.status })),
      negatives: q.negatives.map((n) => ({ kind: n.response.kind, status: n.status })),
    })),
  };
}
