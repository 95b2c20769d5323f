import type { GridGraph } from "../model.js";
import type { GraphComputationCache } from "../cache.js";
import { betweennessCentrality } from "./brandes.js";
import { compareIds } from "./components.js";
import { type WeightMode, singleSourceDistances } from "./dijkstra.js";

export type CentralityMetric = "degree" | "closeness" | "betweenness" | "eigenvector";

export interface CentralityOptions {
  /** Edge pricing for the distance based metrics (closeness, betweenness). */
  readonly weight?: WeightMode;
  /** Only used by betweenness, see {@link betweennessCentrality}. */
  readonly normalise?: boolean;
  readonly maxIterations?: number;
  readonly tolerance?: number;
  /** Memoises results per graph fingerprint when provided. */
  readonly cache?: GraphComputationCache;
}

export interface CentralityResult {
  readonly metric: CentralityMetric;
  readonly scores: Map<string, number>;
  /** Power iterations performed (eigenvector only). */
  readonly iterations?: number;
  /** False when the iteration cap was hit before reaching the tolerance. */
  readonly converged?: boolean;
}

export interface RankedNode {
  readonly node: string;
  readonly score: number;
}

/** Degree divided by `n - 1`. Graphs with a single node score 0. */
export function degreeCentrality(graph: GridGraph): Map<string, number> {
  const n = graph.nodeCount;
  const scores = new Map<string, number>();
  for (let index = 0; index < n; index += 1) {
    const degree = graph.neighboursOf(index).length;
    scores.set(graph.nodeAt(index).id, n > 1 ? degree / (n - 1) : 0);
  }
  return scores;
}

/**
 * Closeness with the Wasserman-Faust correction: the inverse mean distance to
 * reachable nodes, scaled by the reachable share of the graph so isolated
 * islands do not look artificially central.
 */
export function closenessCentrality(graph: GridGraph, weight: WeightMode = "length"): Map<string, number> {
  const n = graph.nodeCount;
  const scores = new Map<string, number>();
  for (let source = 0; source < n; source += 1) {
    const { distances } = singleSourceDistances(graph, source, weight);
    let total = 0;
    let reachable = 0;
    for (const distance of distances) {
      if (Number.isFinite(distance)) {
        total += distance;
        reachable += 1;
      }
    }
    let score = 0;
    if (total > 0 && n > 1) {
      score = ((reachable - 1) / total) * ((reachable - 1) / (n - 1));
    }
    scores.set(graph.nodeAt(source).id, score);
  }
  return scores;
}

/**
 * Eigenvector centrality by power iteration on `A + I` (the identity shift
 * keeps bipartite networks such as radial feeders from oscillating). The
 * vector is L2-normalised after each step; iteration stops once the L1 change
 * drops below `n × tolerance` or the cap is reached.
 */
export function eigenvectorCentrality(
  graph: GridGraph,
  maxIterations = 100,
  tolerance = 1e-6,
): { scores: Map<string, number>; iterations: number; converged: boolean } {
  const n = graph.nodeCount;
  let current = new Float64Array(n).fill(n > 0 ? 1 / n : 0);
  let iterations = 0;
  let converged = n === 0;

  while (!converged && iterations < maxIterations) {
    iterations += 1;
    const next = Float64Array.from(current);
    for (let index = 0; index < n; index += 1) {
      for (const { node } of graph.neighboursOf(index)) {
        next[node] += current[index];
      }
    }
    let norm = 0;
    for (const value of next) {
      norm += value * value;
    }
    norm = Math.sqrt(norm) || 1;
    let change = 0;
    for (let index = 0; index < n; index += 1) {
      next[index] /= norm;
      change += Math.abs(next[index] - current[index]);
    }
    current = next;
    converged = change < n * tolerance;
  }

  const scores = new Map<string, number>();
  for (let index = 0; index < n; index += 1) {
    scores.set(graph.nodeAt(index).id, current[index]);
  }
  return { scores, iterations, converged };
}

function computeCentrality(graph: GridGraph, metric: CentralityMetric, options: CentralityOptions): CentralityResult {
  switch (metric) {
    case "degree":
      return { metric, scores: degreeCentrality(graph) };
    case "closeness":
      return { metric, scores: closenessCentrality(graph, options.weight) };
    case "betweenness":
      return {
        metric,
        scores: betweennessCentrality(graph, { weight: options.weight, normalise: options.normalise }),
      };
    case "eigenvector": {
      const result = eigenvectorCentrality(graph, options.maxIterations, options.tolerance);
      return { metric, scores: result.scores, iterations: result.iterations, converged: result.converged };
    }
  }
}

/**
 * Computes one centrality metric for every node. Higher scores flag nodes
 * whose loss disconnects or lengthens more of the network.
 */
export function centrality(graph: GridGraph, metric: CentralityMetric, options: CentralityOptions = {}): CentralityResult {
  const { cache, ...variant } = options;
  if (!cache) {
    return computeCentrality(graph, metric, options);
  }
  return cache.remember(graph.fingerprint(), `centrality:${metric}`, variant, () =>
    computeCentrality(graph, metric, options),
  );
}

/** Sorts scores descending, breaking ties by ascending node identifier. */
export function rankScores(scores: Map<string, number>, topN?: number): RankedNode[] {
  const ranked = Array.from(scores, ([node, score]) => ({ node, score })).sort(
    (a, b) => b.score - a.score || compareIds(a.node, b.node),
  );
  return topN === undefined ? ranked : ranked.slice(0, Math.max(0, topN));
}

/**
 * Single-point-of-failure candidates: the highest betweenness nodes. Paths are
 * priced in `repair` mode unless a weight is given, so flows reroute around
 * damaged segments.
 */
export function criticalNodes(graph: GridGraph, topN = 10, options: CentralityOptions = {}): RankedNode[] {
  const weighted = { ...options, weight: options.weight ?? "repair" };
  return rankScores(centrality(graph, "betweenness", weighted).scores, topN);
}
