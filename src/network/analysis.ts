import {
  type CentralityMetric,
  type ConnectNearestReport,
  type DistanceFunction,
  type GraphComputationCache,
  type GridEdge,
  type GridGraph,
  type GridNode,
  type NetworkStatistics,
  type RankedNode,
  type WeightMode,
  buildGridGraph,
  centrality,
  connectNearest,
  connectedComponents,
  criticalNodes,
  networkStatistics,
  shortestPath,
} from "grid-graph";

import { createSilentLogger, type StructuredLogger } from "../logger.js";
import type {
  BuildingSiteRecord,
  NetworkPointRecord,
  SegmentRecord,
  SubstationRecord,
} from "../records/schemas.js";

/** Substations further than this from every network point stay detached. */
export const SUBSTATION_MAX_DISTANCE = 50;
/** Same limit for building service drops. */
export const BUILDING_MAX_DISTANCE = 100;

export interface NetworkInput {
  readonly segments: readonly SegmentRecord[];
  readonly networkPoints: readonly NetworkPointRecord[];
  readonly substations?: readonly SubstationRecord[];
  readonly buildingSites?: readonly BuildingSiteRecord[];
}

export interface BuildNetworkOptions {
  readonly substationMaxDistance?: number;
  readonly buildingMaxDistance?: number;
  readonly distance?: DistanceFunction;
  readonly logger?: StructuredLogger;
}

export interface BuiltNetwork {
  /** Frozen once the connections are in place. */
  readonly graph: GridGraph;
  readonly substationLinks: ConnectNearestReport;
  readonly buildingLinks: ConnectNearestReport;
}

/**
 * Assembles the topology: network points, substations and building sites as
 * nodes, segments as edges, then attaches substations and buildings to their
 * nearest network point. Dangling or negative segments abort the build.
 */
export function buildNetworkGraph(input: NetworkInput, options: BuildNetworkOptions = {}): BuiltNetwork {
  const logger = options.logger ?? createSilentLogger();

  const nodes: GridNode[] = [
    ...input.networkPoints.map((point): GridNode => ({ id: point.id, kind: "network_point", position: point.position })),
    ...(input.substations ?? []).map(
      (substation): GridNode => ({
        id: substation.id,
        kind: "substation",
        position: substation.position,
        ...(substation.capacity !== undefined ? { capacity: substation.capacity } : {}),
        ...(substation.name !== undefined ? { name: substation.name } : {}),
      }),
    ),
    ...(input.buildingSites ?? []).map(
      (site): GridNode => ({
        id: site.id,
        kind: "building",
        position: site.position,
        inhabitants: site.inhabitants,
        connected: site.connected,
      }),
    ),
  ];
  const edges: GridEdge[] = input.segments.map((segment) => ({
    from: segment.endpoint_a,
    to: segment.endpoint_b,
    length: segment.length,
    kind: "segment",
    status: segment.status,
    sourceId: segment.id,
    ...(segment.capacity !== undefined ? { capacity: segment.capacity } : {}),
  }));

  const graph = buildGridGraph(nodes, edges);
  const substationLinks = connectNearest(graph, {
    kind: "substation",
    maxDistance: options.substationMaxDistance ?? SUBSTATION_MAX_DISTANCE,
    ...(options.distance ? { distance: options.distance } : {}),
  });
  const buildingLinks = connectNearest(graph, {
    kind: "building",
    maxDistance: options.buildingMaxDistance ?? BUILDING_MAX_DISTANCE,
    ...(options.distance ? { distance: options.distance } : {}),
  });
  graph.freeze();

  logger.info("graph_built", {
    nodes: graph.nodeCount,
    edges: graph.edgeCount,
    substations_connected: substationLinks.connected.length,
    buildings_connected: buildingLinks.connected.length,
    buildings_unconnected: buildingLinks.unconnected.length,
  });
  if (buildingLinks.unconnected.length > 0) {
    logger.warn("graph_buildings_unconnected", { buildings: buildingLinks.unconnected });
  }

  return { graph, substationLinks, buildingLinks };
}

export interface RouteQuery {
  readonly source: string;
  readonly target: string;
}

export type RouteReport =
  | { source: string; target: string; found: true; path: string[]; distance: number }
  | { source: string; target: string; found: false; reason: string };

export interface GraphMetricsReport {
  nodeCount: number;
  edgeCount: number;
  componentCount: number;
  components: string[][];
  statistics: NetworkStatistics;
  centrality: {
    metric: CentralityMetric;
    /** Node identifier to score, keys in ascending order. */
    scores: Record<string, number>;
    iterations?: number;
    converged?: boolean;
  };
  criticalNodes: RankedNode[];
  route: RouteReport | null;
}

export interface AnalyseNetworkOptions {
  readonly metric?: CentralityMetric;
  /** Pricing for the centrality metric and the route. */
  readonly weight?: WeightMode;
  /** Pricing for the critical node ranking; damaged segments count ×10 by default. */
  readonly criticalWeight?: WeightMode;
  /** Number of critical nodes reported. */
  readonly topN?: number;
  readonly route?: RouteQuery;
  readonly cache?: GraphComputationCache;
  readonly logger?: StructuredLogger;
}

function sortedRecord(scores: Map<string, number>): Record<string, number> {
  const keys = Array.from(scores.keys()).sort((a, b) => (a < b ? -1 : a > b ? 1 : 0));
  const record: Record<string, number> = {};
  for (const key of keys) {
    record[key] = scores.get(key) ?? 0;
  }
  return record;
}

/** Connectivity, criticality and an optional route for an assembled network. */
export function analyseNetwork(graph: GridGraph, options: AnalyseNetworkOptions = {}): GraphMetricsReport {
  const logger = options.logger ?? createSilentLogger();
  const metric = options.metric ?? "betweenness";
  const weight = options.weight ?? "length";
  const cache = options.cache ? { cache: options.cache } : {};

  const components = connectedComponents(graph);
  const result = centrality(graph, metric, { weight, ...cache });
  const critical = criticalNodes(graph, options.topN ?? 10, { weight: options.criticalWeight ?? "repair", ...cache });

  let route: RouteReport | null = null;
  if (options.route) {
    const { source, target } = options.route;
    const found = shortestPath(graph, source, target, { weight });
    route = found.found
      ? { source, target, found: true, path: found.path, distance: found.distance }
      : { source, target, found: false, reason: found.error.message };
    if (!found.found) {
      logger.warn("graph_route_missing", { source, target });
    }
  }

  logger.info("graph_analysed", {
    metric,
    components: components.length,
    critical_nodes: critical.map((entry) => entry.node),
  });

  return {
    nodeCount: graph.nodeCount,
    edgeCount: graph.edgeCount,
    componentCount: components.length,
    components,
    statistics: networkStatistics(graph),
    centrality: {
      metric,
      scores: sortedRecord(result.scores),
      ...(result.iterations !== undefined ? { iterations: result.iterations } : {}),
      ...(result.converged !== undefined ? { converged: result.converged } : {}),
    },
    criticalNodes: critical,
    route,
  };
}
