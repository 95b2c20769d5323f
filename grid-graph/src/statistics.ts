import type { GridGraph, NodeKind } from "./model.js";
import { connectedComponents } from "./algorithms/components.js";
import { type WeightMode, shortestPath } from "./algorithms/dijkstra.js";

export interface NetworkStatistics {
  nodes: number;
  edges: number;
  isConnected: boolean;
  components: number;
  nodeKinds: Record<NodeKind, number>;
  /** Degree figures are `null` on an empty graph. */
  minDegree: number | null;
  avgDegree: number | null;
  maxDegree: number | null;
  totalLength: number;
  damagedSegments: number;
}

export function networkStatistics(graph: GridGraph): NetworkStatistics {
  const nodeKinds: Record<NodeKind, number> = { substation: 0, network_point: 0, building: 0 };
  let minDegree: number | null = null;
  let maxDegree: number | null = null;
  let degreeSum = 0;

  for (let index = 0; index < graph.nodeCount; index += 1) {
    nodeKinds[graph.nodeAt(index).kind] += 1;
    const degree = graph.neighboursOf(index).length;
    degreeSum += degree;
    minDegree = minDegree === null ? degree : Math.min(minDegree, degree);
    maxDegree = maxDegree === null ? degree : Math.max(maxDegree, degree);
  }

  let totalLength = 0;
  let damagedSegments = 0;
  for (const edge of graph.listEdges()) {
    totalLength += edge.length;
    if (edge.kind === "segment" && edge.status === "damaged") {
      damagedSegments += 1;
    }
  }

  const components = connectedComponents(graph).length;
  return {
    nodes: graph.nodeCount,
    edges: graph.edgeCount,
    // An empty graph is not considered connected.
    isConnected: components === 1,
    components,
    nodeKinds,
    minDegree,
    avgDegree: graph.nodeCount > 0 ? degreeSum / graph.nodeCount : null,
    maxDegree,
    totalLength,
    damagedSegments,
  };
}

export interface SubstationRoute {
  readonly substationId: string;
  readonly path: string[];
  readonly cost: number;
}

/**
 * Shortest route from a node to every reachable substation, cheapest first.
 * Unreachable substations are simply absent.
 */
export function pathsToSubstations(graph: GridGraph, nodeId: string, weight: WeightMode = "length"): SubstationRoute[] {
  const routes: SubstationRoute[] = [];
  for (const substation of graph.nodesOfKind("substation")) {
    const result = shortestPath(graph, nodeId, substation.id, { weight });
    if (result.found) {
      routes.push({ substationId: substation.id, path: result.path, cost: result.distance });
    }
  }
  return routes.sort((a, b) => a.cost - b.cost || (a.substationId < b.substationId ? -1 : 1));
}
