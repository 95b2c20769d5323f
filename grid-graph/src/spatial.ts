import type { GridGraph, NodeKind, Position } from "./model.js";

export type DistanceFunction = (a: Position, b: Position) => number;

export const euclideanDistance: DistanceFunction = (a, b) => Math.hypot(a.x - b.x, a.y - b.y);

export interface NearestHit {
  readonly id: string;
  readonly distance: number;
}

/**
 * Nearest-neighbour lookup over network points. Production callers can back
 * this with an R-tree or a PostGIS query; the graph only needs the contract.
 */
export interface NearestNeighbourIndex {
  nearest(position: Position): NearestHit | undefined;
}

export interface IndexedPoint {
  readonly id: string;
  readonly position: Position;
}

/**
 * Reference index scanning every point. Ties resolve to the smallest
 * identifier so repeated runs connect buildings identically.
 */
export class LinearScanIndex implements NearestNeighbourIndex {
  private readonly points: IndexedPoint[];

  constructor(points: readonly IndexedPoint[], private readonly distance: DistanceFunction = euclideanDistance) {
    this.points = [...points];
  }

  nearest(position: Position): NearestHit | undefined {
    let best: NearestHit | undefined;
    for (const point of this.points) {
      const distance = this.distance(position, point.position);
      if (!best || distance < best.distance || (distance === best.distance && point.id < best.id)) {
        best = { id: point.id, distance };
      }
    }
    return best;
  }
}

export interface ConnectNearestOptions {
  /** Connections are only created when the nearest point is strictly closer. */
  readonly maxDistance: number;
  /** Kind of node being attached. Defaults to buildings. */
  readonly kind?: Exclude<NodeKind, "network_point">;
  /** Restricts the sweep to these node identifiers. */
  readonly nodeIds?: readonly string[];
  readonly index?: NearestNeighbourIndex;
  /** Used to build the default {@link LinearScanIndex}. */
  readonly distance?: DistanceFunction;
}

export interface ConnectionLink {
  readonly nodeId: string;
  readonly networkPointId: string;
  readonly distance: number;
}

export interface ConnectNearestReport {
  readonly connected: ConnectionLink[];
  /** Nodes left without a connection, either too far or with no candidate. */
  readonly unconnected: string[];
}

/**
 * Attaches every building (or substation) to its nearest network point with
 * a `connection` edge whose length is the measured distance. Nodes already
 * linked are skipped.
 */
export function connectNearest(graph: GridGraph, options: ConnectNearestOptions): ConnectNearestReport {
  const kind = options.kind ?? "building";
  const index =
    options.index ??
    new LinearScanIndex(
      graph.nodesOfKind("network_point").map((node) => ({ id: node.id, position: node.position })),
      options.distance,
    );
  const wanted = options.nodeIds ? new Set(options.nodeIds) : null;

  const connected: ConnectionLink[] = [];
  const unconnected: string[] = [];

  for (const node of graph.nodesOfKind(kind)) {
    if (wanted && !wanted.has(node.id)) {
      continue;
    }
    if (graph.isLinked(node.id)) {
      continue;
    }
    const hit = index.nearest(node.position);
    if (!hit || hit.distance >= options.maxDistance) {
      unconnected.push(node.id);
      continue;
    }
    graph.addEdge({ from: node.id, to: hit.id, length: hit.distance, kind: "connection" });
    connected.push({ nodeId: node.id, networkPointId: hit.id, distance: hit.distance });
  }

  return { connected, unconnected };
}
