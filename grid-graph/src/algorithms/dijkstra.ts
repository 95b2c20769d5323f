import { GraphConstructionError, type GridEdge, type GridGraph } from "../model.js";

/**
 * How an edge is priced during traversal. `length` uses the physical length,
 * `repair` multiplies damaged segments by {@link DAMAGED_SEGMENT_FACTOR} so
 * routes avoid sections that need work first.
 */
export type WeightMode = "length" | "repair";

export const DAMAGED_SEGMENT_FACTOR = 10;

export interface ShortestPathOptions {
  readonly weight?: WeightMode;
}

/**
 * Raised (or returned) when two nodes live in different components. Callers
 * usually receive it inside a {@link ShortestPathResult} rather than as a
 * thrown exception.
 */
export class NoPathError extends Error {
  public readonly code = "E-GRAPH-NO-PATH";
  public readonly source: string;
  public readonly target: string;

  constructor(source: string, target: string) {
    super(`no path between '${source}' and '${target}'`);
    this.name = "NoPathError";
    this.source = source;
    this.target = target;
  }
}

export type ShortestPathResult =
  | { readonly found: true; readonly path: string[]; readonly distance: number }
  | { readonly found: false; readonly error: NoPathError };

export function edgeWeight(edge: GridEdge, mode: WeightMode = "length"): number {
  if (mode === "repair" && edge.kind === "segment" && edge.status === "damaged") {
    return edge.length * DAMAGED_SEGMENT_FACTOR;
  }
  return edge.length;
}

interface QueueEntry {
  node: number;
  priority: number;
}

export class MinHeap {
  private readonly data: QueueEntry[] = [];

  enqueue(entry: QueueEntry): void {
    this.data.push(entry);
    this.bubbleUp(this.data.length - 1);
  }

  dequeue(): QueueEntry | undefined {
    if (this.data.length === 0) {
      return undefined;
    }
    const min = this.data[0];
    const last = this.data.pop();
    if (last && this.data.length > 0) {
      this.data[0] = last;
      this.bubbleDown(0);
    }
    return min;
  }

  isEmpty(): boolean {
    return this.data.length === 0;
  }

  private bubbleUp(index: number): void {
    while (index > 0) {
      const parent = Math.floor((index - 1) / 2);
      if (this.data[parent].priority <= this.data[index].priority) {
        break;
      }
      [this.data[parent], this.data[index]] = [this.data[index], this.data[parent]];
      index = parent;
    }
  }

  private bubbleDown(index: number): void {
    const length = this.data.length;
    while (true) {
      let smallest = index;
      const left = 2 * index + 1;
      const right = 2 * index + 2;
      if (left < length && this.data[left].priority < this.data[smallest].priority) {
        smallest = left;
      }
      if (right < length && this.data[right].priority < this.data[smallest].priority) {
        smallest = right;
      }
      if (smallest === index) {
        break;
      }
      [this.data[index], this.data[smallest]] = [this.data[smallest], this.data[index]];
      index = smallest;
    }
  }
}

export interface SingleSourceResult {
  /** Distance per node index; unreachable nodes hold `Infinity`. */
  readonly distances: Float64Array;
  /** Predecessor per node index on one shortest path tree, -1 when none. */
  readonly previous: Int32Array;
}

/**
 * Runs Dijkstra from one node over the whole graph, or until `stopAt` is
 * settled when provided.
 */
export function singleSourceDistances(
  graph: GridGraph,
  source: number,
  mode: WeightMode = "length",
  stopAt?: number,
): SingleSourceResult {
  const distances = new Float64Array(graph.nodeCount).fill(Number.POSITIVE_INFINITY);
  const previous = new Int32Array(graph.nodeCount).fill(-1);
  const settled = new Uint8Array(graph.nodeCount);
  distances[source] = 0;

  const queue = new MinHeap();
  queue.enqueue({ node: source, priority: 0 });

  while (!queue.isEmpty()) {
    const current = queue.dequeue();
    if (!current || settled[current.node]) {
      continue;
    }
    settled[current.node] = 1;
    if (current.node === stopAt) {
      break;
    }
    for (const { node, edge } of graph.neighboursOf(current.node)) {
      const tentative = distances[current.node] + edgeWeight(graph.edgeAt(edge), mode);
      if (tentative < distances[node]) {
        distances[node] = tentative;
        previous[node] = current.node;
        queue.enqueue({ node, priority: tentative });
      }
    }
  }

  return { distances, previous };
}

function resolveIndex(graph: GridGraph, id: string, role: string): number {
  const index = graph.indexOf(id);
  if (index === undefined) {
    throw new GraphConstructionError(`Unknown ${role} node '${id}'`, "E-GRAPH-UNKNOWN-NODE", { nodeId: id });
  }
  return index;
}

/**
 * Shortest route between two nodes, minimising the summed edge weight.
 * Disconnected endpoints are reported through `found: false`.
 */
export function shortestPath(
  graph: GridGraph,
  source: string,
  target: string,
  options: ShortestPathOptions = {},
): ShortestPathResult {
  const start = resolveIndex(graph, source, "source");
  const goal = resolveIndex(graph, target, "target");
  const { distances, previous } = singleSourceDistances(graph, start, options.weight ?? "length", goal);

  const distance = distances[goal];
  if (!Number.isFinite(distance)) {
    return { found: false, error: new NoPathError(source, target) };
  }

  const path: string[] = [];
  let cursor = goal;
  while (cursor !== -1) {
    path.unshift(graph.nodeAt(cursor).id);
    cursor = previous[cursor];
  }
  return { found: true, path, distance };
}

/**
 * Sums the edge weights along an explicit node sequence. A sequence with
 * fewer than two nodes costs nothing; a hop without a joining edge throws
 * {@link NoPathError}.
 */
export function pathCost(graph: GridGraph, path: readonly string[], mode: WeightMode = "length"): number {
  let total = 0;
  for (let index = 0; index + 1 < path.length; index += 1) {
    const edge = graph.findEdge(path[index], path[index + 1]);
    if (!edge) {
      throw new NoPathError(path[index], path[index + 1]);
    }
    total += edgeWeight(edge, mode);
  }
  return total;
}
