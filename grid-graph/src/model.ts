import { createHash } from "node:crypto";

export type NodeKind = "substation" | "network_point" | "building";
export type EdgeKind = "segment" | "connection";
export type SegmentStatus = "active" | "damaged";

export interface Position {
  readonly x: number;
  readonly y: number;
}

interface NodeBase {
  readonly id: string;
  readonly position: Position;
}

export interface SubstationNode extends NodeBase {
  readonly kind: "substation";
  readonly capacity?: number;
  readonly name?: string;
}

export interface NetworkPointNode extends NodeBase {
  readonly kind: "network_point";
}

export interface BuildingNode extends NodeBase {
  readonly kind: "building";
  readonly inhabitants: number;
  readonly connected: boolean;
}

export type GridNode = SubstationNode | NetworkPointNode | BuildingNode;

export interface GridEdge {
  readonly from: string;
  readonly to: string;
  readonly length: number;
  readonly kind: EdgeKind;
  /** Only meaningful on segments; connections are always considered active. */
  readonly status?: SegmentStatus;
  readonly capacity?: number;
  /** Identifier of the source segment record, when the edge comes from one. */
  readonly sourceId?: string;
}

/** Neighbour entry stored in the adjacency lists. */
export interface Adjacent {
  readonly node: number;
  readonly edge: number;
}

/**
 * Error raised when the topology cannot be assembled. The {@link code} lets
 * callers distinguish dangling references from malformed lengths.
 */
export class GraphConstructionError extends Error {
  public readonly code: string;
  public readonly details?: unknown;

  constructor(message: string, code: string, details?: unknown) {
    super(message);
    this.name = "GraphConstructionError";
    this.code = code;
    this.details = details;
  }
}

/**
 * Undirected topology of the distribution network. Nodes are interned to
 * dense indices so algorithms can work on arrays; the public API still speaks
 * in node identifiers.
 */
export class GridGraph {
  private readonly nodeList: GridNode[] = [];
  private readonly edgeList: GridEdge[] = [];
  private readonly indexById = new Map<string, number>();
  private readonly adjacency: Adjacent[][] = [];
  private readonly pairs = new Set<string>();
  private frozen = false;
  private cachedFingerprint: string | null = null;

  addNode(node: GridNode): void {
    this.assertMutable();
    if (this.indexById.has(node.id)) {
      throw new GraphConstructionError(`duplicate node '${node.id}'`, "E-GRAPH-DUPLICATE-NODE", { nodeId: node.id });
    }
    this.indexById.set(node.id, this.nodeList.length);
    this.nodeList.push(node);
    this.adjacency.push([]);
    this.cachedFingerprint = null;
  }

  addEdge(edge: GridEdge): void {
    this.assertMutable();
    const from = this.indexById.get(edge.from);
    const to = this.indexById.get(edge.to);
    if (from === undefined || to === undefined) {
      const missing = from === undefined ? edge.from : edge.to;
      throw new GraphConstructionError(`edge ${edge.from} -- ${edge.to} references unknown node '${missing}'`, "E-GRAPH-UNKNOWN-NODE", {
        from: edge.from,
        to: edge.to,
        missing,
      });
    }
    if (!Number.isFinite(edge.length) || edge.length < 0) {
      throw new GraphConstructionError(`edge ${edge.from} -- ${edge.to} has invalid length ${edge.length}`, "E-GRAPH-NEGATIVE-LENGTH", {
        from: edge.from,
        to: edge.to,
        length: edge.length,
      });
    }
    if (from === to) {
      throw new GraphConstructionError(`self-loop on node '${edge.from}'`, "E-GRAPH-SELF-LOOP", { nodeId: edge.from });
    }
    const pairKey = pairKeyOf(edge.from, edge.to);
    if (this.pairs.has(pairKey)) {
      throw new GraphConstructionError(`duplicate edge ${edge.from} -- ${edge.to}`, "E-GRAPH-DUPLICATE-EDGE", {
        from: edge.from,
        to: edge.to,
      });
    }
    this.pairs.add(pairKey);
    const edgeIndex = this.edgeList.length;
    this.edgeList.push(edge);
    this.adjacency[from].push({ node: to, edge: edgeIndex });
    this.adjacency[to].push({ node: from, edge: edgeIndex });
    this.cachedFingerprint = null;
  }

  /** Prevents any further mutation. Analysis helpers expect a frozen graph. */
  freeze(): this {
    this.frozen = true;
    return this;
  }

  isFrozen(): boolean {
    return this.frozen;
  }

  get nodeCount(): number {
    return this.nodeList.length;
  }

  get edgeCount(): number {
    return this.edgeList.length;
  }

  getNode(id: string): GridNode | undefined {
    const index = this.indexById.get(id);
    return index === undefined ? undefined : this.nodeList[index];
  }

  indexOf(id: string): number | undefined {
    return this.indexById.get(id);
  }

  nodeAt(index: number): GridNode {
    return this.nodeList[index];
  }

  edgeAt(index: number): GridEdge {
    return this.edgeList[index];
  }

  neighboursOf(index: number): readonly Adjacent[] {
    return this.adjacency[index] ?? [];
  }

  /** Returns the edge joining both nodes, regardless of orientation. */
  findEdge(a: string, b: string): GridEdge | undefined {
    const from = this.indexById.get(a);
    const to = this.indexById.get(b);
    if (from === undefined || to === undefined) {
      return undefined;
    }
    const hit = this.adjacency[from].find((entry) => entry.node === to);
    return hit ? this.edgeList[hit.edge] : undefined;
  }

  degree(id: string): number {
    const index = this.indexById.get(id);
    return index === undefined ? 0 : this.adjacency[index].length;
  }

  listEdges(): GridEdge[] {
    return [...this.edgeList];
  }

  nodesOfKind<K extends NodeKind>(kind: K): Array<Extract<GridNode, { kind: K }>> {
    return this.nodeList.filter((node): node is Extract<GridNode, { kind: K }> => node.kind === kind);
  }

  /** True when at least one `connection` edge touches the node. */
  isLinked(id: string): boolean {
    const index = this.indexById.get(id);
    if (index === undefined) {
      return false;
    }
    return this.adjacency[index].some((entry) => this.edgeList[entry.edge].kind === "connection");
  }

  /**
   * SHA-256 digest of the graph content. Node and edge order do not matter;
   * any change to identifiers, kinds, lengths or statuses changes the digest.
   */
  fingerprint(): string {
    if (this.cachedFingerprint) {
      return this.cachedFingerprint;
    }
    const nodes = this.nodeList
      .map((node) => `${node.kind}:${node.id}@${node.position.x},${node.position.y}`)
      .sort();
    const edges = this.edgeList
      .map((edge) => {
        const [a, b] = edge.from < edge.to ? [edge.from, edge.to] : [edge.to, edge.from];
        return `${edge.kind}:${a}|${b}:${edge.length}:${edge.status ?? "active"}`;
      })
      .sort();
    const hash = createHash("sha256");
    hash.update(nodes.join("\n"));
    hash.update("\n--\n");
    hash.update(edges.join("\n"));
    this.cachedFingerprint = hash.digest("hex");
    return this.cachedFingerprint;
  }

  private assertMutable(): void {
    if (this.frozen) {
      throw new GraphConstructionError("graph is frozen", "E-GRAPH-FROZEN");
    }
  }
}

function pairKeyOf(a: string, b: string): string {
  return a < b ? `${a}\u0000${b}` : `${b}\u0000${a}`;
}

/**
 * Builds an undirected graph from node and edge lists. Construction is
 * all-or-nothing: the first malformed entry aborts with a
 * {@link GraphConstructionError}.
 */
export function buildGridGraph(nodes: readonly GridNode[], edges: readonly GridEdge[]): GridGraph {
  const graph = new GridGraph();
  for (const node of nodes) {
    graph.addNode(node);
  }
  for (const edge of edges) {
    graph.addEdge(edge);
  }
  return graph;
}
