import { type GridEdge, type GridGraph, type GridNode, buildGridGraph } from "../src/index.js";

export function point(id: string, x = 0, y = 0): GridNode {
  return { id, kind: "network_point", position: { x, y } };
}

export function segment(from: string, to: string, length: number, status: "active" | "damaged" = "active"): GridEdge {
  return { from, to, length, kind: "segment", status };
}

/** A - B - C - D with unit lengths. */
export function buildPath(): GridGraph {
  return buildGridGraph(
    [point("A"), point("B"), point("C"), point("D")],
    [segment("A", "B", 1), segment("B", "C", 1), segment("C", "D", 1)],
  );
}
