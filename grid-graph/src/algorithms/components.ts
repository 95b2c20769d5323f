import type { GridGraph } from "../model.js";

export type ConnectedComponent = string[];

/**
 * Partitions the nodes into maximal connected sets with a breadth-first sweep.
 * Members are sorted ascending and components are ordered by their first
 * member so the output does not depend on insertion order.
 */
export function connectedComponents(graph: GridGraph): ConnectedComponent[] {
  const seen = new Uint8Array(graph.nodeCount);
  const components: ConnectedComponent[] = [];

  for (let start = 0; start < graph.nodeCount; start += 1) {
    if (seen[start]) {
      continue;
    }
    seen[start] = 1;
    const members: string[] = [];
    const queue: number[] = [start];
    for (let head = 0; head < queue.length; head += 1) {
      const current = queue[head];
      members.push(graph.nodeAt(current).id);
      for (const { node } of graph.neighboursOf(current)) {
        if (!seen[node]) {
          seen[node] = 1;
          queue.push(node);
        }
      }
    }
    members.sort(compareIds);
    components.push(members);
  }

  return components.sort((a, b) => compareIds(a[0], b[0]));
}

/** Maps every node to the position of its component in {@link connectedComponents}. */
export function componentMembership(components: readonly ConnectedComponent[]): Map<string, number> {
  const membership = new Map<string, number>();
  components.forEach((members, index) => {
    for (const id of members) {
      membership.set(id, index);
    }
  });
  return membership;
}

export function compareIds(a: string, b: string): number {
  return a < b ? -1 : a > b ? 1 : 0;
}
