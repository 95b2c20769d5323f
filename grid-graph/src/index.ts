export * from "./model.js";
export * from "./cache.js";
export * from "./spatial.js";
export * from "./statistics.js";
export * from "./algorithms/dijkstra.js";
export * from "./algorithms/components.js";
export * from "./algorithms/brandes.js";
export * from "./algorithms/centrality.js";
