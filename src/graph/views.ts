import type { Graph, GraphNode } from "./types.js";

/** Keeps matching nodes and only the edges whose endpoints both survive. */
export function filterGraph(graph: Graph, keep: (node: GraphNode) => boolean): Graph {
  const nodes = graph.nodes.filter(keep);
  const ids = new Set(nodes.map((n) => n.id));
  const edges = graph.edges.filter((e) => ids.has(e.from) && ids.has(e.to));
  return { ...graph, nodes, edges };
}

export function withoutTransient(graph: Graph): Graph {
  return filterGraph(graph, (n) => !n.isTransient);
}

/** Edges referencing an id that is not a node are dropped. */
export function dropDanglingEdges(graph: Graph): Graph {
  return filterGraph(graph, () => true);
}
