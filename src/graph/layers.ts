import { sortStringsBinary } from "../determinism/CanonicalOrder.js";
import type { Edge, Graph, NodeID } from "./types.js";

/**
 * Layer = BFS distance from the nearest root (a node nothing depends on).
 * Nodes only reachable through cycles get the smallest unreached id as an
 * extra root, so every node receives a layer.
 */
export function computeLayers(nodeIds: NodeID[], edges: Edge[]): Map<NodeID, number> {
  const ids = new Set(nodeIds);
  const out = new Map<NodeID, NodeID[]>();
  const hasIncoming = new Set<NodeID>();
  for (const id of ids) out.set(id, []);
  for (const e of edges) {
    if (e.from === e.to) continue;
    const list = out.get(e.from);
    if (!list || !ids.has(e.to)) continue;
    list.push(e.to);
    hasIncoming.add(e.to);
  }
  for (const [id, list] of out) out.set(id, sortStringsBinary(list));

  const sorted = sortStringsBinary(ids);
  const layers = new Map<NodeID, number>();

  const bfs = (roots: NodeID[]): void => {
    const queue: NodeID[] = [];
    for (const r of roots) {
      if (layers.has(r)) continue;
      layers.set(r, 0);
      queue.push(r);
    }
    for (let head = 0; head < queue.length; head++) {
      const id = queue[head];
      const layer = layers.get(id) ?? 0;
      for (const next of out.get(id) ?? []) {
        if (layers.has(next)) continue;
        layers.set(next, layer + 1);
        queue.push(next);
      }
    }
  };

  bfs(sorted.filter((id) => !hasIncoming.has(id)));
  for (const id of sorted) {
    if (!layers.has(id)) bfs([id]);
  }
  return layers;
}

/** Node ids grouped by layer, each group in binary order. */
export function nodesByLayer(graph: Graph): NodeID[][] {
  const layers: NodeID[][] = [];
  for (const node of graph.nodes) {
    while (layers.length <= node.layer) layers.push([]);
    layers[node.layer].push(node.id);
  }
  return layers.map((ids) => sortStringsBinary(ids));
}

/** Same graph with layers recomputed over its current nodes and edges. */
export function withLayers(graph: Graph): Graph {
  const layers = computeLayers(
    graph.nodes.map((n) => n.id),
    graph.edges,
  );
  return {
    ...graph,
    nodes: graph.nodes.map((n) => ({ ...n, layer: layers.get(n.id) ?? 0 })),
  };
}
