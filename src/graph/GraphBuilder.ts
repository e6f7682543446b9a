import { sortEdges, sortNodes, stringCompareBinary } from "../determinism/CanonicalOrder.js";
import { withLayers } from "./layers.js";
import { mergeKind } from "./nodeKind.js";
import { edgeKey, type BuildFlags, type Edge, type Graph, type GraphNode, type IdScheme, type NodeID, type NodeKind } from "./types.js";

interface NodeState {
  id: NodeID;
  name: string;
  kind: NodeKind;
  isTransient: boolean;
}

/**
 * Accumulates nodes and edges. `addNode` and `addEdge` are the only mutation
 * surface, and both are idempotent and commutative:
 * - kind merges through the upgrade table (never regresses),
 * - isTransient only ever goes from true to false,
 * - the display name is the binary-smallest spelling seen,
 * - edges are a set; self loops are not recorded.
 * Any insertion order of the same observations yields the same graph.
 */
export class GraphBuilder {
  private readonly nodes = new Map<NodeID, NodeState>();
  private readonly edges = new Map<string, Edge>();

  addNode(id: NodeID, name: string, kind: NodeKind, isTransient: boolean): void {
    const existing = this.nodes.get(id);
    if (!existing) {
      this.nodes.set(id, { id, name, kind, isTransient });
      return;
    }
    existing.kind = mergeKind(existing.kind, kind);
    existing.isTransient = existing.isTransient && isTransient;
    if (stringCompareBinary(name, existing.name) < 0) existing.name = name;
  }

  addEdge(from: NodeID, to: NodeID): void {
    if (from === to) return;
    const edge = { from, to };
    const key = edgeKey(edge);
    if (!this.edges.has(key)) this.edges.set(key, edge);
  }

  /** Snapshot with layers assigned; nodes and edges in canonical order. */
  toGraph(idScheme: IdScheme, flags: BuildFlags): Graph {
    const nodes: GraphNode[] = [...this.nodes.values()].map((s) => ({
      id: s.id,
      name: s.name,
      kind: s.kind,
      isTransient: s.isTransient,
      layer: 0,
    }));
    return withLayers({
      nodes: sortNodes(nodes),
      edges: sortEdges([...this.edges.values()]),
      idScheme,
      flags: { ...flags },
    });
  }
}
