import { sortStringsBinary } from "../determinism/CanonicalOrder.js";
import { edgeKey, type BuildFlags, type Graph, type NodeID } from "../graph/types.js";

export interface GraphDiff {
  addedNodes: NodeID[];
  removedNodes: NodeID[];
  /** Edge keys, "from->to". */
  addedEdges: string[];
  removedEdges: string[];
}

function minus(a: Set<string>, b: Set<string>): string[] {
  const out: string[] = [];
  for (const x of a) if (!b.has(x)) out.push(x);
  return sortStringsBinary(out);
}

/**
 * Set differences of node ids and edge keys between two snapshots.
 * Meaningful only when both were built with the same flags and id scheme;
 * see `sameBuildFlags`. A mismatch is not corrected here.
 */
export function diffGraphs(from: Graph, to: Graph): GraphDiff {
  const fromNodes = new Set(from.nodes.map((n) => n.id));
  const toNodes = new Set(to.nodes.map((n) => n.id));
  const fromEdges = new Set(from.edges.map(edgeKey));
  const toEdges = new Set(to.edges.map(edgeKey));
  return {
    addedNodes: minus(toNodes, fromNodes),
    removedNodes: minus(fromNodes, toNodes),
    addedEdges: minus(toEdges, fromEdges),
    removedEdges: minus(fromEdges, toEdges),
  };
}

export function sameBuildFlags(a: Graph, b: Graph): boolean {
  if (a.idScheme !== b.idScheme) return false;
  const keys: (keyof BuildFlags)[] = ["includeSubTargets", "hideTransient", "augmented"];
  return keys.every((k) => a.flags[k] === b.flags[k]);
}

export function isEmptyDiff(d: GraphDiff): boolean {
  return (
    d.addedNodes.length === 0 &&
    d.removedNodes.length === 0 &&
    d.addedEdges.length === 0 &&
    d.removedEdges.length === 0
  );
}
