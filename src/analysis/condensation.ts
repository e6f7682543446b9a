import type { Edge, NodeID } from "../graph/types.js";
import { stronglyConnectedComponents } from "./stronglyConnected.js";

/**
 * The DAG formed by collapsing each strongly connected component into one
 * vertex. Vertex c stands for `components[c]`.
 */
export interface Condensation {
  components: NodeID[][];
  componentOf: Map<NodeID, number>;
  successors: number[][];
  predecessors: number[][];
}

export function condense(nodeIds: NodeID[], edges: Edge[]): Condensation {
  const { components, componentOf } = stronglyConnectedComponents(nodeIds, edges);
  const succ = components.map(() => new Set<number>());
  const pred = components.map(() => new Set<number>());

  for (const e of edges) {
    const a = componentOf.get(e.from);
    const b = componentOf.get(e.to);
    if (a === undefined || b === undefined || a === b) continue;
    succ[a].add(b);
    pred[b].add(a);
  }

  const sorted = (s: Set<number>): number[] => [...s].sort((x, y) => x - y);
  return {
    components,
    componentOf,
    successors: succ.map(sorted),
    predecessors: pred.map(sorted),
  };
}

/**
 * Longest path (in condensation edges) from each component down to a sink:
 * 0 without successors, else 1 + max over successors. Memoized, explicit stack.
 */
export function componentDepths(c: Condensation): number[] {
  const depth = new Array<number>(c.components.length).fill(-1);

  for (let start = 0; start < depth.length; start++) {
    if (depth[start] >= 0) continue;
    const stack = [start];
    while (stack.length > 0) {
      const top = stack[stack.length - 1];
      if (depth[top] >= 0) {
        stack.pop();
        continue;
      }
      let pending = false;
      for (const s of c.successors[top]) {
        if (depth[s] < 0) {
          stack.push(s);
          pending = true;
        }
      }
      if (pending) continue;
      stack.pop();
      let d = 0;
      for (const s of c.successors[top]) d = Math.max(d, depth[s] + 1);
      depth[top] = d;
    }
  }
  return depth;
}

/** Components reachable from `start` along `adjacency`, excluding `start` itself. Visited-set BFS. */
export function reachableComponents(adjacency: number[][], start: number): Set<number> {
  const seen = new Set<number>();
  const queue = [...adjacency[start]];
  for (let head = 0; head < queue.length; head++) {
    const c = queue[head];
    if (c === start || seen.has(c)) continue;
    seen.add(c);
    for (const next of adjacency[c]) {
      if (!seen.has(next)) queue.push(next);
    }
  }
  return seen;
}
