import { stringCompareBinary } from "../determinism/CanonicalOrder.js";
import type { Edge, NodeID } from "../graph/types.js";

export interface ComponentIndex {
  /** Members of each component, binary-sorted; components ordered by their first member. */
  components: NodeID[][];
  componentOf: Map<NodeID, number>;
}

interface Frame {
  v: number;
  next: number;
}

/**
 * Strongly connected components (Tarjan), every node included, singletons too.
 * Edges touching an unknown id are ignored. Iterative, so deep chains cannot
 * overflow the call stack.
 * Deterministic: same graph produces same component order and member order.
 */
export function stronglyConnectedComponents(nodeIds: NodeID[], edges: Edge[]): ComponentIndex {
  const nodes = [...new Set(nodeIds)].sort(stringCompareBinary);
  const indexByNode = new Map<NodeID, number>();
  nodes.forEach((n, i) => indexByNode.set(n, i));

  const outEdges = nodes.map((): number[] => []);
  for (const e of edges) {
    const fromIdx = indexByNode.get(e.from);
    const toIdx = indexByNode.get(e.to);
    if (fromIdx != null && toIdx != null && fromIdx !== toIdx) {
      outEdges[fromIdx].push(toIdx);
    }
  }

  let indexCounter = 0;
  const index = new Array<number>(nodes.length).fill(-1);
  const lowlink = new Array<number>(nodes.length).fill(-1);
  const onStack = new Array<boolean>(nodes.length).fill(false);
  const stack: number[] = [];
  const sccs: number[][] = [];

  const visit = (v: number, callStack: Frame[]): void => {
    index[v] = indexCounter;
    lowlink[v] = indexCounter;
    indexCounter++;
    stack.push(v);
    onStack[v] = true;
    callStack.push({ v, next: 0 });
  };

  for (let root = 0; root < nodes.length; root++) {
    if (index[root] !== -1) continue;
    const callStack: Frame[] = [];
    visit(root, callStack);

    while (callStack.length > 0) {
      const frame = callStack[callStack.length - 1];
      const v = frame.v;

      if (frame.next < outEdges[v].length) {
        const w = outEdges[v][frame.next++];
        if (index[w] === -1) {
          visit(w, callStack);
        } else if (onStack[w]) {
          lowlink[v] = Math.min(lowlink[v], index[w]);
        }
        continue;
      }

      callStack.pop();
      if (lowlink[v] === index[v]) {
        const scc: number[] = [];
        let w: number | undefined;
        do {
          w = stack.pop();
          if (w === undefined) break;
          onStack[w] = false;
          scc.push(w);
        } while (w !== v);
        scc.sort((a, b) => a - b);
        sccs.push(scc);
      }
      const parent = callStack[callStack.length - 1];
      if (parent) {
        lowlink[parent.v] = Math.min(lowlink[parent.v], lowlink[v]);
      }
    }
  }

  sccs.sort((a, b) => a[0] - b[0]);

  const components = sccs.map((scc) => scc.map((i) => nodes[i]));
  const componentOf = new Map<NodeID, number>();
  components.forEach((members, c) => {
    for (const id of members) componentOf.set(id, c);
  });
  return { components, componentOf };
}

/** Components with more than one member, i.e. the dependency cycles. */
export function detectCycles(nodeIds: NodeID[], edges: Edge[]): NodeID[][] {
  return stronglyConnectedComponents(nodeIds, edges).components.filter((c) => c.length > 1);
}
