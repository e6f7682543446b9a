/**
 * Canonical ordering: binary UTF-16 code unit ascending only.
 * NEVER use localeCompare (ids must sort the same on every machine).
 */

import type { Edge, GraphNode } from "../graph/types.js";

/** Binary string comparison (UTF-16 code unit ascending). Returns -1 | 0 | 1. */
export function stringCompareBinary(a: string, b: string): number {
  if (a < b) return -1;
  if (a > b) return 1;
  return 0;
}

export function sortStringsBinary(values: Iterable<string>): string[] {
  return [...values].sort(stringCompareBinary);
}

/** Sort nodes by id using binary order. */
export function sortNodes(nodes: GraphNode[]): GraphNode[] {
  return [...nodes].sort((a, b) => stringCompareBinary(a.id, b.id));
}

/** Sort edges by (from asc, to asc) using binary order. */
export function sortEdges(edges: Edge[]): Edge[] {
  return [...edges].sort((a, b) => {
    const fromCmp = stringCompareBinary(a.from, b.from);
    if (fromCmp !== 0) return fromCmp;
    return stringCompareBinary(a.to, b.to);
  });
}
