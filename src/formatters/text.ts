/**
 * Plain text rendering: every node with its dependencies, then statistics.
 */

import { stringCompareBinary } from "../determinism/CanonicalOrder.js";
import type { Graph, GraphNode, NodeID, NodeKind } from "../graph/types.js";

const RULE = "═".repeat(70);
const THIN_RULE = "─".repeat(70);

export const KIND_MARKER: Record<NodeKind, string> = {
  container: "◆",
  subTarget: "▸",
  internalModule: "●",
  externalModule: "○",
};

export interface GraphStatistics {
  containers: number;
  subTargets: number;
  internalModules: number;
  externalModules: number;
  transient: number;
  /** Nodes with more than one dependent. */
  sharedDependencies: number;
  edges: number;
}

function byName(a: GraphNode, b: GraphNode): number {
  return stringCompareBinary(a.name, b.name) || stringCompareBinary(a.id, b.id);
}

export function graphStatistics(graph: Graph): GraphStatistics {
  const ids = new Set(graph.nodes.map((n) => n.id));
  const dependents = new Map<NodeID, number>();
  for (const e of graph.edges) {
    if (!ids.has(e.from) || !ids.has(e.to)) continue;
    dependents.set(e.to, (dependents.get(e.to) ?? 0) + 1);
  }
  const countKind = (kind: NodeKind): number => graph.nodes.filter((n) => n.kind === kind).length;
  return {
    containers: countKind("container"),
    subTargets: countKind("subTarget"),
    internalModules: countKind("internalModule"),
    externalModules: countKind("externalModule"),
    transient: graph.nodes.filter((n) => n.isTransient).length,
    sharedDependencies: [...dependents.values()].filter((c) => c > 1).length,
    edges: graph.edges.filter((e) => ids.has(e.from) && ids.has(e.to)).length,
  };
}

export function formatStatistics(stats: GraphStatistics): string[] {
  return [
    RULE,
    "STATISTICS",
    RULE,
    `Containers: ${stats.containers}`,
    `Sub-targets: ${stats.subTargets}`,
    `Internal modules: ${stats.internalModules}`,
    `External modules: ${stats.externalModules}`,
    `Transient: ${stats.transient}`,
    `Shared dependencies: ${stats.sharedDependencies}`,
    `Edges: ${stats.edges}`,
  ];
}

export function formatGraphText(graph: Graph): string {
  const byId = new Map(graph.nodes.map((n) => [n.id, n]));
  const deps = new Map<NodeID, GraphNode[]>();
  for (const e of graph.edges) {
    const target = byId.get(e.to);
    if (!target || !byId.has(e.from)) continue;
    const list = deps.get(e.from) ?? [];
    list.push(target);
    deps.set(e.from, list);
  }

  const lines: string[] = [THIN_RULE, "CONNECTIONS", THIN_RULE];
  for (const node of [...graph.nodes].sort(byName)) {
    const children = (deps.get(node.id) ?? []).sort(byName);
    if (children.length === 0) continue;
    lines.push(`${KIND_MARKER[node.kind]} ${node.name}`);
    children.forEach((child, i) => {
      const prefix = i === children.length - 1 ? "  └──▶" : "  ├──▶";
      const transient = child.isTransient ? " (transient)" : "";
      lines.push(`${prefix} ${child.name}${transient}`);
    });
  }

  lines.push("", ...formatStatistics(graphStatistics(graph)));
  return lines.join("\n");
}
