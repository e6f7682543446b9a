import type { Graph, GraphNode, NodeKind } from "../graph/types.js";

const FILL: Partial<Record<NodeKind, string>> = {
  container: "lightblue",
  subTarget: "lightgreen",
  internalModule: "lightyellow",
};

/** DOT identifiers are always quoted; backslashes and quotes escaped. */
export function escapeDotIdentifier(name: string): string {
  return `"${name.replace(/\\/g, "\\\\").replace(/"/g, '\\"')}"`;
}

function nodeAttributes(node: GraphNode): string {
  const attrs = [`label=${escapeDotIdentifier(node.name)}`];
  const fill = FILL[node.kind];
  const styles = ["rounded"];
  if (fill) styles.push("filled");
  if (node.isTransient) styles.push("dashed");
  if (styles.length > 1) attrs.push(`style="${styles.join(",")}"`);
  if (fill) attrs.push(`fillcolor="${fill}"`);
  return attrs.join(", ");
}

/** Graphviz rendering. Edges whose endpoint is not a node are left out. */
export function formatDot(graph: Graph): string {
  const ids = new Set(graph.nodes.map((n) => n.id));
  const lines = [
    "digraph DependencyGraph {",
    "  rankdir=TB;",
    "  node [shape=box, style=rounded];",
    "",
  ];
  for (const node of graph.nodes) {
    lines.push(`  ${escapeDotIdentifier(node.id)} [${nodeAttributes(node)}];`);
  }
  lines.push("");
  for (const e of graph.edges) {
    if (!ids.has(e.from) || !ids.has(e.to)) continue;
    lines.push(`  ${escapeDotIdentifier(e.from)} -> ${escapeDotIdentifier(e.to)};`);
  }
  lines.push("}");
  return lines.join("\n");
}
