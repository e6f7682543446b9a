/**
 * Layered view: nodes grouped by distance from the roots, followed by the
 * connection list and statistics of the text rendering.
 */

import { stringCompareBinary } from "../determinism/CanonicalOrder.js";
import { nodesByLayer } from "../graph/layers.js";
import type { Graph, GraphNode } from "../graph/types.js";
import { formatGraphText, KIND_MARKER } from "./text.js";

const RULE = "═".repeat(70);
const LEGEND = "DEPENDENCY GRAPH  ◆ container  ▸ sub-target  ● internal module  ○ external module";

export function formatLayeredGraph(graph: Graph): string {
  const byId = new Map(graph.nodes.map((n) => [n.id, n]));
  const lines: string[] = [RULE, LEGEND, RULE];

  nodesByLayer(graph).forEach((ids, layer) => {
    const nodes = ids
      .map((id) => byId.get(id))
      .filter((n): n is GraphNode => n !== undefined)
      .sort((a, b) => stringCompareBinary(a.name, b.name) || stringCompareBinary(a.id, b.id));
    if (nodes.length === 0) return;
    lines.push(`Layer ${layer}`);
    for (const node of nodes) {
      lines.push(`  ${KIND_MARKER[node.kind]} ${node.name}${node.isTransient ? " (transient)" : ""}`);
    }
    lines.push("");
  });

  lines.push(formatGraphText(graph));
  return lines.join("\n");
}
