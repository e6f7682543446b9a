import { isEmptyDiff, type GraphDiff } from "../diff/diffGraphs.js";

export function formatDiffText(diff: GraphDiff): string {
  const lines = [
    "GRAPH DIFF",
    `Nodes: +${diff.addedNodes.length} -${diff.removedNodes.length}`,
    `Edges: +${diff.addedEdges.length} -${diff.removedEdges.length}`,
  ];
  if (isEmptyDiff(diff)) {
    lines.push("", "No structural changes.");
    return lines.join("\n");
  }
  lines.push("");
  for (const id of diff.addedNodes) lines.push(`+ node ${id}`);
  for (const id of diff.removedNodes) lines.push(`- node ${id}`);
  for (const key of diff.addedEdges) lines.push(`+ edge ${key}`);
  for (const key of diff.removedEdges) lines.push(`- edge ${key}`);
  return lines.join("\n");
}
