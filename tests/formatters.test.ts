import { analyzePinchPoints } from "../src/analysis/pinchPoints.js";
import { diffGraphs } from "../src/diff/diffGraphs.js";
import { graphFingerprint } from "../src/fingerprint.js";
import { formatPinchPointReport } from "../src/formatters/analysis.js";
import { formatDiffText } from "../src/formatters/diff.js";
import { escapeDotIdentifier, formatDot } from "../src/formatters/dot.js";
import { formatDiffJson, formatGraphJson, toGraphDocument } from "../src/formatters/json.js";
import { formatLayeredGraph } from "../src/formatters/layers.js";
import { formatGraphText, graphStatistics } from "../src/formatters/text.js";
import { formatTree } from "../src/formatters/tree.js";
import { buildGraph } from "../src/graph/buildGraph.js";
import type { DependencyInfo, Graph, GraphNode } from "../src/graph/types.js";

const RULE = "═".repeat(70);
const THIN_RULE = "─".repeat(70);

function rec(path: string, name: string, dependencies: string[], explicitDependencies: string[] = []): DependencyInfo {
  return { path, name, dependencies, explicitDependencies, subTargets: [] };
}

// App pins Alamofire (declared by Lib) and Yams (declared by nobody).
const records = [rec("/r/App", "App", ["Alamofire", "Yams"]), rec("/r/Lib", "Lib", ["Alamofire"], ["Lib", "Alamofire"])];
const graph = buildGraph(records, { scanRoot: "/r" });

describe("formatDot", () => {
  it("renders nodes with kind styling and edges", () => {
    expect(formatDot(graph).split("\n")).toEqual([
      "digraph DependencyGraph {",
      "  rankdir=TB;",
      "  node [shape=box, style=rounded];",
      "",
      '  "container:App@App" [label="App", style="rounded,filled", fillcolor="lightblue"];',
      '  "module:alamofire" [label="Alamofire"];',
      '  "module:lib" [label="Lib", style="rounded,filled", fillcolor="lightyellow"];',
      '  "module:yams" [label="Yams", style="rounded,dashed"];',
      "",
      '  "container:App@App" -> "module:alamofire";',
      '  "container:App@App" -> "module:yams";',
      '  "module:lib" -> "module:alamofire";',
      "}",
    ]);
  });

  it("escapes quotes and backslashes", () => {
    expect(escapeDotIdentifier('say "hi"')).toBe('"say \\"hi\\""');
    expect(escapeDotIdentifier("a\\b")).toBe('"a\\\\b"');
  });
});

describe("formatGraphText", () => {
  it("lists connections by name and the statistics", () => {
    expect(formatGraphText(graph).split("\n")).toEqual([
      THIN_RULE,
      "CONNECTIONS",
      THIN_RULE,
      "◆ App",
      "  ├──▶ Alamofire",
      "  └──▶ Yams (transient)",
      "● Lib",
      "  └──▶ Alamofire",
      "",
      RULE,
      "STATISTICS",
      RULE,
      "Containers: 1",
      "Sub-targets: 0",
      "Internal modules: 1",
      "External modules: 2",
      "Transient: 1",
      "Shared dependencies: 1",
      "Edges: 3",
    ]);
  });

  it("counts only edges between existing nodes", () => {
    const dangling: Graph = { ...graph, edges: [...graph.edges, { from: "module:lib", to: "module:ghost" }] };
    expect(graphStatistics(dangling).edges).toBe(3);
  });
});

describe("formatLayeredGraph", () => {
  it("groups nodes by layer ahead of the connections", () => {
    const lines = formatLayeredGraph(graph).split("\n");
    expect(lines.slice(0, 11)).toEqual([
      RULE,
      "DEPENDENCY GRAPH  ◆ container  ▸ sub-target  ● internal module  ○ external module",
      RULE,
      "Layer 0",
      "  ◆ App",
      "  ● Lib",
      "",
      "Layer 1",
      "  ○ Alamofire",
      "  ○ Yams (transient)",
      "",
    ]);
    expect(lines.slice(11)).toEqual(formatGraphText(graph).split("\n"));
  });
});

describe("formatTree", () => {
  it("lists each project with its path and marks shared dependencies", () => {
    expect(formatTree(records, "/r").split("\n")).toEqual([
      RULE,
      "DEPENDENCY TREE",
      RULE,
      "",
      "┌─ App",
      "│  Path: App",
      "│",
      "│  ├── Alamofire [shared by 2 projects]",
      "│  └── Yams",
      "",
      "┌─ Lib",
      "│  Path: Lib",
      "│",
      "│  └── Alamofire [shared by 2 projects]",
      "",
      RULE,
      "SHARED DEPENDENCIES",
      RULE,
      "",
      "◆ Alamofire",
      "  ├── App (App)",
      "  └── Lib (Lib)",
      "",
      RULE,
      "STATISTICS",
      RULE,
      "Projects scanned: 2",
      "Unique dependencies: 2",
      "Shared dependencies: 1",
    ]);
  });

  it("matches dependencies case-insensitively and omits the shared section when nothing is shared", () => {
    const shared = formatTree([rec("/r/A", "A", ["yams"]), rec("/r/B", "B", ["Yams", "Yams"])], "/r").split("\n");
    expect(shared).toContain("◆ Yams");
    expect(shared).toContain("Unique dependencies: 1");
    expect(shared.filter((l) => l === "│  └── Yams [shared by 2 projects]")).toHaveLength(1);

    const single = formatTree([rec("/r/A", "A", ["Yams"])], "/r").split("\n");
    expect(single).not.toContain("SHARED DEPENDENCIES");
    expect(single.slice(-3)).toEqual(["Projects scanned: 1", "Unique dependencies: 1", "Shared dependencies: 0"]);
  });
});

describe("JSON documents", () => {
  it("stamps the schema version for the id scheme", () => {
    expect(toGraphDocument(graph).schemaVersion).toBe(2);
    expect(toGraphDocument(buildGraph(records, { idScheme: "legacy" })).schemaVersion).toBe(1);
  });

  it("round-trips nodes and edges and drops dangling edges", () => {
    const dangling: Graph = { ...graph, edges: [...graph.edges, { from: "module:lib", to: "module:ghost" }] };
    const doc = JSON.parse(formatGraphJson(dangling));
    expect(doc.idScheme).toBe("stable");
    expect(doc.flags).toEqual({ includeSubTargets: false, hideTransient: false, augmented: false });
    expect(doc.edges).toEqual(graph.edges);
    expect(doc.fingerprint).toBe(graphFingerprint(graph));
  });

  it("fingerprints independently of record order", () => {
    const reversed = buildGraph([...records].reverse(), { scanRoot: "/r" });
    expect(graphFingerprint(reversed)).toBe(graphFingerprint(graph));
    expect(graphFingerprint(graph)).toMatch(/^[a-f0-9]{16}$/);
  });

  it("wraps a diff with its schema version", () => {
    const doc = JSON.parse(formatDiffJson(diffGraphs(buildGraph([]), graph), "stable"));
    expect(doc.schemaVersion).toBe(2);
    expect(doc.addedNodes).toEqual(["container:App@App", "module:alamofire", "module:lib", "module:yams"]);
    expect(doc.removedEdges).toEqual([]);
  });
});

describe("formatDiffText", () => {
  it("lists added and removed entries", () => {
    const after = buildGraph([rec("/r/App", "App", ["Alamofire"]), records[1]], { scanRoot: "/r" });
    expect(formatDiffText(diffGraphs(graph, after)).split("\n")).toEqual([
      "GRAPH DIFF",
      "Nodes: +0 -1",
      "Edges: +0 -1",
      "",
      "- node module:yams",
      "- edge container:App@App->module:yams",
    ]);
  });

  it("says so when nothing changed", () => {
    expect(formatDiffText(diffGraphs(graph, graph)).split("\n")).toEqual([
      "GRAPH DIFF",
      "Nodes: +0 -0",
      "Edges: +0 -0",
      "",
      "No structural changes.",
    ]);
  });
});

describe("formatPinchPointReport", () => {
  function node(id: string, name: string): GraphNode {
    return { id, name, kind: "externalModule", isTransient: false, layer: 0 };
  }
  const cyclic: Graph = {
    nodes: [node("module:a", "A"), node("module:b", "B"), node("module:c", "C")],
    edges: [
      { from: "module:a", to: "module:b" },
      { from: "module:b", to: "module:a" },
      { from: "module:c", to: "module:a" },
    ],
    idScheme: "stable",
    flags: { includeSubTargets: false, hideTransient: false, augmented: false },
  };

  it("renders summary, rankings and cycles", () => {
    const report = formatPinchPointReport(cyclic, analyzePinchPoints(cyclic), { top: 3, internalOnly: false });
    expect(report.split("\n")).toEqual([
      RULE,
      "PINCH POINT ANALYSIS",
      RULE,
      "Candidates: 3",
      "Max depth: 1",
      "Cycles: 1",
      "Risk: critical 0 · high 0 · medium 0 · low 3",
      "",
      "TOP BY IMPACT",
      "  1. A [low] impact 1.0 · dependents 1 (direct 1) · depth 0 · cycle of 2",
      "  2. B [low] impact 1.0 · dependents 1 (direct 1) · depth 0 · cycle of 2",
      "  3. C [low] impact 0.0 · dependents 0 (direct 0) · depth 1",
      "",
      "TOP BY VULNERABILITY",
      "  1. C vulnerability 2 · dependencies 2 (direct 2)",
      "  2. A vulnerability 0 · dependencies 0 (direct 0)",
      "  3. B vulnerability 0 · dependencies 0 (direct 0)",
      "",
      "CYCLES",
      "  - A ⇄ B",
    ]);
  });

  it("limits each ranking to top entries", () => {
    const lines = formatPinchPointReport(cyclic, analyzePinchPoints(cyclic), { top: 1, internalOnly: false }).split("\n");
    expect(lines.filter((l) => l.startsWith("  2."))).toEqual([]);
  });

  it("says when there is nothing to analyze", () => {
    const internal = analyzePinchPoints(cyclic, { internalOnly: true });
    expect(formatPinchPointReport(cyclic, internal, { top: 3, internalOnly: true }).split("\n")).toEqual([
      RULE,
      "PINCH POINT ANALYSIS (internal only)",
      RULE,
      "No candidate nodes to analyze.",
    ]);
  });
});
