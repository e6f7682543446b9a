import { buildGraph, isSelfDeclared } from "../src/graph/buildGraph.js";
import { GraphBuilder } from "../src/graph/GraphBuilder.js";
import { manifestToInfo, parseManifestDump } from "../src/parse/manifestDump.js";
import type { DependencyInfo, SubTargetInfo } from "../src/graph/types.js";

function rec(
  path: string,
  name: string,
  dependencies: string[],
  explicitDependencies: string[] = [],
  subTargets: SubTargetInfo[] = [],
): DependencyInfo {
  return { path, name, dependencies, explicitDependencies, subTargets };
}

const app = rec("/r/App", "App", ["Alamofire", "Core"], ["Alamofire"]);
const core = rec("/r/Core", "Core", ["Logging"], ["Core", "Logging"]);
const tool = rec("/r/Tool", "Tool", ["Alamofire", "Yams"]);

describe("buildGraph", () => {
  it("merges records into namespaced nodes and canonical edges", () => {
    const g = buildGraph([app, core, tool], { scanRoot: "/r" });
    expect(g.nodes.map((n) => [n.id, n.kind, n.isTransient, n.layer])).toEqual([
      ["container:App@App", "container", false, 0],
      ["container:Tool@Tool", "container", false, 0],
      ["module:alamofire", "externalModule", false, 1],
      ["module:core", "internalModule", false, 1],
      ["module:logging", "externalModule", false, 2],
      ["module:yams", "externalModule", true, 1],
    ]);
    expect(g.edges).toEqual([
      { from: "container:App@App", to: "module:alamofire" },
      { from: "container:App@App", to: "module:core" },
      { from: "container:Tool@Tool", to: "module:alamofire" },
      { from: "container:Tool@Tool", to: "module:yams" },
      { from: "module:core", to: "module:logging" },
    ]);
    expect(g.idScheme).toBe("stable");
    expect(g.flags).toEqual({ includeSubTargets: false, hideTransient: false, augmented: false });
  });

  it("is independent of record order and duplication", () => {
    const base = buildGraph([app, core, tool], { scanRoot: "/r" });
    expect(buildGraph([tool, core, app], { scanRoot: "/r" })).toEqual(base);
    expect(buildGraph([core, app, tool, app, core], { scanRoot: "/r" })).toEqual(base);
  });

  it("keeps a node explicit once any source declares it", () => {
    const lock = rec("/r/A", "A", ["Yams"]);
    const manifest = rec("/r/B", "B", [], ["Yams"]);
    for (const records of [[lock, manifest], [manifest, lock]]) {
      const yams = buildGraph(records, { scanRoot: "/r" }).nodes.find((n) => n.id === "module:yams");
      expect(yams?.isTransient).toBe(false);
    }
  });

  it("classifies a referenced local module as internal, never transient", () => {
    const lock = rec("/r/A", "A", ["core"]);
    const g = buildGraph([lock, core], { scanRoot: "/r" });
    const node = g.nodes.find((n) => n.id === "module:core");
    expect(node?.kind).toBe("internalModule");
    expect(node?.isTransient).toBe(false);
    expect(node?.name).toBe("Core");
  });

  it("classifies path dependencies as internal even outside the scan root", () => {
    const manifest = parseManifestDump(
      JSON.stringify({
        name: "App",
        dependencies: [
          { fileSystem: [{ identity: "shared", path: "/elsewhere/Shared" }] },
          { sourceControl: [{ identity: "yams" }] },
        ],
        targets: [],
      }),
    );
    if (!manifest) throw new Error("manifest did not parse");
    const g = buildGraph([manifestToInfo("/r/App", manifest)], { scanRoot: "/r" });
    expect(g.nodes.map((n) => [n.id, n.kind, n.isTransient])).toEqual([
      ["module:app", "internalModule", false],
      ["module:shared", "internalModule", false],
      ["module:yams", "externalModule", false],
    ]);
  });

  it("treats a local lockfile pin as an internal module for every record", () => {
    const lock: DependencyInfo = { ...rec("/r/App", "App", ["Shared"]), localDependencies: ["Shared"] };
    const other = rec("/r/Tool", "Tool", ["shared"]);
    const shared = buildGraph([other, lock], { scanRoot: "/r" }).nodes.find((n) => n.id === "module:shared");
    expect(shared?.kind).toBe("internalModule");
    expect(shared?.isTransient).toBe(false);
  });

  it("keeps a container and a same-named module apart", () => {
    const container = rec("/r/Core", "Core", ["Yams"]);
    const user = rec("/r/App", "App", ["Core"], ["Core"]);
    const ids = buildGraph([container, user], { scanRoot: "/r" }).nodes.map((n) => n.id);
    expect(ids).toContain("container:Core@Core");
    expect(ids).toContain("module:core");
  });

  it("does not record a self edge for a module listing itself", () => {
    const g = buildGraph([rec("/r/Core", "Core", ["Core", "Logging"], ["Core"])], { scanRoot: "/r" });
    expect(g.edges).toEqual([{ from: "module:core", to: "module:logging" }]);
  });

  it("adds sub-targets only when asked", () => {
    const withTargets = rec("/r/Core", "Core", ["Logging"], ["Core", "Logging"], [
      { name: "CoreKit", packageDependencies: ["Logging"], targetDependencies: ["CoreUtils"] },
      { name: "CoreUtils", packageDependencies: [], targetDependencies: [] },
    ]);
    expect(buildGraph([withTargets], { scanRoot: "/r" }).nodes.map((n) => n.id)).toEqual([
      "module:core",
      "module:logging",
    ]);

    const g = buildGraph([withTargets], { scanRoot: "/r", includeSubTargets: true });
    expect(g.nodes.filter((n) => n.kind === "subTarget").map((n) => [n.id, n.name])).toEqual([
      ["target:Core@Core/CoreKit", "Core/CoreKit"],
      ["target:Core@Core/CoreUtils", "Core/CoreUtils"],
    ]);
    expect(g.edges).toEqual([
      { from: "module:core", to: "module:logging" },
      { from: "module:core", to: "target:Core@Core/CoreKit" },
      { from: "module:core", to: "target:Core@Core/CoreUtils" },
      { from: "target:Core@Core/CoreKit", to: "module:logging" },
      { from: "target:Core@Core/CoreKit", to: "target:Core@Core/CoreUtils" },
    ]);
    expect(g.flags.includeSubTargets).toBe(true);
  });

  it("hides transient nodes and their edges", () => {
    const lock = rec("/r/App", "App", ["Alamofire", "Yams"]);
    const lib = rec("/r/Lib", "Lib", ["Alamofire"], ["Lib", "Alamofire"]);
    const g = buildGraph([lock, lib], { scanRoot: "/r", hideTransient: true });
    expect(g.nodes.map((n) => n.id)).toEqual(["container:App@App", "module:alamofire", "module:lib"]);
    expect(g.edges).toEqual([
      { from: "container:App@App", to: "module:alamofire" },
      { from: "module:lib", to: "module:alamofire" },
    ]);
    expect(g.flags.hideTransient).toBe(true);
  });

  it("stable ids do not change with the checkout location", () => {
    const at = (root: string) =>
      buildGraph([rec(`${root}/App`, "App", ["Yams"]), rec(`${root}/Lib`, "Lib", [], ["Lib"])]);
    expect(at("/home/one/repo")).toEqual(at("/tmp/ci/checkout"));
  });

  it("legacy ids carry the absolute path", () => {
    const g = buildGraph([rec("/r/App", "App", [])], { idScheme: "legacy" });
    expect(g.nodes.map((n) => n.id)).toEqual(["container:App@/r/App"]);
    expect(g.idScheme).toBe("legacy");
  });

  it("builds an empty graph from no records", () => {
    const g = buildGraph([]);
    expect(g.nodes).toEqual([]);
    expect(g.edges).toEqual([]);
  });
});

describe("isSelfDeclared", () => {
  it("matches the record name case-insensitively", () => {
    expect(isSelfDeclared(rec("/r/Core", "Core", [], ["core"]))).toBe(true);
    expect(isSelfDeclared(rec("/r/App", "App", [], ["Core"]))).toBe(false);
  });
});

describe("GraphBuilder", () => {
  it("upgrades kind and clears transient in either observation order", () => {
    const forward = new GraphBuilder();
    forward.addNode("module:a", "a", "externalModule", true);
    forward.addNode("module:a", "A", "internalModule", false);
    const backward = new GraphBuilder();
    backward.addNode("module:a", "A", "internalModule", false);
    backward.addNode("module:a", "a", "externalModule", true);

    const flags = { includeSubTargets: false, hideTransient: false, augmented: false };
    const a = forward.toGraph("stable", flags);
    expect(a).toEqual(backward.toGraph("stable", flags));
    expect(a.nodes).toEqual([{ id: "module:a", name: "A", kind: "internalModule", isTransient: false, layer: 0 }]);
  });

  it("dedupes edges and ignores self loops", () => {
    const b = new GraphBuilder();
    b.addNode("x", "x", "externalModule", false);
    b.addNode("y", "y", "externalModule", false);
    b.addEdge("x", "y");
    b.addEdge("x", "y");
    b.addEdge("x", "x");
    expect(b.toGraph("stable", { includeSubTargets: false, hideTransient: false, augmented: false }).edges).toEqual([
      { from: "x", to: "y" },
    ]);
  });
});
