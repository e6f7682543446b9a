export type {
  BuildFlags,
  DependencyInfo,
  Edge,
  Graph,
  GraphNode,
  IdScheme,
  NodeID,
  NodeKind,
  SubTargetInfo,
} from "./graph/types.js";
export { edgeKey } from "./graph/types.js";
export { KIND_UPGRADE, mergeKind } from "./graph/nodeKind.js";
export { containerId, moduleId, schemaVersionFor, subTargetId } from "./graph/identity.js";
export { GraphBuilder } from "./graph/GraphBuilder.js";
export { buildGraph, type BuildOptions } from "./graph/buildGraph.js";
export { computeLayers, nodesByLayer } from "./graph/layers.js";
export { filterGraph, withoutTransient } from "./graph/views.js";

export { ResolutionCache, type ResolutionRequest } from "./resolve/ResolutionCache.js";
export { createCommandRunner } from "./resolve/runCommand.js";
export type { ResolutionRunner, ResolvedPackage } from "./resolve/types.js";

export { stronglyConnectedComponents, detectCycles } from "./analysis/stronglyConnected.js";
export { condense, type Condensation } from "./analysis/condensation.js";
export {
  analyzePinchPoints,
  rankPinchPoints,
  type AnalyzeOptions,
  type PinchPointAnalysis,
  type PinchPointInfo,
} from "./analysis/pinchPoints.js";
export { DEFAULT_POLICY, type PinchPointPolicy, type RiskTier } from "./analysis/policy.js";

export { diffGraphs, sameBuildFlags, type GraphDiff } from "./diff/diffGraphs.js";

export { parsePackageResolved, packageResolvedToInfo } from "./parse/packageResolved.js";
export { parseManifestDump, manifestToInfo } from "./parse/manifestDump.js";
export { parseResolvedPackage } from "./parse/showDependencies.js";
export { scanProjects, ScanRootError, type ScanResult } from "./fs/scanProjects.js";
export { loadModgraphConfig, type ModgraphConfig } from "./config/modgraphYaml.js";

export { graphFingerprint } from "./fingerprint.js";
export { formatGraphText } from "./formatters/text.js";
export { formatLayeredGraph } from "./formatters/layers.js";
export { formatTree } from "./formatters/tree.js";
export { formatDot } from "./formatters/dot.js";
export { formatGraphJson, formatDiffJson, toGraphDocument } from "./formatters/json.js";
export { formatPinchPointReport } from "./formatters/analysis.js";
export { formatDiffText } from "./formatters/diff.js";
export { runCli } from "./cli/run.js";
