export type NodeID = string;

export type NodeKind = "container" | "subTarget" | "internalModule" | "externalModule";

export type IdScheme = "stable" | "legacy";

export interface SubTargetInfo {
  name: string;
  packageDependencies: string[];
  targetDependencies: string[];
}

/**
 * One discovered container (project, manifest or lockfile owner), as produced
 * by the parsers. `explicitDependencies` is authoritative for explicit vs
 * transient; `dependencies` may come from a lockfile and carry no such split.
 */
export interface DependencyInfo {
  path: string;
  name: string;
  dependencies: string[];
  explicitDependencies: string[];
  /** Referenced packages that live on the local filesystem (path dependencies). */
  localDependencies?: string[];
  subTargets: SubTargetInfo[];
}

export interface GraphNode {
  id: NodeID;
  name: string;
  kind: NodeKind;
  isTransient: boolean;
  layer: number;
}

export interface Edge {
  from: NodeID;
  to: NodeID;
}

export interface BuildFlags {
  includeSubTargets: boolean;
  hideTransient: boolean;
  augmented: boolean;
}

export interface Graph {
  nodes: GraphNode[];
  edges: Edge[];
  idScheme: IdScheme;
  flags: BuildFlags;
}

export function edgeKey(edge: Edge): string {
  return `${edge.from}->${edge.to}`;
}
