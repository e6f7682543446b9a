/**
 * Pinch-point analysis over the SCC condensation of a graph.
 *
 * Members of one cycle are a single unit: they never count each other as
 * dependents or dependencies, and they share one depth. Reachability runs on
 * the condensation DAG with a visited set, so diamonds are counted once and
 * cycles cannot recurse.
 */

import { stringCompareBinary } from "../determinism/CanonicalOrder.js";
import type { Graph, GraphNode, NodeID, NodeKind } from "../graph/types.js";
import { componentDepths, condense, reachableComponents } from "./condensation.js";
import { DEFAULT_POLICY, impactScore, riskTier, type PinchPointPolicy, type RiskTier } from "./policy.js";

export interface PinchPointInfo {
  id: NodeID;
  name: string;
  kind: NodeKind;
  directDependents: number;
  transitiveDependents: number;
  directDependencies: number;
  transitiveDependencies: number;
  dependencyDepth: number;
  cycleSize: number;
  impactScore: number;
  vulnerabilityScore: number;
  risk: RiskTier;
}

export interface PinchPointAnalysis {
  /** One entry per candidate node, ordered by id. */
  points: PinchPointInfo[];
  maxDepth: number;
  /** Components with more than one member, each binary-sorted. */
  cycles: NodeID[][];
}

export interface AnalyzeOptions {
  /** Leave external modules out of the candidates. */
  internalOnly?: boolean;
  policy?: PinchPointPolicy;
}

export type RankMetric = "impact" | "vulnerability";

function isCandidate(node: GraphNode, internalOnly: boolean): boolean {
  if (node.isTransient) return false;
  if (internalOnly && node.kind === "externalModule") return false;
  return true;
}

/** Pure function of the graph. Edges to unknown ids contribute nothing. */
export function analyzePinchPoints(graph: Graph, options: AnalyzeOptions = {}): PinchPointAnalysis {
  const internalOnly = options.internalOnly ?? false;
  const policy = options.policy ?? DEFAULT_POLICY;

  const cond = condense(
    graph.nodes.map((n) => n.id),
    graph.edges,
  );
  const depths = componentDepths(cond);
  const sizeOf = (components: Iterable<number>): number => {
    let total = 0;
    for (const c of components) total += cond.components[c].length;
    return total;
  };

  const forward = new Map<number, number>();
  const backward = new Map<number, number>();
  const reach = (memo: Map<number, number>, adjacency: number[][], c: number): number => {
    const known = memo.get(c);
    if (known !== undefined) return known;
    const count = sizeOf(reachableComponents(adjacency, c));
    memo.set(c, count);
    return count;
  };

  const points: PinchPointInfo[] = [];
  let maxDepth = 0;

  for (const node of graph.nodes) {
    if (!isCandidate(node, internalOnly)) continue;
    const c = cond.componentOf.get(node.id);
    if (c === undefined) continue;

    const depth = depths[c];
    const transitiveDependents = reach(backward, cond.predecessors, c);
    const transitiveDependencies = reach(forward, cond.successors, c);
    maxDepth = Math.max(maxDepth, depth);

    points.push({
      id: node.id,
      name: node.name,
      kind: node.kind,
      directDependents: sizeOf(cond.predecessors[c]),
      transitiveDependents,
      directDependencies: sizeOf(cond.successors[c]),
      transitiveDependencies,
      dependencyDepth: depth,
      cycleSize: cond.components[c].length,
      impactScore: impactScore(transitiveDependents, depth, policy),
      vulnerabilityScore: transitiveDependencies,
      risk: riskTier(transitiveDependents, policy),
    });
  }

  points.sort((a, b) => stringCompareBinary(a.id, b.id));
  const cycles = cond.components.filter((members) => members.length > 1);
  return { points, maxDepth, cycles };
}

function metricOf(p: PinchPointInfo, metric: RankMetric): number {
  return metric === "impact" ? p.impactScore : p.vulnerabilityScore;
}

/** Score descending; ties by name ascending, then id. */
export function rankPinchPoints(points: PinchPointInfo[], metric: RankMetric, limit?: number): PinchPointInfo[] {
  const ranked = [...points].sort((a, b) => {
    const diff = metricOf(b, metric) - metricOf(a, metric);
    if (diff !== 0) return diff;
    const nameCmp = stringCompareBinary(a.name, b.name);
    if (nameCmp !== 0) return nameCmp;
    return stringCompareBinary(a.id, b.id);
  });
  return limit === undefined ? ranked : ranked.slice(0, limit);
}

/** Candidate counts per tier, every tier present. */
export function countByRisk(points: PinchPointInfo[]): Record<RiskTier, number> {
  const counts: Record<RiskTier, number> = { critical: 0, high: 0, medium: 0, low: 0 };
  for (const p of points) counts[p.risk]++;
  return counts;
}
