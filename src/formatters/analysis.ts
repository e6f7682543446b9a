/**
 * Pinch-point report: summary, rankings by impact and vulnerability, cycles.
 */

import { countByRisk, rankPinchPoints, type PinchPointAnalysis, type PinchPointInfo } from "../analysis/pinchPoints.js";
import type { Graph } from "../graph/types.js";

const RULE = "═".repeat(70);

export interface AnalysisReportOptions {
  top: number;
  internalOnly: boolean;
}

function impactLine(rank: number, p: PinchPointInfo): string {
  const cycle = p.cycleSize > 1 ? ` · cycle of ${p.cycleSize}` : "";
  return (
    `${rank}. ${p.name} [${p.risk}] impact ${p.impactScore.toFixed(1)}` +
    ` · dependents ${p.transitiveDependents} (direct ${p.directDependents})` +
    ` · depth ${p.dependencyDepth}${cycle}`
  );
}

function vulnerabilityLine(rank: number, p: PinchPointInfo): string {
  return (
    `${rank}. ${p.name} vulnerability ${p.vulnerabilityScore}` +
    ` · dependencies ${p.transitiveDependencies} (direct ${p.directDependencies})`
  );
}

export function formatPinchPointReport(
  graph: Graph,
  analysis: PinchPointAnalysis,
  options: AnalysisReportOptions,
): string {
  const lines: string[] = [RULE, "PINCH POINT ANALYSIS" + (options.internalOnly ? " (internal only)" : ""), RULE];

  if (analysis.points.length === 0) {
    lines.push("No candidate nodes to analyze.");
    return lines.join("\n");
  }

  const risk = countByRisk(analysis.points);
  lines.push(
    `Candidates: ${analysis.points.length}`,
    `Max depth: ${analysis.maxDepth}`,
    `Cycles: ${analysis.cycles.length}`,
    `Risk: critical ${risk.critical} · high ${risk.high} · medium ${risk.medium} · low ${risk.low}`,
    "",
    "TOP BY IMPACT",
  );
  rankPinchPoints(analysis.points, "impact", options.top).forEach((p, i) => {
    lines.push("  " + impactLine(i + 1, p));
  });

  lines.push("", "TOP BY VULNERABILITY");
  rankPinchPoints(analysis.points, "vulnerability", options.top).forEach((p, i) => {
    lines.push("  " + vulnerabilityLine(i + 1, p));
  });

  if (analysis.cycles.length > 0) {
    const nameOf = new Map(graph.nodes.map((n) => [n.id, n.name]));
    lines.push("", "CYCLES");
    for (const members of analysis.cycles) {
      lines.push(`  - ${members.map((id) => nameOf.get(id) ?? id).join(" ⇄ ")}`);
    }
  }

  return lines.join("\n");
}
