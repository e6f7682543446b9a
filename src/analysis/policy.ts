/**
 * Scoring policy. The thresholds and the depth weight are reasonable
 * defaults, not derived values; `.modgraph.yml` may override them.
 */

export type RiskTier = "critical" | "high" | "medium" | "low";

export interface PinchPointPolicy {
  /** Minimum transitive dependents for each tier. */
  critical: number;
  high: number;
  medium: number;
  /** Impact multiplier per level of dependency depth. */
  depthWeight: number;
}

export const DEFAULT_POLICY: PinchPointPolicy = {
  critical: 20,
  high: 10,
  medium: 5,
  depthWeight: 0.2,
};

export function riskTier(transitiveDependents: number, policy: PinchPointPolicy = DEFAULT_POLICY): RiskTier {
  if (transitiveDependents >= policy.critical) return "critical";
  if (transitiveDependents >= policy.high) return "high";
  if (transitiveDependents >= policy.medium) return "medium";
  return "low";
}

export function impactScore(
  transitiveDependents: number,
  depth: number,
  policy: PinchPointPolicy = DEFAULT_POLICY,
): number {
  return transitiveDependents * (1 + depth * policy.depthWeight);
}
