import { stableHash } from "./determinism/StableJson.js";
import type { Graph } from "./graph/types.js";

const FINGERPRINT_SCHEMA = "graph:v1";

/**
 * Deterministic fingerprint of a graph's structure and build flags.
 * Same records in any order → identical fingerprint.
 */
export function graphFingerprint(graph: Graph): string {
  return stableHash({
    schema: FINGERPRINT_SCHEMA,
    idScheme: graph.idScheme,
    flags: graph.flags,
    nodes: graph.nodes,
    edges: graph.edges,
  });
}
