import { graphFingerprint } from "../fingerprint.js";
import { schemaVersionFor } from "../graph/identity.js";
import type { BuildFlags, Edge, Graph, GraphNode, IdScheme } from "../graph/types.js";
import { dropDanglingEdges } from "../graph/views.js";
import type { GraphDiff } from "../diff/diffGraphs.js";

export interface GraphDocument {
  schemaVersion: number;
  idScheme: IdScheme;
  flags: BuildFlags;
  fingerprint: string;
  nodes: GraphNode[];
  edges: Edge[];
}

export interface DiffDocument extends GraphDiff {
  schemaVersion: number;
  idScheme: IdScheme;
}

/** Versioned exchange document; `schemaVersion` tells consumers which id discipline was used. */
export function toGraphDocument(graph: Graph): GraphDocument {
  const clean = dropDanglingEdges(graph);
  return {
    schemaVersion: schemaVersionFor(clean.idScheme),
    idScheme: clean.idScheme,
    flags: { ...clean.flags },
    fingerprint: graphFingerprint(clean),
    nodes: clean.nodes,
    edges: clean.edges,
  };
}

export function formatGraphJson(graph: Graph): string {
  return JSON.stringify(toGraphDocument(graph), null, 2);
}

export function formatDiffJson(diff: GraphDiff, idScheme: IdScheme): string {
  const doc: DiffDocument = { schemaVersion: schemaVersionFor(idScheme), idScheme, ...diff };
  return JSON.stringify(doc, null, 2);
}
