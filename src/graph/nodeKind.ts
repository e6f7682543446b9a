import type { NodeKind } from "./types.js";

export const NODE_KINDS: readonly NodeKind[] = [
  "container",
  "subTarget",
  "internalModule",
  "externalModule",
];

/**
 * Resulting kind when a node already observed as `old` is observed again as `next`.
 *
 * Legal upgrades: externalModule → internalModule, container → internalModule.
 * internalModule never regresses. Pairs that only meet when two namespaces
 * collide resolve to the higher of externalModule < subTarget < container <
 * internalModule, which keeps the table commutative.
 */
export const KIND_UPGRADE: Readonly<Record<NodeKind, Readonly<Record<NodeKind, NodeKind>>>> = {
  container: {
    container: "container",
    subTarget: "container",
    internalModule: "internalModule",
    externalModule: "container",
  },
  subTarget: {
    container: "container",
    subTarget: "subTarget",
    internalModule: "internalModule",
    externalModule: "subTarget",
  },
  internalModule: {
    container: "internalModule",
    subTarget: "internalModule",
    internalModule: "internalModule",
    externalModule: "internalModule",
  },
  externalModule: {
    container: "container",
    subTarget: "subTarget",
    internalModule: "internalModule",
    externalModule: "externalModule",
  },
};

export function mergeKind(old: NodeKind, next: NodeKind): NodeKind {
  return KIND_UPGRADE[old][next];
}
