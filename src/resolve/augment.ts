import type { GraphBuilder } from "../graph/GraphBuilder.js";
import { moduleId } from "../graph/identity.js";
import type { NodeID, NodeKind } from "../graph/types.js";
import type { ResolvedPackage } from "./types.js";

export interface ReferenceClassifier {
  kindOf(name: string): NodeKind;
  isTransient(name: string): boolean;
}

export interface AugmentOptions {
  /** Stop below depth 1: direct children are explicit, grandchildren transient and unexpanded. */
  depthLimited: boolean;
}

interface Frame {
  parent: NodeID;
  pkg: ResolvedPackage;
  depth: number;
}

/**
 * Adds the edges of one resolved tree below `rootId`. Explicit stack; each
 * package is expanded at most once, so shared subtrees and cycles in the
 * reported tree cost nothing extra.
 */
export function augmentFromTree(
  builder: GraphBuilder,
  rootId: NodeID,
  tree: ResolvedPackage,
  classify: ReferenceClassifier,
  options: AugmentOptions,
): void {
  const expanded = new Set<NodeID>([rootId]);
  const stack: Frame[] = [];
  for (let i = tree.dependencies.length - 1; i >= 0; i--) {
    stack.push({ parent: rootId, pkg: tree.dependencies[i], depth: 1 });
  }

  while (stack.length > 0) {
    const frame = stack.pop();
    if (!frame) break;
    const { parent, pkg, depth } = frame;
    const id = moduleId(pkg.identity);

    const beyondLimit = options.depthLimited && depth > 1;
    const kind: NodeKind = pkg.local ? "internalModule" : classify.kindOf(pkg.identity);
    // Internal modules are never transient; only the depth limit can still hide one.
    const transient =
      depth === 1 ? false : beyondLimit || (kind !== "internalModule" && classify.isTransient(pkg.identity));

    builder.addNode(id, pkg.name ?? pkg.identity, kind, transient);
    builder.addEdge(parent, id);

    if (beyondLimit || expanded.has(id)) continue;
    expanded.add(id);
    for (let i = pkg.dependencies.length - 1; i >= 0; i--) {
      stack.push({ parent: id, pkg: pkg.dependencies[i], depth: depth + 1 });
    }
  }
}
