import { commonRoot } from "../fs/canonicalPath.js";
import { augmentFromTree, type ReferenceClassifier } from "../resolve/augment.js";
import type { ResolutionCache } from "../resolve/ResolutionCache.js";
import { GraphBuilder } from "./GraphBuilder.js";
import { containerId, moduleId, normalizeModuleName, subTargetId, type IdentityContext } from "./identity.js";
import type { DependencyInfo, Graph, IdScheme, NodeID } from "./types.js";
import { withoutTransient } from "./views.js";
import { withLayers } from "./layers.js";

export interface BuildOptions {
  includeSubTargets?: boolean;
  hideTransient?: boolean;
  idScheme?: IdScheme;
  /** Root the stable ids are relative to. Defaults to the deepest directory holding every record. */
  scanRoot?: string;
  /** Enables augmentation with resolved package-to-package edges. */
  resolution?: ResolutionCache;
  /** Called once per record path whose resolution produced no data. */
  onWarning?: (message: string) => void;
}

/** A record naming itself among its explicit dependencies is a local (internal) module. */
export function isSelfDeclared(record: DependencyInfo): boolean {
  const self = normalizeModuleName(record.name);
  return record.explicitDependencies.some((d) => normalizeModuleName(d) === self);
}

function uniqueNames(names: string[]): string[] {
  const seen = new Set<string>();
  const out: string[] = [];
  for (const n of names) {
    const key = normalizeModuleName(n);
    if (key === "" || seen.has(key)) continue;
    seen.add(key);
    out.push(n);
  }
  return out;
}

function classifier(records: DependencyInfo[]): ReferenceClassifier {
  const local = new Set<string>();
  const explicit = new Set<string>();
  for (const r of records) {
    if (isSelfDeclared(r)) local.add(normalizeModuleName(r.name));
    for (const d of r.localDependencies ?? []) local.add(normalizeModuleName(d));
    for (const d of r.explicitDependencies) explicit.add(normalizeModuleName(d));
  }
  return {
    kindOf: (name) => (local.has(normalizeModuleName(name)) ? "internalModule" : "externalModule"),
    isTransient: (name) => {
      const key = normalizeModuleName(name);
      return !explicit.has(key) && !local.has(key);
    },
  };
}

function ownNodeId(ctx: IdentityContext, record: DependencyInfo): NodeID {
  return isSelfDeclared(record) ? moduleId(record.name) : containerId(ctx, record.name, record.path);
}

/**
 * Merge dependency records into one graph.
 *
 * Every step goes through GraphBuilder's idempotent insertion, so the result
 * does not depend on record order or on duplicated records.
 */
export function buildGraph(records: DependencyInfo[], options: BuildOptions = {}): Graph {
  const includeSubTargets = options.includeSubTargets ?? false;
  const hideTransient = options.hideTransient ?? false;
  const ctx: IdentityContext = {
    scheme: options.idScheme ?? "stable",
    scanRoot: options.scanRoot ?? commonRoot(records.map((r) => r.path)) ?? ".",
  };
  const classify = classifier(records);
  const builder = new GraphBuilder();

  for (const record of records) {
    const selfDeclared = isSelfDeclared(record);
    const ownId = ownNodeId(ctx, record);
    builder.addNode(ownId, record.name, selfDeclared ? "internalModule" : "container", false);

    for (const dep of uniqueNames([...record.dependencies, ...record.explicitDependencies])) {
      const depId = moduleId(dep);
      if (depId === ownId) continue;
      builder.addNode(depId, dep, classify.kindOf(dep), classify.isTransient(dep));
      builder.addEdge(ownId, depId);
    }

    if (!includeSubTargets) continue;

    for (const target of record.subTargets) {
      const targetId = subTargetId(ctx, record.name, record.path, target.name);
      builder.addNode(targetId, `${record.name}/${target.name}`, "subTarget", false);
      builder.addEdge(ownId, targetId);

      for (const sibling of target.targetDependencies) {
        const siblingId = subTargetId(ctx, record.name, record.path, sibling);
        builder.addNode(siblingId, `${record.name}/${sibling}`, "subTarget", false);
        builder.addEdge(targetId, siblingId);
      }

      // Straight to the package: a change to it invalidates this target, not every target of the container.
      for (const pkg of uniqueNames(target.packageDependencies)) {
        const pkgId = moduleId(pkg);
        builder.addNode(pkgId, pkg, classify.kindOf(pkg), classify.isTransient(pkg));
        builder.addEdge(targetId, pkgId);
      }
    }
  }

  const resolution = options.resolution;
  if (resolution) {
    const warned = new Set<string>();
    for (const record of records) {
      const tree = resolution.resolve({
        root: record.path,
        identity: isSelfDeclared(record) ? record.name : undefined,
      });
      if (!tree) {
        if (!warned.has(record.path)) {
          warned.add(record.path);
          options.onWarning?.(`resolution skipped for ${record.name} (${record.path})`);
        }
        continue;
      }
      augmentFromTree(builder, ownNodeId(ctx, record), tree, classify, { depthLimited: hideTransient });
    }
  }

  const graph = builder.toGraph(ctx.scheme, {
    includeSubTargets,
    hideTransient,
    augmented: resolution !== undefined,
  });
  return hideTransient ? withLayers(withoutTransient(graph)) : graph;
}
