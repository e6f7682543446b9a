/**
 * Node identity. Ids are namespaced by kind so a container and a same-named
 * module never collapse into one node:
 *
 *   module:<lowercased name>                        internal and external modules
 *   container:<name>@<path>                         containers
 *   target:<container name>@<path>/<target name>    sub-targets
 *
 * Under the stable scheme <path> is relative to the scan root, so the same
 * layout checked out in two places yields the same ids. The legacy scheme
 * keeps the absolute path.
 */

import { absoluteCanonicalPath, canonicalPath } from "../fs/canonicalPath.js";
import type { IdScheme, NodeID } from "./types.js";

export interface IdentityContext {
  scheme: IdScheme;
  scanRoot: string;
}

const SCHEMA_VERSION: Record<IdScheme, number> = {
  legacy: 1,
  stable: 2,
};

/** JSON schema version renderers stamp for graphs built under `scheme`. */
export function schemaVersionFor(scheme: IdScheme): number {
  return SCHEMA_VERSION[scheme];
}

/** Module-like names compare case-insensitively. */
export function normalizeModuleName(name: string): string {
  return name.trim().toLowerCase();
}

export function moduleId(name: string): NodeID {
  return `module:${normalizeModuleName(name)}`;
}

function containerKey(ctx: IdentityContext, name: string, path: string): string {
  const where = ctx.scheme === "stable" ? canonicalPath(path, ctx.scanRoot) : absoluteCanonicalPath(path);
  return `${name.trim()}@${where}`;
}

export function containerId(ctx: IdentityContext, name: string, path: string): NodeID {
  return `container:${containerKey(ctx, name, path)}`;
}

export function subTargetId(
  ctx: IdentityContext,
  containerName: string,
  path: string,
  targetName: string,
): NodeID {
  return `target:${containerKey(ctx, containerName, path)}/${targetName.trim()}`;
}
