import { realpathSync } from "fs";
import { absoluteCanonicalPath } from "../fs/canonicalPath.js";
import { normalizeSeparators } from "../fs/pathUtils.js";
import { normalizeModuleName } from "../graph/identity.js";
import type { ResolutionRunner, ResolvedPackage } from "./types.js";

/** Maps a root as referenced by a record to the directory it really is. */
export type RootCanonicalizer = (root: string) => string;

export interface ResolutionRequest {
  root: string;
  /** Package identity the caller already knows for this root, if it is a module. */
  identity?: string;
}

/** Symlinks and `..` hops collapse; a root that cannot be stat'ed keeps its resolved spelling. */
export function realRoot(root: string): string {
  try {
    return normalizeSeparators(realpathSync(root));
  } catch {
    return absoluteCanonicalPath(root);
  }
}

/**
 * Memoizes resolution runs for one whole invocation of the tool.
 *
 * Keyed twice: by canonical root, and by the package identity each successful
 * run reported. A root whose identity already converged through an earlier
 * result is a hit even when reached through a different path. Failed runs are
 * cached as null and never retried.
 */
export class ResolutionCache {
  private readonly byRoot = new Map<string, ResolvedPackage | null>();
  private readonly byIdentity = new Map<string, ResolvedPackage>();
  private invocations = 0;

  constructor(
    private readonly runner: ResolutionRunner,
    private readonly canonicalize: RootCanonicalizer = realRoot,
  ) {}

  /** Number of times the runner was actually called. */
  get invocationCount(): number {
    return this.invocations;
  }

  resolve(request: ResolutionRequest): ResolvedPackage | null {
    if (request.identity !== undefined) {
      const hit = this.byIdentity.get(normalizeModuleName(request.identity));
      if (hit) return hit;
    }

    const key = this.canonicalize(request.root);
    const cached = this.byRoot.get(key);
    if (cached !== undefined) return cached;

    this.invocations++;
    const result = this.runner(key);
    this.byRoot.set(key, result);
    if (result) {
      this.byIdentity.set(normalizeModuleName(result.identity), result);
    }
    return result;
  }
}
