/**
 * One node of the tree a package manager prints for its resolved dependency
 * graph (`swift package show-dependencies --format json`).
 */
export interface ResolvedPackage {
  identity: string;
  name?: string;
  /** true when the package is checked out from the local filesystem rather than a remote. */
  local: boolean;
  dependencies: ResolvedPackage[];
}

/** Runs the resolution command in `cwd`. null means "no data" for that root. */
export type ResolutionRunner = (cwd: string) => ResolvedPackage | null;
