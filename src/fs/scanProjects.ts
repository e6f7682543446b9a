import { readdirSync, readFileSync, statSync } from "fs";
import { join, resolve } from "path";
import type { DependencyInfo } from "../graph/types.js";
import { MANIFEST_NAME, manifestToInfo, parseManifestDump } from "../parse/manifestDump.js";
import { LOCKFILE_NAME, packageResolvedToInfo } from "../parse/packageResolved.js";
import { DEFAULT_MANIFEST_COMMAND, runCommand } from "../resolve/runCommand.js";

export const DEFAULT_EXCLUDED_DIRS: readonly string[] = [
  ".build",
  "node_modules",
  "DerivedData",
  "Pods",
  "Carthage",
];

export class ScanRootError extends Error {
  constructor(readonly root: string) {
    super(`scan root does not exist: ${root}`);
    this.name = "ScanRootError";
  }
}

export interface ScanOptions {
  /** Directory names skipped in addition to the defaults and hidden directories. */
  exclude?: string[];
  manifestCommand?: readonly string[];
  /** Prints the manifest JSON for a package directory, null on failure. Defaults to running `manifestCommand`. */
  dumpManifest?: (dir: string) => string | null;
}

export interface ScanResult {
  root: string;
  records: DependencyInfo[];
  /** Project files found but not usable (unreadable, malformed, manifest dump failed). */
  skipped: string[];
}

function readText(absPath: string): string | null {
  try {
    return readFileSync(absPath, "utf8");
  } catch {
    return null;
  }
}

function listDir(dir: string): { dirs: string[]; files: string[] } {
  const dirs: string[] = [];
  const files: string[] = [];
  try {
    for (const e of readdirSync(dir, { withFileTypes: true })) {
      if (e.isSymbolicLink()) continue;
      if (e.isDirectory()) dirs.push(e.name);
      else if (e.isFile()) files.push(e.name);
    }
  } catch {
    return { dirs: [], files: [] };
  }
  return { dirs: dirs.sort(), files: files.sort() };
}

/**
 * Single pass over the tree under `root`. Hidden and excluded directories are
 * not entered. An empty `records` list means nothing to analyze; only a
 * missing root throws.
 */
export function scanProjects(root: string, options: ScanOptions = {}): ScanResult {
  const absRoot = resolve(root);
  if (!statSync(absRoot, { throwIfNoEntry: false })?.isDirectory()) {
    throw new ScanRootError(absRoot);
  }

  const excluded = new Set([...DEFAULT_EXCLUDED_DIRS, ...(options.exclude ?? [])]);
  const manifestCommand = options.manifestCommand ?? DEFAULT_MANIFEST_COMMAND;
  const dumpManifest = options.dumpManifest ?? ((dir: string) => runCommand(manifestCommand, dir));

  const records: DependencyInfo[] = [];
  const skipped: string[] = [];
  const pending = [absRoot];

  while (pending.length > 0) {
    const dir = pending.pop();
    if (dir === undefined) break;
    const { dirs, files } = listDir(dir);

    for (const name of files) {
      const abs = join(dir, name);
      if (name === LOCKFILE_NAME) {
        const content = readText(abs);
        const info = content === null ? null : packageResolvedToInfo(abs, content);
        if (info) records.push(info);
        else skipped.push(abs);
      } else if (name === MANIFEST_NAME) {
        const dumped = dumpManifest(dir);
        const manifest = dumped === null ? null : parseManifestDump(dumped);
        if (manifest) records.push(manifestToInfo(dir, manifest));
        else skipped.push(abs);
      }
    }

    for (let i = dirs.length - 1; i >= 0; i--) {
      const name = dirs[i];
      if (name.startsWith(".") || excluded.has(name)) continue;
      pending.push(join(dir, name));
    }
  }

  return { root: absRoot, records, skipped };
}
