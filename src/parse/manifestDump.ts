/**
 * Package manifest parser. Reads the JSON that `swift package dump-package`
 * prints for a Package.swift; the manifest itself is Swift source and is never
 * evaluated here.
 */

import type { DependencyInfo, SubTargetInfo } from "../graph/types.js";

export const MANIFEST_NAME = "Package.swift";

export interface ManifestDependency {
  identity: string;
  /** Declared with a filesystem path rather than a remote location. */
  local: boolean;
}

export type TargetDependency =
  | { kind: "target"; name: string }
  | { kind: "product"; name: string; package?: string }
  | { kind: "byName"; name: string };

export interface ManifestTarget {
  name: string;
  type: string;
  dependencies: TargetDependency[];
}

export interface PackageManifest {
  name: string;
  dependencies: ManifestDependency[];
  targets: ManifestTarget[];
}

const DEPENDENCY_KEYS = ["fileSystem", "local", "sourceControl", "scm", "registry"];
const FILE_SYSTEM_KEYS = new Set(["fileSystem", "local"]);

function isRecord(v: unknown): v is Record<string, unknown> {
  return v !== null && typeof v === "object" && !Array.isArray(v);
}

function firstString(v: unknown): string | undefined {
  if (!Array.isArray(v)) return undefined;
  const s: unknown = v[0];
  return typeof s === "string" && s !== "" ? s : undefined;
}

function parseDependency(raw: unknown): ManifestDependency | null {
  if (!isRecord(raw)) return null;
  for (const key of DEPENDENCY_KEYS) {
    const list = raw[key];
    const entry: unknown = Array.isArray(list) ? list[0] : undefined;
    if (isRecord(entry) && typeof entry.identity === "string" && entry.identity !== "") {
      return { identity: entry.identity, local: FILE_SYSTEM_KEYS.has(key) };
    }
  }
  return null;
}

function parseTargetDependency(raw: unknown): TargetDependency | null {
  if (!isRecord(raw)) return null;
  const target = firstString(raw.target);
  if (target !== undefined) return { kind: "target", name: target };
  const byName = firstString(raw.byName);
  if (byName !== undefined) return { kind: "byName", name: byName };
  const product = firstString(raw.product);
  if (product !== undefined && Array.isArray(raw.product)) {
    const pkg: unknown = raw.product[1];
    return typeof pkg === "string" && pkg !== ""
      ? { kind: "product", name: product, package: pkg }
      : { kind: "product", name: product };
  }
  return null;
}

function parseTarget(raw: unknown): ManifestTarget | null {
  if (!isRecord(raw) || typeof raw.name !== "string" || raw.name === "") return null;
  const dependencies: TargetDependency[] = [];
  if (Array.isArray(raw.dependencies)) {
    for (const d of raw.dependencies) {
      const parsed = parseTargetDependency(d);
      if (parsed) dependencies.push(parsed);
    }
  }
  return {
    name: raw.name,
    type: typeof raw.type === "string" ? raw.type : "regular",
    dependencies,
  };
}

/** Not JSON or no package name → null. Unrecognized entries are dropped. */
export function parseManifestDump(content: string): PackageManifest | null {
  let raw: unknown;
  try {
    raw = JSON.parse(content);
  } catch {
    return null;
  }
  if (!isRecord(raw) || typeof raw.name !== "string" || raw.name === "") return null;

  const dependencies: ManifestDependency[] = [];
  if (Array.isArray(raw.dependencies)) {
    for (const d of raw.dependencies) {
      const parsed = parseDependency(d);
      if (parsed) dependencies.push(parsed);
    }
  }

  const targets: ManifestTarget[] = [];
  if (Array.isArray(raw.targets)) {
    for (const t of raw.targets) {
      const parsed = parseTarget(t);
      if (parsed) targets.push(parsed);
    }
  }

  return { name: raw.name, dependencies, targets };
}

function toSubTarget(target: ManifestTarget, targetNames: Set<string>): SubTargetInfo {
  const packageDependencies: string[] = [];
  const targetDependencies: string[] = [];
  for (const dep of target.dependencies) {
    if (dep.kind === "target") {
      targetDependencies.push(dep.name);
    } else if (dep.kind === "product") {
      packageDependencies.push(dep.package ?? dep.name);
    } else if (targetNames.has(dep.name)) {
      targetDependencies.push(dep.name);
    } else {
      packageDependencies.push(dep.name);
    }
  }
  return { name: target.name, packageDependencies, targetDependencies };
}

/**
 * A manifest declares its own package, which makes the record an internal
 * module; every declared package dependency is explicit, and path
 * dependencies are local.
 */
export function manifestToInfo(dir: string, manifest: PackageManifest): DependencyInfo {
  const identities = manifest.dependencies.map((d) => d.identity);
  const targetNames = new Set(manifest.targets.map((t) => t.name));
  return {
    path: dir,
    name: manifest.name,
    dependencies: identities,
    explicitDependencies: [manifest.name, ...identities],
    localDependencies: manifest.dependencies.filter((d) => d.local).map((d) => d.identity),
    subTargets: manifest.targets.map((t) => toSubTarget(t, targetNames)),
  };
}
