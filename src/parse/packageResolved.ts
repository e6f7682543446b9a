/**
 * Package.resolved lockfile parser. Accepts the v1 layout
 * (`object.pins[].package` / `repositoryURL`) and the v2/v3 layout
 * (`pins[].identity` / `location`). Lockfiles carry names and origins only,
 * no edges and no explicit/transient split; a pin whose location is a path is
 * a local package.
 */

import { basename, dirname } from "path";
import { stripExtension } from "../fs/pathUtils.js";
import type { DependencyInfo } from "../graph/types.js";
import { isLocalLocation } from "./showDependencies.js";

export const LOCKFILE_NAME = "Package.resolved";

export interface ResolvedPin {
  name: string;
  /** Remote URL, or a filesystem path for local packages. */
  location?: string;
}

function isRecord(v: unknown): v is Record<string, unknown> {
  return v !== null && typeof v === "object" && !Array.isArray(v);
}

function optionalString(v: unknown): string | undefined {
  return typeof v === "string" && v !== "" ? v : undefined;
}

function toPin(raw: unknown): ResolvedPin | null {
  if (!isRecord(raw)) return null;
  const name = optionalString(raw.identity) ?? optionalString(raw.package);
  if (name === undefined) return null;
  const location = optionalString(raw.location) ?? optionalString(raw.repositoryURL);
  return location === undefined ? { name } : { name, location };
}

/**
 * Pins of a lockfile, in file order. Not JSON or no pin list → null.
 * Pins without a name are dropped.
 */
export function parsePackageResolved(content: string): ResolvedPin[] | null {
  let raw: unknown;
  try {
    raw = JSON.parse(content);
  } catch {
    return null;
  }
  if (!isRecord(raw)) return null;

  let pins: unknown;
  if (Array.isArray(raw.pins)) {
    pins = raw.pins;
  } else if (isRecord(raw.object) && Array.isArray(raw.object.pins)) {
    pins = raw.object.pins;
  }
  if (!Array.isArray(pins)) return null;

  const out: ResolvedPin[] = [];
  for (const p of pins) {
    const pin = toPin(p);
    if (pin) out.push(pin);
  }
  return out;
}

/**
 * The project a lockfile belongs to. A lockfile inside `App.xcodeproj/...` or
 * `App.xcworkspace/...` belongs to `App` in the directory holding the bundle;
 * otherwise to its containing directory. The `project.xcworkspace` nested in
 * every .xcodeproj is not a project of its own.
 */
export function projectForLockfile(filePath: string): { name: string; path: string } {
  const dir = dirname(filePath);
  for (let cur = dir; ; cur = dirname(cur)) {
    const base = basename(cur);
    if (base.endsWith(".xcodeproj") || (base.endsWith(".xcworkspace") && base !== "project.xcworkspace")) {
      return { name: stripExtension(base), path: dirname(cur) };
    }
    if (dirname(cur) === cur) break;
  }
  return { name: basename(dir), path: dir };
}

export function packageResolvedToInfo(filePath: string, content: string): DependencyInfo | null {
  const pins = parsePackageResolved(content);
  if (pins === null) return null;
  const { name, path } = projectForLockfile(filePath);
  return {
    path,
    name,
    dependencies: pins.map((p) => p.name),
    explicitDependencies: [],
    localDependencies: pins.filter((p) => isLocalLocation(p.location)).map((p) => p.name),
    subTargets: [],
  };
}
