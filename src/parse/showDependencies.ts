/**
 * Parser for the resolved dependency tree printed by
 * `swift package show-dependencies --format json`:
 *
 *   { "identity": "app", "name": "App", "url": "/src/app", "path": "...",
 *     "dependencies": [ { "identity": "alamofire", "url": "https://...", "dependencies": [] } ] }
 */

import type { ResolvedPackage } from "../resolve/types.js";

const REMOTE_URL = /^(?:[a-z][a-z0-9+.-]*:\/\/|git@)/i;

function isRecord(v: unknown): v is Record<string, unknown> {
  return v !== null && typeof v === "object" && !Array.isArray(v);
}

function nonEmptyString(v: unknown): string | undefined {
  return typeof v === "string" && v.trim() !== "" ? v.trim() : undefined;
}

/** A package is local when its location is a filesystem path rather than a remote URL. */
export function isLocalLocation(location: string | undefined): boolean {
  if (location === undefined) return false;
  return !REMOTE_URL.test(location);
}

function toResolvedPackage(raw: unknown): ResolvedPackage | null {
  if (!isRecord(raw)) return null;
  const name = nonEmptyString(raw.name);
  const identity = nonEmptyString(raw.identity) ?? name?.toLowerCase();
  if (identity === undefined) return null;

  const dependencies: ResolvedPackage[] = [];
  if (Array.isArray(raw.dependencies)) {
    for (const child of raw.dependencies) {
      const parsed = toResolvedPackage(child);
      if (parsed) dependencies.push(parsed);
    }
  }

  return {
    identity,
    name,
    local: isLocalLocation(nonEmptyString(raw.url)),
    dependencies,
  };
}

/** Malformed JSON or a root without identity → null. Malformed children are dropped. */
export function parseResolvedPackage(content: string): ResolvedPackage | null {
  let raw: unknown;
  try {
    raw = JSON.parse(content);
  } catch {
    return null;
  }
  return toResolvedPackage(raw);
}
