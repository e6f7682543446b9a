import { relative, resolve } from "path";
import { normalizeSeparators } from "./pathUtils.js";

/**
 * Canonicalize path for deterministic cross-machine ids.
 * - scan-root relative ("." for the root itself, "../x" outside it)
 * - forward slashes
 * - collapse . and ..
 * - strip trailing slash
 * - lowercase drive letters (Windows)
 * - DO NOT lowercase full path (Linux case-sensitive)
 */
export function canonicalPath(absPath: string, scanRoot: string): string {
  let rel = normalizeSeparators(relative(resolve(scanRoot), resolve(absPath)));
  if (rel === "" || rel === ".") return ".";
  if (rel.endsWith("/")) rel = rel.slice(0, -1);
  if (/^[A-Z]:/.test(rel)) {
    rel = rel[0].toLowerCase() + rel.slice(1);
  }
  return rel;
}

/** Absolute path with forward slashes and a lowercased drive letter, for legacy ids. */
export function absoluteCanonicalPath(p: string): string {
  let abs = normalizeSeparators(resolve(p));
  if (abs.length > 1 && abs.endsWith("/")) abs = abs.slice(0, -1);
  if (/^[A-Z]:/.test(abs)) {
    abs = abs[0].toLowerCase() + abs.slice(1);
  }
  return abs;
}

/** Deepest directory containing every given path. */
export function commonRoot(paths: string[]): string | null {
  if (paths.length === 0) return null;
  const split = paths.map((p) => normalizeSeparators(resolve(p)).split("/"));
  const first = split[0];
  let len = first.length;
  for (const parts of split) {
    let i = 0;
    while (i < len && i < parts.length && parts[i] === first[i]) i++;
    len = i;
  }
  const joined = first.slice(0, len).join("/");
  return joined === "" ? "/" : joined;
}
