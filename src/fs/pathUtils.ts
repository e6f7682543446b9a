import { normalize, sep } from "path";

/**
 * Normalize path separators to forward slashes for deterministic cross-platform output.
 */
export function normalizeSeparators(p: string): string {
  return normalize(p).split(sep).join("/");
}

export function stripExtension(segment: string): string {
  const dot = segment.lastIndexOf(".");
  return dot > 0 ? segment.slice(0, dot) : segment;
}
