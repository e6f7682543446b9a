/**
 * Deterministic JSON stringification with binary key ordering.
 * Array order is preserved (caller must canonicalize before if needed).
 * Undefined object members are dropped and non-finite numbers become null, as JSON.stringify does.
 */

import { createHash } from "crypto";
import { stringCompareBinary } from "./CanonicalOrder.js";

export function stableStringify(obj: unknown): string {
  if (obj === null || obj === undefined) return "null";
  if (typeof obj === "boolean") return String(obj);
  if (typeof obj === "number") return Number.isFinite(obj) ? String(obj) : "null";
  if (typeof obj === "string") return JSON.stringify(obj);

  if (Array.isArray(obj)) {
    const parts = obj.map((v) => stableStringify(v));
    return "[" + parts.join(",") + "]";
  }

  if (typeof obj === "object") {
    const entries: [string, unknown][] = Object.entries(obj)
      .filter(([, v]) => v !== undefined)
      .sort(([a], [b]) => stringCompareBinary(a, b));
    const parts = entries.map(([k, v]) => JSON.stringify(k) + ":" + stableStringify(v));
    return "{" + parts.join(",") + "}";
  }

  return "null";
}

/** Short SHA256 of the canonical serialization. */
export function stableHash(obj: unknown): string {
  return createHash("sha256").update(stableStringify(obj), "utf8").digest("hex").slice(0, 16);
}
