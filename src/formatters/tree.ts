/**
 * Per-project tree of the scanned records, with the dependencies more than one
 * project shares. Works on the records, before any merging.
 */

import { stringCompareBinary } from "../determinism/CanonicalOrder.js";
import { canonicalPath } from "../fs/canonicalPath.js";
import { normalizeModuleName } from "../graph/identity.js";
import type { DependencyInfo } from "../graph/types.js";

const RULE = "═".repeat(70);

interface SharedEntry {
  name: string;
  projects: Set<string>;
}

function branch(index: number, count: number): string {
  return index === count - 1 ? "└──" : "├──";
}

/** Dependency names of one record, deduped case-insensitively, binary-sorted. */
function recordDependencies(record: DependencyInfo): string[] {
  const seen = new Map<string, string>();
  for (const d of record.dependencies) {
    const key = normalizeModuleName(d);
    if (key === "") continue;
    const prev = seen.get(key);
    if (prev === undefined || stringCompareBinary(d, prev) < 0) seen.set(key, d);
  }
  return [...seen.values()].sort(stringCompareBinary);
}

export function formatTree(records: DependencyInfo[], scanRoot: string): string {
  const sorted = [...records].sort(
    (a, b) => stringCompareBinary(a.name, b.name) || stringCompareBinary(a.path, b.path),
  );
  const deps = sorted.map(recordDependencies);

  const usage = new Map<string, SharedEntry>();
  sorted.forEach((record, i) => {
    const project = `${record.name} (${canonicalPath(record.path, scanRoot)})`;
    for (const d of deps[i]) {
      const key = normalizeModuleName(d);
      const entry = usage.get(key) ?? { name: d, projects: new Set<string>() };
      if (stringCompareBinary(d, entry.name) < 0) entry.name = d;
      entry.projects.add(project);
      usage.set(key, entry);
    }
  });
  const usedBy = (d: string): number => usage.get(normalizeModuleName(d))?.projects.size ?? 0;

  const lines: string[] = [RULE, "DEPENDENCY TREE", RULE];
  sorted.forEach((record, i) => {
    lines.push("", `┌─ ${record.name}`, `│  Path: ${canonicalPath(record.path, scanRoot)}`, "│");
    const list = deps[i];
    list.forEach((d, j) => {
      const n = usedBy(d);
      const marker = n > 1 ? ` [shared by ${n} projects]` : "";
      lines.push(`│  ${branch(j, list.length)} ${d}${marker}`);
    });
  });

  const shared = [...usage.values()]
    .filter((e) => e.projects.size > 1)
    .sort((a, b) => stringCompareBinary(a.name, b.name));
  if (shared.length > 0) {
    lines.push("", RULE, "SHARED DEPENDENCIES", RULE);
    for (const entry of shared) {
      const projects = [...entry.projects].sort(stringCompareBinary);
      lines.push("", `◆ ${entry.name}`);
      projects.forEach((p, j) => lines.push(`  ${branch(j, projects.length)} ${p}`));
    }
  }

  lines.push(
    "",
    RULE,
    "STATISTICS",
    RULE,
    `Projects scanned: ${sorted.length}`,
    `Unique dependencies: ${usage.size}`,
    `Shared dependencies: ${shared.length}`,
  );
  return lines.join("\n");
}
