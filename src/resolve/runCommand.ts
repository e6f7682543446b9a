import { spawnSync } from "child_process";
import { parseResolvedPackage } from "../parse/showDependencies.js";
import type { ResolutionRunner } from "./types.js";

export const DEFAULT_RESOLVE_COMMAND: readonly string[] = [
  "swift",
  "package",
  "show-dependencies",
  "--format",
  "json",
];

export const DEFAULT_MANIFEST_COMMAND: readonly string[] = ["swift", "package", "dump-package"];

const MAX_BUFFER = 64 * 1024 * 1024;

/**
 * Run `command` in `cwd` and return its stdout.
 * Missing binary, non-zero exit or empty output → null. No timeout is enforced here.
 */
export function runCommand(command: readonly string[], cwd: string): string | null {
  const [bin, ...args] = command;
  if (!bin) return null;
  try {
    const out = spawnSync(bin, args, {
      cwd,
      encoding: "utf8",
      maxBuffer: MAX_BUFFER,
      stdio: ["ignore", "pipe", "pipe"],
    });
    if (out.error || out.status !== 0 || !out.stdout?.trim()) return null;
    return out.stdout;
  } catch {
    return null;
  }
}

/** Resolution runner backed by a package-manager subprocess. */
export function createCommandRunner(command: readonly string[] = DEFAULT_RESOLVE_COMMAND): ResolutionRunner {
  return (cwd) => {
    const stdout = runCommand(command, cwd);
    return stdout === null ? null : parseResolvedPackage(stdout);
  };
}
