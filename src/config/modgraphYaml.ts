/**
 * .modgraph.yml loader (v1, frozen schema).
 * Unknown keys or invalid values → throw (CLI exits 2).
 * Missing file → defaults.
 */

import { readFileSync, existsSync } from "fs";
import { join } from "path";
import { parse } from "yaml";
import { DEFAULT_POLICY, type PinchPointPolicy } from "../analysis/policy.js";
import { DEFAULT_MANIFEST_COMMAND, DEFAULT_RESOLVE_COMMAND } from "../resolve/runCommand.js";

export const CONFIG_FILE = ".modgraph.yml";

const ALLOWED_KEYS = new Set(["exclude", "top", "policy", "resolveCommand", "manifestCommand"]);
const POLICY_KEYS = new Set(["critical", "high", "medium", "depthWeight"]);
const DEFAULT_TOP = 10;
const MIN_TOP = 1;
const MAX_TOP = 1000;
const MAX_DEPTH_WEIGHT = 10;

export interface ModgraphConfig {
  exclude: string[];
  top: number;
  policy: PinchPointPolicy;
  resolveCommand: string[];
  manifestCommand: string[];
}

export function defaultConfig(): ModgraphConfig {
  return {
    exclude: [],
    top: DEFAULT_TOP,
    policy: { ...DEFAULT_POLICY },
    resolveCommand: [...DEFAULT_RESOLVE_COMMAND],
    manifestCommand: [...DEFAULT_MANIFEST_COMMAND],
  };
}

function isRecord(v: unknown): v is Record<string, unknown> {
  return v !== null && typeof v === "object" && !Array.isArray(v);
}

function stringList(value: unknown, key: string, allowEmpty: boolean): string[] {
  if (!Array.isArray(value)) {
    throw new Error(`${CONFIG_FILE}: ${key} must be an array of strings`);
  }
  const out: string[] = [];
  for (let i = 0; i < value.length; i++) {
    const v: unknown = value[i];
    if (typeof v !== "string" || v === "") {
      throw new Error(`${CONFIG_FILE}: ${key}[${i}] must be a non-empty string`);
    }
    out.push(v);
  }
  if (!allowEmpty && out.length === 0) {
    throw new Error(`${CONFIG_FILE}: ${key} must not be empty`);
  }
  return out;
}

function threshold(raw: Record<string, unknown>, key: "critical" | "high" | "medium", fallback: number): number {
  if (raw[key] === undefined) return fallback;
  const n = Number(raw[key]);
  if (!Number.isInteger(n) || n < 1) {
    throw new Error(`${CONFIG_FILE}: policy.${key} must be a positive integer`);
  }
  return n;
}

function parsePolicy(value: unknown): PinchPointPolicy {
  if (!isRecord(value)) {
    throw new Error(`${CONFIG_FILE}: policy must be an object`);
  }
  for (const key of Object.keys(value)) {
    if (!POLICY_KEYS.has(key)) {
      throw new Error(`${CONFIG_FILE}: unknown key "policy.${key}"`);
    }
  }

  const critical = threshold(value, "critical", DEFAULT_POLICY.critical);
  const high = threshold(value, "high", DEFAULT_POLICY.high);
  const medium = threshold(value, "medium", DEFAULT_POLICY.medium);
  if (!(critical > high && high > medium)) {
    throw new Error(`${CONFIG_FILE}: policy thresholds must satisfy critical > high > medium`);
  }

  let depthWeight = DEFAULT_POLICY.depthWeight;
  if (value.depthWeight !== undefined) {
    const n = Number(value.depthWeight);
    if (!Number.isFinite(n) || n < 0 || n > MAX_DEPTH_WEIGHT) {
      throw new Error(`${CONFIG_FILE}: policy.depthWeight must be a number between 0 and ${MAX_DEPTH_WEIGHT}`);
    }
    depthWeight = n;
  }

  return { critical, high, medium, depthWeight };
}

/** Validate an already-parsed document. */
export function validateConfig(raw: unknown): ModgraphConfig {
  const config = defaultConfig();
  if (raw === null || raw === undefined) return config;
  if (!isRecord(raw)) {
    throw new Error(`${CONFIG_FILE}: root must be an object`);
  }

  for (const key of Object.keys(raw)) {
    if (!ALLOWED_KEYS.has(key)) {
      throw new Error(`${CONFIG_FILE}: unknown key "${key}" (v1 schema is frozen)`);
    }
  }

  if (raw.exclude !== undefined) config.exclude = stringList(raw.exclude, "exclude", true);

  if (raw.top !== undefined) {
    const n = Number(raw.top);
    if (!Number.isInteger(n) || n < MIN_TOP || n > MAX_TOP) {
      throw new Error(`${CONFIG_FILE}: top must be an integer between ${MIN_TOP} and ${MAX_TOP}`);
    }
    config.top = n;
  }

  if (raw.policy !== undefined) config.policy = parsePolicy(raw.policy);
  if (raw.resolveCommand !== undefined) config.resolveCommand = stringList(raw.resolveCommand, "resolveCommand", false);
  if (raw.manifestCommand !== undefined) {
    config.manifestCommand = stringList(raw.manifestCommand, "manifestCommand", false);
  }

  return config;
}

/** Load and validate .modgraph.yml from the scan root. */
export function loadModgraphConfig(root: string): ModgraphConfig {
  const path = join(root, CONFIG_FILE);
  if (!existsSync(path)) return defaultConfig();

  let raw: unknown;
  try {
    raw = parse(readFileSync(path, "utf8"));
  } catch (err) {
    const msg = err instanceof Error ? err.message : String(err);
    throw new Error(`${CONFIG_FILE}: invalid YAML: ${msg}`);
  }
  return validateConfig(raw);
}
