/**
 * modgraph CLI. Results go to stdout, diagnostics to stderr.
 * Exit codes: 0 success (including "nothing to analyze"), 2 usage or hard failure.
 */

import { resolve } from "path";
import { analyzePinchPoints } from "../analysis/pinchPoints.js";
import { loadModgraphConfig, type ModgraphConfig } from "../config/modgraphYaml.js";
import { diffGraphs } from "../diff/diffGraphs.js";
import { scanProjects, ScanRootError } from "../fs/scanProjects.js";
import { formatPinchPointReport } from "../formatters/analysis.js";
import { formatDiffText } from "../formatters/diff.js";
import { formatDot } from "../formatters/dot.js";
import { formatDiffJson, formatGraphJson } from "../formatters/json.js";
import { formatLayeredGraph } from "../formatters/layers.js";
import { formatGraphText } from "../formatters/text.js";
import { formatTree } from "../formatters/tree.js";
import { buildGraph } from "../graph/buildGraph.js";
import type { DependencyInfo, Graph, IdScheme } from "../graph/types.js";
import { ResolutionCache } from "../resolve/ResolutionCache.js";
import { createCommandRunner } from "../resolve/runCommand.js";
import type { ResolutionRunner } from "../resolve/types.js";
import { getFlagValue, hasFlag, positionals, unknownFlags } from "./args.js";

export interface CliIO {
  out(text: string): void;
  err(text: string): void;
}

export const consoleIO: CliIO = {
  out: (text) => console.log(text),
  err: (text) => console.error(text),
};

/** Subprocess seams; the defaults run the configured package-manager commands. */
export interface CliDeps {
  resolutionRunner?: ResolutionRunner;
  dumpManifest?: (dir: string) => string | null;
}

const GRAPH_FORMATS = new Set(["text", "graph", "tree", "dot", "json", "analyze"]);
const DIFF_FORMATS = new Set(["text", "json"]);
const KNOWN_FLAGS = new Set([
  "--format",
  "--top",
  "--show-targets",
  "--hide-transient",
  "--resolve",
  "--legacy-ids",
  "--internal-only",
  "--verbose",
  "--help",
]);

export const USAGE = [
  "usage: modgraph <dir> [--format text|graph|tree|dot|json|analyze] [options]",
  "       modgraph diff <from-dir> <to-dir> [--format text|json] [options]",
  "",
  "options:",
  "  --show-targets     include sub-targets as nodes",
  "  --hide-transient   drop dependencies nothing declares directly",
  "  --resolve          add package-to-package edges from the package manager",
  "  --legacy-ids       ids with absolute paths instead of scan-root relative ones",
  "  --internal-only    analyze: leave external modules out of the candidates",
  "  --top N            analyze: entries per ranking",
  "  --verbose          report skipped files and roots on stderr",
].join("\n");

interface RunFlags {
  includeSubTargets: boolean;
  hideTransient: boolean;
  resolve: boolean;
  idScheme: IdScheme;
  internalOnly: boolean;
  verbose: boolean;
}

class UsageError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "UsageError";
  }
}

function readFlags(args: string[]): RunFlags {
  return {
    includeSubTargets: hasFlag(args, "--show-targets"),
    hideTransient: hasFlag(args, "--hide-transient"),
    resolve: hasFlag(args, "--resolve"),
    idScheme: hasFlag(args, "--legacy-ids") ? "legacy" : "stable",
    internalOnly: hasFlag(args, "--internal-only"),
    verbose: hasFlag(args, "--verbose"),
  };
}

function readTop(args: string[], config: ModgraphConfig): number {
  const raw = getFlagValue(args, "--top");
  if (raw === null) return config.top;
  const n = Number(raw);
  if (!Number.isInteger(n) || n < 1) throw new UsageError(`--top must be a positive integer, got "${raw}"`);
  return n;
}

function readFormat(args: string[], allowed: Set<string>): string {
  const format = getFlagValue(args, "--format") ?? "text";
  if (!allowed.has(format)) {
    throw new UsageError(`unknown format "${format}" (expected ${[...allowed].join(", ")})`);
  }
  return format;
}

interface ScannedGraph {
  graph: Graph;
  records: DependencyInfo[];
  scanRoot: string;
}

/** Scan and build one side. null when no project files were found. */
function graphForRoot(
  root: string,
  flags: RunFlags,
  config: ModgraphConfig,
  resolution: ResolutionCache | undefined,
  io: CliIO,
  deps: CliDeps,
): ScannedGraph | null {
  const scan = scanProjects(root, {
    exclude: config.exclude,
    manifestCommand: config.manifestCommand,
    dumpManifest: deps.dumpManifest,
  });
  if (flags.verbose) {
    for (const path of scan.skipped) io.err(`modgraph: skipped ${path}`);
  }
  if (scan.records.length === 0) return null;

  const graph = buildGraph(scan.records, {
    includeSubTargets: flags.includeSubTargets,
    hideTransient: flags.hideTransient,
    idScheme: flags.idScheme,
    scanRoot: scan.root,
    resolution,
    onWarning: flags.verbose ? (message) => io.err(`modgraph: ${message}`) : undefined,
  });
  return { graph, records: scan.records, scanRoot: scan.root };
}

function createResolution(flags: RunFlags, config: ModgraphConfig, deps: CliDeps): ResolutionCache | undefined {
  if (!flags.resolve) return undefined;
  return new ResolutionCache(deps.resolutionRunner ?? createCommandRunner(config.resolveCommand));
}

function runGraph(args: string[], io: CliIO, deps: CliDeps): number {
  const [dir, ...extra] = positionals(args);
  if (dir === undefined || extra.length > 0) throw new UsageError("expected exactly one directory");
  const root = resolve(dir);
  const flags = readFlags(args);
  const format = readFormat(args, GRAPH_FORMATS);
  const config = loadModgraphConfig(root);
  const top = readTop(args, config);

  const scanned = graphForRoot(root, flags, config, createResolution(flags, config, deps), io, deps);
  if (!scanned) {
    io.out(`No project files found in ${dir}`);
    return 0;
  }

  const { graph } = scanned;
  switch (format) {
    case "graph":
      io.out(formatLayeredGraph(graph));
      break;
    case "tree":
      io.out(formatTree(scanned.records, scanned.scanRoot));
      break;
    case "dot":
      io.out(formatDot(graph));
      break;
    case "json":
      io.out(formatGraphJson(graph));
      break;
    case "analyze": {
      const analysis = analyzePinchPoints(graph, { internalOnly: flags.internalOnly, policy: config.policy });
      io.out(formatPinchPointReport(graph, analysis, { top, internalOnly: flags.internalOnly }));
      break;
    }
    default:
      io.out(formatGraphText(graph));
  }
  return 0;
}

function runDiff(args: string[], io: CliIO, deps: CliDeps): number {
  const dirs = positionals(args.slice(1));
  if (dirs.length !== 2) throw new UsageError("diff expects <from-dir> <to-dir>");
  const [fromRoot, toRoot] = dirs.map((d) => resolve(d));
  const flags = readFlags(args);
  const format = readFormat(args, DIFF_FORMATS);
  const config = loadModgraphConfig(fromRoot);
  if (flags.idScheme === "legacy") {
    io.err("modgraph: legacy ids embed absolute paths; containers in different roots never match");
  }

  // One cache for both sides: the same package reached from either root resolves once.
  const resolution = createResolution(flags, config, deps);
  const empty = buildGraph([], {
    includeSubTargets: flags.includeSubTargets,
    hideTransient: flags.hideTransient,
    idScheme: flags.idScheme,
    resolution,
  });
  const from = graphForRoot(fromRoot, flags, config, resolution, io, deps)?.graph ?? empty;
  const to = graphForRoot(toRoot, flags, config, resolution, io, deps)?.graph ?? empty;
  const diff = diffGraphs(from, to);

  io.out(format === "json" ? formatDiffJson(diff, flags.idScheme) : formatDiffText(diff));
  return 0;
}

export function runCli(args: string[], io: CliIO = consoleIO, deps: CliDeps = {}): number {
  if (hasFlag(args, "--help")) {
    io.out(USAGE);
    return 0;
  }
  try {
    const unknown = unknownFlags(args, KNOWN_FLAGS);
    if (unknown.length > 0) throw new UsageError(`unknown option ${unknown[0]}`);
    return args[0] === "diff" ? runDiff(args, io, deps) : runGraph(args, io, deps);
  } catch (err) {
    const msg = err instanceof Error ? err.message : String(err);
    io.err(`modgraph: ${msg}`);
    if (err instanceof UsageError) io.err(USAGE);
    else if (!(err instanceof ScanRootError) && !msg.startsWith(".modgraph.yml")) throw err;
    return 2;
  }
}
