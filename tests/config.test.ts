import { mkdtempSync, rmSync, writeFileSync } from "fs";
import { join } from "path";
import { tmpdir } from "os";
import { CONFIG_FILE, defaultConfig, loadModgraphConfig, validateConfig } from "../src/config/modgraphYaml.js";

describe("validateConfig", () => {
  it("returns defaults for an empty document", () => {
    expect(validateConfig(null)).toEqual(defaultConfig());
    expect(defaultConfig().top).toBe(10);
    expect(defaultConfig().policy).toEqual({ critical: 20, high: 10, medium: 5, depthWeight: 0.2 });
  });

  it("merges a partial policy over the defaults", () => {
    const config = validateConfig({ top: 5, exclude: ["Vendor"], policy: { critical: 30 } });
    expect(config.top).toBe(5);
    expect(config.exclude).toEqual(["Vendor"]);
    expect(config.policy).toEqual({ critical: 30, high: 10, medium: 5, depthWeight: 0.2 });
  });

  it("rejects unknown keys", () => {
    expect(() => validateConfig({ bogus: 1 })).toThrow('.modgraph.yml: unknown key "bogus" (v1 schema is frozen)');
    expect(() => validateConfig({ policy: { low: 1 } })).toThrow('unknown key "policy.low"');
  });

  it("rejects thresholds out of order", () => {
    expect(() => validateConfig({ policy: { high: 25 } })).toThrow("critical > high > medium");
  });

  it("rejects out of range values", () => {
    expect(() => validateConfig({ top: 0 })).toThrow("top must be an integer between 1 and 1000");
    expect(() => validateConfig({ policy: { depthWeight: -1 } })).toThrow("policy.depthWeight");
    expect(() => validateConfig({ resolveCommand: [] })).toThrow("resolveCommand must not be empty");
    expect(() => validateConfig({ exclude: "Vendor" })).toThrow("exclude must be an array of strings");
  });
});

describe("loadModgraphConfig", () => {
  let tmpDir: string;

  beforeEach(() => {
    tmpDir = mkdtempSync(join(tmpdir(), "modgraph-config-"));
  });

  afterEach(() => {
    rmSync(tmpDir, { recursive: true, force: true });
  });

  it("uses defaults when the file is absent", () => {
    expect(loadModgraphConfig(tmpDir)).toEqual(defaultConfig());
  });

  it("reads the file from the root", () => {
    writeFileSync(
      join(tmpDir, CONFIG_FILE),
      ["top: 3", "exclude:", "  - Vendor", "resolveCommand: [swift, package, show-dependencies, --format, json]"].join("\n"),
      "utf8",
    );
    const config = loadModgraphConfig(tmpDir);
    expect(config.top).toBe(3);
    expect(config.exclude).toEqual(["Vendor"]);
    expect(config.resolveCommand).toEqual(["swift", "package", "show-dependencies", "--format", "json"]);
  });

  it("reports invalid YAML", () => {
    writeFileSync(join(tmpDir, CONFIG_FILE), "exclude: [Vendor", "utf8");
    expect(() => loadModgraphConfig(tmpDir)).toThrow(/^\.modgraph\.yml: invalid YAML/);
  });
});
