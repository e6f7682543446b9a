import {
  containerId,
  moduleId,
  normalizeModuleName,
  schemaVersionFor,
  subTargetId,
} from "../src/graph/identity.js";
import { absoluteCanonicalPath, canonicalPath, commonRoot } from "../src/fs/canonicalPath.js";

describe("node identity", () => {
  it("module ids are case-insensitive and trimmed", () => {
    expect(normalizeModuleName("  Alamofire ")).toBe("alamofire");
    expect(moduleId("Alamofire")).toBe("module:alamofire");
    expect(moduleId("alamofire")).toBe(moduleId("ALAMOFIRE"));
  });

  it("stable container ids are relative to the scan root", () => {
    const ctx = { scheme: "stable" as const, scanRoot: "/work/repo" };
    expect(containerId(ctx, "App", "/work/repo/apps/ios")).toBe("container:App@apps/ios");
    expect(containerId(ctx, "Root", "/work/repo")).toBe("container:Root@.");
  });

  it("stable ids do not depend on where the tree is checked out", () => {
    const a = { scheme: "stable" as const, scanRoot: "/home/one/repo" };
    const b = { scheme: "stable" as const, scanRoot: "/tmp/ci/checkout" };
    expect(containerId(a, "App", "/home/one/repo/App")).toBe(containerId(b, "App", "/tmp/ci/checkout/App"));
    expect(subTargetId(a, "App", "/home/one/repo/App", "Core")).toBe(
      subTargetId(b, "App", "/tmp/ci/checkout/App", "Core"),
    );
  });

  it("legacy ids keep the absolute path", () => {
    const ctx = { scheme: "legacy" as const, scanRoot: "/work/repo" };
    expect(containerId(ctx, "App", "/work/repo/App")).toBe("container:App@/work/repo/App");
    expect(subTargetId(ctx, "App", "/work/repo/App", "Core")).toBe("target:App@/work/repo/App/Core");
  });

  it("a container and a same-named module never share an id", () => {
    const ctx = { scheme: "stable" as const, scanRoot: "/r" };
    expect(containerId(ctx, "Core", "/r/Core")).not.toBe(moduleId("Core"));
  });

  it("stamps schema version 2 for stable ids and 1 for legacy", () => {
    expect(schemaVersionFor("stable")).toBe(2);
    expect(schemaVersionFor("legacy")).toBe(1);
  });
});

describe("canonical paths", () => {
  it("relative path with forward slashes and no trailing slash", () => {
    expect(canonicalPath("/a/b/c/", "/a")).toBe("b/c");
    expect(canonicalPath("/a/b/../c", "/a")).toBe("c");
    expect(canonicalPath("/a", "/a")).toBe(".");
    expect(canonicalPath("/x/y", "/a")).toBe("../x/y");
  });

  it("absolute canonical path drops the trailing slash", () => {
    expect(absoluteCanonicalPath("/a/b/")).toBe("/a/b");
  });

  it("common root is the deepest shared directory", () => {
    expect(commonRoot(["/r/apps/one", "/r/apps/two", "/r/libs/core"])).toBe("/r");
    expect(commonRoot(["/r/apps/one"])).toBe("/r/apps/one");
    expect(commonRoot(["/a/x", "/b/y"])).toBe("/");
    expect(commonRoot([])).toBeNull();
  });
});
