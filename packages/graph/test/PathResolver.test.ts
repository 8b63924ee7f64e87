import { describe, it, expect } from "vitest";
import type { LanguageId } from "@depgraph/syntax";

import { FileIndex } from "../src/core/FileIndex.js";
import { directoryDistance, PathResolver } from "../src/core/PathResolver.js";

function resolverFor(language: LanguageId, paths: string[]): PathResolver {
  return new PathResolver(new FileIndex(paths.map((path) => ({ path, language }))));
}

function imp(module: string, raw: string, level = 0, name: string | null = null) {
  return { module, raw, level, name };
}

describe("directoryDistance", () => {
  it("counts segments through the common ancestor", () => {
    expect(directoryDistance("a/b", "a/c")).toBe(2);
    expect(directoryDistance("", "src")).toBe(1);
    expect(directoryDistance("a/b", "a/b")).toBe(0);
  });
});

describe("PathResolver", () => {
  describe("python", () => {
    const resolver = resolverFor("python", ["a/__init__.py", "a/b.py", "a/c.py", "c.py", "main.py", "src/util.py"]);

    it("resolves a sibling import in the importing package", () => {
      expect(resolver.resolve(imp("", ".", 1, "c"), "a/b.py")).toEqual({ kind: "file", path: "a/c.py" });
    });

    it("resolves absolute imports by dotted path", () => {
      expect(resolver.resolve(imp("c", "c"), "a/b.py")).toEqual({ kind: "file", path: "c.py" });
      expect(resolver.resolve(imp("a.c", "a.c"), "main.py")).toEqual({ kind: "file", path: "a/c.py" });
    });

    it("imports a package through its __init__", () => {
      expect(resolver.resolve(imp("a", "a"), "main.py")).toEqual({ kind: "file", path: "a/__init__.py" });
    });

    it("treats a src directory as a source root", () => {
      expect(resolver.resolve(imp("util", "util"), "main.py")).toEqual({ kind: "file", path: "src/util.py" });
    });

    it("leaves unknown modules external, keyed by the module as written", () => {
      expect(resolver.resolve(imp("os.path", "os.path"), "main.py")).toEqual({ kind: "external", module: "os.path" });
    });

    it("falls back to an absolute lookup past the project root", () => {
      expect(resolver.resolve(imp("", "..", 2, "c"), "main.py")).toEqual({ kind: "file", path: "c.py" });
    });
  });

  describe("ecmascript", () => {
    const resolver = resolverFor("typescript", ["lib/index.ts", "web/app.ts", "web/util.ts"]);

    it("maps a compiled extension to its TypeScript source", () => {
      expect(resolver.resolve(imp("util.js", "./util.js", 1), "web/app.ts")).toEqual({
        kind: "file",
        path: "web/util.ts",
      });
    });

    it("resolves a directory import to its index file", () => {
      expect(resolver.resolve(imp("lib", "../lib", 2), "web/app.ts")).toEqual({ kind: "file", path: "lib/index.ts" });
    });

    it("keeps bare specifiers external", () => {
      expect(resolver.resolve(imp("react", "react"), "web/app.ts")).toEqual({ kind: "external", module: "react" });
    });
  });

  describe("rust", () => {
    const resolver = resolverFor("rust", ["src/main.rs", "src/net/client.rs", "src/util.rs"]);

    it("resolves a module declaration next to the crate root", () => {
      expect(resolver.resolve(imp("util", "self::util", 1), "src/main.rs")).toEqual({ kind: "file", path: "src/util.rs" });
    });

    it("trims item names from crate paths", () => {
      expect(resolver.resolve(imp("net::client::Client", "crate::net::client::Client"), "src/main.rs")).toEqual({
        kind: "file",
        path: "src/net/client.rs",
      });
    });

    it("keeps other crates external", () => {
      expect(resolver.resolve(imp("serde::Serialize", "serde::Serialize"), "src/main.rs")).toEqual({
        kind: "external",
        module: "serde::Serialize",
      });
    });
  });

  describe("go", () => {
    it("matches the package directory at the end of the import path", () => {
      const resolver = resolverFor("go", ["cmd/main.go", "internal/store/db.go"]);
      expect(resolver.resolve(imp("example.com/app/internal/store", "example.com/app/internal/store"), "cmd/main.go")).toEqual({
        kind: "file",
        path: "internal/store/db.go",
      });
      expect(resolver.resolve(imp("fmt", "fmt"), "cmd/main.go")).toEqual({ kind: "external", module: "fmt" });
    });

    it("breaks ties by path order, whatever the discovery order", () => {
      const forward = resolverFor("go", ["main.go", "util/a.go", "util/b.go"]);
      const backward = resolverFor("go", ["util/b.go", "util/a.go", "main.go"]);
      const fact = imp("example.com/app/util", "example.com/app/util");

      expect(forward.resolve(fact, "main.go")).toEqual({ kind: "file", path: "util/a.go" });
      expect(backward.resolve(fact, "main.go")).toEqual({ kind: "file", path: "util/a.go" });
    });
  });

  it("prefers the candidate nearest to the importing file", () => {
    // Both files declare the module path "x": one at the root, one under src/
    const resolver = resolverFor("typescript", ["main.ts", "src/app.ts", "src/x.ts", "x.ts"]);
    expect(resolver.resolve(imp("x", "x"), "src/app.ts")).toEqual({ kind: "file", path: "src/x.ts" });
    expect(resolver.resolve(imp("x", "x"), "main.ts")).toEqual({ kind: "file", path: "x.ts" });
  });
});
