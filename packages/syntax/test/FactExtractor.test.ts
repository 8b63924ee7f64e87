import { describe, it, expect } from "vitest";
import {
  AdapterRegistry,
  FactExtractor,
  type LanguageAdapter,
  createDefaultRegistry,
} from "../src/index.js";

describe("FactExtractor", () => {
  const extractor = new FactExtractor(createDefaultRegistry());

  it("returns an error for unsupported extensions", async () => {
    const result = await extractor.extractFile("README.md", "# title\n");
    expect(result).toEqual({
      ok: false,
      error: { file: "README.md", kind: "unsupported-language", message: "no adapter for README.md" },
    });
    expect(extractor.supports("README.md")).toBe(false);
    expect(extractor.supports("src/a.tsx")).toBe(true);
  });

  it("keeps a broken file with a parse-failure diagnostic", async () => {
    const result = await extractor.extractFile("broken.py", "def f(:\n    pass\n");
    expect(result.ok).toBe(true);
    if (!result.ok) return;

    expect(result.value.path).toBe("broken.py");
    expect(result.value.language).toBe("python");
    expect(result.value.parsed).toBe(false);
    expect(result.value.facts).toEqual([]);
    expect(result.value.diagnostics).toHaveLength(1);
    expect(result.value.diagnostics[0].kind).toBe("parse-failure");
    expect(result.value.diagnostics[0].file).toBe("broken.py");
  });

  it("produces identical facts for identical text", async () => {
    const source = "import os\n\nclass A:\n    def m(self):\n        os.getcwd()\n";
    const first = await extractor.extractFile("a.py", source);
    const second = await extractor.extractFile("a.py", source);
    expect(first.ok).toBe(true);
    expect(second).toEqual(first);
  });

  it("converts an adapter crash into a parse failure", async () => {
    const crashing: LanguageAdapter = {
      language: "go",
      extract: async () => {
        throw new Error("grammar exploded");
      },
    };
    const guarded = new FactExtractor(new AdapterRegistry([crashing]));
    const result = await guarded.extractFile("main.go", "package main\n");
    expect(result).toEqual({
      ok: true,
      value: {
        path: "main.go",
        language: "go",
        facts: [],
        parsed: false,
        diagnostics: [{ file: "main.go", kind: "parse-failure", message: "grammar exploded" }],
      },
    });
  });

  it("honours a language subset", async () => {
    const pythonOnly = new FactExtractor(createDefaultRegistry(["python"]));
    expect(pythonOnly.supports("a.py")).toBe(true);
    expect(pythonOnly.supports("a.rs")).toBe(false);
  });
});
