import { describe, it, expect } from "vitest";
import { comparePositions, detectLanguage, extensionsFor, isLanguageId } from "../src/index.js";

describe("language table", () => {
  it("detects languages by extension", () => {
    expect(detectLanguage("a/b.py")?.id).toBe("python");
    expect(detectLanguage("x.PYI")?.id).toBe("python");
    expect(detectLanguage("src/App.tsx")?.id).toBe("typescript");
    expect(detectLanguage("lib/index.mjs")?.id).toBe("javascript");
    expect(detectLanguage("src/main.rs")?.id).toBe("rust");
    expect(detectLanguage("cmd/main.go")?.id).toBe("go");
  });

  it("returns undefined for unsupported or extensionless paths", () => {
    expect(detectLanguage("README.md")).toBeUndefined();
    expect(detectLanguage("Makefile")).toBeUndefined();
    expect(detectLanguage("v1.2/Makefile")).toBeUndefined();
  });

  it("lists extensions per language subset", () => {
    expect(extensionsFor(["rust", "go"])).toEqual([".rs", ".go"]);
    expect(extensionsFor()).toHaveLength(12);
  });

  it("recognizes language ids", () => {
    expect(isLanguageId("go")).toBe(true);
    expect(isLanguageId("cpp")).toBe(false);
  });

  it("orders positions by line then column", () => {
    expect(comparePositions({ line: 1, column: 9 }, { line: 2, column: 1 })).toBeLessThan(0);
    expect(comparePositions({ line: 2, column: 3 }, { line: 2, column: 1 })).toBeGreaterThan(0);
    expect(comparePositions({ line: 2, column: 3 }, { line: 2, column: 3 })).toBe(0);
  });
});
