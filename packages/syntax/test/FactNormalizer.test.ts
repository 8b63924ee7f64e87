import { describe, it, expect } from "vitest";
import {
  type DefinitionFact,
  type RawFact,
  normalizeFact,
  normalizeFacts,
  splitRelative,
} from "../src/index.js";

function definition(
  name: string,
  kind: "function" | "container",
  start: [number, number],
  end: [number, number],
  container?: string
): RawFact {
  return {
    type: "definition",
    file: "m.py",
    line: start[0],
    column: start[1],
    kind,
    name,
    span: { start: { line: start[0], column: start[1] }, end: { line: end[0], column: end[1] } },
    ...(container ? { container } : {}),
  };
}

function reference(name: string, line: number, column = 5): RawFact {
  return { type: "reference", file: "m.py", line, column, kind: "function-call", name };
}

describe("splitRelative", () => {
  it("counts Python leading dots", () => {
    expect(splitRelative("..pkg.mod", "python")).toEqual({ module: "pkg.mod", level: 2 });
    expect(splitRelative(".", "python")).toEqual({ module: "", level: 1 });
    expect(splitRelative("pkg", "python")).toBeNull();
  });

  it("walks ./ and ../ prefixes for file-path languages", () => {
    expect(splitRelative("./util", "typescript")).toEqual({ module: "util", level: 1 });
    expect(splitRelative("../lib/x", "javascript")).toEqual({ module: "lib/x", level: 2 });
    expect(splitRelative("./../../x", "typescript")).toEqual({ module: "x", level: 3 });
    expect(splitRelative("..", "typescript")).toEqual({ module: "", level: 2 });
    expect(splitRelative("./internal", "go")).toEqual({ module: "internal", level: 1 });
    expect(splitRelative("github.com/a/b", "go")).toBeNull();
  });

  it("maps Rust path prefixes", () => {
    expect(splitRelative("self::a", "rust")).toEqual({ module: "a", level: 1 });
    expect(splitRelative("super::a::b", "rust")).toEqual({ module: "a::b", level: 2 });
    expect(splitRelative("super::super::a", "rust")).toEqual({ module: "a", level: 3 });
    expect(splitRelative("crate::a::b", "rust")).toEqual({ module: "a::b", level: 0 });
    expect(splitRelative("crate", "rust")).toEqual({ module: "", level: 0 });
    expect(splitRelative("std::io", "rust")).toBeNull();
  });
});

describe("normalizeFact", () => {
  it("drops an alias equal to the imported name", () => {
    const result = normalizeFact(
      { type: "import", file: "a.py", line: 1, column: 1, module: "pkg", name: "x", alias: "x" },
      "python"
    );
    expect(result).toEqual({
      ok: true,
      value: {
        type: "import",
        file: "a.py",
        line: 1,
        column: 1,
        module: "pkg",
        name: "x",
        alias: null,
        level: 0,
        raw: "pkg",
      },
    });
  });

  it("keeps an explicit level when the module has no prefix", () => {
    const result = normalizeFact(
      { type: "import", file: "a.py", line: 3, column: 1, module: "", name: "c", level: 1 },
      "python"
    );
    expect(result.ok && result.value).toMatchObject({ module: "", name: "c", level: 1, raw: "" });
  });

  it("rejects an absolute import without a module", () => {
    const result = normalizeFact({ type: "import", file: "a.ts", line: 2, column: 1, module: "" }, "typescript");
    expect(result).toEqual({
      ok: false,
      error: { file: "a.ts", kind: "malformed-fact", message: "import: import with an empty module name", line: 2 },
    });
  });

  it("rejects empty names and non-positive lines", () => {
    const noName = normalizeFact(reference("", 4), "python");
    expect(!noName.ok && noName.error.message).toBe("reference: reference without a name");

    const badLine = normalizeFact(definition("f", "function", [0, 1], [2, 1]), "python");
    expect(badLine).toEqual({
      ok: false,
      error: { file: "m.py", kind: "malformed-fact", message: "definition: invalid line 0" },
    });
  });

  it("appends an explicit container after the enclosing containers", () => {
    const outer: DefinitionFact = {
      type: "definition",
      file: "m.go",
      line: 1,
      column: 1,
      kind: "container",
      name: "Outer",
      qualifiedName: "Outer",
      container: null,
      span: { start: { line: 1, column: 1 }, end: { line: 9, column: 2 } },
    };
    const result = normalizeFact(definition("Start", "function", [3, 1], [5, 2], "Server"), "go", [outer]);
    expect(result.ok && [result.value.type === "definition" && result.value.qualifiedName]).toEqual([
      "Outer.Server.Start",
    ]);
  });
});

describe("normalizeFacts", () => {
  const raws: RawFact[] = [
    reference("late", 20),
    definition("method", "function", [2, 5], [4, 1]),
    definition("Klass", "container", [1, 1], [5, 1]),
    reference("inside", 3),
    reference("after", 6, 1),
  ];

  it("sorts by position and qualifies through the scope stack", () => {
    const { facts, diagnostics } = normalizeFacts("m.py", "python", raws);
    expect(diagnostics).toEqual([]);
    expect(
      facts.map((f) => (f.type === "definition" ? `def ${f.qualifiedName}` : `${f.type} ${f.name} @${f.type === "reference" ? f.scope : ""}`))
    ).toEqual(["def Klass", "def Klass.method", "reference inside @Klass.method", "reference after @null", "reference late @null"]);
  });

  it("pops a scope once a fact starts at its end", () => {
    const { facts } = normalizeFacts("m.py", "python", [
      definition("f", "function", [1, 1], [2, 10]),
      reference("edge", 2, 10),
    ]);
    const edge = facts[1];
    expect(edge.type === "reference" && edge.scope).toBeNull();
  });

  it("is a no-op on already normalized facts", () => {
    const once = normalizeFacts("m.py", "python", raws).facts;
    const twice = normalizeFacts("m.py", "python", once).facts;
    expect(twice).toEqual(once);
  });

  it("reports dropped facts and keeps the rest", () => {
    const { facts, diagnostics } = normalizeFacts("m.py", "python", [reference("", 1), reference("ok", 2)]);
    expect(facts).toHaveLength(1);
    expect(diagnostics).toEqual([
      { file: "m.py", kind: "malformed-fact", message: "reference: reference without a name", line: 1 },
    ]);
  });

  it("does not mutate the raw facts", () => {
    const input = [definition("g", "function", [1, 1], [2, 1])];
    const before = JSON.stringify(input);
    normalizeFacts("m.py", "python", input);
    expect(JSON.stringify(input)).toBe(before);
  });
});
