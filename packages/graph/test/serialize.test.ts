import { describe, it, expect } from "vitest";

import { Graph } from "../src/core/Graph.js";
import { edgeKey } from "../src/core/model.js";
import { GraphBuilder } from "../src/infrastructure/GraphBuilder.js";
import { fromJSON, GRAPH_FORMAT_VERSION, parseGraph, toJSON } from "../src/infrastructure/serialize.js";

async function sampleGraph(): Promise<Graph> {
  const result = await new GraphBuilder().buildFromSources([
    { path: "app/main.py", source: "import os\nfrom app import models\n\n\ndef run():\n    models.User()\n" },
    { path: "app/__init__.py", source: "" },
    { path: "app/models.py", source: "class User:\n    def save(self):\n        pass\n" },
    { path: "broken.py", source: "def broken(:\n" },
  ]);
  if (!result.ok) throw result.error;
  return result.value;
}

describe("serialize", () => {
  it("writes the versioned document with snake_case fields", async () => {
    const json = toJSON(await sampleGraph());

    expect(json.version).toBe(GRAPH_FORMAT_VERSION);
    expect(json.nodes.find((n) => n.id === "def:app/models.py:User.save:function")).toEqual({
      id: "def:app/models.py:User.save:function",
      type: "definition",
      kind: "function",
      qualified_name: "User.save",
      name: "save",
      file: "app/models.py",
      line: 2,
      span: expect.objectContaining({ start: { line: 2, column: 5 } }),
      container: "def:app/models.py:User:container",
    });
    expect(json.nodes.find((n) => n.type === "external")).toEqual({ id: "ext:os", type: "external", module: "os" });
    expect(json.references).toEqual([
      {
        kind: "container-use",
        qualified_name: "models.User",
        name: "User",
        file: "app/main.py",
        line: 6,
        scope: "run",
        target: "def:app/models.py:User:container",
      },
    ]);
  });

  it("round-trips through JSON text", async () => {
    const graph = await sampleGraph();
    const parsed = parseGraph(JSON.stringify(toJSON(graph)));
    expect(parsed.ok).toBe(true);
    if (!parsed.ok) return;

    const copy = parsed.value;
    expect(copy.nodes()).toHaveLength(graph.nodes().length);
    expect(copy.edges()).toHaveLength(graph.edges().length);
    expect(copy.edges().map(edgeKey)).toEqual(graph.edges().map(edgeKey));
    expect(copy.diagnostics()).toEqual(graph.diagnostics());
    expect(copy.stats()).toEqual(graph.stats());
  });

  it("reads documents without edge lines", () => {
    const result = fromJSON({
      version: 1,
      root: "/p",
      nodes: [
        { id: "file:a.py", type: "file", path: "a.py", language: "python", definitions: [], parsed: true },
        { id: "ext:os", type: "external", module: "os" },
      ],
      edges: [{ source: "file:a.py", target: "ext:os", kind: "imports" }],
      imports: [],
      references: [],
      diagnostics: [{ file: "a.py", kind: "malformed-fact", message: "reference: reference without a name", line: null }],
    });
    expect(result.ok).toBe(true);
    if (!result.ok) return;

    expect(result.value.edges()).toEqual([{ source: "file:a.py", target: "ext:os", kind: "imports", line: 0 }]);
    expect(result.value.diagnostics()).toEqual([
      { file: "a.py", kind: "malformed-fact", message: "reference: reference without a name" },
    ]);
  });

  it("rejects documents that do not match the schema", () => {
    const result = fromJSON({ version: 2, root: "", nodes: [], edges: [], imports: [], references: [], diagnostics: [] });
    expect(result.ok).toBe(false);
    if (result.ok) return;
    expect(result.error.message).toMatch(/^Invalid graph document: version: /);
  });

  it("rejects text that is not JSON", () => {
    expect(parseGraph("{ nodes").ok).toBe(false);
  });

  it("serializes an empty graph", () => {
    expect(toJSON(Graph.empty("/p"))).toEqual({
      version: 1,
      root: "/p",
      nodes: [],
      edges: [],
      imports: [],
      references: [],
      diagnostics: [],
    });
  });
});
