import { describe, it, expect, vi, beforeAll, afterAll } from "vitest";
import { mkdtempSync, rmSync } from "fs";
import { join } from "path";
import { tmpdir } from "os";
import { McpServer } from "@depgraph/core";

import { findImportCycles, mostCentralFiles } from "../src/core/analysis.js";
import type { Graph } from "../src/core/Graph.js";
import { fileSummary } from "../src/core/queries.js";
import { GraphBuilder } from "../src/infrastructure/GraphBuilder.js";
import { GraphSession } from "../src/infrastructure/GraphSession.js";
import { formatCycles, formatFileSummary, formatStats, registerAllTools } from "../src/tools/index.js";

const SOURCES = [
  { path: "app/__init__.py", source: "" },
  { path: "app/a.py", source: "from app import b\n\n\ndef run():\n    b.step()\n" },
  { path: "app/b.py", source: "import json\nfrom app import a\n\n\ndef step():\n    pass\n" },
];

async function buildSample(): Promise<Graph> {
  const result = await new GraphBuilder().buildFromSources(SOURCES);
  if (!result.ok) throw result.error;
  return result.value;
}

describe("fileSummary", () => {
  it("lists definitions, imports and importers", async () => {
    const graph = await buildSample();

    expect(fileSummary(graph, "app/b.py")).toEqual({
      path: "app/b.py",
      language: "python",
      parsed: true,
      definitions: [{ qualifiedName: "step", kind: "function", line: 5 }],
      imports: [
        { module: "json", name: null, line: 1, resolved: null },
        { module: "app", name: "a", line: 2, resolved: "app/a.py" },
      ],
      importers: ["app/a.py"],
    });
    expect(fileSummary(graph, "missing.py")).toBeUndefined();
  });

  it("formats a summary", async () => {
    const summary = fileSummary(await buildSample(), "app/a.py");
    expect(summary).toBeDefined();
    if (!summary) return;

    expect(formatFileSummary(summary)).toBe(
      [
        "## app/a.py",
        "",
        "**Language:** python",
        "",
        "### Definitions (1)",
        "- run (function) L4",
        "",
        "### Imports (1)",
        "- app (b) -> app/b.py L1",
        "",
        "### Imported by (1)",
        "- app/b.py",
      ].join("\n")
    );
  });
});

describe("formatCycles", () => {
  it("lists cycles and central files", async () => {
    const graph = await buildSample();
    const text = formatCycles(findImportCycles(graph), mostCentralFiles(graph, 1));

    expect(text).toBe(
      [
        "## Import Cycles",
        "",
        "1. app/a.py <-> app/b.py",
        "",
        "### Component sizes",
        "- 2: 1",
        "- 1: 1",
        "",
        "### Most central files",
        "- app/__init__.py 0.000",
      ].join("\n")
    );
  });
});

describe("formatStats", () => {
  it("reports counts per type and kind", async () => {
    const graph = await buildSample();
    expect(formatStats("Graph Statistics", graph.root, graph.stats())).toBe(
      [
        "## Graph Statistics",
        "",
        "**Root:** (in memory)",
        "**Nodes:** 6 (3 files, 2 definitions, 1 external)",
        "**Edges:** 6 (imports 3, references 1, defines 2)",
        "**Languages:** python 3",
        "**Failed files:** 0",
        "**Diagnostics:** 0",
      ].join("\n")
    );
  });
});

describe("GraphSession", () => {
  let empty: string;

  beforeAll(() => {
    empty = mkdtempSync(join(tmpdir(), "depgraph-session-"));
  });

  afterAll(() => {
    rmSync(empty, { recursive: true, force: true });
  });

  it("reports a missing graph until one is built", async () => {
    const session = new GraphSession(new GraphBuilder());
    const before = session.current();
    expect(before.ok).toBe(false);
    if (!before.ok) {
      expect(before.error.message).toBe("Graph not built. Call graph_build first.");
    }

    const update = await session.update("a.py", "");
    expect(update.ok).toBe(false);
  });

  it("reports a file it cannot read", async () => {
    const session = new GraphSession(new GraphBuilder());
    const dir = await session.build(empty);
    expect(dir.ok).toBe(true);

    const missing = await session.update("absent.py");
    expect(missing.ok).toBe(false);
    if (!missing.ok) {
      expect(missing.error.message).toMatch(/^Could not read absent\.py: /);
    }
  });

  it("keeps the previous graph when a build fails", async () => {
    const builder = new GraphBuilder();
    const session = new GraphSession(builder);
    const first = await session.build(empty);
    expect(first.ok).toBe(true);

    const failed = await session.build(join(empty, "missing"));
    expect(failed.ok).toBe(false);

    const current = session.current();
    expect(current.ok && first.ok && current.value === first.value).toBe(true);
  });

  it("re-parses a file of the current graph", async () => {
    const builder = new GraphBuilder();
    const session = new GraphSession(builder);
    const dir = await session.build(empty);
    expect(dir.ok).toBe(true);

    const updated = await session.update("extra.go", "package extra\n\nfunc Extra() {}\n");
    expect(updated.ok).toBe(true);
    if (!updated.ok) return;
    expect(updated.value.definitionNodes().map((d) => d.id)).toContain("def:extra.go:Extra:function");
  });
});

describe("registerAllTools", () => {
  it("registers every graph tool", () => {
    const server = new McpServer({ name: "test", version: "0.0.0" });
    const register = vi.spyOn(server, "registerTool");

    registerAllTools(server, { session: new GraphSession(new GraphBuilder()) });

    expect(register.mock.calls.map((call) => call[0])).toEqual([
      "graph_build",
      "graph_rebuild_file",
      "graph_stats",
      "graph_file",
      "graph_cycles",
      "graph_diagnostics",
      "graph_export",
    ]);
  });
});
