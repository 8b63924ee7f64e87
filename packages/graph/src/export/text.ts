/**
 * Plain-text summary of a graph.
 */
import { type Diagnostic, LANGUAGE_IDS } from "@depgraph/syntax";

import type { Graph } from "../core/Graph.js";

export function formatDiagnostic(diagnostic: Diagnostic): string {
  const where = diagnostic.line === undefined ? diagnostic.file : `${diagnostic.file}:${diagnostic.line}`;
  return `${where}: ${diagnostic.kind}: ${diagnostic.message}`;
}

/**
 * Header, totals, languages, files, external dependencies and import edges.
 * Empty sections other than the totals are left out.
 */
export function renderText(graph: Graph): string {
  const stats = graph.stats();
  const lines = [
    `# Dependency graph: ${graph.root || "(in memory)"}`,
    "",
    `Files: ${stats.files}${stats.failedFiles > 0 ? ` (${stats.failedFiles} failed)` : ""}`,
    `Definitions: ${stats.definitions}`,
    `External modules: ${stats.externals}`,
    `Edges: ${stats.edges} (imports ${stats.edgesByKind.imports}, references ${stats.edgesByKind.references}, ` +
      `defines ${stats.edgesByKind.defines})`,
    `Diagnostics: ${stats.diagnostics}`,
  ];

  const languages = LANGUAGE_IDS.flatMap((id) => {
    const count = stats.languages[id];
    return count ? [`- ${id}: ${count}`] : [];
  });
  section(lines, "Languages", languages);

  const definitionCounts = new Map<string, number>();
  for (const def of graph.definitionNodes()) {
    definitionCounts.set(def.file, (definitionCounts.get(def.file) ?? 0) + 1);
  }
  section(
    lines,
    "Files",
    graph.fileNodes().map((file) => {
      const count = definitionCounts.get(file.path) ?? 0;
      const failed = file.parsed ? "" : ", not parsed";
      return `- ${file.path} (${file.language}, ${count} ${count === 1 ? "definition" : "definitions"}${failed})`;
    })
  );

  section(
    lines,
    "External dependencies",
    graph.externalNodes().map((ext) => `- ${ext.module}`)
  );

  section(
    lines,
    "Imports",
    graph.edges().flatMap((edge) => {
      if (edge.kind !== "imports") return [];
      const source = graph.node(edge.source);
      const target = graph.node(edge.target);
      if (source?.type !== "file" || !target) return [];
      const name = target.type === "external" ? target.module : target.type === "file" ? target.path : target.id;
      return [`- ${source.path} -> ${name}`];
    })
  );

  return `${lines.join("\n")}\n`;
}

function section(lines: string[], title: string, body: string[]): void {
  if (body.length === 0) return;
  lines.push("", `## ${title}`, ...body);
}
