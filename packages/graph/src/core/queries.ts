/**
 * Per-file views of a Graph.
 */
import type { DefinitionKind, LanguageId } from "@depgraph/syntax";

import type { Graph } from "./Graph.js";
import { fileId } from "./model.js";

export interface FileDefinition {
  qualifiedName: string;
  kind: DefinitionKind;
  line: number;
}

export interface FileImport {
  /** Module as written, after normalization */
  module: string;
  name: string | null;
  line: number;
  /** Resolved project file, or null for an external module */
  resolved: string | null;
}

export interface FileSummary {
  path: string;
  language: LanguageId;
  parsed: boolean;
  definitions: FileDefinition[];
  imports: FileImport[];
  /** Files importing this one, in discovery order */
  importers: string[];
}

export function fileSummary(graph: Graph, filePath: string): FileSummary | undefined {
  const node = graph.node(fileId(filePath));
  if (node?.type !== "file") return undefined;

  const definitions = graph
    .definitionNodes()
    .filter((d) => d.file === filePath)
    .map((d) => ({ qualifiedName: d.qualifiedName, kind: d.kind, line: d.span.start.line }));

  const imports = graph
    .imports()
    .filter((i) => i.file === filePath)
    .map((i) => {
      const target = graph.node(i.target);
      return {
        module: i.module,
        name: i.name,
        line: i.line,
        resolved: target?.type === "file" ? target.path : null,
      };
    });

  const importerIds = new Set(graph.incoming(node.id, "imports").map((e) => e.source));
  const importers = graph
    .fileNodes()
    .filter((f) => importerIds.has(f.id))
    .map((f) => f.path);

  return { path: node.path, language: node.language, parsed: node.parsed, definitions, imports, importers };
}
