/**
 * Graph model: file, definition and external module nodes joined by
 * imports, references and defines edges.
 */
import type { DefinitionKind, Diagnostic, LanguageId, ReferenceKind, Span } from "@depgraph/syntax";

export const EDGE_KINDS = ["imports", "references", "defines"] as const;

export type EdgeKind = (typeof EDGE_KINDS)[number];

export interface FileNode {
  type: "file";
  /** `file:<path>` */
  id: string;
  /** POSIX path relative to the project root */
  path: string;
  language: LanguageId;
  /** Ids of definitions not nested in a container */
  definitions: string[];
  /** False after a read or parse failure */
  parsed: boolean;
}

export interface DefinitionNode {
  type: "definition";
  /** `def:<path>:<qualifiedName>:<kind>` */
  id: string;
  kind: DefinitionKind;
  qualifiedName: string;
  name: string;
  file: string;
  span: Span;
  /** Id of the enclosing container definition */
  container: string | null;
}

export interface ExternalModuleNode {
  type: "external";
  /** `ext:<module>` */
  id: string;
  /** Module name as written in the import */
  module: string;
}

export type Node = FileNode | DefinitionNode | ExternalModuleNode;

export type NodeType = Node["type"];

export interface Edge {
  source: string;
  target: string;
  kind: EdgeKind;
  /** Line of the first fact that produced the edge; not part of its identity */
  line: number;
}

/**
 * One import statement and where it resolved.
 */
export interface ImportRecord {
  file: string;
  line: number;
  module: string;
  name: string | null;
  alias: string | null;
  level: number;
  /** Id of the target FileNode or ExternalModuleNode */
  target: string;
}

/**
 * One reference and the definition it matched, if any.
 */
export interface ReferenceRecord {
  kind: ReferenceKind;
  /** `receiver.name`, or the name alone */
  qualifiedName: string;
  name: string;
  file: string;
  line: number;
  scope: string | null;
  target: string | null;
}

export interface GraphStats {
  nodes: number;
  edges: number;
  files: number;
  definitions: number;
  externals: number;
  edgesByKind: Record<EdgeKind, number>;
  languages: Partial<Record<LanguageId, number>>;
  /** Files that could not be read or parsed */
  failedFiles: number;
  diagnostics: number;
}

export interface GraphData {
  root: string;
  nodes: Node[];
  edges: Edge[];
  imports: ImportRecord[];
  references: ReferenceRecord[];
  diagnostics: Diagnostic[];
}

export function fileId(path: string): string {
  return `file:${path}`;
}

export function definitionId(file: string, qualifiedName: string, kind: DefinitionKind): string {
  return `def:${file}:${qualifiedName}:${kind}`;
}

export function externalId(module: string): string {
  return `ext:${module}`;
}

/**
 * Identity of an edge: source, target and kind.
 */
export function edgeKey(edge: Pick<Edge, "source" | "target" | "kind">): string {
  return JSON.stringify([edge.source, edge.target, edge.kind]);
}
