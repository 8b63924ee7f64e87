/**
 * Read-only dependency graph with adjacency lookups.
 */

import type { Diagnostic, LanguageId } from "@depgraph/syntax";

import type {
  DefinitionNode,
  Edge,
  EdgeKind,
  ExternalModuleNode,
  FileNode,
  GraphData,
  GraphStats,
  ImportRecord,
  Node,
  ReferenceRecord,
} from "./model.js";

export class Graph {
  readonly root: string;

  private readonly nodeList: readonly Node[];
  private readonly edgeList: readonly Edge[];
  private readonly importList: readonly ImportRecord[];
  private readonly referenceList: readonly ReferenceRecord[];
  private readonly diagnosticList: readonly Diagnostic[];

  private readonly byId = new Map<string, Node>();
  private readonly outgoingEdges = new Map<string, Edge[]>(); // source -> edges
  private readonly incomingEdges = new Map<string, Edge[]>(); // target -> edges

  constructor(data: GraphData) {
    this.root = data.root;
    this.nodeList = data.nodes;
    this.edgeList = data.edges;
    this.importList = data.imports;
    this.referenceList = data.references;
    this.diagnosticList = data.diagnostics;

    for (const node of data.nodes) {
      this.byId.set(node.id, node);
    }

    for (const edge of data.edges) {
      appendTo(this.outgoingEdges, edge.source, edge);
      appendTo(this.incomingEdges, edge.target, edge);
    }
  }

  static empty(root = ""): Graph {
    return new Graph({ root, nodes: [], edges: [], imports: [], references: [], diagnostics: [] });
  }

  nodes(): readonly Node[] {
    return this.nodeList;
  }

  edges(): readonly Edge[] {
    return this.edgeList;
  }

  node(id: string): Node | undefined {
    return this.byId.get(id);
  }

  fileNodes(): FileNode[] {
    return this.nodeList.filter((n): n is FileNode => n.type === "file");
  }

  definitionNodes(): DefinitionNode[] {
    return this.nodeList.filter((n): n is DefinitionNode => n.type === "definition");
  }

  externalNodes(): ExternalModuleNode[] {
    return this.nodeList.filter((n): n is ExternalModuleNode => n.type === "external");
  }

  /**
   * Edges leaving a node, optionally of one kind.
   */
  outgoing(id: string, kind?: EdgeKind): Edge[] {
    const edges = this.outgoingEdges.get(id) ?? [];
    return kind ? edges.filter((e) => e.kind === kind) : [...edges];
  }

  /**
   * Edges entering a node, optionally of one kind.
   */
  incoming(id: string, kind?: EdgeKind): Edge[] {
    const edges = this.incomingEdges.get(id) ?? [];
    return kind ? edges.filter((e) => e.kind === kind) : [...edges];
  }

  imports(): readonly ImportRecord[] {
    return this.importList;
  }

  references(): readonly ReferenceRecord[] {
    return this.referenceList;
  }

  diagnostics(): readonly Diagnostic[] {
    return this.diagnosticList;
  }

  isEmpty(): boolean {
    return this.nodeList.length === 0;
  }

  stats(): GraphStats {
    const edgesByKind: Record<EdgeKind, number> = { imports: 0, references: 0, defines: 0 };
    for (const edge of this.edgeList) {
      edgesByKind[edge.kind]++;
    }

    const languages: Partial<Record<LanguageId, number>> = {};
    let files = 0;
    let failedFiles = 0;
    let definitions = 0;
    let externals = 0;
    for (const node of this.nodeList) {
      switch (node.type) {
        case "file":
          files++;
          if (!node.parsed) failedFiles++;
          languages[node.language] = (languages[node.language] ?? 0) + 1;
          break;
        case "definition":
          definitions++;
          break;
        case "external":
          externals++;
          break;
      }
    }

    return {
      nodes: this.nodeList.length,
      edges: this.edgeList.length,
      files,
      definitions,
      externals,
      edgesByKind,
      languages,
      failedFiles,
      diagnostics: this.diagnosticList.length,
    };
  }
}

function appendTo(map: Map<string, Edge[]>, key: string, edge: Edge): void {
  const list = map.get(key);
  if (list) {
    list.push(edge);
  } else {
    map.set(key, [edge]);
  }
}
