/**
 * Turns every file's normalized Facts into the Graph.
 *
 * Definitions are placed first so that references anywhere in the project
 * can match them; imports go through the Path Resolver. Inconsistent input
 * degrades to a missing edge, never an exception.
 */
import {
  comparePositions,
  type DefinitionFact,
  type DefinitionKind,
  type Diagnostic,
  type FileFacts,
  type ReferenceFact,
  type ReferenceKind,
} from "@depgraph/syntax";

import { Graph } from "./Graph.js";
import {
  type DefinitionNode,
  definitionId,
  type Edge,
  type EdgeKind,
  edgeKey,
  type ExternalModuleNode,
  externalId,
  type FileNode,
  fileId,
  type ImportRecord,
  type ReferenceRecord,
} from "./model.js";
import type { PathResolver } from "./PathResolver.js";

const PREFERRED_KIND: Record<ReferenceKind, DefinitionKind> = {
  "function-call": "function",
  "container-use": "container",
};

export interface AssembleOptions {
  root?: string;
  /** Diagnostics gathered before assembly (discovery, reads, extraction) */
  diagnostics?: readonly Diagnostic[];
}

export class GraphAssembler {
  constructor(private readonly resolver: PathResolver) {}

  /**
   * Build the Graph from files in discovery order.
   */
  assemble(files: readonly FileFacts[], options: AssembleOptions = {}): Graph {
    const state = new AssemblyState();

    for (const file of files) {
      state.addFile(file);
    }
    for (const file of files) {
      this.placeDefinitions(state, file);
    }
    for (const file of files) {
      this.linkImports(state, file);
    }
    for (const file of files) {
      this.linkReferences(state, file);
    }

    const diagnostics = [...(options.diagnostics ?? []), ...files.flatMap((f) => f.diagnostics)];
    return state.toGraph(options.root ?? "", diagnostics);
  }

  private placeDefinitions(state: AssemblyState, file: FileFacts): void {
    const definitions = file.facts.filter((f): f is DefinitionFact => f.type === "definition");

    // Containers are known up front so members can point at them in any order
    const containers = new Map<string, string>();
    for (const def of definitions) {
      if (def.kind === "container" && !containers.has(def.qualifiedName)) {
        containers.set(def.qualifiedName, definitionId(file.path, def.qualifiedName, def.kind));
      }
    }

    for (const def of definitions) {
      const containerId = def.container ? (containers.get(def.container) ?? null) : null;
      const node = state.mergeDefinition(file.path, def, containerId);
      state.addEdge(containerId ?? fileId(file.path), node.id, "defines", def.line);
    }
  }

  private linkImports(state: AssemblyState, file: FileFacts): void {
    const source = fileId(file.path);

    for (const fact of file.facts) {
      if (fact.type !== "import") continue;

      const resolution = this.resolver.resolve(fact, file.path);
      const target =
        resolution.kind === "file" ? fileId(resolution.path) : state.external(resolution.module).id;

      if (target !== source) {
        state.addEdge(source, target, "imports", fact.line);
      }
      state.imports.push({
        file: file.path,
        line: fact.line,
        module: fact.module,
        name: fact.name,
        alias: fact.alias,
        level: fact.level,
        target,
      });
    }
  }

  private linkReferences(state: AssemblyState, file: FileFacts): void {
    for (const fact of file.facts) {
      if (fact.type !== "reference") continue;

      const scope = fact.scope ? state.definitionIn(file.path, fact.scope) : undefined;
      const source = scope?.id ?? fileId(file.path);
      const target = state.matchReference(file.path, fact);

      if (target && target.id !== source) {
        state.addEdge(source, target.id, "references", fact.line);
      }
      state.references.push({
        kind: fact.kind,
        qualifiedName: fact.receiver ? `${fact.receiver}.${fact.name}` : fact.name,
        name: fact.name,
        file: file.path,
        line: fact.line,
        scope: fact.scope,
        target: target?.id ?? null,
      });
    }
  }
}

/**
 * Mutable accumulation for one assembly run.
 */
class AssemblyState {
  readonly imports: ImportRecord[] = [];
  readonly references: ReferenceRecord[] = [];

  private readonly files = new Map<string, FileNode>();
  private readonly definitions = new Map<string, DefinitionNode>();
  /** Arena of external modules, keyed by module name */
  private readonly externals = new Map<string, ExternalModuleNode>();
  private readonly edges = new Map<string, Edge>();

  /** file -> qualified name -> definitions in source order */
  private readonly byQualifiedName = new Map<string, Map<string, DefinitionNode[]>>();
  /** simple name -> definitions in discovery then source order */
  private readonly bySimpleName = new Map<string, DefinitionNode[]>();

  addFile(file: FileFacts): void {
    if (this.files.has(file.path)) return;
    this.files.set(file.path, {
      type: "file",
      id: fileId(file.path),
      path: file.path,
      language: file.language,
      definitions: [],
      parsed: file.parsed,
    });
  }

  /**
   * Create the node for a (file, qualified name, kind) triple, or widen the
   * existing node's span to cover the new occurrence.
   */
  mergeDefinition(filePath: string, def: DefinitionFact, containerId: string | null): DefinitionNode {
    const id = definitionId(filePath, def.qualifiedName, def.kind);
    const existing = this.definitions.get(id);
    if (existing) {
      if (comparePositions(def.span.end, existing.span.end) > 0) {
        existing.span = { start: existing.span.start, end: { ...def.span.end } };
      }
      return existing;
    }

    const node: DefinitionNode = {
      type: "definition",
      id,
      kind: def.kind,
      qualifiedName: def.qualifiedName,
      name: def.name,
      file: filePath,
      span: { start: { ...def.span.start }, end: { ...def.span.end } },
      container: containerId,
    };
    this.definitions.set(id, node);

    let byName = this.byQualifiedName.get(filePath);
    if (!byName) {
      byName = new Map();
      this.byQualifiedName.set(filePath, byName);
    }
    pushTo(byName, def.qualifiedName, node);
    pushTo(this.bySimpleName, def.name, node);

    if (containerId === null) {
      this.files.get(filePath)?.definitions.push(id);
    }
    return node;
  }

  external(module: string): ExternalModuleNode {
    let node = this.externals.get(module);
    if (!node) {
      node = { type: "external", id: externalId(module), module };
      this.externals.set(module, node);
    }
    return node;
  }

  addEdge(source: string, target: string, kind: EdgeKind, line: number): void {
    const edge = { source, target, kind, line };
    const key = edgeKey(edge);
    if (!this.edges.has(key)) {
      this.edges.set(key, edge);
    }
  }

  definitionIn(filePath: string, qualifiedName: string): DefinitionNode | undefined {
    return this.byQualifiedName.get(filePath)?.get(qualifiedName)?.[0];
  }

  /**
   * Same-file match by qualified name (the name under each enclosing scope,
   * innermost first, then bare), then project-wide by simple name where the
   * first definition in discovery order wins. Within a file a qualified name
   * shared by a function and a container goes to the kind the reference implies.
   */
  matchReference(filePath: string, ref: ReferenceFact): DefinitionNode | undefined {
    const preferred = PREFERRED_KIND[ref.kind];
    const local = this.byQualifiedName.get(filePath);

    if (local) {
      const scope = ref.scope ? ref.scope.split(".") : [];
      for (let n = scope.length; n >= 0; n--) {
        const qualified = [...scope.slice(0, n), ref.name].join(".");
        const match = choose(local.get(qualified), preferred);
        if (match) return match;
      }
    }

    return this.bySimpleName.get(ref.name)?.[0];
  }

  toGraph(root: string, diagnostics: Diagnostic[]): Graph {
    return new Graph({
      root,
      nodes: [...this.files.values(), ...this.definitions.values(), ...this.externals.values()],
      edges: [...this.edges.values()],
      imports: this.imports,
      references: this.references,
      diagnostics,
    });
  }
}

function choose(candidates: readonly DefinitionNode[] | undefined, kind: DefinitionKind): DefinitionNode | undefined {
  if (!candidates || candidates.length === 0) return undefined;
  return candidates.find((c) => c.kind === kind) ?? candidates[0];
}

function pushTo<T>(map: Map<string, T[]>, key: string, value: T): void {
  const list = map.get(key);
  if (list) {
    list.push(value);
  } else {
    map.set(key, [value]);
  }
}
