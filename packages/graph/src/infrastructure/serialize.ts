/**
 * Versioned JSON form of the Graph. Field names are snake_case and stable
 * across consumers (exporters, viewers, other tools).
 */
import * as z from "zod/v4";
import { Err, Ok, type Result, tryCatch } from "@depgraph/core";
import {
  DEFINITION_KINDS,
  DIAGNOSTIC_KINDS,
  type Diagnostic,
  LANGUAGE_IDS,
  REFERENCE_KINDS,
} from "@depgraph/syntax";

import { Graph } from "../core/Graph.js";
import { EDGE_KINDS, type Node } from "../core/model.js";

export const GRAPH_FORMAT_VERSION = 1;

const LocationSchema = z.object({
  line: z.number().int(),
  column: z.number().int(),
});

const SpanSchema = z.object({
  start: LocationSchema,
  end: LocationSchema,
});

const FileNodeSchema = z.object({
  id: z.string(),
  type: z.literal("file"),
  path: z.string(),
  language: z.enum(LANGUAGE_IDS),
  definitions: z.array(z.string()),
  parsed: z.boolean(),
});

const DefinitionNodeSchema = z.object({
  id: z.string(),
  type: z.literal("definition"),
  kind: z.enum(DEFINITION_KINDS),
  qualified_name: z.string(),
  name: z.string(),
  file: z.string(),
  line: z.number().int(),
  span: SpanSchema,
  container: z.string().nullable(),
});

const ExternalNodeSchema = z.object({
  id: z.string(),
  type: z.literal("external"),
  module: z.string(),
});

const NodeSchema = z.discriminatedUnion("type", [FileNodeSchema, DefinitionNodeSchema, ExternalNodeSchema]);

const EdgeSchema = z.object({
  source: z.string(),
  target: z.string(),
  kind: z.enum(EDGE_KINDS),
  line: z.number().int().optional(),
});

const ImportSchema = z.object({
  file: z.string(),
  line: z.number().int(),
  module: z.string(),
  name: z.string().nullable(),
  alias: z.string().nullable(),
  level: z.number().int().min(0),
  target: z.string(),
});

const ReferenceSchema = z.object({
  kind: z.enum(REFERENCE_KINDS),
  qualified_name: z.string(),
  name: z.string(),
  file: z.string(),
  line: z.number().int(),
  scope: z.string().nullable(),
  target: z.string().nullable(),
});

const DiagnosticSchema = z.object({
  file: z.string(),
  kind: z.enum(DIAGNOSTIC_KINDS),
  message: z.string(),
  line: z.number().int().nullable().optional(),
});

export const SerializedGraphSchema = z.object({
  version: z.literal(GRAPH_FORMAT_VERSION),
  root: z.string(),
  nodes: z.array(NodeSchema),
  edges: z.array(EdgeSchema),
  imports: z.array(ImportSchema),
  references: z.array(ReferenceSchema),
  diagnostics: z.array(DiagnosticSchema),
});

export type SerializedGraph = z.infer<typeof SerializedGraphSchema>;
export type SerializedNode = z.infer<typeof NodeSchema>;

export function toJSON(graph: Graph): SerializedGraph {
  return {
    version: GRAPH_FORMAT_VERSION,
    root: graph.root,
    nodes: graph.nodes().map(serializeNode),
    edges: graph.edges().map((e) => ({ source: e.source, target: e.target, kind: e.kind, line: e.line })),
    imports: graph.imports().map((i) => ({ ...i })),
    references: graph.references().map((r) => ({
      kind: r.kind,
      qualified_name: r.qualifiedName,
      name: r.name,
      file: r.file,
      line: r.line,
      scope: r.scope,
      target: r.target,
    })),
    diagnostics: graph.diagnostics().map((d) => ({
      file: d.file,
      kind: d.kind,
      message: d.message,
      line: d.line ?? null,
    })),
  };
}

/**
 * Rebuild a Graph from its serialized form.
 */
export function fromJSON(value: unknown): Result<Graph, Error> {
  const parsed = SerializedGraphSchema.safeParse(value);
  if (!parsed.success) {
    const issues = parsed.error.issues.map((issue) => `${issue.path.join(".") || "(root)"}: ${issue.message}`);
    return Err(new Error(`Invalid graph document: ${issues.join("; ")}`));
  }

  const data = parsed.data;
  return Ok(
    new Graph({
      root: data.root,
      nodes: data.nodes.map(deserializeNode),
      edges: data.edges.map((e) => ({ source: e.source, target: e.target, kind: e.kind, line: e.line ?? 0 })),
      imports: data.imports.map((i) => ({ ...i })),
      references: data.references.map((r) => ({
        kind: r.kind,
        qualifiedName: r.qualified_name,
        name: r.name,
        file: r.file,
        line: r.line,
        scope: r.scope,
        target: r.target,
      })),
      diagnostics: data.diagnostics.map(deserializeDiagnostic),
    })
  );
}

/**
 * Parse JSON text and rebuild the Graph.
 */
export function parseGraph(text: string): Result<Graph, Error> {
  const json = tryCatch((): unknown => JSON.parse(text));
  if (!json.ok) return json;
  return fromJSON(json.value);
}

function serializeNode(node: Node): SerializedNode {
  switch (node.type) {
    case "file":
      return { ...node, definitions: [...node.definitions] };
    case "definition":
      return {
        id: node.id,
        type: "definition",
        kind: node.kind,
        qualified_name: node.qualifiedName,
        name: node.name,
        file: node.file,
        line: node.span.start.line,
        span: node.span,
        container: node.container,
      };
    case "external":
      return { ...node };
  }
}

function deserializeNode(node: SerializedNode): Node {
  switch (node.type) {
    case "file":
      return { ...node };
    case "definition":
      return {
        id: node.id,
        type: "definition",
        kind: node.kind,
        qualifiedName: node.qualified_name,
        name: node.name,
        file: node.file,
        span: node.span,
        container: node.container,
      };
    case "external":
      return { ...node };
  }
}

function deserializeDiagnostic(diagnostic: z.infer<typeof DiagnosticSchema>): Diagnostic {
  const { line, ...rest } = diagnostic;
  return line === null || line === undefined ? rest : { ...rest, line };
}
