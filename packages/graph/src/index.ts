/**
 * @depgraph/graph
 * Unified dependency graph over Python, TypeScript, JavaScript, Rust and Go sources.
 */

// Model
export {
  EDGE_KINDS,
  type EdgeKind,
  type FileNode,
  type DefinitionNode,
  type ExternalModuleNode,
  type Node,
  type NodeType,
  type Edge,
  type ImportRecord,
  type ReferenceRecord,
  type GraphStats,
  type GraphData,
  fileId,
  definitionId,
  externalId,
  edgeKey,
} from "./core/model.js";
export { Graph } from "./core/Graph.js";

// Resolution and assembly
export {
  type LanguageFamily,
  type ModuleLayout,
  LAYOUTS,
  familyOf,
  layoutFor,
  dirOf,
  joinPath,
} from "./core/ModuleLayout.js";
export { FileIndex, type IndexedFile } from "./core/FileIndex.js";
export { PathResolver, type Resolution, directoryDistance } from "./core/PathResolver.js";
export { GraphAssembler, type AssembleOptions } from "./core/GraphAssembler.js";

// Analysis and queries
export {
  type ImportGraph,
  type ImportCycles,
  type ComponentSize,
  type CentralityEntry,
  importGraph,
  stronglyConnectedComponents,
  findImportCycles,
  betweennessCentrality,
  mostCentralFiles,
} from "./core/analysis.js";
export { type FileSummary, type FileDefinition, type FileImport, fileSummary } from "./core/queries.js";

// Build pipeline
export {
  DEFAULT_CONCURRENCY,
  BuildOptionsSchema,
  type BuildOptions,
  type BuildOptionsInput,
  parseBuildOptions,
  LOG_LEVEL_ENV,
  resolveLogLevel,
} from "./config.js";
export { GraphBuilder, type GraphBuilderDeps, type SourceFile } from "./infrastructure/GraphBuilder.js";
export { GraphSession } from "./infrastructure/GraphSession.js";

// Serialization and export
export {
  GRAPH_FORMAT_VERSION,
  SerializedGraphSchema,
  type SerializedGraph,
  type SerializedNode,
  toJSON,
  fromJSON,
  parseGraph,
} from "./infrastructure/serialize.js";
export {
  EXPORT_FORMATS,
  type ExportFormat,
  renderGraph,
  renderSvg,
  renderText,
  formatDiagnostic,
  escapeXml,
} from "./export/index.js";

// Entry points
export { runCli, type CliIO, EXIT_OK, EXIT_FATAL, EXIT_PARTIAL } from "./cli.js";
export { createServerOptions } from "./server.js";
export { registerAllTools, type Services } from "./tools/index.js";
