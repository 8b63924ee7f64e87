// Domain model
export {
  type LanguageId,
  type Language,
  LANGUAGES,
  LANGUAGE_IDS,
  isLanguageId,
  detectLanguage,
  extensionsFor,
  type Location,
  type Span,
  DEFINITION_KINDS,
  type DefinitionKind,
  REFERENCE_KINDS,
  type ReferenceKind,
  type RawImportFact,
  type RawDefinitionFact,
  type RawReferenceFact,
  type RawFact,
  type ImportFact,
  type DefinitionFact,
  type ReferenceFact,
  type Fact,
  DIAGNOSTIC_KINDS,
  type DiagnosticKind,
  type Diagnostic,
  type FileFacts,
  comparePositions,
} from "./core/model.js";

// Ports
export type { LanguageAdapter, ParseError } from "./core/ports/LanguageAdapter.js";
export type { FileSystem } from "./core/ports/FileSystem.js";
export type { ProjectScanner, ScanOptions } from "./core/ports/ProjectScanner.js";

// Services
export { AdapterRegistry } from "./core/services/AdapterRegistry.js";
export { type NormalizedFile, normalizeFact, normalizeFacts, splitRelative } from "./core/services/FactNormalizer.js";
export { FactExtractor, failedFile } from "./core/services/FactExtractor.js";

// Infrastructure implementations
export { TreeSitterParser, findFirstError } from "./infrastructure/parsers/TreeSitterParser.js";
export { PythonAdapter } from "./infrastructure/adapters/PythonAdapter.js";
export { TypeScriptAdapter } from "./infrastructure/adapters/TypeScriptAdapter.js";
export { RustAdapter } from "./infrastructure/adapters/RustAdapter.js";
export { GoAdapter } from "./infrastructure/adapters/GoAdapter.js";
export { createDefaultAdapters, createDefaultRegistry } from "./infrastructure/adapters/defaults.js";
export { NodeFileSystem } from "./infrastructure/filesystem/NodeFileSystem.js";
export { NodeProjectScanner, gitignoreToRegex } from "./infrastructure/scanner/NodeProjectScanner.js";
