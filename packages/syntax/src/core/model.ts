/**
 * Core domain types for the syntax package: languages, positions and Facts.
 */

export type LanguageId = "typescript" | "javascript" | "python" | "go" | "rust";

export interface Language {
  id: LanguageId;
  name: string;
  extensions: string[];
  /** Separator between segments of a module path as written in imports */
  moduleSeparator: string;
}

export const LANGUAGES: Record<LanguageId, Language> = {
  typescript: {
    id: "typescript",
    name: "TypeScript",
    extensions: [".ts", ".tsx", ".mts", ".cts"],
    moduleSeparator: "/",
  },
  javascript: {
    id: "javascript",
    name: "JavaScript",
    extensions: [".js", ".jsx", ".mjs", ".cjs"],
    moduleSeparator: "/",
  },
  python: {
    id: "python",
    name: "Python",
    extensions: [".py", ".pyi"],
    moduleSeparator: ".",
  },
  go: {
    id: "go",
    name: "Go",
    extensions: [".go"],
    moduleSeparator: "/",
  },
  rust: {
    id: "rust",
    name: "Rust",
    extensions: [".rs"],
    moduleSeparator: "::",
  },
};

export const LANGUAGE_IDS = ["python", "typescript", "javascript", "rust", "go"] as const satisfies readonly LanguageId[];

/**
 * Check whether a string names a supported language.
 */
export function isLanguageId(value: string): value is LanguageId {
  return LANGUAGE_IDS.some((id) => id === value);
}

/**
 * Detect language from file path extension.
 */
export function detectLanguage(filePath: string): Language | undefined {
  const dot = filePath.lastIndexOf(".");
  if (dot < 0 || dot < filePath.lastIndexOf("/")) return undefined;
  const ext = filePath.slice(dot).toLowerCase();
  for (const lang of Object.values(LANGUAGES)) {
    if (lang.extensions.includes(ext)) {
      return lang;
    }
  }
  return undefined;
}

/**
 * Every extension handled by the given languages.
 */
export function extensionsFor(languages: readonly LanguageId[] = LANGUAGE_IDS): string[] {
  return languages.flatMap((id) => LANGUAGES[id].extensions);
}

export interface Location {
  /** 1-indexed line number */
  line: number;
  /** 1-indexed column number */
  column: number;
}

export interface Span {
  start: Location;
  /** Exclusive end position */
  end: Location;
}

export const DEFINITION_KINDS = ["function", "container"] as const;

export type DefinitionKind = (typeof DEFINITION_KINDS)[number];

export const REFERENCE_KINDS = ["function-call", "container-use"] as const;

export type ReferenceKind = (typeof REFERENCE_KINDS)[number];

interface FactBase {
  /** Originating file, relative to the project root */
  file: string;
  /** 1-indexed line */
  line: number;
  /** 1-indexed column */
  column: number;
}

/**
 * Import as the adapter saw it. `module` may still carry relative prefixes
 * (`..pkg`, `./util`, `super::x`); the normalizer turns them into `level`.
 */
export interface RawImportFact extends FactBase {
  type: "import";
  module: string;
  name?: string | null;
  alias?: string | null;
  level?: number;
  /** Module text exactly as written; filled in by the normalizer when absent */
  raw?: string;
}

export interface RawDefinitionFact extends FactBase {
  type: "definition";
  kind: DefinitionKind;
  name: string;
  /** Enclosing container named outside the lexical body (a Go method receiver) */
  container?: string | null;
  span: Span;
  qualifiedName?: string;
}

export interface RawReferenceFact extends FactBase {
  type: "reference";
  kind: ReferenceKind;
  name: string;
  /** Object text in `obj.name()` */
  receiver?: string | null;
  scope?: string | null;
}

export type RawFact = RawImportFact | RawDefinitionFact | RawReferenceFact;

export interface ImportFact extends FactBase {
  type: "import";
  /** Module path with relative prefixes removed */
  module: string;
  name: string | null;
  alias: string | null;
  /** 0 = absolute, 1 = same directory, 2 = parent, ... */
  level: number;
  raw: string;
}

export interface DefinitionFact extends FactBase {
  type: "definition";
  kind: DefinitionKind;
  name: string;
  /** Enclosing containers and the name, joined with "." */
  qualifiedName: string;
  /** Qualified name of the enclosing container */
  container: string | null;
  span: Span;
}

export interface ReferenceFact extends FactBase {
  type: "reference";
  kind: ReferenceKind;
  name: string;
  receiver: string | null;
  /** Qualified name of the innermost enclosing definition, null at file level */
  scope: string | null;
}

/** Normalized Fact. Every normalized Fact is also a valid RawFact. */
export type Fact = ImportFact | DefinitionFact | ReferenceFact;

export const DIAGNOSTIC_KINDS = ["parse-failure", "read-failure", "malformed-fact", "unsupported-language"] as const;

export type DiagnosticKind = (typeof DIAGNOSTIC_KINDS)[number];

export interface Diagnostic {
  file: string;
  kind: DiagnosticKind;
  message: string;
  line?: number;
}

/**
 * Extraction outcome for one file.
 */
export interface FileFacts {
  path: string;
  language: LanguageId;
  /** Normalized Facts in source order */
  facts: Fact[];
  /** False when the file could not be read or parsed */
  parsed: boolean;
  diagnostics: Diagnostic[];
}

/**
 * Compare two positions in source order.
 */
export function comparePositions(a: Location, b: Location): number {
  return a.line - b.line || a.column - b.column;
}
