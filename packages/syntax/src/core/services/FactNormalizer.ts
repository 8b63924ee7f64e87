import { Err, Ok, type Result } from "@depgraph/core";

import {
  comparePositions,
  type DefinitionFact,
  type Diagnostic,
  type Fact,
  type ImportFact,
  type LanguageId,
  type RawDefinitionFact,
  type RawFact,
  type RawImportFact,
  type RawReferenceFact,
  type ReferenceFact,
} from "../model.js";

export interface NormalizedFile {
  facts: Fact[];
  diagnostics: Diagnostic[];
}

interface RelativeModule {
  module: string;
  level: number;
}

/**
 * Normalize a single raw Fact.
 *
 * @param openScopes - Definitions enclosing the Fact, outermost first
 * @returns The normalized Fact, or a `malformed-fact` diagnostic when it must be dropped
 */
export function normalizeFact(
  raw: RawFact,
  language: LanguageId,
  openScopes: readonly DefinitionFact[] = []
): Result<Fact, Diagnostic> {
  if (!Number.isInteger(raw.line) || raw.line < 1) {
    return Err(malformed(raw, `invalid line ${raw.line}`));
  }

  switch (raw.type) {
    case "import":
      return normalizeImport(raw, language);
    case "definition":
      return normalizeDefinition(raw, openScopes);
    case "reference":
      return normalizeReference(raw, openScopes);
  }
}

/**
 * Normalize one file's raw Facts in source order, tracking enclosing definitions.
 */
export function normalizeFacts(file: string, language: LanguageId, raws: readonly RawFact[]): NormalizedFile {
  // Array.prototype.sort is stable, so Facts at the same position keep adapter order
  const ordered = [...raws].sort(comparePositions);

  const facts: Fact[] = [];
  const diagnostics: Diagnostic[] = [];
  const stack: DefinitionFact[] = [];

  for (const raw of ordered) {
    while (stack.length > 0 && comparePositions(stack[stack.length - 1].span.end, raw) <= 0) {
      stack.pop();
    }

    const result = normalizeFact({ ...raw, file }, language, stack);
    if (!result.ok) {
      diagnostics.push(result.error);
      continue;
    }

    facts.push(result.value);
    if (result.value.type === "definition") {
      stack.push(result.value);
    }
  }

  return { facts, diagnostics };
}

function normalizeImport(raw: RawImportFact, language: LanguageId): Result<ImportFact, Diagnostic> {
  const relative = splitRelative(raw.module, language);
  const module = relative ? relative.module : raw.module;
  const level = relative ? relative.level : (raw.level ?? 0);
  const name = raw.name || null;

  if (module === "" && level === 0 && name === null) {
    return Err(malformed(raw, "import with an empty module name"));
  }

  const alias = raw.alias && raw.alias !== (name ?? module) ? raw.alias : null;

  return Ok({
    type: "import",
    file: raw.file,
    line: raw.line,
    column: raw.column,
    module,
    name,
    alias,
    level,
    raw: raw.raw ?? raw.module,
  });
}

function normalizeDefinition(
  raw: RawDefinitionFact,
  openScopes: readonly DefinitionFact[]
): Result<DefinitionFact, Diagnostic> {
  if (!raw.name) {
    return Err(malformed(raw, "definition without a name"));
  }

  let qualifiedName = raw.qualifiedName;
  let container = raw.container ?? null;

  if (qualifiedName === undefined) {
    const enclosing = innermost(openScopes, "container");
    const prefix = [enclosing?.qualifiedName, raw.container].filter((part): part is string => !!part);
    container = prefix.length > 0 ? prefix.join(".") : null;
    qualifiedName = [...prefix, raw.name].join(".");
  }

  return Ok({
    type: "definition",
    file: raw.file,
    line: raw.line,
    column: raw.column,
    kind: raw.kind,
    name: raw.name,
    qualifiedName,
    container,
    span: { start: { ...raw.span.start }, end: { ...raw.span.end } },
  });
}

function normalizeReference(
  raw: RawReferenceFact,
  openScopes: readonly DefinitionFact[]
): Result<ReferenceFact, Diagnostic> {
  if (!raw.name) {
    return Err(malformed(raw, "reference without a name"));
  }

  const scope = raw.scope !== undefined ? raw.scope : (innermost(openScopes)?.qualifiedName ?? null);

  return Ok({
    type: "reference",
    file: raw.file,
    line: raw.line,
    column: raw.column,
    kind: raw.kind,
    name: raw.name,
    receiver: raw.receiver || null,
    scope,
  });
}

function innermost(
  scopes: readonly DefinitionFact[],
  kind?: DefinitionFact["kind"]
): DefinitionFact | undefined {
  for (let i = scopes.length - 1; i >= 0; i--) {
    if (!kind || scopes[i].kind === kind) return scopes[i];
  }
  return undefined;
}

/**
 * Split a relative prefix off a module path as written.
 * Returns null when the path carries no prefix.
 */
export function splitRelative(module: string, language: LanguageId): RelativeModule | null {
  switch (language) {
    case "python": {
      const dots = /^\.+/.exec(module);
      return dots ? { module: module.slice(dots[0].length), level: dots[0].length } : null;
    }
    case "rust":
      return splitRustPath(module);
    case "typescript":
    case "javascript":
    case "go":
      return splitFilePath(module);
  }
}

/**
 * `./x` -> 1, `../x` -> 2, `./../../x` -> 3
 */
function splitFilePath(module: string): RelativeModule | null {
  let rest = module;
  let level = 0;
  for (;;) {
    if (rest.startsWith("./")) {
      rest = rest.slice(2);
      level = Math.max(level, 1);
    } else if (rest.startsWith("../")) {
      rest = rest.slice(3);
      level = Math.max(level, 1) + 1;
    } else if (rest === ".") {
      rest = "";
      level = Math.max(level, 1);
    } else if (rest === "..") {
      rest = "";
      level = Math.max(level, 1) + 1;
    } else {
      break;
    }
  }
  return level > 0 ? { module: rest, level } : null;
}

/**
 * `self::x` -> 1, `super::x` -> 2, `super::super::x` -> 3, `crate::x` -> 0 without the prefix
 */
function splitRustPath(module: string): RelativeModule | null {
  if (module === "crate" || module.startsWith("crate::")) {
    return { module: module.slice("crate::".length), level: 0 };
  }

  const segments = module.split("::");
  let level = 0;
  let consumed = 0;
  for (const segment of segments) {
    if (segment === "self") {
      level = Math.max(level, 1);
    } else if (segment === "super") {
      level = Math.max(level, 1) + 1;
    } else {
      break;
    }
    consumed++;
  }
  return level > 0 ? { module: segments.slice(consumed).join("::"), level } : null;
}

function malformed(raw: RawFact, message: string): Diagnostic {
  return {
    file: raw.file,
    kind: "malformed-fact",
    message: `${raw.type}: ${message}`,
    ...(Number.isInteger(raw.line) && raw.line > 0 ? { line: raw.line } : {}),
  };
}
