import { Err, Ok, type Result, toError } from "@depgraph/core";
import Parser from "tree-sitter";

import type { LanguageId } from "../../core/model.js";
import type { ParseError } from "../../core/ports/LanguageAdapter.js";

// Tree-sitter language objects are untyped in the binding
type TreeSitterLanguage = unknown;

type GrammarLoader = () => Promise<TreeSitterLanguage>;

type GrammarKey = LanguageId | "tsx";

const GRAMMAR_LOADERS: Record<GrammarKey, GrammarLoader> = {
  typescript: async () => {
    const mod = await import("tree-sitter-typescript");
    return mod.default.typescript;
  },
  tsx: async () => {
    const mod = await import("tree-sitter-typescript");
    return mod.default.tsx;
  },
  javascript: async () => {
    const mod = await import("tree-sitter-javascript");
    return mod.default;
  },
  python: async () => {
    const mod = await import("tree-sitter-python");
    return mod.default;
  },
  go: async () => {
    const mod = await import("tree-sitter-go");
    return mod.default;
  },
  rust: async () => {
    const mod = await import("tree-sitter-rust");
    return mod.default;
  },
};

// The binding's default 32 KiB input buffer rejects larger files
const MIN_BUFFER_SIZE = 32 * 1024;

/**
 * Shared tree-sitter front end for the language adapters.
 * Grammars load lazily, once per parser instance.
 */
export class TreeSitterParser {
  private readonly parser: Parser;
  private readonly loadedGrammars = new Map<GrammarKey, TreeSitterLanguage>();

  constructor() {
    this.parser = new Parser();
  }

  /**
   * Parse a file and reject trees containing ERROR or MISSING nodes.
   */
  async parse(source: string, filePath: string, language: LanguageId): Promise<Result<Parser.Tree, ParseError>> {
    try {
      const grammar = await this.getGrammar(language, filePath);
      // No await between setLanguage and parse: concurrent callers cannot interleave here
      this.parser.setLanguage(grammar);
      const tree = this.parser.parse(source, undefined, {
        bufferSize: Math.max(MIN_BUFFER_SIZE, source.length * 2 + 1),
      });

      const failure = findFirstError(tree.rootNode);
      if (failure) {
        return Err(failure);
      }
      return Ok(tree);
    } catch (error) {
      return Err({ kind: "parse-failure", message: toError(error).message, line: 1, column: 1 });
    }
  }

  private async getGrammar(language: LanguageId, filePath: string): Promise<TreeSitterLanguage> {
    const grammarKey: GrammarKey = language === "typescript" && filePath.endsWith(".tsx") ? "tsx" : language;

    const cached = this.loadedGrammars.get(grammarKey);
    if (cached) return cached;

    const grammar = await GRAMMAR_LOADERS[grammarKey]();
    this.loadedGrammars.set(grammarKey, grammar);
    return grammar;
  }
}

/**
 * Locate the first ERROR or MISSING node in document order.
 */
export function findFirstError(node: Parser.SyntaxNode): ParseError | null {
  if (node.type === "ERROR" || node.isMissing) {
    const line = node.startPosition.row + 1;
    const column = node.startPosition.column + 1;
    const what = node.isMissing ? `missing ${node.type}` : "syntax error";
    return { kind: "parse-failure", message: `${what} at ${line}:${column}`, line, column };
  }

  for (const child of node.children) {
    const found = findFirstError(child);
    if (found) return found;
  }
  return null;
}
