/**
 * Accumulates raw Facts for one file while an adapter walks its tree.
 */
import type Parser from "tree-sitter";

import type { DefinitionKind, Location, RawFact, ReferenceKind, Span } from "../../core/model.js";

export function nodeLocation(node: Parser.SyntaxNode): Location {
  return { line: node.startPosition.row + 1, column: node.startPosition.column + 1 };
}

export function nodeToSpan(node: Parser.SyntaxNode): Span {
  return {
    start: nodeLocation(node),
    end: { line: node.endPosition.row + 1, column: node.endPosition.column + 1 },
  };
}

/**
 * Text of a string literal node without its quotes.
 */
export function stringContent(node: Parser.SyntaxNode): string {
  return node.text.slice(1, -1);
}

/**
 * Source text collapsed to one line, or null when it spans several.
 */
export function inlineText(node: Parser.SyntaxNode | null): string | null {
  if (!node || node.startPosition.row !== node.endPosition.row) return null;
  return node.text;
}

export interface ImportDetails {
  name?: string | null;
  alias?: string | null;
  level?: number;
}

export class FactCollector {
  readonly facts: RawFact[] = [];

  constructor(private readonly file: string) {}

  addImport(node: Parser.SyntaxNode, module: string, details: ImportDetails = {}): void {
    this.facts.push({
      type: "import",
      file: this.file,
      ...nodeLocation(node),
      module,
      ...details,
    });
  }

  addDefinition(
    node: Parser.SyntaxNode,
    kind: DefinitionKind,
    name: string,
    container?: string | null
  ): void {
    this.facts.push({
      type: "definition",
      file: this.file,
      ...nodeLocation(node),
      kind,
      name,
      span: nodeToSpan(node),
      ...(container ? { container } : {}),
    });
  }

  addReference(node: Parser.SyntaxNode, kind: ReferenceKind, name: string, receiver?: string | null): void {
    this.facts.push({
      type: "reference",
      file: this.file,
      ...nodeLocation(node),
      kind,
      name,
      ...(receiver ? { receiver } : {}),
    });
  }
}
