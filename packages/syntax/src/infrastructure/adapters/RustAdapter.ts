/**
 * Rust adapter.
 *
 * `use` trees are flattened to one import per leaf path. A `mod foo;`
 * declaration becomes an import of `self::foo`. `impl` blocks are containers
 * named after their type, so they merge with the type's own definition.
 */
import { Ok, type Result } from "@depgraph/core";
import type Parser from "tree-sitter";

import type { RawFact } from "../../core/model.js";
import type { LanguageAdapter, ParseError } from "../../core/ports/LanguageAdapter.js";
import type { TreeSitterParser } from "../parsers/TreeSitterParser.js";
import { FactCollector, inlineText } from "./FactCollector.js";

const CONTAINER_ITEMS = new Set(["struct_item", "enum_item", "union_item", "trait_item"]);

const PATH_TYPES = new Set(["identifier", "scoped_identifier", "crate", "super", "self"]);

interface UseLeaf {
  path: string;
  alias?: string;
  wildcard?: boolean;
}

export class RustAdapter implements LanguageAdapter {
  readonly language = "rust";

  constructor(private readonly parser: TreeSitterParser) {}

  async extract(source: string, filePath: string): Promise<Result<RawFact[], ParseError>> {
    const parsed = await this.parser.parse(source, filePath, this.language);
    if (!parsed.ok) return parsed;

    const out = new FactCollector(filePath);
    visit(parsed.value.rootNode, out, false);
    return Ok(out.facts);
  }
}

function visit(node: Parser.SyntaxNode, out: FactCollector, inFunction: boolean): void {
  if (CONTAINER_ITEMS.has(node.type)) {
    const name = node.childForFieldName("name");
    if (name && !inFunction) out.addDefinition(node, "container", name.text);
    visitChildren(node, out, inFunction);
    return;
  }

  switch (node.type) {
    case "use_declaration":
      collectUse(node, out);
      return;
    case "mod_item": {
      const name = node.childForFieldName("name");
      if (!name) return;
      if (!node.childForFieldName("body")) {
        out.addImport(node, `self::${name.text}`);
        return;
      }
      if (!inFunction) out.addDefinition(node, "container", name.text);
      break;
    }
    case "impl_item": {
      const type = node.childForFieldName("type");
      if (type && !inFunction) out.addDefinition(node, "container", typeName(type.text));
      break;
    }
    case "function_item": {
      const name = node.childForFieldName("name");
      if (name && !inFunction) out.addDefinition(node, "function", name.text);
      visitChildren(node, out, true);
      return;
    }
    case "closure_expression":
      visitChildren(node, out, true);
      return;
    case "call_expression": {
      const callee = node.childForFieldName("function");
      const target = callee ? calleeName(callee) : null;
      if (target) out.addReference(node, "function-call", target.name, target.receiver);
      break;
    }
    case "struct_expression": {
      const name = node.childForFieldName("name");
      if (name) out.addReference(node, "container-use", typeName(name.text));
      break;
    }
  }

  visitChildren(node, out, inFunction);
}

function visitChildren(node: Parser.SyntaxNode, out: FactCollector, inFunction: boolean): void {
  for (const child of node.namedChildren) {
    visit(child, out, inFunction);
  }
}

function collectUse(node: Parser.SyntaxNode, out: FactCollector): void {
  const argument = node.childForFieldName("argument");
  if (!argument) return;

  const leaves: UseLeaf[] = [];
  flattenUse(argument, "", leaves);
  for (const leaf of leaves) {
    out.addImport(node, leaf.path, {
      ...(leaf.alias ? { alias: leaf.alias } : {}),
      ...(leaf.wildcard ? { name: "*" } : {}),
    });
  }
}

/**
 * `use a::{b, c::d as e, f::*}` -> a::b, a::c::d (alias e), a::f (wildcard).
 */
export function flattenUse(node: Parser.SyntaxNode, prefix: string, into: UseLeaf[]): void {
  switch (node.type) {
    case "use_as_clause": {
      const path = node.childForFieldName("path");
      const alias = node.childForFieldName("alias");
      if (path) into.push({ path: joinPath(prefix, path.text), alias: alias?.text });
      return;
    }
    case "use_list":
      for (const item of node.namedChildren) {
        flattenUse(item, prefix, into);
      }
      return;
    case "scoped_use_list": {
      const path = node.childForFieldName("path");
      const list = node.childForFieldName("list");
      if (list) flattenUse(list, path ? joinPath(prefix, path.text) : prefix, into);
      return;
    }
    case "use_wildcard": {
      const path = node.text.replace(/\s+/g, "").replace(/:?:?\*$/, "");
      into.push({ path: joinPath(prefix, path), wildcard: true });
      return;
    }
    case "self":
      // `use a::{self}` names the module itself
      into.push({ path: prefix || "self" });
      return;
  }

  if (PATH_TYPES.has(node.type)) {
    into.push({ path: joinPath(prefix, node.text) });
  }
}

function joinPath(prefix: string, path: string): string {
  const clean = path.replace(/\s+/g, "");
  if (!prefix) return clean;
  return clean ? `${prefix}::${clean}` : prefix;
}

/**
 * Last path segment of a type without generic arguments: `fmt::Display<T>` -> `Display`.
 */
export function typeName(text: string): string {
  const withoutGenerics = text.replace(/<[\s\S]*>$/, "").replace(/^&\s*(mut\s+)?/, "");
  const segments = withoutGenerics.split("::");
  return segments[segments.length - 1].trim();
}

function calleeName(callee: Parser.SyntaxNode): { name: string; receiver: string | null } | null {
  switch (callee.type) {
    case "identifier":
      return { name: callee.text, receiver: null };
    case "scoped_identifier": {
      const name = callee.childForFieldName("name");
      return name ? { name: name.text, receiver: inlineText(callee.childForFieldName("path")) } : null;
    }
    case "field_expression": {
      const field = callee.childForFieldName("field");
      return field ? { name: field.text, receiver: inlineText(callee.childForFieldName("value")) } : null;
    }
    case "generic_function": {
      const inner = callee.childForFieldName("function");
      return inner ? calleeName(inner) : null;
    }
    default:
      return null;
  }
}
