/**
 * TypeScript and JavaScript adapter. The two grammars share node types for
 * everything extracted here; TypeScript adds interfaces and abstract classes.
 */
import { Ok, type Result } from "@depgraph/core";
import type Parser from "tree-sitter";

import type { RawFact } from "../../core/model.js";
import type { LanguageAdapter, ParseError } from "../../core/ports/LanguageAdapter.js";
import type { TreeSitterParser } from "../parsers/TreeSitterParser.js";
import { FactCollector, type ImportDetails, inlineText, stringContent } from "./FactCollector.js";

const CONTAINER_TYPES = new Set([
  "class_declaration",
  "abstract_class_declaration",
  "interface_declaration",
  "enum_declaration",
]);

const FUNCTION_DECLARATIONS = new Set(["function_declaration", "generator_function_declaration"]);

// Function-valued expressions: bodies open a function scope
const FUNCTION_EXPRESSIONS = new Set(["arrow_function", "function_expression", "function", "generator_function"]);

const RECEIVER_TYPES = new Set(["identifier", "this", "member_expression"]);

export class TypeScriptAdapter implements LanguageAdapter {
  constructor(
    private readonly parser: TreeSitterParser,
    readonly language: "typescript" | "javascript" = "typescript"
  ) {}

  async extract(source: string, filePath: string): Promise<Result<RawFact[], ParseError>> {
    const parsed = await this.parser.parse(source, filePath, this.language);
    if (!parsed.ok) return parsed;

    const out = new FactCollector(filePath);
    visit(parsed.value.rootNode, out, false);
    return Ok(out.facts);
  }
}

function visit(node: Parser.SyntaxNode, out: FactCollector, inFunction: boolean): void {
  if (FUNCTION_DECLARATIONS.has(node.type)) {
    const name = node.childForFieldName("name");
    if (name && !inFunction) out.addDefinition(node, "function", name.text);
    visitChildren(node, out, true);
    return;
  }

  if (FUNCTION_EXPRESSIONS.has(node.type)) {
    visitChildren(node, out, true);
    return;
  }

  if (CONTAINER_TYPES.has(node.type)) {
    const name = node.childForFieldName("name");
    if (name && !inFunction) out.addDefinition(node, "container", name.text);
    visitChildren(node, out, inFunction);
    return;
  }

  switch (node.type) {
    case "import_statement":
      collectImport(node, out);
      return;
    case "export_statement":
      if (node.childForFieldName("source")) {
        collectReexport(node, out);
        return;
      }
      break;
    case "method_definition": {
      const name = node.childForFieldName("name");
      // Object literal methods are not definitions
      if (name && !inFunction && node.parent?.type === "class_body") {
        out.addDefinition(node, "function", name.text);
      }
      visitChildren(node, out, true);
      return;
    }
    case "variable_declarator": {
      const name = node.childForFieldName("name");
      const value = node.childForFieldName("value");
      if (!inFunction && name?.type === "identifier" && value && FUNCTION_EXPRESSIONS.has(value.type)) {
        out.addDefinition(node, "function", name.text);
      }
      break;
    }
    case "call_expression":
      if (collectCall(node, out)) return;
      break;
    case "new_expression":
      collectNew(node, out);
      break;
  }

  visitChildren(node, out, inFunction);
}

function visitChildren(node: Parser.SyntaxNode, out: FactCollector, inFunction: boolean): void {
  for (const child of node.namedChildren) {
    visit(child, out, inFunction);
  }
}

/**
 * `import d from "m"`, `import * as ns from "m"`, `import { a as b } from "m"`,
 * `import "m"`, `import x = require("m")`. Name and alias describe the first binding.
 */
function collectImport(node: Parser.SyntaxNode, out: FactCollector): void {
  const requireClause = node.namedChildren.find((c) => c.type === "import_require_clause");
  const source = node.childForFieldName("source") ?? requireClause?.childForFieldName("source");
  if (!source) return;

  let details: ImportDetails = {};
  const clause = node.namedChildren.find((c) => c.type === "import_clause");
  const first = clause?.namedChildren[0];

  if (requireClause) {
    const alias = requireClause.namedChildren.find((c) => c.type === "identifier");
    details = { alias: alias?.text };
  } else if (first?.type === "identifier") {
    details = { alias: first.text };
  } else if (first?.type === "namespace_import") {
    details = { alias: first.namedChildren.find((c) => c.type === "identifier")?.text };
  } else if (first?.type === "named_imports") {
    const spec = first.namedChildren.find((c) => c.type === "import_specifier");
    if (spec) {
      details = {
        name: spec.childForFieldName("name")?.text,
        alias: spec.childForFieldName("alias")?.text,
      };
    }
  }

  out.addImport(node, stringContent(source), details);
}

/**
 * `export { a as b } from "m"` and `export * from "m"`.
 */
function collectReexport(node: Parser.SyntaxNode, out: FactCollector): void {
  const source = node.childForFieldName("source");
  if (!source) return;

  const clause = node.namedChildren.find((c) => c.type === "export_clause");
  const spec = clause?.namedChildren.find((c) => c.type === "export_specifier");
  const details: ImportDetails = spec
    ? { name: spec.childForFieldName("name")?.text, alias: spec.childForFieldName("alias")?.text }
    : { name: "*" };

  out.addImport(node, stringContent(source), details);
}

/**
 * Dynamic `import("m")` and `require("m")` become imports; every other call a reference.
 * Returns true when the call was an import, whose arguments need no visit.
 */
function collectCall(node: Parser.SyntaxNode, out: FactCollector): boolean {
  const callee = node.childForFieldName("function");
  if (!callee) return false;

  if (callee.type === "import" || (callee.type === "identifier" && callee.text === "require")) {
    const argument = node.childForFieldName("arguments")?.namedChildren[0];
    if (argument?.type === "string") {
      out.addImport(node, stringContent(argument));
      return true;
    }
    return false;
  }

  const target = calleeName(callee);
  if (target) {
    out.addReference(node, "function-call", target.name, target.receiver);
  }
  return false;
}

function collectNew(node: Parser.SyntaxNode, out: FactCollector): void {
  const ctor = node.childForFieldName("constructor");
  const target = ctor ? calleeName(ctor) : null;
  if (target) {
    out.addReference(node, "container-use", target.name, target.receiver);
  }
}

function calleeName(callee: Parser.SyntaxNode): { name: string; receiver: string | null } | null {
  if (callee.type === "identifier") {
    return { name: callee.text, receiver: null };
  }
  if (callee.type === "member_expression") {
    const property = callee.childForFieldName("property");
    const object = callee.childForFieldName("object");
    if (!property) return null;
    const receiver = object && RECEIVER_TYPES.has(object.type) ? inlineText(object) : null;
    return { name: property.text, receiver };
  }
  return null;
}
