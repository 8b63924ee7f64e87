/**
 * Go adapter. Methods carry their receiver type as container.
 */
import { Ok, type Result } from "@depgraph/core";
import type Parser from "tree-sitter";

import type { RawFact } from "../../core/model.js";
import type { LanguageAdapter, ParseError } from "../../core/ports/LanguageAdapter.js";
import type { TreeSitterParser } from "../parsers/TreeSitterParser.js";
import { FactCollector, inlineText, stringContent } from "./FactCollector.js";

export class GoAdapter implements LanguageAdapter {
  readonly language = "go";

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
  switch (node.type) {
    case "import_spec":
      collectImportSpec(node, out);
      return;
    case "function_declaration": {
      const name = node.childForFieldName("name");
      if (name && !inFunction) out.addDefinition(node, "function", name.text);
      visitChildren(node, out, true);
      return;
    }
    case "method_declaration": {
      const name = node.childForFieldName("name");
      if (name && !inFunction) {
        out.addDefinition(node, "function", name.text, receiverType(node.childForFieldName("receiver")));
      }
      visitChildren(node, out, true);
      return;
    }
    case "func_literal":
      visitChildren(node, out, true);
      return;
    case "type_spec": {
      const name = node.childForFieldName("name");
      if (name && !inFunction) out.addDefinition(node, "container", name.text);
      break;
    }
    case "call_expression": {
      const callee = node.childForFieldName("function");
      const target = callee ? calleeName(callee) : null;
      if (target) out.addReference(node, "function-call", target.name, target.receiver);
      break;
    }
    case "composite_literal": {
      const type = node.childForFieldName("type");
      const name = type ? compositeTypeName(type) : null;
      if (name) out.addReference(node, "container-use", name.name, name.receiver);
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

/**
 * `import f "fmt"`, `import _ "embed"`, `import . "strings"`
 */
function collectImportSpec(node: Parser.SyntaxNode, out: FactCollector): void {
  const path = node.childForFieldName("path");
  if (!path) return;
  const alias = node.childForFieldName("name");
  out.addImport(node, stringContent(path), { alias: alias?.text });
}

/**
 * `(s *Server)` -> `Server`, `(l List[T])` -> `List`
 */
export function receiverType(receiver: Parser.SyntaxNode | null): string | null {
  const param = receiver?.namedChildren.find((c) => c.type === "parameter_declaration");
  const type = param?.childForFieldName("type");
  if (!type) return null;
  const name = type.text.replace(/^\*+/, "").replace(/\[[\s\S]*\]$/, "").trim();
  return name || null;
}

function calleeName(callee: Parser.SyntaxNode): { name: string; receiver: string | null } | null {
  if (callee.type === "identifier") {
    return { name: callee.text, receiver: null };
  }
  if (callee.type === "selector_expression") {
    const field = callee.childForFieldName("field");
    if (!field) return null;
    return { name: field.text, receiver: inlineText(callee.childForFieldName("operand")) };
  }
  return null;
}

function compositeTypeName(type: Parser.SyntaxNode): { name: string; receiver: string | null } | null {
  switch (type.type) {
    case "type_identifier":
      return { name: type.text, receiver: null };
    case "qualified_type": {
      const name = type.childForFieldName("name");
      const pkg = type.childForFieldName("package");
      return name ? { name: name.text, receiver: pkg?.text ?? null } : null;
    }
    case "generic_type": {
      const inner = type.childForFieldName("type");
      return inner ? compositeTypeName(inner) : null;
    }
    default:
      return null;
  }
}
