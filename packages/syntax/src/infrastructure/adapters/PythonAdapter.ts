/**
 * Python adapter.
 *
 * Imports: `import a.b as c`, `from ..pkg import x as y`, wildcard imports.
 * Definitions: `def` / `async def` (function) and `class` (container), taken
 * from module level and class bodies only.
 * References: calls anywhere; a call to a capitalized name is a container use.
 */
import { Ok, type Result } from "@depgraph/core";
import type Parser from "tree-sitter";

import type { RawFact } from "../../core/model.js";
import type { LanguageAdapter, ParseError } from "../../core/ports/LanguageAdapter.js";
import type { TreeSitterParser } from "../parsers/TreeSitterParser.js";
import { FactCollector, inlineText } from "./FactCollector.js";

export class PythonAdapter implements LanguageAdapter {
  readonly language = "python";

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
    case "import_statement":
      collectImport(node, out);
      return;
    case "import_from_statement":
      collectFromImport(node, out);
      return;
    case "future_import_statement":
      return;
    case "function_definition": {
      const name = node.childForFieldName("name");
      if (name && !inFunction) out.addDefinition(node, "function", name.text);
      visitChildren(node, out, true);
      return;
    }
    case "class_definition": {
      const name = node.childForFieldName("name");
      if (name && !inFunction) out.addDefinition(node, "container", name.text);
      break;
    }
    case "call":
      collectCall(node, out);
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
 * `import a.b, c as d`
 */
function collectImport(node: Parser.SyntaxNode, out: FactCollector): void {
  for (const child of node.namedChildren) {
    if (child.type === "dotted_name") {
      out.addImport(node, child.text);
    } else if (child.type === "aliased_import") {
      const name = child.childForFieldName("name");
      const alias = child.childForFieldName("alias");
      if (name) out.addImport(node, name.text, { alias: alias?.text });
    }
  }
}

/**
 * `from ..pkg import x, y as z` yields one import per imported name.
 */
function collectFromImport(node: Parser.SyntaxNode, out: FactCollector): void {
  const moduleNode = node.childForFieldName("module_name");
  if (!moduleNode) return;
  const module = moduleNode.text.replace(/\s+/g, "");

  let emitted = false;
  for (const child of node.namedChildren) {
    if (child.startIndex === moduleNode.startIndex) continue;

    if (child.type === "dotted_name") {
      out.addImport(node, module, { name: child.text });
      emitted = true;
    } else if (child.type === "aliased_import") {
      const name = child.childForFieldName("name");
      const alias = child.childForFieldName("alias");
      if (name) {
        out.addImport(node, module, { name: name.text, alias: alias?.text });
        emitted = true;
      }
    } else if (child.type === "wildcard_import") {
      out.addImport(node, module, { name: "*" });
      emitted = true;
    }
  }

  if (!emitted) {
    out.addImport(node, module);
  }
}

function collectCall(node: Parser.SyntaxNode, out: FactCollector): void {
  const callee = node.childForFieldName("function");
  if (!callee) return;

  let name: string | undefined;
  let receiver: string | null = null;
  if (callee.type === "identifier") {
    name = callee.text;
  } else if (callee.type === "attribute") {
    name = callee.childForFieldName("attribute")?.text;
    receiver = inlineText(callee.childForFieldName("object"));
  }
  if (!name) return;

  out.addReference(node, /^[A-Z]/.test(name) ? "container-use" : "function-call", name, receiver);
}
