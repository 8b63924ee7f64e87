import { AdapterRegistry } from "../../core/services/AdapterRegistry.js";
import type { LanguageAdapter } from "../../core/ports/LanguageAdapter.js";
import type { LanguageId } from "../../core/model.js";
import { TreeSitterParser } from "../parsers/TreeSitterParser.js";
import { GoAdapter } from "./GoAdapter.js";
import { PythonAdapter } from "./PythonAdapter.js";
import { RustAdapter } from "./RustAdapter.js";
import { TypeScriptAdapter } from "./TypeScriptAdapter.js";

/**
 * One adapter per supported language, all sharing a parser.
 */
export function createDefaultAdapters(parser: TreeSitterParser = new TreeSitterParser()): LanguageAdapter[] {
  return [
    new PythonAdapter(parser),
    new TypeScriptAdapter(parser, "typescript"),
    new TypeScriptAdapter(parser, "javascript"),
    new RustAdapter(parser),
    new GoAdapter(parser),
  ];
}

/**
 * Registry over the default adapters, optionally limited to some languages.
 */
export function createDefaultRegistry(languages?: readonly LanguageId[]): AdapterRegistry {
  const adapters = createDefaultAdapters();
  return new AdapterRegistry(languages ? adapters.filter((a) => languages.includes(a.language)) : adapters);
}
