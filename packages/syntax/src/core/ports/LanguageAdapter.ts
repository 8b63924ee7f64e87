import type { Result } from "@depgraph/core";

import type { LanguageId, RawFact } from "../model.js";

/**
 * The grammar could not handle a file. Position of the first error node.
 */
export interface ParseError {
  kind: "parse-failure";
  message: string;
  line: number;
  column: number;
}

/**
 * Port for turning one file's text into raw Facts.
 * One implementation per language; implementations hold no cross-file state.
 */
export interface LanguageAdapter {
  readonly language: LanguageId;

  /**
   * Extract imports, definitions and references from a single file.
   *
   * @param source - The file's text
   * @param filePath - Path relative to the project root, stamped on every Fact
   * @returns Facts in source order, or the parse error that stopped extraction
   */
  extract(source: string, filePath: string): Promise<Result<RawFact[], ParseError>>;
}
