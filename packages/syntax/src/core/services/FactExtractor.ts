import { Err, Ok, type Logger, type Result, silentLogger, tryCatchAsync } from "@depgraph/core";

import type { Diagnostic, FileFacts, LanguageId } from "../model.js";
import type { AdapterRegistry } from "./AdapterRegistry.js";
import { normalizeFacts } from "./FactNormalizer.js";

/**
 * Per-file extraction entry point: adapter selection, extraction, normalization.
 */
export class FactExtractor {
  constructor(
    private readonly registry: AdapterRegistry,
    private readonly logger: Logger = silentLogger
  ) {}

  /**
   * Check whether a file has an adapter.
   */
  supports(filePath: string): boolean {
    return this.registry.forFile(filePath) !== undefined;
  }

  /**
   * Language of the adapter that would handle a file.
   */
  languageOf(filePath: string): LanguageId | undefined {
    return this.registry.forFile(filePath)?.language;
  }

  /**
   * Extract and normalize one file's Facts.
   *
   * A parse failure is not an error here: the file comes back with
   * `parsed: false`, no Facts and a `parse-failure` diagnostic.
   *
   * @returns Err only when no adapter handles the file's extension
   */
  async extractFile(filePath: string, source: string): Promise<Result<FileFacts, Diagnostic>> {
    const adapter = this.registry.forFile(filePath);
    if (!adapter) {
      return Err({ file: filePath, kind: "unsupported-language", message: `no adapter for ${filePath}` });
    }

    const outcome = await tryCatchAsync(() => adapter.extract(source, filePath));
    if (!outcome.ok) {
      this.logger.warn(`extraction crashed for ${filePath}`, { error: outcome.error.message });
      return Ok(failedFile(filePath, adapter.language, {
        file: filePath,
        kind: "parse-failure",
        message: outcome.error.message,
      }));
    }

    const extracted = outcome.value;
    if (!extracted.ok) {
      this.logger.debug(`parse failure in ${filePath}: ${extracted.error.message}`);
      return Ok(failedFile(filePath, adapter.language, {
        file: filePath,
        kind: "parse-failure",
        message: extracted.error.message,
        line: extracted.error.line,
      }));
    }

    const { facts, diagnostics } = normalizeFacts(filePath, adapter.language, extracted.value);
    for (const diagnostic of diagnostics) {
      this.logger.debug(`dropped fact in ${filePath}: ${diagnostic.message}`);
    }

    return Ok({ path: filePath, language: adapter.language, facts, parsed: true, diagnostics });
  }
}

/**
 * Outcome for a file that contributes a node but no Facts.
 */
export function failedFile(filePath: string, language: LanguageId, diagnostic: Diagnostic): FileFacts {
  return { path: filePath, language, facts: [], parsed: false, diagnostics: [diagnostic] };
}
