import { detectLanguage, type LanguageId } from "../model.js";
import type { LanguageAdapter } from "../ports/LanguageAdapter.js";

/**
 * Selects a Language Adapter by file extension.
 */
export class AdapterRegistry {
  private readonly adapters = new Map<LanguageId, LanguageAdapter>();

  constructor(adapters: Iterable<LanguageAdapter>) {
    for (const adapter of adapters) {
      this.adapters.set(adapter.language, adapter);
    }
  }

  get(language: LanguageId): LanguageAdapter | undefined {
    return this.adapters.get(language);
  }

  /**
   * Adapter for a file, or undefined when its extension is not supported.
   */
  forFile(filePath: string): LanguageAdapter | undefined {
    const language = detectLanguage(filePath);
    return language ? this.adapters.get(language.id) : undefined;
  }

  languages(): LanguageId[] {
    return [...this.adapters.keys()];
  }
}
