import type { LanguageId } from "@depgraph/syntax";

import { dirOf, familyOf, LAYOUTS, type LanguageFamily } from "./ModuleLayout.js";

export interface IndexedFile {
  path: string;
  language: LanguageId;
}

/**
 * Immutable snapshot of the discovered files: languages, discovery order
 * and the module paths each file declares. Built once before resolution.
 */
export class FileIndex {
  private readonly languages = new Map<string, LanguageId>();
  private readonly order: readonly string[];
  private readonly modules = new Map<LanguageFamily, Map<string, string[]>>();
  private readonly directories = new Map<LanguageFamily, Map<string, string[]>>();

  constructor(files: readonly IndexedFile[]) {
    const all = new Set(files.map((f) => f.path));
    const order: string[] = [];

    for (const file of files) {
      if (this.languages.has(file.path)) continue;
      this.languages.set(file.path, file.language);
      order.push(file.path);

      const family = familyOf(file.language);
      for (const modulePath of LAYOUTS[family].declaredModules(file.path, all)) {
        append(this.modules, family, modulePath, file.path);
      }
      append(this.directories, family, dirOf(file.path), file.path);
    }

    this.order = order;
  }

  has(filePath: string): boolean {
    return this.languages.has(filePath);
  }

  language(filePath: string): LanguageId | undefined {
    return this.languages.get(filePath);
  }

  /**
   * Paths in discovery order.
   */
  files(): readonly string[] {
    return this.order;
  }

  get size(): number {
    return this.order.length;
  }

  /**
   * Files declaring a module path, in discovery order.
   */
  lookup(family: LanguageFamily, modulePath: string): readonly string[] {
    return this.modules.get(family)?.get(modulePath) ?? [];
  }

  /**
   * Files of a family directly inside a directory, in discovery order.
   */
  inDirectory(family: LanguageFamily, dir: string): readonly string[] {
    return this.directories.get(family)?.get(dir) ?? [];
  }

  /**
   * Every module path declared by the family.
   */
  declaredModules(family: LanguageFamily): readonly string[] {
    return [...(this.modules.get(family)?.keys() ?? [])];
  }
}

function append(
  target: Map<LanguageFamily, Map<string, string[]>>,
  family: LanguageFamily,
  key: string,
  filePath: string
): void {
  let byKey = target.get(family);
  if (!byKey) {
    byKey = new Map();
    target.set(family, byKey);
  }
  const list = byKey.get(key);
  if (!list) {
    byKey.set(key, [filePath]);
  } else if (!list.includes(filePath)) {
    list.push(filePath);
  }
}
