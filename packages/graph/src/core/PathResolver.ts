/**
 * Maps normalized imports to project files.
 *
 * Relative imports walk up from the importing file and try the language's
 * candidate files. Absolute imports, and relative ones that found nothing,
 * look up declared module paths in the File Index. Anything else is external.
 */
import type { ImportFact } from "@depgraph/syntax";

import type { FileIndex } from "./FileIndex.js";
import {
  dirOf,
  joinPath,
  type LanguageFamily,
  layoutFor,
  type ModuleLayout,
  splitPath,
} from "./ModuleLayout.js";

export type Resolution = { kind: "file"; path: string } | { kind: "external"; module: string };

type ImportInput = Pick<ImportFact, "module" | "name" | "level" | "raw">;

export class PathResolver {
  constructor(private readonly index: FileIndex) {}

  resolve(fact: ImportInput, fromFile: string): Resolution {
    const language = this.index.language(fromFile);
    if (!language) {
      return { kind: "external", module: fact.raw };
    }
    const layout = layoutFor(language);

    const found =
      (fact.level > 0 ? this.resolveRelative(fact, fromFile, layout) : null) ??
      this.resolveAbsolute(fact, fromFile, layout);

    return found === null ? { kind: "external", module: fact.raw } : { kind: "file", path: found };
  }

  private resolveRelative(fact: ImportInput, fromFile: string, layout: ModuleLayout): string | null {
    const base = walkUp(layout.moduleDirectory(fromFile), fact.level - 1);
    if (base === null) return null;

    switch (layout.family) {
      case "python":
        for (const target of pythonTargets(fact)) {
          // `from . import x` falls back to the package itself
          const candidates =
            target === ""
              ? [joinPath(base, "__init__.py")]
              : layout.candidates(joinPath(base, ...splitModule(target, layout.separator)));
          const hit = this.firstExisting(candidates);
          if (hit) return hit;
        }
        return null;

      case "ecmascript":
        return this.firstExisting(layout.candidates(joinPath(base, fact.module)));

      case "rust": {
        // Trailing segments may name items inside the module rather than files
        const segments = splitModule(fact.module, layout.separator);
        for (let n = segments.length; n >= 0; n--) {
          const hit = this.firstExisting(layout.candidates(joinPath(base, ...segments.slice(0, n))));
          if (hit) return hit;
        }
        return null;
      }

      case "go":
        return this.pick(this.index.inDirectory("go", joinPath(base, fact.module)), fromFile);
    }
  }

  private resolveAbsolute(fact: ImportInput, fromFile: string, layout: ModuleLayout): string | null {
    const family = layout.family;

    switch (family) {
      case "python":
        for (const target of pythonTargets(fact)) {
          if (target === "") continue;
          const hit = this.lookup(family, target, fromFile);
          if (hit) return hit;
        }
        return null;

      case "ecmascript":
        return this.lookup(family, stripScriptExtension(fact.module), fromFile);

      case "rust": {
        const segments = splitModule(fact.module, layout.separator);
        const lowest = fact.raw === "crate" || fact.raw.startsWith("crate::") ? 0 : 1;
        for (let n = segments.length; n >= lowest; n--) {
          const hit = this.lookup(family, segments.slice(0, n).join(layout.separator), fromFile);
          if (hit) return hit;
        }
        return null;
      }

      case "go":
        return this.lookup(family, fact.module, fromFile) ?? this.lookupGoSuffix(fact.module, fromFile);
    }
  }

  /**
   * Import paths carry the module prefix from go.mod, which is not known here:
   * match the longest declared package path that ends the import path.
   */
  private lookupGoSuffix(importPath: string, fromFile: string): string | null {
    let best: string | null = null;
    for (const declared of this.index.declaredModules("go")) {
      if (declared === "" || !importPath.endsWith(`/${declared}`)) continue;
      if (best === null || declared.length > best.length) best = declared;
    }
    return best === null ? null : this.lookup("go", best, fromFile);
  }

  private lookup(family: LanguageFamily, modulePath: string, fromFile: string): string | null {
    return this.pick(this.index.lookup(family, modulePath), fromFile);
  }

  private firstExisting(candidates: readonly string[]): string | null {
    return candidates.find((c) => this.index.has(c)) ?? null;
  }

  /**
   * Nearest candidate to the importing file, then lexicographic path order.
   */
  private pick(candidates: readonly string[], fromFile: string): string | null {
    let best: string | null = null;
    let bestDistance = Infinity;
    for (const candidate of candidates) {
      const distance = directoryDistance(dirOf(fromFile), dirOf(candidate));
      if (distance < bestDistance || (distance === bestDistance && best !== null && candidate < best)) {
        best = candidate;
        bestDistance = distance;
      }
    }
    return best;
  }
}

/**
 * Path segments between two directories through their common ancestor.
 */
export function directoryDistance(a: string, b: string): number {
  const left = splitPath(a);
  const right = splitPath(b);
  let common = 0;
  while (common < left.length && common < right.length && left[common] === right[common]) {
    common++;
  }
  return left.length - common + (right.length - common);
}

/**
 * Parent directory `steps` times, or null past the root.
 */
function walkUp(dir: string, steps: number): string | null {
  let current = dir;
  for (let i = 0; i < steps; i++) {
    if (current === "") return null;
    current = dirOf(current);
  }
  return current;
}

function splitModule(module: string, separator: string): string[] {
  return module === "" ? [] : module.split(separator);
}

/**
 * `from pkg import name` may import the submodule `pkg.name`: try it first.
 */
function pythonTargets(fact: ImportInput): string[] {
  if (!fact.name || fact.name === "*") return [fact.module];
  const submodule = fact.module === "" ? fact.name : `${fact.module}.${fact.name}`;
  return [submodule, fact.module];
}

function stripScriptExtension(module: string): string {
  return module.replace(/\.(?:[mc]?[jt]s|[jt]sx)$/, "");
}
