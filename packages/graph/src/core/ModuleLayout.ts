/**
 * Per-language rules mapping file paths to module paths and module paths to
 * candidate files. TypeScript and JavaScript share one family.
 */
import path from "node:path";
import type { LanguageId } from "@depgraph/syntax";

export type LanguageFamily = "python" | "ecmascript" | "rust" | "go";

export interface ModuleLayout {
  family: LanguageFamily;
  /** Separator between module path segments as written in imports */
  separator: string;

  /**
   * Module paths a file can be imported by.
   *
   * @param filePath - Root-relative POSIX path
   * @param allFiles - Every discovered file, for package-structure checks
   */
  declaredModules(filePath: string, allFiles: ReadonlySet<string>): string[];

  /**
   * Directory that relative imports in a file start from.
   */
  moduleDirectory(filePath: string): string;

  /**
   * Files to try, in order, for a root-relative path built from an import.
   */
  candidates(basePath: string): string[];
}

export function familyOf(language: LanguageId): LanguageFamily {
  switch (language) {
    case "typescript":
    case "javascript":
      return "ecmascript";
    case "python":
      return "python";
    case "rust":
      return "rust";
    case "go":
      return "go";
  }
}

/**
 * POSIX dirname with "" for the root.
 */
export function dirOf(filePath: string): string {
  const dir = path.posix.dirname(filePath);
  return dir === "." ? "" : dir;
}

/**
 * Join path parts, skipping empty ones.
 */
export function joinPath(...parts: string[]): string {
  const joined = parts.filter((p) => p !== "").join("/");
  return joined === "" ? "" : path.posix.normalize(joined);
}

export function splitPath(filePath: string): string[] {
  return filePath === "" ? [] : filePath.split("/");
}

function stripExtension(filePath: string): string {
  const ext = path.posix.extname(filePath);
  return ext ? filePath.slice(0, -ext.length) : filePath;
}

function withoutSrc(modulePath: string, separator: string): string | null {
  const prefix = `src${separator}`;
  return modulePath.startsWith(prefix) ? modulePath.slice(prefix.length) : null;
}

function unique(values: Array<string | null>): string[] {
  return [...new Set(values.filter((v): v is string => v !== null))];
}

const pythonLayout: ModuleLayout = {
  family: "python",
  separator: ".",

  declaredModules(filePath, allFiles) {
    const segments = stripExtension(filePath).split("/");
    if (segments[segments.length - 1] === "__init__") segments.pop();
    if (segments.length === 0) return [];

    const dotted = segments.join(".");

    // Walk up while the directory is a package, then name the file from above the topmost one
    let top: string | null = null;
    let dir = dirOf(filePath);
    while (dir !== "" && allFiles.has(`${dir}/__init__.py`)) {
      top = dir;
      dir = dirOf(dir);
    }
    const fromPackageRoot =
      top === null ? null : segments.slice(splitPath(dirOf(top)).length).join(".") || null;

    return unique([dotted, withoutSrc(dotted, "."), fromPackageRoot]);
  },

  moduleDirectory: dirOf,

  candidates(basePath) {
    return [`${basePath}.py`, `${basePath}.pyi`, `${basePath}/__init__.py`];
  },
};

const ECMASCRIPT_EXTENSIONS = [".ts", ".tsx", ".js", ".jsx", ".mts", ".mjs", ".cts", ".cjs"];

// A compiled extension written in an import may name a TypeScript source
const SOURCE_EXTENSIONS: Record<string, string[]> = {
  ".js": [".ts", ".tsx"],
  ".jsx": [".tsx"],
  ".mjs": [".mts"],
  ".cjs": [".cts"],
};

const ecmascriptLayout: ModuleLayout = {
  family: "ecmascript",
  separator: "/",

  declaredModules(filePath) {
    const modulePath = stripExtension(filePath);
    const isIndex = path.posix.basename(modulePath) === "index";
    const dir = dirOf(modulePath);
    const paths = isIndex && dir !== "" ? [modulePath, dir] : [modulePath];
    return unique([...paths, ...paths.map((p) => withoutSrc(p, "/"))]);
  },

  moduleDirectory: dirOf,

  candidates(basePath) {
    const result = basePath === "" ? [] : [basePath];
    const ext = path.posix.extname(basePath);
    for (const sourceExt of SOURCE_EXTENSIONS[ext] ?? []) {
      result.push(basePath.slice(0, -ext.length) + sourceExt);
    }
    if (basePath !== "") {
      result.push(...ECMASCRIPT_EXTENSIONS.map((e) => basePath + e));
    }
    result.push(...ECMASCRIPT_EXTENSIONS.map((e) => joinPath(basePath, `index${e}`)));
    return result;
  },
};

const RUST_MODULE_ROOTS = new Set(["main", "lib", "mod"]);

/**
 * Module segments of a Rust file below its crate's `src/` directory.
 */
function rustSegments(filePath: string): string[] {
  const segments = stripExtension(filePath).split("/");
  const stem = segments.pop() ?? "";
  const srcIndex = segments.lastIndexOf("src");
  const dirs = srcIndex >= 0 ? segments.slice(srcIndex + 1) : segments;
  return RUST_MODULE_ROOTS.has(stem) ? dirs : [...dirs, stem];
}

const rustLayout: ModuleLayout = {
  family: "rust",
  separator: "::",

  declaredModules(filePath) {
    return [rustSegments(filePath).join("::")];
  },

  // `mod x;` in `a/b.rs` names `a/b/x.rs`; in `a/mod.rs` it names `a/x.rs`
  moduleDirectory(filePath) {
    const stem = path.posix.basename(filePath, ".rs");
    return RUST_MODULE_ROOTS.has(stem) ? dirOf(filePath) : stripExtension(filePath);
  },

  candidates(basePath) {
    if (basePath === "") return [];
    return [`${basePath}.rs`, `${basePath}/mod.rs`];
  },
};

const goLayout: ModuleLayout = {
  family: "go",
  separator: "/",

  declaredModules(filePath) {
    return [dirOf(filePath)];
  },

  moduleDirectory: dirOf,

  // Go imports name packages; the resolver lists the directory instead
  candidates() {
    return [];
  },
};

export const LAYOUTS: Record<LanguageFamily, ModuleLayout> = {
  python: pythonLayout,
  ecmascript: ecmascriptLayout,
  rust: rustLayout,
  go: goLayout,
};

export function layoutFor(language: LanguageId): ModuleLayout {
  return LAYOUTS[familyOf(language)];
}
