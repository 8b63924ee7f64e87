import type { Result } from "@depgraph/core";

export interface ScanOptions {
  /** File extensions to include (e.g., [".py", ".rs"]); every file when omitted */
  extensions?: readonly string[];
  /** Leave out test files (`*.test.ts`, `*_test.go`, `__tests__/`) */
  skipTests?: boolean;
}

/**
 * Port for discovering source files in a project.
 */
export interface ProjectScanner {
  /**
   * Scan a directory for source files.
   * Respects .gitignore and common build/vendor directories.
   *
   * @param rootPath - Project root directory
   * @returns POSIX paths relative to rootPath, sorted lexicographically
   */
  scan(rootPath: string, options?: ScanOptions): Promise<Result<string[], Error>>;

  /**
   * Check if a root-relative POSIX path should be ignored.
   */
  shouldIgnore(relativePath: string, options?: ScanOptions): boolean;
}
