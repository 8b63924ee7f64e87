import fs from "node:fs";
import { readdir } from "node:fs/promises";
import path from "node:path";
import { type Logger, type Result, Err, Ok, silentLogger, toError } from "@depgraph/core";

import type { ProjectScanner, ScanOptions } from "../../core/ports/ProjectScanner.js";

// Directories never worth descending into
const ALWAYS_IGNORE = new Set([
  "node_modules",
  ".git",
  ".svn",
  ".hg",
  "dist",
  "build",
  "out",
  ".next",
  ".nuxt",
  ".output",
  "coverage",
  ".nyc_output",
  "__pycache__",
  ".pytest_cache",
  ".mypy_cache",
  "venv",
  ".venv",
  "env",
  ".env",
  ".tox",
  "target", // Rust
  "vendor", // Go
  ".idea",
  ".vscode",
]);

const IGNORE_PATTERNS = [/\.min\.[jt]s$/, /\.bundle\.[jt]s$/, /\.d\.[mc]?ts$/, /(^|\/)__mocks__\//];

const TEST_PATTERNS = [
  /\.test\.[jt]sx?$/,
  /\.spec\.[jt]sx?$/,
  /_test\.go$/,
  /(^|\/)__tests__\//,
  /(^|\/)test_[^/]*\.py$/,
  /_test\.py$/,
];

/**
 * Node.js implementation of ProjectScanner.
 * Walks the tree recursively, honouring the root .gitignore.
 */
export class NodeProjectScanner implements ProjectScanner {
  private gitignorePatterns: RegExp[] = [];

  constructor(private readonly logger: Logger = silentLogger) {}

  async scan(rootPath: string, options: ScanOptions = {}): Promise<Result<string[], Error>> {
    try {
      this.loadGitignore(rootPath);

      const files: string[] = [];
      const extSet = options.extensions ? new Set(options.extensions.map((e) => e.toLowerCase())) : null;

      await this.scanDirectory(rootPath, "", extSet, options, files);

      // Plain code-unit order: the discovery order every later phase relies on
      files.sort();
      this.logger.debug(`Discovered ${files.length} files`, { root: rootPath });
      return Ok(files);
    } catch (error) {
      return Err(toError(error));
    }
  }

  shouldIgnore(relativePath: string, options: ScanOptions = {}): boolean {
    for (const part of relativePath.split("/")) {
      if (ALWAYS_IGNORE.has(part)) {
        return true;
      }
    }

    for (const pattern of IGNORE_PATTERNS) {
      if (pattern.test(relativePath)) {
        return true;
      }
    }

    if (options.skipTests && TEST_PATTERNS.some((pattern) => pattern.test(relativePath))) {
      return true;
    }

    for (const pattern of this.gitignorePatterns) {
      if (pattern.test(relativePath)) {
        return true;
      }
    }

    return false;
  }

  private async scanDirectory(
    rootPath: string,
    relativeDir: string,
    extensions: Set<string> | null,
    options: ScanOptions,
    results: string[]
  ): Promise<void> {
    const entries = await readdir(path.join(rootPath, relativeDir), { withFileTypes: true });

    for (const entry of entries) {
      const relativePath = relativeDir ? `${relativeDir}/${entry.name}` : entry.name;

      if (this.shouldIgnore(relativePath, options)) {
        continue;
      }

      if (entry.isDirectory()) {
        await this.scanDirectory(rootPath, relativePath, extensions, options, results);
      } else if (entry.isFile()) {
        const ext = path.extname(entry.name).toLowerCase();
        if (!extensions || extensions.has(ext)) {
          results.push(relativePath);
        }
      }
    }
  }

  private loadGitignore(rootPath: string): void {
    this.gitignorePatterns = [];

    const gitignorePath = path.join(rootPath, ".gitignore");
    if (!fs.existsSync(gitignorePath)) {
      return;
    }

    let content: string;
    try {
      content = fs.readFileSync(gitignorePath, "utf-8");
    } catch (error) {
      this.logger.warn("Could not read .gitignore, continuing without it", {
        error: toError(error).message,
      });
      return;
    }

    for (const line of content.split(/\r?\n/)) {
      const trimmed = line.trim();

      if (!trimmed || trimmed.startsWith("#")) {
        continue;
      }

      const pattern = gitignoreToRegex(trimmed);
      if (pattern) {
        this.gitignorePatterns.push(pattern);
      }
    }
  }
}

/**
 * Convert a .gitignore line to a regex over root-relative POSIX paths (simplified).
 * Negations are not supported and yield null.
 */
export function gitignoreToRegex(pattern: string): RegExp | null {
  if (pattern.startsWith("!")) {
    return null;
  }

  const anchored = pattern.startsWith("/");
  let p = anchored ? pattern.slice(1) : pattern;
  const directoryOnly = p.endsWith("/");
  if (directoryOnly) {
    p = p.slice(0, -1);
  }
  if (!p) {
    return null;
  }

  // Escape regex metacharacters except the glob ones
  p = p.replace(/[.+^${}()|[\]\\]/g, "\\$&");
  p = p.replace(/\*\*/g, "\u0000");
  p = p.replace(/\*/g, "[^/]*");
  p = p.replace(/\?/g, "[^/]");
  p = p.replace(/\u0000/g, ".*");

  const head = anchored ? "^" : "(^|/)";
  const tail = directoryOnly ? "/" : "($|/)";
  return new RegExp(`${head}${p}${tail}`);
}
