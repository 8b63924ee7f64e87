import fs from "node:fs";
import { readFile } from "node:fs/promises";
import path from "node:path";
import { type Result, tryCatchAsync } from "@depgraph/core";

import type { FileSystem } from "../../core/ports/FileSystem.js";

/**
 * Node.js implementation of the FileSystem port.
 */
export class NodeFileSystem implements FileSystem {
  private readonly basePath: string;

  constructor(basePath?: string) {
    this.basePath = basePath ?? process.cwd();
  }

  private resolvePath(filePath: string): string {
    if (path.isAbsolute(filePath)) {
      return filePath;
    }
    return path.resolve(this.basePath, filePath);
  }

  read(filePath: string): Promise<Result<string, Error>> {
    return tryCatchAsync(() => readFile(this.resolvePath(filePath), "utf-8"));
  }

  isDirectory(dirPath: string): boolean {
    const stat = fs.statSync(this.resolvePath(dirPath), { throwIfNoEntry: false });
    return stat?.isDirectory() ?? false;
  }
}
