import type { Result } from "@depgraph/core";

/**
 * Port for reading project files.
 */
export interface FileSystem {
  /**
   * Read file contents as UTF-8.
   *
   * @param filePath - Absolute, or relative to the file system's base path
   */
  read(filePath: string): Promise<Result<string, Error>>;

  /**
   * Check whether a path is an existing directory.
   */
  isDirectory(dirPath: string): boolean;
}
