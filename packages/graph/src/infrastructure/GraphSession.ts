import { Err, type Logger, Ok, type Result, silentLogger } from "@depgraph/core";
import { type FileSystem, NodeFileSystem } from "@depgraph/syntax";

import type { BuildOptionsInput } from "../config.js";
import type { Graph } from "../core/Graph.js";
import type { GraphBuilder } from "./GraphBuilder.js";

/**
 * The graph an MCP server answers queries from. A failed build keeps the
 * previous graph.
 */
export class GraphSession {
  private graph: Graph | null = null;

  constructor(
    private readonly builder: GraphBuilder,
    private readonly logger: Logger = silentLogger,
    private readonly fileSystem: (root: string) => FileSystem = (root) => new NodeFileSystem(root)
  ) {}

  async build(root: string, options?: BuildOptionsInput): Promise<Result<Graph, Error>> {
    const result = await this.builder.build(root, options);
    if (result.ok) {
      this.graph = result.value;
    } else {
      this.logger.warn(`Build failed, keeping the previous graph: ${result.error.message}`);
    }
    return result;
  }

  /**
   * Re-parse one file of the current graph, from `source` or else from disk
   * under the graph root. A file new to the graph is added.
   */
  async update(filePath: string, source?: string): Promise<Result<Graph, Error>> {
    const current = this.current();
    if (!current.ok) return current;
    const graph = current.value;

    let text = source;
    if (text === undefined) {
      const read = await this.fileSystem(graph.root).read(filePath);
      if (!read.ok) {
        return Err(new Error(`Could not read ${filePath}: ${read.error.message}`));
      }
      text = read.value;
    }

    const result = await this.builder.rebuildFile(graph, filePath, text);
    if (result.ok) {
      this.graph = result.value;
      this.logger.debug(`Updated ${filePath}`);
    }
    return result;
  }

  current(): Result<Graph, Error> {
    return this.graph ? Ok(this.graph) : Err(new Error("Graph not built. Call graph_build first."));
  }

  /**
   * Drop the current graph and the builder's cached Facts with it.
   */
  close(): void {
    if (this.graph) {
      this.logger.debug("Releasing graph", { files: this.graph.stats().files });
    }
    this.graph = null;
  }
}
