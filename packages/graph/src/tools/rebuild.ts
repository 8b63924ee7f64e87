/**
 * graph_rebuild_file - Re-parse one file and reassemble the current graph.
 */
import * as z from "zod/v4";
import { errorResponse, successResponse, type ToolResponse } from "@depgraph/core";

import { formatStats } from "./build.js";
import type { ToolRegistrar } from "./types.js";

interface RebuildInput {
  file_path: string;
  source?: string;
}

export const registerRebuildFile: ToolRegistrar = (server, session) => {
  server.registerTool(
    "graph_rebuild_file",
    {
      title: "Rebuild file",
      description: `Re-parse one file after an edit and update the current graph. Every other file keeps its cached facts.

A path not yet in the graph is added.`,
      inputSchema: {
        file_path: z.string().describe("Path relative to the graph root"),
        source: z.string().optional().describe("New file contents (default: read from disk)"),
      },
    },
    async (input: RebuildInput): Promise<ToolResponse> => {
      const result = await session.update(input.file_path, input.source);
      if (!result.ok) {
        return errorResponse(result.error.message);
      }

      const graph = result.value;
      const stats = graph.stats();
      return successResponse(formatStats("Graph Updated", graph.root, stats), { file: input.file_path, stats });
    }
  );
};
