/**
 * graph_stats - Counts for the current graph.
 */
import { resultToResponse, type ToolResponse } from "@depgraph/core";

import { formatStats } from "./build.js";
import type { ToolRegistrar } from "./types.js";

export const registerStats: ToolRegistrar = (server, session) => {
  server.registerTool(
    "graph_stats",
    {
      title: "Graph stats",
      description: "Node and edge counts of the current graph, per type, kind and language.",
      inputSchema: {},
    },
    async (): Promise<ToolResponse> =>
      resultToResponse(session.current(), (graph) => {
        const stats = graph.stats();
        return { text: formatStats("Graph Statistics", graph.root, stats), data: { stats } };
      })
  );
};
