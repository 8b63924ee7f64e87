/**
 * graph_cycles - Import cycles and the files most import paths pass through.
 */
import * as z from "zod/v4";
import { resultToResponse, type ToolResponse } from "@depgraph/core";

import { type CentralityEntry, findImportCycles, type ImportCycles, mostCentralFiles } from "../core/analysis.js";
import type { ToolRegistrar } from "./types.js";

interface CyclesInput {
  limit?: number;
}

export function formatCycles(cycles: ImportCycles, central: CentralityEntry[]): string {
  const lines = ["## Import Cycles", ""];

  if (cycles.cycles.length === 0) {
    lines.push("No import cycles.");
  } else {
    cycles.cycles.forEach((cycle, i) => {
      lines.push(`${i + 1}. ${cycle.join(" <-> ")}`);
    });
  }

  lines.push("", "### Component sizes");
  for (const { size, count } of cycles.sizes) {
    lines.push(`- ${size}: ${count}`);
  }

  lines.push("", "### Most central files");
  for (const { file, score } of central) {
    lines.push(`- ${file} ${score.toFixed(3)}`);
  }

  return lines.join("\n");
}

export const registerCycles: ToolRegistrar = (server, session) => {
  server.registerTool(
    "graph_cycles",
    {
      title: "Import cycles",
      description: `Find strongly connected groups of files in the import graph and rank files by betweenness centrality.

A cycle lists files that import each other directly or through other members.`,
      inputSchema: {
        limit: z.number().int().min(1).optional().describe("Central files to list (default: 10)"),
      },
    },
    async (input: CyclesInput): Promise<ToolResponse> =>
      resultToResponse(session.current(), (graph) => {
        const cycles = findImportCycles(graph);
        const central = mostCentralFiles(graph, input.limit ?? 10);
        return {
          text: formatCycles(cycles, central),
          data: { cycles: cycles.cycles, sizes: cycles.sizes, largest: cycles.largest, central },
        };
      })
  );
};
