/**
 * graph_file - Definitions, imports and importers of one file.
 */
import * as z from "zod/v4";
import { errorResponse, successResponse, type ToolResponse } from "@depgraph/core";

import { type FileSummary, fileSummary } from "../core/queries.js";
import type { ToolRegistrar } from "./types.js";

interface FileInput {
  file_path: string;
}

export function formatFileSummary(summary: FileSummary): string {
  const lines = [`## ${summary.path}`, "", `**Language:** ${summary.language}${summary.parsed ? "" : " (not parsed)"}`];

  lines.push("", `### Definitions (${summary.definitions.length})`);
  for (const def of summary.definitions) {
    lines.push(`- ${def.qualifiedName} (${def.kind}) L${def.line}`);
  }

  lines.push("", `### Imports (${summary.imports.length})`);
  for (const imp of summary.imports) {
    const imported = imp.name ? `${imp.module || "."} (${imp.name})` : imp.module;
    lines.push(`- ${imported} -> ${imp.resolved ?? "external"} L${imp.line}`);
  }

  lines.push("", `### Imported by (${summary.importers.length})`);
  for (const importer of summary.importers) {
    lines.push(`- ${importer}`);
  }

  return lines.join("\n");
}

export const registerFile: ToolRegistrar = (server, session) => {
  server.registerTool(
    "graph_file",
    {
      title: "File in graph",
      description: "Show what a file defines, what it imports (resolved or external) and which files import it.",
      inputSchema: {
        file_path: z.string().describe("Path relative to the graph root, as listed by graph_export"),
      },
    },
    async (input: FileInput): Promise<ToolResponse> => {
      const current = session.current();
      if (!current.ok) {
        return errorResponse(current.error.message);
      }

      const summary = fileSummary(current.value, input.file_path);
      if (!summary) {
        return errorResponse(`File not in graph: ${input.file_path}`);
      }
      return successResponse(formatFileSummary(summary), { file: summary });
    }
  );
};
