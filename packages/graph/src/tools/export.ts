/**
 * graph_export - Render the current graph as JSON, SVG or text.
 */
import { writeFile } from "node:fs/promises";
import * as z from "zod/v4";
import { errorResponse, successResponse, textResponse, type ToolResponse, tryCatchAsync } from "@depgraph/core";

import { EXPORT_FORMATS, type ExportFormat, renderGraph } from "../export/index.js";
import type { ToolRegistrar } from "./types.js";

interface ExportInput {
  format: ExportFormat;
  out_path?: string;
}

export const registerExport: ToolRegistrar = (server, session) => {
  server.registerTool(
    "graph_export",
    {
      title: "Export graph",
      description: `Render the current graph.

- json: the versioned serialized graph
- svg: files and external modules on a circle with import arrows
- text: a readable summary

Returns the document, or writes it to out_path.`,
      inputSchema: {
        format: z.enum(EXPORT_FORMATS).describe("Output format"),
        out_path: z.string().optional().describe("Write to this file instead of returning the document"),
      },
    },
    async (input: ExportInput): Promise<ToolResponse> => {
      const current = session.current();
      if (!current.ok) {
        return errorResponse(current.error.message);
      }

      const output = renderGraph(current.value, input.format);
      if (!input.out_path) {
        return textResponse(output);
      }

      const outPath = input.out_path;
      const written = await tryCatchAsync(() => writeFile(outPath, output, "utf-8"));
      if (!written.ok) {
        return errorResponse(`Could not write ${outPath}: ${written.error.message}`);
      }
      return successResponse(`Wrote ${input.format} graph to ${outPath}`, { path: outPath, length: output.length });
    }
  );
};
