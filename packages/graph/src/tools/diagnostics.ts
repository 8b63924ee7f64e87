/**
 * graph_diagnostics - Problems recorded while building the graph.
 */
import * as z from "zod/v4";
import { resultToResponse, type ToolResponse } from "@depgraph/core";
import { DIAGNOSTIC_KINDS, type DiagnosticKind } from "@depgraph/syntax";

import { formatDiagnostic } from "../export/text.js";
import type { ToolRegistrar } from "./types.js";

interface DiagnosticsInput {
  kind?: DiagnosticKind;
  file_path?: string;
}

export const registerDiagnostics: ToolRegistrar = (server, session) => {
  server.registerTool(
    "graph_diagnostics",
    {
      title: "Graph diagnostics",
      description:
        "List read failures, parse failures, dropped facts and unsupported files recorded by the last build.",
      inputSchema: {
        kind: z.enum(DIAGNOSTIC_KINDS).optional().describe("Only this kind"),
        file_path: z.string().optional().describe("Only this file"),
      },
    },
    async (input: DiagnosticsInput): Promise<ToolResponse> =>
      resultToResponse(session.current(), (graph) => {
        const diagnostics = graph
          .diagnostics()
          .filter((d) => (!input.kind || d.kind === input.kind) && (!input.file_path || d.file === input.file_path));

        const text =
          diagnostics.length === 0
            ? "No diagnostics."
            : [`## Diagnostics (${diagnostics.length})`, "", ...diagnostics.map((d) => `- ${formatDiagnostic(d)}`)].join(
                "\n"
              );
        return { text, data: { diagnostics: [...diagnostics], count: diagnostics.length } };
      })
  );
};
