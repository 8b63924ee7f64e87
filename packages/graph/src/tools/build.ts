/**
 * graph_build - Build the graph of a directory and make it current.
 */
import * as z from "zod/v4";
import { errorResponse, successResponse, type ToolResponse } from "@depgraph/core";
import { LANGUAGE_IDS, type LanguageId } from "@depgraph/syntax";

import type { GraphStats } from "../core/model.js";
import type { ToolRegistrar } from "./types.js";

interface BuildInput {
  path?: string;
  concurrency?: number;
  languages?: LanguageId[];
  verbose?: boolean;
  skip_tests?: boolean;
}

export function formatStats(title: string, root: string, stats: GraphStats): string {
  const languages = LANGUAGE_IDS.flatMap((id) => {
    const count = stats.languages[id];
    return count ? [`${id} ${count}`] : [];
  });
  return [
    `## ${title}`,
    "",
    `**Root:** ${root || "(in memory)"}`,
    `**Nodes:** ${stats.nodes} (${stats.files} files, ${stats.definitions} definitions, ${stats.externals} external)`,
    `**Edges:** ${stats.edges} (imports ${stats.edgesByKind.imports}, references ${stats.edgesByKind.references}, defines ${stats.edgesByKind.defines})`,
    `**Languages:** ${languages.length > 0 ? languages.join(", ") : "none"}`,
    `**Failed files:** ${stats.failedFiles}`,
    `**Diagnostics:** ${stats.diagnostics}`,
  ].join("\n");
}

export const registerBuild: ToolRegistrar = (server, session) => {
  server.registerTool(
    "graph_build",
    {
      title: "Build graph",
      description: `Build the dependency graph of a directory and make it the graph every other tool queries.

Files in Python, TypeScript, JavaScript, Rust and Go are parsed; imports are resolved to project files or external modules.`,
      inputSchema: {
        path: z.string().optional().describe("Project root (default: the server's working directory)"),
        concurrency: z.number().int().min(1).optional().describe("Files parsed at once (default: 8)"),
        languages: z.array(z.enum(LANGUAGE_IDS)).optional().describe("Only extract these languages"),
        verbose: z.boolean().optional().describe("Report unsupported files as diagnostics"),
        skip_tests: z.boolean().optional().describe("Leave test files out of the graph"),
      },
    },
    async (input: BuildInput): Promise<ToolResponse> => {
      const root = input.path ?? process.cwd();
      const result = await session.build(root, {
        concurrency: input.concurrency,
        languages: input.languages,
        verbose: input.verbose,
        skipTests: input.skip_tests,
      });
      if (!result.ok) {
        return errorResponse(result.error.message);
      }

      const graph = result.value;
      const stats = graph.stats();
      return successResponse(formatStats("Graph Built", graph.root, stats), { root: graph.root, stats });
    }
  );
};
