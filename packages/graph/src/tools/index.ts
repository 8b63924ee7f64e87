/**
 * MCP tool registration for the graph server.
 */
import type { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";

import type { GraphSession } from "../infrastructure/GraphSession.js";
import { registerBuild } from "./build.js";
import { registerCycles } from "./cycles.js";
import { registerDiagnostics } from "./diagnostics.js";
import { registerExport } from "./export.js";
import { registerFile } from "./file.js";
import { registerRebuildFile } from "./rebuild.js";
import { registerStats } from "./stats.js";

export interface Services {
  session: GraphSession;
}

export function registerAllTools(server: McpServer, services: Services): void {
  const { session } = services;

  registerBuild(server, session);
  registerRebuildFile(server, session);
  registerStats(server, session);
  registerFile(server, session);
  registerCycles(server, session);
  registerDiagnostics(server, session);
  registerExport(server, session);
}

export { formatStats } from "./build.js";
export { formatFileSummary } from "./file.js";
export { formatCycles } from "./cycles.js";
export type { ToolRegistrar } from "./types.js";
