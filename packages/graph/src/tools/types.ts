import type { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";

import type { GraphSession } from "../infrastructure/GraphSession.js";

export type ToolRegistrar = (server: McpServer, session: GraphSession) => void;
