/**
 * MCP server over one in-memory graph, built for the working directory at startup.
 */
import { createLogger, type Logger, type ServerBootstrapOptions } from "@depgraph/core";

import { resolveLogLevel } from "./config.js";
import { GraphBuilder } from "./infrastructure/GraphBuilder.js";
import { GraphSession } from "./infrastructure/GraphSession.js";
import { registerAllTools, type Services } from "./tools/index.js";

export const SERVER_NAME = "depgraph";
export const SERVER_VERSION = "0.1.0";

export function createServerOptions(
  rootPath: string = process.cwd(),
  logger: Logger = createLogger({ prefix: SERVER_NAME, level: resolveLogLevel({}) })
): ServerBootstrapOptions<Services> {
  return {
    config: { name: SERVER_NAME, version: SERVER_VERSION },
    logger,
    createServices: () => {
      const builder = new GraphBuilder({ logger: logger.child("build") });
      return { session: new GraphSession(builder, logger) };
    },
    registerTools: registerAllTools,
    onStartup: async ({ session }) => {
      logger.info(`Building graph for workspace: ${rootPath}`);
      const result = await session.build(rootPath);
      if (!result.ok) {
        logger.warn(`Could not build graph: ${result.error.message}. Call graph_build with a path.`);
      }
    },
    onShutdown: ({ session }) => session.close(),
  };
}
