/**
 * MCP server bootstrap: services, tools, lifecycle hooks and a transport.
 */

import { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { StdioServerTransport } from "@modelcontextprotocol/sdk/server/stdio.js";
import type { Transport } from "@modelcontextprotocol/sdk/shared/transport.js";

import { createLogger, type Logger } from "./logger.js";

export interface ServerConfig {
  name: string;
  version: string;
}

export interface ServerBootstrapOptions<S> {
  config: ServerConfig;

  /** Factory for the services the tools operate on */
  createServices: () => S | Promise<S>;

  /** Register every tool on the server */
  registerTools: (server: McpServer, services: S) => void;

  /** Runs after tools are registered, before the transport connects */
  onStartup?: (services: S) => Promise<void> | void;

  /** Runs when the server closes, before the transport goes away */
  onShutdown?: (services: S) => Promise<void> | void;

  /** Lifecycle logger (default: a stderr logger named after the server) */
  logger?: Logger;

  /** Transport to serve on (default: stdio) */
  transport?: Transport;
}

export interface RunningServer<S> {
  server: McpServer;
  services: S;
  /** Run the shutdown hook, then close the server and its transport */
  close: () => Promise<void>;
}

/**
 * Create services, register tools, run the startup hook and connect.
 *
 * @example
 * ```typescript
 * const running = await bootstrapServer({
 *   config: { name: "depgraph", version: "0.1.0" },
 *   createServices: () => ({ session: new GraphSession(new GraphBuilder()) }),
 *   registerTools: registerAllTools,
 *   onStartup: ({ session }) => session.build(process.cwd()).then(() => undefined),
 *   onShutdown: ({ session }) => session.close(),
 * });
 * ```
 */
export async function bootstrapServer<S>(options: ServerBootstrapOptions<S>): Promise<RunningServer<S>> {
  const { config, createServices, registerTools, onStartup, onShutdown } = options;
  const logger = options.logger ?? createLogger({ prefix: config.name });

  const services = await createServices();
  const server = new McpServer({ name: config.name, version: config.version });
  registerTools(server, services);

  await onStartup?.(services);

  await server.connect(options.transport ?? new StdioServerTransport());
  logger.info(`${config.name} ${config.version} ready`);

  let closed = false;
  const close = async (): Promise<void> => {
    if (closed) return;
    closed = true;
    logger.info("Shutting down");
    await onShutdown?.(services);
    await server.close();
  };

  return { server, services, close };
}

/**
 * Serve until SIGTERM or SIGINT; exit the process on a startup or shutdown failure.
 */
export function runServer<S>(options: ServerBootstrapOptions<S>): void {
  const logger = options.logger ?? createLogger({ prefix: options.config.name });
  const fail = (message: string) => (error: unknown) => {
    logger.error(message, { error: error instanceof Error ? error.message : String(error) });
    process.exit(1);
  };

  bootstrapServer({ ...options, logger }).then((running) => {
    const onSignal = (): void => {
      running.close().then(() => process.exit(0), fail("Shutdown failed"));
    };
    process.once("SIGTERM", onSignal);
    process.once("SIGINT", onSignal);
  }, fail("Fatal error"));
}

export { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
