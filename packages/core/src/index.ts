export {
  type Result,
  Ok,
  Err,
  map,
  mapErr,
  andThen,
  unwrapOr,
  toError,
  tryCatch,
  tryCatchAsync,
} from "./result.js";

export {
  LOG_LEVELS,
  type LogLevel,
  type LogEntry,
  type LogSink,
  type Logger,
  type LoggerOptions,
  isLogLevel,
  formatEntry,
  createLogger,
  silentLogger,
} from "./logger.js";

export { type PoolOptions, runPool } from "./pool.js";

export {
  type TextContent,
  type ToolResponse,
  type ErrorPayload,
  textResponse,
  errorResponse,
  successResponse,
  resultToResponse,
} from "./mcp.js";

export {
  type ServerConfig,
  type ServerBootstrapOptions,
  type RunningServer,
  bootstrapServer,
  runServer,
  McpServer,
} from "./server.js";
