export {
  type Result,
  Ok,
  Err,
  map,
  mapErr,
  andThen,
  tryCatchAsync,
} from "./result.js";

export {
  type TextContent,
  type ToolResponse,
  type ErrorPayload,
  textResponse,
  errorResponse,
  resultToStructuredResponse,
} from "./mcp.js";

export {
  type ServerConfig,
  type ServerBootstrapOptions,
  bootstrapServer,
  runServer,
  McpServer,
} from "./server.js";

export {
  LOG_LEVELS,
  type LogLevel,
  type Logger,
  type LoggerOptions,
  isLogLevel,
  createLogger,
} from "./logger.js";
