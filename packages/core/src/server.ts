/**
 * MCP server bootstrap shared by the packages that expose tools.
 */

import { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { StdioServerTransport } from "@modelcontextprotocol/sdk/server/stdio.js";

import { createLogger, type Logger } from "./logger.js";

export interface ServerConfig {
  name: string;
  version: string;
}

export interface ServerBootstrapOptions<S> {
  config: ServerConfig;

  /** Builds the services handed to `registerTools` and the lifecycle hooks */
  createServices: () => S | Promise<S>;

  registerTools: (server: McpServer, services: S) => void;

  onStartup?: (services: S) => Promise<void> | void;

  /** Runs on SIGTERM/SIGINT before the server closes */
  onShutdown?: (services: S) => Promise<void> | void;

  logger?: Logger;
}

/**
 * Create services, register tools, install signal handlers and connect the
 * stdio transport.
 *
 * @example
 * ```typescript
 * bootstrapServer({
 *   config: { name: "procmux:exec", version: "0.1.0" },
 *   createServices: () => ({ service: new ExecService() }),
 *   registerTools: registerAllTools,
 *   onShutdown: (services) => services.service.dispose(),
 * });
 * ```
 */
export async function bootstrapServer<S>(options: ServerBootstrapOptions<S>): Promise<void> {
  const { config, createServices, registerTools, onStartup, onShutdown } = options;
  const logger = options.logger ?? createLogger(config.name);

  const services = await createServices();

  const server = new McpServer({
    name: config.name,
    version: config.version,
  });

  registerTools(server, services);

  const transport = new StdioServerTransport();

  const shutdown = async (): Promise<void> => {
    logger.info("Shutting down...");
    await onShutdown?.(services);
    await server.close();
    process.exit(0);
  };

  const onSignal = (): void => {
    shutdown().catch((error: unknown) => {
      logger.error(`Shutdown failed: ${error instanceof Error ? error.message : String(error)}`);
      process.exit(1);
    });
  };

  process.on("SIGTERM", onSignal);
  process.on("SIGINT", onSignal);

  await onStartup?.(services);

  await server.connect(transport);
  logger.info(`Ready (${config.name} ${config.version})`);
}

/**
 * Entry point for server scripts: runs `bootstrapServer` and exits on failure.
 */
export function runServer<S>(options: ServerBootstrapOptions<S>): void {
  const logger = options.logger ?? createLogger(options.config.name);
  bootstrapServer({ ...options, logger }).catch((error: unknown) => {
    logger.error(`Fatal error: ${error instanceof Error ? error.stack ?? error.message : String(error)}`);
    process.exit(1);
  });
}

export { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
