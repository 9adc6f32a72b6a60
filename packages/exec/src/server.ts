#!/usr/bin/env node
/**
 * MCP server exposing command execution tools over stdio.
 *
 * Configured through PROCMUX_OUTPUT_MODE, PROCMUX_MAX_HANDLES and
 * PROCMUX_LOG_LEVEL.
 */

import { createLogger, runServer } from "@procmux/core";

import { loadConfig } from "./config.js";
import { ExecService } from "./core/services/ExecService.js";
import { registerAllTools, type Services } from "./tools/index.js";

const loaded = loadConfig(process.env);
if (!loaded.ok) {
  createLogger("procmux:exec").error(loaded.error);
  process.exit(1);
}

const config = loaded.value;
const logger = createLogger("procmux:exec", { level: config.logLevel });

runServer<Services>({
  config: {
    name: "procmux:exec",
    version: "0.1.0",
  },
  logger,
  createServices: () => ({
    service: new ExecService(config, undefined, logger),
  }),
  registerTools: registerAllTools,
  onStartup: () => {
    logger.info(`Output mode: ${config.outputMode}, keeping up to ${config.maxHandles} handles`);
  },
  onShutdown: (services) => {
    const running = services.service.listRunning().length;
    if (running > 0) {
      logger.warn(`Closing stdin of ${running} running command(s)`);
    }
    services.service.dispose();
  },
});
