import type { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import type { ExecService } from "../core/services/ExecService.js";
import type { ToolRegistrar } from "./types.js";

import { registerRunCommand } from "./runCommand.js";
import { registerStartCommand } from "./startCommand.js";
import { registerGetOutput } from "./getOutput.js";
import { registerWriteStdin } from "./writeStdin.js";
import { registerWaitCommand } from "./waitCommand.js";
import { registerListCommands } from "./listCommands.js";

export interface Services {
  service: ExecService;
}

const allTools: ToolRegistrar[] = [
  registerRunCommand,
  registerStartCommand,
  registerGetOutput,
  registerWriteStdin,
  registerWaitCommand,
  registerListCommands,
];

export function registerAllTools(server: McpServer, services: Services): void {
  for (const register of allTools) {
    register(server, services.service);
  }
}

export * from "./types.js";
export * from "./schemas.js";
export { formatOutput, formatProcessLine, formatResult, resultPayload, cleanText } from "./format.js";
