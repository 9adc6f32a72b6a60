import type { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import type { ExecService } from "../core/services/ExecService.js";

export interface ToolRegistrar {
  (server: McpServer, service: ExecService): void;
}
