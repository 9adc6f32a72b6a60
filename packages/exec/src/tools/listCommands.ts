import * as z from "zod/v4";
import { textResponse, type ToolResponse } from "@procmux/core";

import type { ToolRegistrar } from "./types.js";
import { ManagedProcessSchema } from "./schemas.js";
import { formatProcessLine } from "./format.js";

interface ListCommandsInput {
  running_only?: boolean;
}

export const registerListCommands: ToolRegistrar = (server, service) => {
  server.registerTool(
    "list_commands",
    {
      title: "List commands",
      description: `List started commands that are still tracked, oldest first.

Use running_only=true to see only the ones you can still write to.`,
      inputSchema: {
        running_only: z.boolean().optional().describe("Only show running commands"),
      },
      outputSchema: {
        processes: z.array(ManagedProcessSchema),
      },
    },
    async (input: ListCommandsInput): Promise<ToolResponse> => {
      const processes = input.running_only ? service.listRunning() : service.list();
      const summary = processes.length === 0 ? "No commands" : processes.map(formatProcessLine).join("\n");
      return { ...textResponse(summary), structuredContent: { processes } };
    }
  );
};
