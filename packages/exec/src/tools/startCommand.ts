import * as z from "zod/v4";
import { resultToStructuredResponse } from "@procmux/core";

import type { ToolRegistrar } from "./types.js";
import { BaseOutputShape, CommandSchema, ManagedProcessSchema } from "./schemas.js";
import { formatProcessLine } from "./format.js";

interface StartCommandInput {
  command: string[];
  cwd?: string;
  env?: Record<string, string>;
  stdin?: string;
  label?: string;
}

export const registerStartCommand: ToolRegistrar = (server, service) => {
  server.registerTool(
    "start_command",
    {
      title: "Start command",
      description: `Start a program in the background and return its id immediately.

Output is captured from the start. Follow up with:
- get_output to read what it has printed so far
- write_stdin to feed it input
- wait_command to close stdin and wait for the result

If stdin is given it is written and closed; otherwise stdin stays open.`,
      inputSchema: {
        command: CommandSchema,
        cwd: z.string().optional().describe("Working directory"),
        env: z.record(z.string(), z.string()).optional().describe("Environment variables to set for the child"),
        stdin: z.string().optional().describe("Text written to stdin before it is closed"),
        label: z.string().optional().describe("Human-readable label"),
      },
      outputSchema: {
        ...BaseOutputShape,
        process: ManagedProcessSchema.optional(),
      },
    },
    async (input: StartCommandInput) => {
      const started = await service.start(input);
      return resultToStructuredResponse(started, (process) => ({
        text: `Started ${formatProcessLine(process)}`,
        data: { process },
      }));
    }
  );
};
