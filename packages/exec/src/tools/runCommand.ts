import * as z from "zod/v4";
import { resultToStructuredResponse } from "@procmux/core";

import type { ToolRegistrar } from "./types.js";
import { BaseOutputShape, CommandSchema, ProcessResultSchema } from "./schemas.js";
import { formatResult, resultPayload } from "./format.js";

interface RunCommandInput {
  command: string[];
  cwd?: string;
  env?: Record<string, string>;
  stdin?: string;
  label?: string;
}

export const registerRunCommand: ToolRegistrar = (server, service) => {
  server.registerTool(
    "run_command",
    {
      title: "Run command",
      description: `Run a program to completion and return its exit code, stdout and stderr.

Both streams are drained concurrently, so commands with large output on either stream do not stall.
A non-zero exit is reported, not treated as a tool error.

Use start_command instead for long-running or interactive programs.`,
      inputSchema: {
        command: CommandSchema,
        cwd: z.string().optional().describe("Working directory"),
        env: z.record(z.string(), z.string()).optional().describe("Environment variables to set for the child"),
        stdin: z.string().optional().describe("Text written to stdin before it is closed"),
        label: z.string().optional().describe("Human-readable label"),
      },
      outputSchema: {
        ...BaseOutputShape,
        id: z.string().optional(),
        result: ProcessResultSchema.optional(),
      },
    },
    async (input: RunCommandInput) => {
      const ran = await service.run(input);
      return resultToStructuredResponse(ran, ({ process, result }) => ({
        text: formatResult(result, input.label),
        data: { id: process.id, result: resultPayload(result) },
      }));
    }
  );
};
