import * as z from "zod/v4";
import { resultToStructuredResponse } from "@procmux/core";

import type { ToolRegistrar } from "./types.js";
import { BaseOutputShape, ManagedProcessSchema, StreamSchema } from "./schemas.js";
import { formatOutput, formatProcessLine } from "./format.js";
import type { ExecStream } from "../core/model.js";

interface GetOutputInput {
  id: string;
  stream?: ExecStream;
}

export const registerGetOutput: ToolRegistrar = (server, service) => {
  server.registerTool(
    "get_output",
    {
      title: "Get command output",
      description: `Everything a started command has printed so far, without waiting.

Use stream to read only stdout or only stderr.`,
      inputSchema: {
        id: z.string().describe("Id returned by start_command"),
        stream: StreamSchema.optional().describe("Only this stream"),
      },
      outputSchema: {
        ...BaseOutputShape,
        process: ManagedProcessSchema.optional(),
        stdout: z.string().optional(),
        stderr: z.string().optional(),
      },
    },
    async (input: GetOutputInput) => {
      const captured = service.output(input.id, input.stream);
      return resultToStructuredResponse(captured, ({ process, stdout, stderr }) => ({
        text: `${formatProcessLine(process)}\n${formatOutput(stdout, stderr)}`,
        data: { process, stdout, stderr },
      }));
    }
  );
};
