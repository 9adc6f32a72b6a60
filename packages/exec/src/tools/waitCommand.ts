import * as z from "zod/v4";
import { resultToStructuredResponse } from "@procmux/core";

import type { ToolRegistrar } from "./types.js";
import { BaseOutputShape, ProcessResultSchema } from "./schemas.js";
import { formatResult, resultPayload } from "./format.js";

interface WaitCommandInput {
  id: string;
}

export const registerWaitCommand: ToolRegistrar = (server, service) => {
  server.registerTool(
    "wait_command",
    {
      title: "Wait for command",
      description: `Close a started command's stdin and wait until it exits and all output is drained.

Returns the same result every time it is called for the same id.`,
      inputSchema: {
        id: z.string().describe("Id returned by start_command"),
      },
      outputSchema: {
        ...BaseOutputShape,
        result: ProcessResultSchema.optional(),
      },
    },
    async (input: WaitCommandInput) => {
      const waited = await service.wait(input.id);
      const label = service.get(input.id)?.label;
      return resultToStructuredResponse(waited, (result) => ({
        text: formatResult(result, label),
        data: { result: resultPayload(result) },
      }));
    }
  );
};
