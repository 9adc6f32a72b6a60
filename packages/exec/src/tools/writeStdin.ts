import * as z from "zod/v4";
import { resultToStructuredResponse } from "@procmux/core";

import type { ToolRegistrar } from "./types.js";
import { BaseOutputShape } from "./schemas.js";

interface WriteStdinInput {
  id: string;
  data: string;
  close?: boolean;
}

export const registerWriteStdin: ToolRegistrar = (server, service) => {
  server.registerTool(
    "write_stdin",
    {
      title: "Write to command stdin",
      description: `Send input to a started command's stdin.

Add \\n for newline if the program expects Enter.
Set close=true to signal end of input afterwards; many programs only finish then.`,
      inputSchema: {
        id: z.string().describe("Id returned by start_command"),
        data: z.string().describe("Data to write (include \\n for newline)"),
        close: z.boolean().optional().describe("Close stdin after writing"),
      },
      outputSchema: {
        ...BaseOutputShape,
        written: z.boolean().optional(),
        closed: z.boolean().optional(),
      },
    },
    async (input: WriteStdinInput) => {
      const written = service.write(input.id, input.data);
      const closed = written.ok && input.close === true && service.closeStdin(input.id).ok;

      return resultToStructuredResponse(written, (accepted) => ({
        text: [
          accepted ? "Written" : "Written (queued behind a full pipe)",
          closed ? "stdin closed" : "",
        ]
          .filter(Boolean)
          .join("\n"),
        data: { written: accepted, closed },
      }));
    }
  );
};
