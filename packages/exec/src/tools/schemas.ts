import * as z from "zod/v4";

export const StreamSchema = z.enum(["stdout", "stderr"]);

export const CommandSchema = z
  .array(z.string())
  .min(1)
  .describe("Program followed by its arguments, e.g. [\"npm\", \"test\"]. No shell is involved.");

export const ManagedProcessSchema = z.object({
  id: z.string(),
  command: z.array(z.string()),
  label: z.string().optional(),
  cwd: z.string().optional(),
  pid: z.number(),
  status: z.enum(["running", "exited"]),
  exitCode: z.number().nullable(),
  startedAt: z.string(),
});

export const ProcessResultSchema = z.object({
  command: z.array(z.string()),
  pid: z.number(),
  stdout: z.string(),
  stderr: z.string(),
  exitCode: z.number(),
  signal: z.string().nullable(),
  success: z.boolean(),
});

/** Fields every tool's structured output carries. */
export const BaseOutputShape = {
  success: z.boolean(),
  error: z.string().optional(),
};
