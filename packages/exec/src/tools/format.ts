import type * as z from "zod/v4";
import stripAnsi from "strip-ansi";

import { formatCommand } from "../core/format.js";
import type { ManagedProcess } from "../core/services/ExecService.js";
import type { ProcessResult } from "../core/model.js";
import type { ProcessResultSchema } from "./schemas.js";

export function formatProcessLine(p: ManagedProcess): string {
  const code = p.exitCode !== null ? `:${p.exitCode}` : "";
  return `[${p.status}${code}] ${p.label ?? formatCommand(p.command)} (id: ${p.id}, pid: ${p.pid})`;
}

/** Output for display: escape sequences removed, bare CRs as newlines. */
export function cleanText(raw: string): string {
  return stripAnsi(raw).replace(/\r(?!\n)/g, "\n").trimEnd();
}

export function formatOutput(stdout: string, stderr: string): string {
  const sections: string[] = [];
  const out = cleanText(stdout);
  const err = cleanText(stderr);
  if (out) sections.push(`stdout:\n${out}`);
  if (err) sections.push(`stderr:\n${err}`);
  return sections.length > 0 ? sections.join("\n\n") : "(no output)";
}

/** The JSON-safe fields of a result, for structured tool output. */
export function resultPayload(result: ProcessResult): z.infer<typeof ProcessResultSchema> {
  return {
    command: [...result.command],
    pid: result.pid,
    stdout: result.stdout,
    stderr: result.stderr,
    exitCode: result.exitCode,
    signal: result.signal,
    success: result.success,
  };
}

export function formatResult(result: ProcessResult, label?: string): string {
  const status = result.success ? "✓" : `✗ exit ${result.exitCode}`;
  return `[${status}] ${label ?? formatCommand(result.command)}\n${formatOutput(result.stdout, result.stderr)}`;
}
