import { quote } from "shell-quote";
import type { ProcessResult } from "./model.js";

/**
 * Render argv as a shell-quoted line, for diagnostics only.
 */
export function formatCommand(command: readonly string[]): string {
  return quote([...command]);
}

export function formatFailure(result: ProcessResult): string {
  return [
    `Command failed: ${formatCommand(result.command)}`,
    `Exit code: ${result.exitCode}`,
    `Pid: ${result.pid}`,
    `stdout: ${result.stdout}`,
    `stderr: ${result.stderr}`,
  ].join("\n");
}
