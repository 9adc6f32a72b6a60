import { formatCommand, formatFailure } from "./format.js";
import type { ProcessResult } from "./model.js";

export type ExecErrorCode = "INVALID_ARGUMENT" | "LAUNCH_FAILURE" | "PROCESS_FAILED";

export class ExecError extends Error {
  constructor(
    readonly code: ExecErrorCode,
    message: string,
    options?: ErrorOptions
  ) {
    super(message, options);
    this.name = "ExecError";
  }
}

/** Caller bug: empty command, empty program name, unusable option. */
export class InvalidArgumentError extends ExecError {
  constructor(message: string, options?: ErrorOptions) {
    super("INVALID_ARGUMENT", message, options);
    this.name = "InvalidArgumentError";
  }
}

/** The OS refused to create the process. */
export class LaunchError extends ExecError {
  /** errno name such as ENOENT or EACCES, when the OS gave one */
  readonly osCode: string | undefined;

  constructor(
    readonly command: readonly string[],
    cause: Error
  ) {
    super("LAUNCH_FAILURE", `Failed to launch ${formatCommand(command)}: ${cause.message}`, { cause });
    this.name = "LaunchError";
    this.osCode = errnoCode(cause);
  }
}

/** Ran to completion but exited non-zero. */
export class ProcessError extends ExecError {
  constructor(readonly result: ProcessResult) {
    super("PROCESS_FAILED", formatFailure(result));
    this.name = "ProcessError";
  }

  get command(): readonly string[] {
    return this.result.command;
  }
}

export function errnoCode(error: Error): string | undefined {
  if ("code" in error && typeof error.code === "string") {
    return error.code;
  }
  return undefined;
}
