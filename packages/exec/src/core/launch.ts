import { createLogger, mapErr, tryCatchAsync, type Logger, type Result } from "@procmux/core";

import { ExecError, InvalidArgumentError, LaunchError } from "./errors.js";
import { formatCommand } from "./format.js";
import type { LaunchOptions } from "./model.js";
import { ProcessHandle } from "./ProcessHandle.js";
import { DEFAULT_CONFIG } from "../config.js";
import { NodeProcessLauncher } from "../infrastructure/node/NodeProcessLauncher.js";

const defaultLogger: Logger = createLogger("exec", { level: DEFAULT_CONFIG.logLevel });

function validateCommand(command: readonly string[]): [string, string[]] {
  if (command.length === 0) {
    throw new InvalidArgumentError("Command must not be empty");
  }
  const [file, ...args] = command;
  if (!file) {
    throw new InvalidArgumentError("Program name must not be empty");
  }
  return [file, args];
}

/**
 * Start `command` (program followed by its arguments) and return its handle
 * once the OS has created the process. Output starts draining immediately.
 *
 * With `options.stdin` the payload is written and stdin closed; otherwise
 * stdin stays open for `writeStdin` until `closeStdin()` or `result()`.
 *
 * @throws InvalidArgumentError for an empty command or program name
 * @throws LaunchError when the process cannot be created
 */
export async function launch(command: readonly string[], options: LaunchOptions = {}): Promise<ProcessHandle> {
  const [file, args] = validateCommand(command);
  const logger = options.logger ?? defaultLogger;
  const launcher = options.launcher ?? new NodeProcessLauncher(logger);

  const proc = await launcher.launch({ file, args, env: options.env, cwd: options.cwd });
  const handle = new ProcessHandle([...command], proc, {
    outputMode: options.outputMode ?? DEFAULT_CONFIG.outputMode,
    logger,
  });
  logger.debug(`Launched pid ${handle.pid}: ${formatCommand(command)}`);

  if (options.stdin !== undefined) {
    handle.writeStdin(options.stdin);
    handle.closeStdin();
  }

  return handle;
}

/**
 * `launch` with failures as a Result.
 */
export async function tryLaunch(
  command: readonly string[],
  options: LaunchOptions = {}
): Promise<Result<ProcessHandle, ExecError>> {
  const result = await tryCatchAsync(() => launch(command, options));
  return mapErr(result, (error) => (error instanceof ExecError ? error : new LaunchError(command, error)));
}
