/**
 * @procmux/exec
 *
 * Run external programs without pipe deadlocks: both output streams are
 * drained concurrently from launch, captured, and fanned out to
 * subscribers or pull readers.
 *
 * @example
 * ```typescript
 * import { run, launch, EOF } from "@procmux/exec";
 *
 * // Blocking: throws ProcessError on a non-zero exit
 * const { stdout } = await run(["git", "status", "--short"], { cwd: repo });
 *
 * // Non-blocking
 * const handle = await launch(["npm", "test"]);
 * handle.onStderr((line) => console.error(line.trimEnd()));
 * for (let line = await handle.readStdout(); line !== EOF; line = await handle.readStdout()) {
 *   process.stdout.write(line);
 * }
 * const result = await handle.result();
 * ```
 */

// Core domain
export * from "./core/model.js";
export * from "./core/ports/index.js";
export {
  ExecError,
  InvalidArgumentError,
  LaunchError,
  ProcessError,
  type ExecErrorCode,
} from "./core/errors.js";
export { formatCommand, formatFailure } from "./core/format.js";
export { toExitCode } from "./core/exitCode.js";
export { OutputChannel } from "./core/OutputChannel.js";
export { StreamDrainer } from "./core/StreamDrainer.js";
export { ProcessHandle, type ProcessHandleOptions } from "./core/ProcessHandle.js";
export { launch, tryLaunch } from "./core/launch.js";
export { run } from "./core/run.js";
export {
  ExecService,
  type ManagedProcess,
  type ManagedStatus,
  type StartCommandParams,
  type CommandOutput,
} from "./core/services/ExecService.js";

// Configuration
export { DEFAULT_CONFIG, loadConfig, resolveConfig, type ExecConfig } from "./config.js";

// Infrastructure
export { NodeProcessLauncher } from "./infrastructure/node/NodeProcessLauncher.js";

// Tools (MCP tool registration)
export { registerAllTools, type Services } from "./tools/index.js";
export * from "./tools/schemas.js";
export type { ToolRegistrar } from "./tools/types.js";
