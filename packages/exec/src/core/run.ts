import { launch } from "./launch.js";
import { ProcessError } from "./errors.js";
import type { OutputSink, ProcessResult, RunOptions } from "./model.js";

/**
 * Launch, drain to completion and return the result.
 *
 * Echoed output is written to the sinks as it arrives; whatever was drained
 * before the echo subscription is replayed first.
 *
 * @throws ProcessError on a non-zero exit unless `canFail` is set
 * @throws InvalidArgumentError / LaunchError as `launch` does
 */
export async function run(command: readonly string[], options: RunOptions = {}): Promise<ProcessResult> {
  const handle = await launch(command, options);

  if (options.echoStdout) {
    const sink: OutputSink = options.stdoutSink ?? process.stdout;
    handle.onStdout((increment) => sink.write(increment));
  }
  if (options.echoStderr) {
    const sink: OutputSink = options.stderrSink ?? process.stderr;
    handle.onStderr((increment) => sink.write(increment));
  }

  const result = await handle.result();
  if (!options.canFail && !result.success) {
    throw new ProcessError(result);
  }
  return result;
}
