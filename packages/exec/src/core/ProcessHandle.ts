import type { Logger } from "@procmux/core";

import type { LaunchedProcess } from "./ports/ProcessLauncher.js";
import { OutputChannel } from "./OutputChannel.js";
import { StreamDrainer } from "./StreamDrainer.js";
import { toExitCode } from "./exitCode.js";
import type { Eof, ExecStream, ExitStatus, OutputMode, OutputSubscriber, ProcessResult, Unsubscribe } from "./model.js";

export interface ProcessHandleOptions {
  outputMode: OutputMode;
  logger: Logger;
}

/**
 * A started child. Its output is drained from construction on; callers
 * subscribe, pull, or await the result. Not reusable.
 *
 * Non-zero exits never make this class throw: inspect `exitCode`.
 * Timeouts are the caller's business: race `result()` against a timer and
 * kill `pid` yourself.
 */
export class ProcessHandle {
  private readonly channels: Record<ExecStream, OutputChannel>;
  private readonly drainer: StreamDrainer;
  private readonly logger: Logger;
  private stdinClosed = false;
  private exitStatus: ExitStatus | null = null;
  private pending: Promise<ProcessResult> | null = null;

  constructor(
    readonly command: readonly string[],
    private readonly proc: LaunchedProcess,
    options: ProcessHandleOptions
  ) {
    this.logger = options.logger;
    this.channels = {
      stdout: new OutputChannel("stdout", options.outputMode, this.logger),
      stderr: new OutputChannel("stderr", options.outputMode, this.logger),
    };
    this.drainer = new StreamDrainer(
      { stdout: proc.stdout, stderr: proc.stderr },
      this.channels,
      this.logger
    );

    // EPIPE when the child exits before reading its input.
    proc.stdin.on("error", (error: Error) => {
      this.logger.debug(`stdin of pid ${proc.pid} failed: ${error.message}`);
    });

    void proc.exited.then((status) => {
      this.exitStatus = status;
    });
  }

  get pid(): number {
    return this.proc.pid;
  }

  get outputMode(): OutputMode {
    return this.channels.stdout.mode;
  }

  /** True once the OS reported the exit; output may still be draining. */
  get hasExited(): boolean {
    return this.exitStatus !== null;
  }

  get exitCode(): number | null {
    return this.exitStatus ? toExitCode(this.exitStatus) : null;
  }

  get stdinOpen(): boolean {
    return !this.stdinClosed && this.proc.stdin.writable;
  }

  /**
   * Returns the stream's backpressure flag (false: queued behind a full
   * pipe), or false without writing once stdin is closed.
   */
  writeStdin(data: string | Uint8Array): boolean {
    if (!this.stdinOpen) return false;
    return this.proc.stdin.write(data);
  }

  closeStdin(): void {
    if (this.stdinClosed) return;
    this.stdinClosed = true;
    this.proc.stdin.end();
  }

  onStdout(subscriber: OutputSubscriber): Unsubscribe {
    return this.channels.stdout.subscribe(subscriber);
  }

  onStderr(subscriber: OutputSubscriber): Unsubscribe {
    return this.channels.stderr.subscribe(subscriber);
  }

  subscribe(stream: ExecStream, subscriber: OutputSubscriber): Unsubscribe {
    return this.channels[stream].subscribe(subscriber);
  }

  readStdout(): Promise<string | Eof> {
    return this.channels.stdout.read();
  }

  readStderr(): Promise<string | Eof> {
    return this.channels.stderr.read();
  }

  readStdoutBytes(): Promise<Buffer | Eof> {
    return this.channels.stdout.readBytes();
  }

  readStderrBytes(): Promise<Buffer | Eof> {
    return this.channels.stderr.readBytes();
  }

  stdoutSoFar(): string {
    return this.channels.stdout.text();
  }

  stderrSoFar(): string {
    return this.channels.stderr.text();
  }

  /**
   * Close stdin, wait for the exit and for both channels to reach end of
   * stream (in either order), then build the result once. Later calls
   * return the same promise.
   */
  result(): Promise<ProcessResult> {
    this.pending ??= this.aggregate();
    return this.pending;
  }

  private async aggregate(): Promise<ProcessResult> {
    this.closeStdin();

    const [status] = await Promise.all([this.proc.exited, this.drainer.drained]);

    this.proc.stdout.destroy();
    this.proc.stderr.destroy();

    const exitCode = toExitCode(status);
    const result: ProcessResult = Object.freeze({
      command: Object.freeze([...this.command]),
      pid: this.proc.pid,
      stdout: this.channels.stdout.text(),
      stderr: this.channels.stderr.text(),
      stdoutBytes: this.channels.stdout.bytes(),
      stderrBytes: this.channels.stderr.bytes(),
      exitCode,
      signal: status.signal,
      success: exitCode === 0,
    });

    this.logger.debug(`pid ${this.proc.pid} finished with exit code ${exitCode}`);
    return result;
  }
}
