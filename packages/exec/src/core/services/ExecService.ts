import { nanoid } from "nanoid";
import { Err, Ok, createLogger, map, mapErr, type Logger, type Result } from "@procmux/core";

import { tryLaunch } from "../launch.js";
import type { ProcessHandle } from "../ProcessHandle.js";
import type { ProcessLauncher } from "../ports/ProcessLauncher.js";
import type { ExecStream, ProcessResult } from "../model.js";
import { resolveConfig, type ExecConfig } from "../../config.js";
import { NodeProcessLauncher } from "../../infrastructure/node/NodeProcessLauncher.js";

export type ManagedStatus = "running" | "exited";

export interface ManagedProcess {
  id: string;
  command: string[];
  label?: string;
  cwd?: string;
  pid: number;
  status: ManagedStatus;
  exitCode: number | null;
  startedAt: string;
}

export interface StartCommandParams {
  command: string[];
  cwd?: string;
  env?: Record<string, string>;
  /** Written and then stdin is closed */
  stdin?: string;
  label?: string;
}

export interface CommandOutput {
  process: ManagedProcess;
  stdout: string;
  stderr: string;
}

interface Entry {
  id: string;
  handle: ProcessHandle;
  label?: string;
  cwd?: string;
  startedAt: string;
}

/**
 * Live handles addressed by id, for callers that cannot hold a
 * ProcessHandle themselves (the MCP tools).
 */
export class ExecService {
  private readonly entries = new Map<string, Entry>();
  private readonly config: Required<ExecConfig>;
  private readonly logger: Logger;
  private readonly launcher: ProcessLauncher;

  constructor(config: ExecConfig = {}, launcher?: ProcessLauncher, logger?: Logger) {
    this.config = resolveConfig(config);
    this.logger = logger ?? createLogger("exec", { level: this.config.logLevel });
    this.launcher = launcher ?? new NodeProcessLauncher(this.logger);
  }

  async start(params: StartCommandParams): Promise<Result<ManagedProcess, string>> {
    const launched = await tryLaunch(params.command, {
      cwd: params.cwd,
      env: params.env,
      stdin: params.stdin,
      outputMode: this.config.outputMode,
      launcher: this.launcher,
      logger: this.logger,
    });

    return map(
      mapErr(launched, (error) => error.message),
      (handle) => {
        const entry: Entry = {
          id: nanoid(10),
          handle,
          label: params.label,
          cwd: params.cwd,
          startedAt: new Date().toISOString(),
        };
        this.entries.set(entry.id, entry);
        this.evict();
        return describe(entry);
      }
    );
  }

  /**
   * Start and wait for the result. Non-zero exits are a successful Result.
   */
  async run(params: StartCommandParams): Promise<Result<{ process: ManagedProcess; result: ProcessResult }, string>> {
    const started = await this.start(params);
    if (!started.ok) return started;

    const waited = await this.wait(started.value.id);
    if (!waited.ok) return waited;

    return Ok({ process: this.get(started.value.id) ?? started.value, result: waited.value });
  }

  get(id: string): ManagedProcess | null {
    const entry = this.entries.get(id);
    return entry ? describe(entry) : null;
  }

  list(): ManagedProcess[] {
    return [...this.entries.values()].map(describe);
  }

  listRunning(): ManagedProcess[] {
    return this.list().filter((p) => p.status === "running");
  }

  /**
   * Ok(false) means the data is queued behind a full pipe.
   */
  write(id: string, data: string): Result<boolean, string> {
    const entry = this.entries.get(id);
    if (!entry) return Err(`Unknown process: ${id}`);
    if (!entry.handle.stdinOpen) return Err(`stdin is closed: ${id}`);
    return Ok(entry.handle.writeStdin(data));
  }

  closeStdin(id: string): Result<ManagedProcess, string> {
    const entry = this.entries.get(id);
    if (!entry) return Err(`Unknown process: ${id}`);
    entry.handle.closeStdin();
    return Ok(describe(entry));
  }

  /**
   * Output captured so far; a stream argument leaves the other one empty.
   */
  output(id: string, stream?: ExecStream): Result<CommandOutput, string> {
    const entry = this.entries.get(id);
    if (!entry) return Err(`Unknown process: ${id}`);
    return Ok({
      process: describe(entry),
      stdout: stream === "stderr" ? "" : entry.handle.stdoutSoFar(),
      stderr: stream === "stdout" ? "" : entry.handle.stderrSoFar(),
    });
  }

  /**
   * Close stdin and wait for the final result.
   */
  async wait(id: string): Promise<Result<ProcessResult, string>> {
    const entry = this.entries.get(id);
    if (!entry) return Err(`Unknown process: ${id}`);
    return Ok(await entry.handle.result());
  }

  /**
   * Forget a finished command. Running ones stay tracked (false): wait for
   * them first.
   */
  remove(id: string): boolean {
    const entry = this.entries.get(id);
    if (!entry || !entry.handle.hasExited) return false;
    return this.entries.delete(id);
  }

  /**
   * Close stdin of every running child. Used on server shutdown.
   */
  dispose(): void {
    for (const entry of this.entries.values()) {
      entry.handle.closeStdin();
    }
  }

  // Oldest finished entries go first; running ones are never evicted.
  private evict(): void {
    let excess = this.entries.size - this.config.maxHandles;
    if (excess <= 0) return;

    for (const entry of this.entries.values()) {
      if (excess <= 0) break;
      if (!entry.handle.hasExited) continue;
      this.remove(entry.id);
      excess--;
      this.logger.debug(`Evicted ${entry.id} (pid ${entry.handle.pid})`);
    }
  }
}

function describe(entry: Entry): ManagedProcess {
  const { handle } = entry;
  return {
    id: entry.id,
    command: [...handle.command],
    label: entry.label,
    cwd: entry.cwd,
    pid: handle.pid,
    status: handle.hasExited ? "exited" : "running",
    exitCode: handle.exitCode,
    startedAt: entry.startedAt,
  };
}
