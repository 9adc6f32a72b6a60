import { spawn, type ChildProcessWithoutNullStreams } from "node:child_process";
import type { Readable, Writable } from "node:stream";
import { createLogger, type Logger } from "@procmux/core";

import type { LaunchedProcess, LaunchParams, ProcessLauncher } from "../../core/ports/ProcessLauncher.js";
import { InvalidArgumentError, LaunchError, errnoCode } from "../../core/errors.js";
import type { ExitStatus } from "../../core/model.js";

class NodeLaunchedProcess implements LaunchedProcess {
  constructor(
    private readonly proc: ChildProcessWithoutNullStreams,
    readonly pid: number,
    readonly exited: Promise<ExitStatus>
  ) {}

  get stdin(): Writable {
    return this.proc.stdin;
  }

  get stdout(): Readable {
    return this.proc.stdout;
  }

  get stderr(): Readable {
    return this.proc.stderr;
  }
}

/**
 * Starts children with `child_process.spawn`, no shell, all three stdio
 * streams piped.
 */
export class NodeProcessLauncher implements ProcessLauncher {
  constructor(private readonly logger: Logger = createLogger("exec", { level: "warn" })) {}

  launch(params: LaunchParams): Promise<LaunchedProcess> {
    const command = [params.file, ...params.args];

    return new Promise((resolve, reject) => {
      let proc: ChildProcessWithoutNullStreams;
      try {
        proc = spawn(params.file, params.args, {
          argv0: params.file,
          cwd: params.cwd,
          env: params.env ? { ...process.env, ...params.env } : undefined,
          shell: false,
          stdio: "pipe",
          windowsHide: true,
        });
      } catch (error) {
        const cause = error instanceof Error ? error : new Error(String(error));
        // Node validates arguments synchronously (e.g. a NUL byte in argv).
        reject(
          errnoCode(cause)?.startsWith("ERR_INVALID_ARG")
            ? new InvalidArgumentError(cause.message, { cause })
            : new LaunchError(command, cause)
        );
        return;
      }

      // Registered before "spawn" so an early exit is not missed.
      const exited = new Promise<ExitStatus>((resolveExit) => {
        proc.once("exit", (code, signal) => resolveExit({ code, signal }));
      });

      const onSpawn = (): void => {
        proc.off("error", onError);
        proc.on("error", (error: Error) => {
          this.logger.warn(`pid ${proc.pid ?? "?"}: ${error.message}`);
        });

        if (proc.pid === undefined) {
          reject(new LaunchError(command, new Error("no pid assigned")));
          return;
        }
        resolve(new NodeLaunchedProcess(proc, proc.pid, exited));
      };

      const onError = (error: Error): void => {
        proc.off("spawn", onSpawn);
        this.logger.debug(`spawn failed: ${error.message}`);
        reject(new LaunchError(command, error));
      };

      proc.once("spawn", onSpawn);
      proc.once("error", onError);
    });
  }
}
