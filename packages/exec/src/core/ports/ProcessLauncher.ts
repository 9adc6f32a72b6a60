import type { Readable, Writable } from "node:stream";
import type { ExitStatus } from "../model.js";

export interface LaunchParams {
  file: string;
  args: string[];
  env?: Record<string, string>;
  cwd?: string;
}

/**
 * The four handles of a started child.
 */
export interface LaunchedProcess {
  readonly pid: number;
  readonly stdin: Writable;
  readonly stdout: Readable;
  readonly stderr: Readable;
  /** Settles when the child exits; never rejects */
  readonly exited: Promise<ExitStatus>;
}

export interface ProcessLauncher {
  /**
   * Start the child. Rejects with LaunchError when the OS refuses it and
   * with InvalidArgumentError for arguments the OS API cannot take.
   */
  launch(params: LaunchParams): Promise<LaunchedProcess>;
}
