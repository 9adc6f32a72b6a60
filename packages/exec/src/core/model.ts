import type { Logger } from "@procmux/core";
import type { ProcessLauncher } from "./ports/ProcessLauncher.js";

export type ExecStream = "stdout" | "stderr";

/**
 * How a channel splits what it drains.
 *
 * - line: complete lines including their "\n"; a trailing partial line is
 *   held until more data arrives or the stream closes, then flushed as is
 * - chunk: each decoded read as it came off the pipe
 */
export type OutputMode = "line" | "chunk";

/** Returned by pull reads once a channel is closed and fully read. */
export const EOF = Symbol("procmux.eof");
export type Eof = typeof EOF;

/** Receives each new increment of one channel. */
export type OutputSubscriber = (increment: string) => void;

export type Unsubscribe = () => void;

/** Where echoed output goes; `process.stdout` fits. */
export interface OutputSink {
  write(chunk: string): unknown;
}

export interface ExitStatus {
  code: number | null;
  signal: NodeJS.Signals | null;
}

/**
 * Final outcome of one process. Frozen when created.
 */
export interface ProcessResult {
  readonly command: readonly string[];
  readonly pid: number;
  /** Decoded as UTF-8; invalid sequences become U+FFFD */
  readonly stdout: string;
  readonly stderr: string;
  /** Exactly the bytes the child wrote */
  readonly stdoutBytes: Buffer;
  readonly stderrBytes: Buffer;
  /** OS exit code, or 128 + signal number when the child was killed */
  readonly exitCode: number;
  readonly signal: NodeJS.Signals | null;
  readonly success: boolean;
}

export interface LaunchOptions {
  /** Merged over the parent's environment, for the child only */
  env?: Record<string, string>;
  cwd?: string;
  /** Written to stdin, which is then closed */
  stdin?: string | Uint8Array;
  /** Default: "line" */
  outputMode?: OutputMode;
  launcher?: ProcessLauncher;
  logger?: Logger;
}

export interface RunOptions extends LaunchOptions {
  /** Return non-zero exits instead of throwing ProcessError */
  canFail?: boolean;
  echoStdout?: boolean;
  echoStderr?: boolean;
  /** Default: process.stdout */
  stdoutSink?: OutputSink;
  /** Default: process.stderr */
  stderrSink?: OutputSink;
}
