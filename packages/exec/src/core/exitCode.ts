import { constants } from "node:os";
import type { ExitStatus } from "./model.js";

const SIGNAL_NUMBERS = new Map<string, number>(Object.entries(constants.signals));

/**
 * Numeric exit code for a wait status: the code itself, or the shell
 * convention 128 + signal number for a child killed by a signal.
 */
export function toExitCode(status: ExitStatus): number {
  if (status.code !== null) {
    return status.code;
  }
  if (status.signal !== null) {
    return 128 + (SIGNAL_NUMBERS.get(status.signal) ?? 0);
  }
  return 1;
}
