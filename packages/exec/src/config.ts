import * as z from "zod/v4";
import { Err, Ok, LOG_LEVELS, andThen, type LogLevel, type Result } from "@procmux/core";

import type { OutputMode } from "./core/model.js";

export interface ExecConfig {
  /** Split of each channel. Default: "line" */
  outputMode?: OutputMode;
  /** Handles an ExecService keeps before evicting finished ones. Default: 64 */
  maxHandles?: number;
  /** Default: "warn" */
  logLevel?: LogLevel;
}

export const DEFAULT_CONFIG: Required<ExecConfig> = {
  outputMode: "line",
  maxHandles: 64,
  logLevel: "warn",
};

const EnvSchema = z.object({
  PROCMUX_OUTPUT_MODE: z.enum(["line", "chunk"]).optional(),
  PROCMUX_MAX_HANDLES: z.coerce.number().int().positive().optional(),
  PROCMUX_LOG_LEVEL: z.enum(LOG_LEVELS).optional(),
});

export function resolveConfig(overrides: ExecConfig = {}): Required<ExecConfig> {
  return {
    outputMode: overrides.outputMode ?? DEFAULT_CONFIG.outputMode,
    maxHandles: overrides.maxHandles ?? DEFAULT_CONFIG.maxHandles,
    logLevel: overrides.logLevel ?? DEFAULT_CONFIG.logLevel,
  };
}

function parseEnv(env: Record<string, string | undefined>): Result<z.infer<typeof EnvSchema>, string> {
  const parsed = EnvSchema.safeParse(env);
  if (parsed.success) {
    return Ok(parsed.data);
  }
  const [issue] = parsed.error.issues;
  const variable = issue ? issue.path.map(String).join(".") : "environment";
  return Err(`Invalid ${variable}: ${issue?.message ?? "unparseable"}`);
}

/**
 * Read PROCMUX_OUTPUT_MODE, PROCMUX_MAX_HANDLES and PROCMUX_LOG_LEVEL.
 */
export function loadConfig(env: Record<string, string | undefined>): Result<Required<ExecConfig>, string> {
  return andThen(parseEnv(env), (vars) =>
    Ok(
      resolveConfig({
        outputMode: vars.PROCMUX_OUTPUT_MODE,
        maxHandles: vars.PROCMUX_MAX_HANDLES,
        logLevel: vars.PROCMUX_LOG_LEVEL,
      })
    )
  );
}
