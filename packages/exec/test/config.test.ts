import { describe, it, expect } from "vitest";

import { DEFAULT_CONFIG, loadConfig, resolveConfig } from "../src/config.js";

describe("resolveConfig", () => {
  it("fills unset fields from the defaults", () => {
    expect(resolveConfig({ maxHandles: 3 })).toEqual({ outputMode: "line", maxHandles: 3, logLevel: "warn" });
  });

  it("does not let undefined override a default", () => {
    expect(resolveConfig({ outputMode: undefined })).toEqual(DEFAULT_CONFIG);
  });
});

describe("loadConfig", () => {
  it("uses the defaults for an empty environment", () => {
    expect(loadConfig({})).toEqual({ ok: true, value: DEFAULT_CONFIG });
  });

  it("reads every variable", () => {
    const loaded = loadConfig({
      PROCMUX_OUTPUT_MODE: "chunk",
      PROCMUX_MAX_HANDLES: "8",
      PROCMUX_LOG_LEVEL: "debug",
      UNRELATED: "ignored",
    });

    expect(loaded).toEqual({ ok: true, value: { outputMode: "chunk", maxHandles: 8, logLevel: "debug" } });
  });

  it("names the variable that failed validation", () => {
    const badCount = loadConfig({ PROCMUX_MAX_HANDLES: "0" });
    expect(badCount.ok).toBe(false);
    if (!badCount.ok) {
      expect(badCount.error).toMatch(/^Invalid PROCMUX_MAX_HANDLES: /);
    }

    const badMode = loadConfig({ PROCMUX_OUTPUT_MODE: "bytes" });
    expect(badMode.ok).toBe(false);
    if (!badMode.ok) {
      expect(badMode.error).toMatch(/^Invalid PROCMUX_OUTPUT_MODE: /);
    }
  });
});
