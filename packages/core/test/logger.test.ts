import { describe, it, expect } from "vitest";
import { createLogger, isLogLevel } from "../src/logger.js";

describe("createLogger", () => {
  it("prefixes lines with the scope and level label", () => {
    const lines: string[] = [];
    const logger = createLogger("exec", { level: "debug", sink: (line) => lines.push(line) });

    logger.debug("spawned");
    logger.info("ready");
    logger.warn("slow");
    logger.error("broken");

    expect(lines).toEqual([
      "[exec] debug: spawned",
      "[exec] ready",
      "[exec] WARN: slow",
      "[exec] ERROR: broken",
    ]);
  });

  it("drops lines below the configured level", () => {
    const lines: string[] = [];
    const logger = createLogger("exec", { level: "warn", sink: (line) => lines.push(line) });

    logger.debug("a");
    logger.info("b");
    logger.warn("c");

    expect(lines).toEqual(["[exec] WARN: c"]);
  });

  it("writes nothing when silent", () => {
    const lines: string[] = [];
    const logger = createLogger("exec", { level: "silent", sink: (line) => lines.push(line) });

    logger.error("x");

    expect(lines).toEqual([]);
  });

  it("defaults to info", () => {
    const lines: string[] = [];
    const logger = createLogger("core", { sink: (line) => lines.push(line) });

    logger.debug("hidden");
    logger.info("shown");

    expect(lines).toEqual(["[core] shown"]);
  });
});

describe("isLogLevel", () => {
  it("accepts known levels only", () => {
    expect(isLogLevel("warn")).toBe(true);
    expect(isLogLevel("verbose")).toBe(false);
  });
});
