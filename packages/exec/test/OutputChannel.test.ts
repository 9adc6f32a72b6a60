import { describe, it, expect } from "vitest";
import { createLogger } from "@procmux/core";

import { OutputChannel } from "../src/core/OutputChannel.js";
import { EOF } from "../src/core/model.js";

const silent = createLogger("test", { level: "silent" });

function collect(channel: OutputChannel): string[] {
  const calls: string[] = [];
  channel.subscribe((increment) => calls.push(increment));
  return calls;
}

describe("OutputChannel", () => {
  describe("line mode", () => {
    it("delivers complete lines across reads", () => {
      const channel = new OutputChannel("stdout", "line", silent);
      const calls = collect(channel);

      channel.push("foo\nba");
      channel.push("r\n");

      expect(calls).toEqual(["foo\n", "bar\n"]);
    });

    it("splits several lines from one read", () => {
      const channel = new OutputChannel("stdout", "line", silent);
      const calls = collect(channel);

      channel.push("a\nb\nc\n");

      expect(calls).toEqual(["a\n", "b\n", "c\n"]);
    });

    it("holds a partial line until close", () => {
      const channel = new OutputChannel("stdout", "line", silent);
      const calls = collect(channel);

      channel.push("no newline");
      expect(calls).toEqual([]);

      channel.close();
      expect(calls).toEqual(["no newline"]);
      expect(channel.text()).toBe("no newline");
    });
  });

  describe("chunk mode", () => {
    it("delivers each read as is", () => {
      const channel = new OutputChannel("stderr", "chunk", silent);
      const calls = collect(channel);

      channel.push("ab\nc");
      channel.push("d");

      expect(calls).toEqual(["ab\nc", "d"]);
    });

    it("does not split a multi-byte character across increments", () => {
      const channel = new OutputChannel("stdout", "chunk", silent);
      const calls = collect(channel);
      const bytes = Buffer.from("é\n", "utf8");

      channel.push(bytes.subarray(0, 1));
      channel.push(bytes.subarray(1));

      expect(calls).toEqual(["é\n"]);
    });
  });

  describe("subscribe", () => {
    it("replays the backlog as one call, then receives live increments", () => {
      const channel = new OutputChannel("stdout", "line", silent);
      channel.push("a\nb\n");

      const calls = collect(channel);
      expect(calls).toEqual(["a\nb\n"]);

      channel.push("c\n");
      expect(calls).toEqual(["a\nb\n", "c\n"]);
      expect(calls.join("")).toBe(channel.text());
    });

    it("does not call a new subscriber when nothing was delivered", () => {
      const channel = new OutputChannel("stdout", "line", silent);
      channel.push("partial");

      expect(collect(channel)).toEqual([]);
    });

    it("notifies subscribers in registration order", () => {
      const channel = new OutputChannel("stdout", "line", silent);
      const order: string[] = [];
      channel.subscribe(() => order.push("first"));
      channel.subscribe(() => order.push("second"));

      channel.push("x\n");

      expect(order).toEqual(["first", "second"]);
    });

    it("stops delivering after unsubscribe", () => {
      const channel = new OutputChannel("stdout", "line", silent);
      const calls: string[] = [];
      const unsubscribe = channel.subscribe((increment) => calls.push(increment));

      channel.push("1\n");
      unsubscribe();
      unsubscribe();
      channel.push("2\n");

      expect(calls).toEqual(["1\n"]);
    });

    it("delivers exactly once to a subscriber added from inside a callback", () => {
      const channel = new OutputChannel("stdout", "line", silent);
      const late: string[] = [];
      let added = false;
      channel.subscribe(() => {
        if (added) return;
        added = true;
        channel.subscribe((increment) => late.push(increment));
      });

      channel.push("1\n");
      channel.push("2\n");

      expect(late).toEqual(["1\n", "2\n"]);
    });

    it("keeps delivering when a subscriber throws", () => {
      const lines: string[] = [];
      const logger = createLogger("test", { level: "warn", sink: (line) => lines.push(line) });
      const channel = new OutputChannel("stdout", "line", logger);
      channel.subscribe(() => {
        throw new Error("boom");
      });
      const calls = collect(channel);

      channel.push("x\n");

      expect(calls).toEqual(["x\n"]);
      expect(lines).toEqual(["[test] WARN: stdout subscriber threw: boom"]);
    });
  });

  describe("read", () => {
    it("returns buffered increments, then waits for the next one", async () => {
      const channel = new OutputChannel("stdout", "line", silent);
      channel.push("x\n");

      expect(await channel.read()).toBe("x\n");

      const next = channel.read();
      channel.push("y\n");
      expect(await next).toBe("y\n");
    });

    it("returns EOF forever once closed and read", async () => {
      const channel = new OutputChannel("stdout", "line", silent);
      channel.push("last");
      channel.close();

      expect(await channel.read()).toBe("last");
      expect(await channel.read()).toBe(EOF);
      expect(await channel.read()).toBe(EOF);
    });

    it("wakes pending reads with EOF on close", async () => {
      const channel = new OutputChannel("stdout", "line", silent);
      const first = channel.read();
      const second = channel.read();

      channel.close();

      expect(await first).toBe(EOF);
      expect(await second).toBe(EOF);
    });

    it("resolves concurrent reads in call order", async () => {
      const channel = new OutputChannel("stdout", "line", silent);
      const first = channel.read();
      const second = channel.read();

      channel.push("a\nb\n");

      expect(await first).toBe("a\n");
      expect(await second).toBe("b\n");
    });

    it("is independent of subscribers", async () => {
      const channel = new OutputChannel("stdout", "line", silent);
      const calls = collect(channel);
      channel.push("a\n");
      channel.push("b\n");

      expect(await channel.read()).toBe("a\n");
      expect(await channel.read()).toBe("b\n");
      expect(calls).toEqual(["a\n", "b\n"]);
    });
  });

  describe("bytes", () => {
    it("keeps invalid UTF-8 exactly while the text shows replacement characters", () => {
      const channel = new OutputChannel("stdout", "line", silent);
      channel.push(Buffer.from([0xff, 0xfe, 0x01]));
      channel.close();

      expect(channel.bytes()).toEqual(Buffer.from([0xff, 0xfe, 0x01]));
      expect(channel.text()).toBe("\ufffd\ufffd\u0001");
    });

    it("decodes a character split across reads once it is complete", () => {
      const channel = new OutputChannel("stdout", "chunk", silent);
      const calls = collect(channel);
      channel.push(Buffer.from([0xe2, 0x82]));
      channel.push(Buffer.from([0xac, 0x0a]));

      expect(calls).toEqual(["€\n"]);
      expect(channel.bytes()).toEqual(Buffer.from("€\n"));
    });

    it("pulls the raw reads in order, independent of text reads", async () => {
      const channel = new OutputChannel("stdout", "line", silent);
      const pending = channel.readBytes();
      channel.push(Buffer.from([0xe2, 0x82]));
      channel.push(Buffer.from([0xac, 0x0a]));
      channel.close();

      expect(await pending).toEqual(Buffer.from([0xe2, 0x82]));
      expect(await channel.readBytes()).toEqual(Buffer.from([0xac, 0x0a]));
      expect(await channel.readBytes()).toBe(EOF);
      expect(await channel.read()).toBe("€\n");
      expect(await channel.read()).toBe(EOF);
    });

    it("wakes a pending byte read with EOF on close", async () => {
      const channel = new OutputChannel("stderr", "chunk", silent);
      const pending = channel.readBytes();

      channel.close();

      expect(await pending).toBe(EOF);
      expect(channel.bytes()).toEqual(Buffer.alloc(0));
    });
  });

  describe("close", () => {
    it("ignores data pushed after close", () => {
      const channel = new OutputChannel("stdout", "chunk", silent);
      channel.push("kept");
      channel.close();
      channel.push("dropped");
      channel.close();

      expect(channel.closed).toBe(true);
      expect(channel.text()).toBe("kept");
    });
  });
});
