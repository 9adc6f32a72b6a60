import type { Readable } from "node:stream";
import type { Logger } from "@procmux/core";

import type { ExecStream } from "./model.js";
import type { OutputChannel } from "./OutputChannel.js";

/**
 * Keeps both pipes of a child flowing into their channels from launch until
 * end of stream, whether or not anyone is consuming. Reading one pipe to the
 * end before the other would deadlock as soon as the child filled the unread
 * pipe's OS buffer.
 *
 * The event loop is the readiness wait: each readable in flowing mode is
 * read whenever libuv reports it ready, and interrupted reads are retried
 * there without surfacing.
 */
export class StreamDrainer {
  /** Settles once both channels are closed; never rejects. */
  readonly drained: Promise<void>;

  constructor(
    sources: Record<ExecStream, Readable>,
    channels: Record<ExecStream, OutputChannel>,
    private readonly logger: Logger
  ) {
    this.drained = Promise.all([
      this.attach(sources.stdout, channels.stdout),
      this.attach(sources.stderr, channels.stderr),
    ]).then(() => undefined);
  }

  private attach(source: Readable, channel: OutputChannel): Promise<void> {
    return new Promise((resolve) => {
      const finish = (): void => {
        channel.close();
        resolve();
      };

      source.on("data", (chunk: Buffer | string) => {
        channel.push(chunk);
      });
      source.once("end", finish);
      // Destroyed without a clean end: nothing more will come.
      source.once("close", finish);
      // Fatal for this channel only.
      source.on("error", (error: Error) => {
        this.logger.warn(`${channel.stream} read failed, closing channel: ${error.message}`);
        finish();
      });
    });
  }
}
