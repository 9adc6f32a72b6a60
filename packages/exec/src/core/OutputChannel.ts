/**
 * One output channel of a child: an append-only record of every byte
 * drained, with views over it.
 *
 * - push view: `subscribe` replays everything delivered so far as a single
 *   call, then receives every later increment
 * - pull views: `read` walks the decoded increments and `readBytes` the raw
 *   chunks, each with its own cursor; both yield EOF once the channel is
 *   closed and fully read
 *
 * Text is decoded as UTF-8, so invalid sequences show up as U+FFFD there;
 * `bytes()` and `readBytes()` keep the output exactly as the child wrote it.
 *
 * Every method runs to completion on the event loop thread, so append and
 * notify, and snapshot and register, are each one critical section. A
 * subscriber can never observe an increment twice or miss one.
 */

import { StringDecoder } from "node:string_decoder";
import type { Logger } from "@procmux/core";

import { EOF, type Eof, type ExecStream, type OutputMode, type OutputSubscriber, type Unsubscribe } from "./model.js";

/** Cursor over an append-only list, with reads waiting for the next item. */
class PullReader<T> {
  private cursor = 0;
  private readonly waiters: Array<(value: T | Eof) => void> = [];

  constructor(private readonly items: readonly T[]) {}

  next(closed: boolean): Promise<T | Eof> {
    if (this.cursor < this.items.length) {
      return Promise.resolve(this.items[this.cursor++]);
    }
    if (closed) {
      return Promise.resolve(EOF);
    }
    return new Promise((resolve) => {
      this.waiters.push(resolve);
    });
  }

  /** Call after appending `item`. A waiting reader is always caught up. */
  appended(item: T): void {
    const waiter = this.waiters.shift();
    if (waiter) {
      this.cursor++;
      waiter(item);
    }
  }

  end(): void {
    for (const waiter of this.waiters.splice(0)) {
      waiter(EOF);
    }
  }
}

export class OutputChannel {
  private readonly decoder = new StringDecoder("utf8");
  private readonly increments: string[] = [];
  private readonly chunks: Buffer[] = [];
  private readonly textReader = new PullReader(this.increments);
  private readonly byteReader = new PullReader(this.chunks);
  private readonly subscribers: OutputSubscriber[] = [];
  private partialLine = "";
  private isClosed = false;

  constructor(
    readonly stream: ExecStream,
    readonly mode: OutputMode,
    private readonly logger: Logger
  ) {}

  get closed(): boolean {
    return this.isClosed;
  }

  /**
   * Append drained bytes. Ignored once the channel is closed.
   */
  push(data: Uint8Array | string): void {
    if (this.isClosed) return;

    const chunk = typeof data === "string" ? Buffer.from(data, "utf8") : toBuffer(data);
    if (chunk.length > 0) {
      this.chunks.push(chunk);
      this.byteReader.appended(chunk);
    }

    const text = typeof data === "string" ? data : this.decoder.write(chunk);
    for (const increment of this.split(text)) {
      this.deliver(increment);
    }
  }

  /**
   * Mark end of stream. Flushes a held partial line (and any incomplete
   * UTF-8 sequence) and wakes pending reads with EOF. Idempotent.
   */
  close(): void {
    if (this.isClosed) return;

    const rest = this.partialLine + this.decoder.end();
    this.partialLine = "";
    if (rest) {
      this.deliver(rest);
    }
    this.isClosed = true;

    this.textReader.end();
    this.byteReader.end();
  }

  subscribe(subscriber: OutputSubscriber): Unsubscribe {
    const backlog = this.increments.join("");
    if (backlog) {
      this.notify(subscriber, backlog);
    }
    this.subscribers.push(subscriber);

    return () => {
      const index = this.subscribers.indexOf(subscriber);
      if (index !== -1) {
        this.subscribers.splice(index, 1);
      }
    };
  }

  /**
   * Next unread increment, waiting for one if needed. Concurrent reads
   * resolve in call order.
   */
  read(): Promise<string | Eof> {
    return this.textReader.next(this.isClosed);
  }

  /**
   * Next raw chunk as read from the pipe, independent of the output mode
   * and of `read`.
   */
  readBytes(): Promise<Buffer | Eof> {
    return this.byteReader.next(this.isClosed);
  }

  /** Everything delivered so far. */
  text(): string {
    return this.increments.join("");
  }

  /** Every byte drained so far. */
  bytes(): Buffer {
    return Buffer.concat(this.chunks);
  }

  private split(text: string): string[] {
    if (this.mode === "chunk") {
      return text ? [text] : [];
    }

    if (!text.includes("\n")) {
      this.partialLine += text;
      return [];
    }

    const pending = this.partialLine + text;
    const lines: string[] = [];
    let start = 0;
    let newline = pending.indexOf("\n", start);
    while (newline !== -1) {
      lines.push(pending.slice(start, newline + 1));
      start = newline + 1;
      newline = pending.indexOf("\n", start);
    }
    this.partialLine = pending.slice(start);
    return lines;
  }

  private deliver(increment: string): void {
    this.increments.push(increment);
    this.textReader.appended(increment);

    // Copy: subscribers may (un)subscribe from inside a callback.
    for (const subscriber of [...this.subscribers]) {
      this.notify(subscriber, increment);
    }
  }

  private notify(subscriber: OutputSubscriber, increment: string): void {
    try {
      subscriber(increment);
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      this.logger.warn(`${this.stream} subscriber threw: ${message}`);
    }
  }
}

function toBuffer(data: Uint8Array): Buffer {
  return Buffer.isBuffer(data) ? data : Buffer.from(data);
}
