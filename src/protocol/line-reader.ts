// ============================================
// Line reader — queued lines from a readable stream
// ============================================
//
// A producer (readline 'line' events) fills a queue; the consumer pulls one
// line at a time with `next()`. Lines that arrive while nobody is waiting
// stay queued, so a response written before the caller starts reading is
// never lost.
// ============================================

import * as readline from "node:readline";
import type { Readable } from "node:stream";

/** Resolves with the next line, or null once the stream has ended. */
type Waiter = (line: string | null) => void;

export class LineReader {
  private readonly queue: string[] = [];
  private readonly waiters: Waiter[] = [];
  private readonly rl: readline.Interface;
  private ended = false;

  /** Reads `source` directly, or takes over the lines of an existing interface. */
  constructor(source: Readable | readline.Interface) {
    this.rl =
      source instanceof readline.Interface
        ? source
        : readline.createInterface({ input: source, crlfDelay: Infinity });
    this.rl.on("line", (line) => this.push(line));
    this.rl.on("close", () => this.finish());
  }

  get closed(): boolean {
    return this.ended && this.queue.length === 0;
  }

  /**
   * Wait for the next line. Resolves null at end of stream.
   * Rejects with `onTimeout()`'s error when `timeoutMs` elapses first.
   */
  next(timeoutMs?: number, onTimeout?: () => Error): Promise<string | null> {
    const queued = this.queue.shift();
    if (queued !== undefined) return Promise.resolve(queued);
    if (this.ended) return Promise.resolve(null);

    return new Promise((resolve, reject) => {
      let timer: ReturnType<typeof setTimeout> | undefined;

      const waiter: Waiter = (line) => {
        if (timer) clearTimeout(timer);
        resolve(line);
      };
      this.waiters.push(waiter);

      if (timeoutMs !== undefined) {
        timer = setTimeout(() => {
          const index = this.waiters.indexOf(waiter);
          if (index >= 0) this.waiters.splice(index, 1);
          reject(onTimeout ? onTimeout() : new Error(`No line within ${timeoutMs}ms`));
        }, timeoutMs);
      }
    });
  }

  close(): void {
    this.rl.close();
  }

  private push(line: string): void {
    const waiter = this.waiters.shift();
    if (waiter) {
      waiter(line);
    } else {
      this.queue.push(line);
    }
  }

  private finish(): void {
    this.ended = true;
    for (const waiter of this.waiters.splice(0)) {
      waiter(null);
    }
  }
}
