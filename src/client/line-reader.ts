import { createInterface, type Interface } from "node:readline";
import type { Readable } from "node:stream";

/**
 * Pull-style reader over a line-delimited stream. `next()` yields the next line,
 * or null once the stream has ended. Lines that arrive before anyone asks are kept.
 */
export class LineReader {
  private readonly rl: Interface;
  private readonly buffered: string[] = [];
  private readonly waiters: ((line: string | null) => void)[] = [];
  private ended = false;

  constructor(input: Readable) {
    this.rl = createInterface({ input, crlfDelay: Infinity });
    this.rl.on("line", (line) => this.onLine(line));
    this.rl.on("close", () => this.onClose());
  }

  get closed(): boolean {
    return this.ended && this.buffered.length === 0;
  }

  next(): Promise<string | null> {
    const line = this.buffered.shift();
    if (line !== undefined) return Promise.resolve(line);
    if (this.ended) return Promise.resolve(null);
    return new Promise((resolve) => {
      this.waiters.push(resolve);
    });
  }

  close(): void {
    this.rl.close();
  }

  private onLine(line: string): void {
    const waiter = this.waiters.shift();
    if (waiter) waiter(line);
    else this.buffered.push(line);
  }

  private onClose(): void {
    this.ended = true;
    for (const waiter of this.waiters.splice(0)) waiter(null);
  }
}
