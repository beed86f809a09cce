import type { Readable } from "node:stream";

type Waiter = {
  resolve: (line: string | null) => void;
  reject: (err: Error) => void;
};

/**
 * Turns a byte stream into pull-based lines. A read that is still pending
 * when the caller stops waiting keeps its place; the next readLine() call
 * gets the line it would have received.
 */
export class LineReader {
  private buffered = "";
  private readonly lines: string[] = [];
  private readonly waiters: Waiter[] = [];
  private ended = false;
  private failure: Error | null = null;

  constructor(stream: Readable) {
    stream.setEncoding("utf8");
    stream.on("data", (chunk: string) => this.push(chunk));
    stream.once("end", () => this.finish());
    stream.once("close", () => this.finish());
    stream.once("error", (err: Error) => this.fail(err));
  }

  readLine(): Promise<string | null> {
    const line = this.lines.shift();
    if (line !== undefined) return Promise.resolve(line);
    if (this.failure) return Promise.reject(this.failure);
    if (this.ended) return Promise.resolve(null);
    return new Promise((resolve, reject) => {
      this.waiters.push({ resolve, reject });
    });
  }

  private push(chunk: string): void {
    this.buffered += chunk;
    let idx: number;
    while ((idx = this.buffered.indexOf("\n")) !== -1) {
      const line = this.buffered.slice(0, idx).replace(/\r$/, "");
      this.buffered = this.buffered.slice(idx + 1);
      this.deliver(line);
    }
  }

  private deliver(line: string): void {
    const waiter = this.waiters.shift();
    if (waiter) waiter.resolve(line);
    else this.lines.push(line);
  }

  private finish(): void {
    if (this.ended) return;
    if (this.buffered) {
      this.deliver(this.buffered.replace(/\r$/, ""));
      this.buffered = "";
    }
    this.ended = true;
    for (const waiter of this.waiters.splice(0)) waiter.resolve(null);
  }

  private fail(err: Error): void {
    if (this.ended) return;
    this.failure = err;
    this.ended = true;
    for (const waiter of this.waiters.splice(0)) waiter.reject(err);
  }
}
