import type { Readable } from "node:stream";
import { StringDecoder } from "node:string_decoder";
// NOTE: Node built-in modules are imported with the explicit `node:` prefix to guarantee ESM resolution in Node.js.

type Waiter = (line: string | null) => void;

/**
 * Newline-delimited framing over a child's stdout. Complete lines are queued
 * until a consumer asks for them; blank lines are dropped and a trailing `\r`
 * is removed. Once the stream ended and the queue drained, {@link next}
 * resolves to `null`.
 */
export class LineReader {
  private readonly decoder = new StringDecoder("utf8");
  private readonly lines: string[] = [];
  private readonly waiters: Waiter[] = [];
  private buffer = "";
  private ended = false;

  private readonly onData = (chunk: Buffer | string) => {
    this.buffer += typeof chunk === "string" ? chunk : this.decoder.write(chunk);
    this.drainBuffer(false);
  };

  private readonly onEnd = () => {
    this.buffer += this.decoder.end();
    this.drainBuffer(true);
    this.ended = true;
    while (this.waiters.length > 0) {
      this.waiters.shift()?.(null);
    }
  };

  constructor(private readonly stream: Readable) {
    stream.on("data", this.onData);
    stream.once("end", this.onEnd);
    stream.once("close", this.onEnd);
  }

  /** `true` once the stream ended and every buffered line was consumed. */
  get exhausted(): boolean {
    return this.ended && this.lines.length === 0;
  }

  next(): Promise<string | null> {
    const line = this.lines.shift();
    if (line !== undefined) {
      return Promise.resolve(line);
    }
    if (this.ended) {
      return Promise.resolve(null);
    }
    return new Promise<string | null>((resolve) => {
      this.waiters.push(resolve);
    });
  }

  /** Detaches from the stream and releases pending consumers. */
  close(): void {
    this.stream.removeListener("data", this.onData);
    this.stream.removeListener("end", this.onEnd);
    this.stream.removeListener("close", this.onEnd);
    if (!this.ended) {
      this.onEnd();
    }
  }

  private drainBuffer(flushRemainder: boolean): void {
    let newlineIndex = this.buffer.indexOf("\n");
    while (newlineIndex !== -1) {
      this.push(this.buffer.slice(0, newlineIndex));
      this.buffer = this.buffer.slice(newlineIndex + 1);
      newlineIndex = this.buffer.indexOf("\n");
    }
    if (flushRemainder && this.buffer.length > 0) {
      this.push(this.buffer);
      this.buffer = "";
    }
  }

  private push(rawLine: string): void {
    const line = rawLine.endsWith("\r") ? rawLine.slice(0, -1) : rawLine;
    if (line.trim().length === 0) {
      return;
    }
    const waiter = this.waiters.shift();
    if (waiter) {
      waiter(line);
    } else {
      this.lines.push(line);
    }
  }
}
