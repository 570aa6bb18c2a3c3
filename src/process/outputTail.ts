/** Default number of characters retained from a child's stderr. */
export const DEFAULT_TAIL_CHARS = 8 * 1024;

/**
 * Keeps the last {@link limit} characters written to a stream. Used to attach
 * stderr context to failures without buffering unbounded output.
 */
export class OutputTail {
  private buffer = "";

  constructor(private readonly limit = DEFAULT_TAIL_CHARS) {}

  append(chunk: string | Buffer): void {
    this.buffer += typeof chunk === "string" ? chunk : chunk.toString("utf8");
    if (this.buffer.length > this.limit) {
      this.buffer = this.buffer.slice(this.buffer.length - this.limit);
    }
  }

  toString(): string {
    return this.buffer.trim();
  }
}
